import { describe, it, expect } from 'vitest';
import { separateClosingBraces, TemplateEngine } from '../../src/template/engine.js';
import { createSampleContext } from '../../src/template/sample-context.js';
import { TemplateError } from '../../src/utils/errors.js';

function captureError(fn: () => unknown): TemplateError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TemplateError) return err;
    throw err;
  }
  throw new Error('expected TemplateError');
}

describe('TemplateEngine', () => {
  const engine = new TemplateEngine();

  it('render - 出力を 2 スペースの JSON に整形し直す', () => {
    const output = engine.render('{"port": {{add 1 2}}, "tag": {{quote agent.name}}}', createSampleContext());

    expect(output).toBe('{\n  "port": 3,\n  "tag": "sample-agent"\n}');
  });

  it('JSON オブジェクトの末尾でマスタッシュの直後に } が続いても描画できる', () => {
    const ctx = createSampleContext();

    expect(engine.render('{"a": {{quote agent.name}}}', ctx)).toBe('{\n  "a": "sample-agent"\n}');
    expect(engine.renderRaw('{"n": {{len users}}}', ctx)).toBe('{"n": 2 }');
    expect(() => engine.checkSyntax('{"inbounds": {"x": {{len users}}}}')).not.toThrow();
  });

  it('renderRaw - JSON 検証をせずに描画する', () => {
    expect(engine.renderRaw('{{upper agent.coreType}}', createSampleContext())).toBe('SING-BOX');
  });

  it('構文エラーは syntax 種別の TemplateError', () => {
    const err = captureError(() => engine.render('{{#each inbounds}}', createSampleContext()));

    expect(err.kind).toBe('syntax');
    expect(err.message).toMatch(/^template syntax error: /);
  });

  it('解決できないプレースホルダーは execution 種別の TemplateError', () => {
    const err = captureError(() => engine.render('{"x": {{missingField}}}', createSampleContext()));

    expect(err.kind).toBe('execution');
    expect(err.message).toMatch(/^template execution error: /);
  });

  it('JSON でない出力は invalid_json 種別の TemplateError', () => {
    const err = captureError(() => engine.render('not json', createSampleContext()));

    expect(err.kind).toBe('invalid_json');
    expect(err.message).toMatch(/^invalid JSON output: /);
  });

  it('値は HTML エスケープしない', () => {
    const ctx = createSampleContext();
    ctx.agent.name = 'a<b>&c';

    expect(engine.renderRaw('{{agent.name}}', ctx)).toBe('a<b>&c');
  });

  it('render - inbound 変換の警告を渡した配列に積む', () => {
    const ctx = createSampleContext();
    ctx.inbounds[1].options = { method: '2022-blake3-aes-128-gcm', foo: 1 };
    const warnings: string[] = [];

    const content = '[{{#each inbounds}}{{json (singboxInbound this)}}{{#unless @last}},{{/unless}}{{/each}}]';

    engine.render(content, ctx, warnings);

    expect(warnings).toEqual([`inbound 'ss-in': option 'foo' has no sing-box equivalent; dropped`]);
  });

  it('addHelper - 追加したヘルパーを呼べる', () => {
    const custom = new TemplateEngine();
    custom.addHelper('shout', (s) => `${String(s)}!`);

    expect(custom.renderRaw('{{shout agent.id}}', createSampleContext())).toBe('sample-agent!');
  });
});

describe('separateClosingBraces', () => {
  it('マスタッシュ直後の } の前に空白を入れる', () => {
    expect(separateClosingBraces('{"a": {{x}}}')).toBe('{"a": {{x}} }');
  });

  it('{{{ }}} で開いたマスタッシュには手を入れない', () => {
    expect(separateClosingBraces('{{{x}}}')).toBe('{{{x}}}');
  });

  it('ブロックコメントは --}} までを 1 つのマスタッシュとして扱う', () => {
    expect(separateClosingBraces('{{!-- }} --}}}')).toBe('{{!-- }} --}} }');
  });

  it('閉じていないマスタッシュ以降はそのまま残す', () => {
    expect(separateClosingBraces('{"a": {{x}')).toBe('{"a": {{x}');
  });
});
