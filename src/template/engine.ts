/**
 * corepipe — Template Engine
 *
 * Handlebars テンプレートをコンテキストで描画し、JSON として検証・整形する。
 * strict モードでコンパイルするため、解決できないプレースホルダーは描画エラーになる。
 */

import Handlebars from 'handlebars';
import type { TemplateContext } from '../types/template.js';
import { TemplateError } from '../utils/errors.js';
import type { TemplateHelper } from './helpers.js';
import { BUILTIN_HELPERS, inboundHelpers } from './helpers.js';
import { createSampleContext } from './sample-context.js';

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * JSON テンプレートでは `{"port": {{port}}}` のようにマスタッシュの直後に `}` が来る。
 * Handlebars はこの `}}}` を `{{{ }}}` の閉じとして読むので、
 * `{{{` で開いていないマスタッシュの後ろの `}` との間に空白を入れる。
 */
export function separateClosingBraces(content: string): string {
  let out = '';
  let pos = 0;
  while (pos < content.length) {
    const open = content.indexOf('{{', pos);
    if (open === -1) {
      break;
    }
    const triple = content.startsWith('{{{', open);
    const closer = triple ? '}}}' : content.startsWith('{{!--', open) ? '--}}' : '}}';
    const close = content.indexOf(closer, open + 2);
    if (close === -1) {
      break;
    }
    const end = close + closer.length;
    out += content.slice(pos, end);
    if (!triple && content[end] === '}') {
      out += ' ';
    }
    pos = end;
  }
  return out + content.slice(pos);
}

export class TemplateEngine {
  private readonly hb: typeof Handlebars;
  private readonly knownHelpers: Record<string, boolean> = {};
  /** 描画中だけ設定される、ヘルパーの警告の受け口 */
  private warnings: string[] | undefined;

  constructor() {
    this.hb = Handlebars.create();
    const helpers = {
      ...BUILTIN_HELPERS,
      ...inboundHelpers((warning) => {
        this.warnings?.push(warning);
      }),
    };
    for (const [name, fn] of Object.entries(helpers)) {
      this.addHelper(name, fn);
    }
  }

  /**
   * ヘルパーを登録する。Handlebars が末尾に付ける options 引数は渡さない。
   */
  addHelper(name: string, fn: TemplateHelper): void {
    this.hb.registerHelper(name, (...args: unknown[]) => fn(...args.slice(0, -1)));
    this.knownHelpers[name] = true;
  }

  /** 構文だけを検査する。構文エラーは TemplateError('syntax')。 */
  checkSyntax(content: string): void {
    try {
      this.hb.parse(separateClosingBraces(content));
    } catch (err) {
      throw new TemplateError('syntax', `template syntax error: ${describe(err)}`);
    }
  }

  /**
   * JSON 検証をせずに描画する（デバッグ用）。
   * warnings を渡すと inbound 変換で落ちた項目の警告がそこに積まれる。
   */
  renderRaw(content: string, ctx: TemplateContext, warnings?: string[]): string {
    this.checkSyntax(content);
    this.warnings = warnings;
    try {
      const template = this.hb.compile(separateClosingBraces(content), {
        strict: true,
        noEscape: true,
        knownHelpers: this.knownHelpers,
      });
      return template(ctx);
    } catch (err) {
      throw new TemplateError('execution', `template execution error: ${describe(err)}`);
    } finally {
      this.warnings = undefined;
    }
  }

  /**
   * 描画し、出力が JSON であることを確認して 2 スペースで整形し直す。
   */
  render(content: string, ctx: TemplateContext, warnings?: string[]): string {
    const output = this.renderRaw(content, ctx, warnings);

    let parsed: unknown;
    try {
      parsed = JSON.parse(output);
    } catch (err) {
      throw new TemplateError('invalid_json', `invalid JSON output: ${describe(err)}`);
    }
    return JSON.stringify(parsed, null, 2);
  }

  /** 固定のサンプルコンテキストで描画する（ライブデータには依存しない） */
  previewRender(content: string): string {
    return this.render(content, createSampleContext());
  }
}
