import { describe, it, expect, vi } from 'vitest';
import { createLogger, withFields } from '../../src/utils/logger.js';
import type { LogFormat, Logger, LogLevel } from '../../src/utils/logger.js';

// ---------------------------------------------------------------------------
// ヘルパー
// ---------------------------------------------------------------------------

const FIXED_NOW = (): Date => new Date('2026-01-02T03:04:05.000Z');

function capture(level: LogLevel, format: LogFormat): { lines: string[]; logger: Logger } {
  const lines: string[] = [];
  const logger = createLogger({ level, format, now: FIXED_NOW, write: (line) => lines.push(line) });
  return { lines, logger };
}

// ---------------------------------------------------------------------------
// テスト
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('設定レベル未満の出力は捨てる', () => {
    const { lines, logger } = capture('warn', 'json');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(lines.map((line) => JSON.parse(line).message)).toEqual(['w', 'e']);
  });

  it('json 形式は 1 行 1 オブジェクトで meta を展開する', () => {
    const { lines, logger } = capture('debug', 'json');

    logger.info('instance started', { agentHostId: 'h1', port: 443 });

    expect(lines).toEqual([
      '{"timestamp":"2026-01-02T03:04:05.000Z","level":"info","message":"instance started","agentHostId":"h1","port":443}',
    ]);
  });

  it('text 形式はレベルを色付きで出し、meta は末尾に JSON で付ける', () => {
    const { lines, logger } = capture('debug', 'text');

    logger.warn('slow agent', { agentHostId: 'h1' });
    logger.error('no meta');

    expect(lines).toEqual([
      '\x1b[33m[2026-01-02T03:04:05.000Z] WARN \x1b[0m slow agent {"agentHostId":"h1"}',
      '\x1b[31m[2026-01-02T03:04:05.000Z] ERROR\x1b[0m no meta',
    ]);
  });
});

describe('withFields', () => {
  it('固定フィールドを meta に足し、同じキーは呼び出し側を優先する', () => {
    const base: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const logger = withFields(base, { agentHostId: 'h1', templateId: 't1' });

    logger.warn('Config generation warning', { warning: 'w1' });
    logger.error('failed', { templateId: 't2' });
    logger.info('bare');

    expect(base.warn).toHaveBeenCalledWith('Config generation warning', {
      agentHostId: 'h1',
      templateId: 't1',
      warning: 'w1',
    });
    expect(base.error).toHaveBeenCalledWith('failed', { agentHostId: 'h1', templateId: 't2' });
    expect(base.info).toHaveBeenCalledWith('bare', { agentHostId: 'h1', templateId: 't1' });
  });
});
