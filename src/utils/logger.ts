/**
 * corepipe — Logger
 *
 * レベルと形式（text / json）は環境変数で切り替える。
 * stdout は MCP の stdio トランスポートが使うため、既定の出力先は stderr。
 */

import { config } from '../config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogFields): void;
  info(message: string, meta?: LogFields): void;
  warn(message: string, meta?: LogFields): void;
  error(message: string, meta?: LogFields): void;
}

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  /** 1 行分（改行なし）を受け取る */
  write?: (line: string) => void;
  now?: () => Date;
}

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const colors: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';

function formatText(timestamp: string, level: LogLevel, message: string, meta: LogFields | undefined): string {
  const head = `${colors[level]}[${timestamp}] ${level.toUpperCase().padEnd(5)}${RESET} ${message}`;
  return meta !== undefined && Object.keys(meta).length > 0 ? `${head} ${JSON.stringify(meta)}` : head;
}

function formatJson(timestamp: string, level: LogLevel, message: string, meta: LogFields | undefined): string {
  return JSON.stringify({ timestamp, level, message, ...meta });
}

export function createLogger(options: LoggerOptions): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());
  const format = options.format === 'json' ? formatJson : formatText;

  const emit = (level: LogLevel) => (message: string, meta?: LogFields) => {
    if (levels[level] < levels[options.level]) return;
    write(format(now().toISOString(), level, message, meta));
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

/**
 * 全呼び出しに fields を付ける Logger を返す。
 * 呼び出し側の meta に同じキーがあればそちらを使う。
 */
export function withFields(base: Logger, fields: LogFields): Logger {
  return {
    debug: (message, meta) => base.debug(message, { ...fields, ...meta }),
    info: (message, meta) => base.info(message, { ...fields, ...meta }),
    warn: (message, meta) => base.warn(message, { ...fields, ...meta }),
    error: (message, meta) => base.error(message, { ...fields, ...meta }),
  };
}

export const logger: Logger = createLogger({ level: config.logLevel, format: config.logFormat });
