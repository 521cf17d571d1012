/**
 * corepipe — JSON helpers
 *
 * 型ガードと JSONC（コメント・末尾カンマ付き JSON）の読み込み。
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ============================================================
// 型ガード
// ============================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/** unknown から文字列を取り出す。文字列以外は空文字。 */
export function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/** 数値（または数値文字列）を整数として取り出す。取り出せなければ 0。 */
export function asInt(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return Number.parseInt(value, 10);
  return 0;
}

export function asBool(value: unknown): boolean {
  return value === true;
}

// ============================================================
// JSONC
// ============================================================

/** 文字列リテラルの終端（閉じ `"` の位置）を返す。 */
function stringEnd(input: string, start: number): number {
  let j = start + 1;
  while (j < input.length) {
    if (input[j] === '\\') {
      j += 2;
      continue;
    }
    if (input[j] === '"') return j;
    j++;
  }
  return input.length;
}

/**
 * `//` と `/* *\/` コメントを取り除く。文字列リテラル内はそのまま保持する。
 */
export function stripJsonComments(input: string): string {
  let out = '';
  let i = 0;
  const len = input.length;

  while (i < len) {
    const ch = input[i];
    const next = input[i + 1];

    if (ch === '"') {
      const end = stringEnd(input, i);
      out += input.slice(i, end + 1);
      i = end + 1;
      continue;
    }

    if (ch === '/' && next === '/') {
      while (i < len && input[i] !== '\n') i++;
      continue;
    }

    if (ch === '/' && next === '*') {
      const end = input.indexOf('*/', i + 2);
      i = end === -1 ? len : end + 2;
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

/** `]` `}` 直前の末尾カンマを取り除く。 */
export function stripTrailingCommas(input: string): string {
  let out = '';
  let i = 0;
  const len = input.length;

  while (i < len) {
    const ch = input[i];

    if (ch === '"') {
      const end = stringEnd(input, i);
      out += input.slice(i, end + 1);
      i = end + 1;
      continue;
    }

    if (ch === ',') {
      let j = i + 1;
      while (j < len && /\s/.test(input.charAt(j))) j++;
      if (input[j] === ']' || input[j] === '}') {
        i++;
        continue;
      }
    }

    out += ch;
    i++;
  }

  return out;
}

/**
 * JSONC 文字列をパースする。構文エラーは SyntaxError をそのまま投げる。
 */
export function parseJsonc(input: string): unknown {
  return JSON.parse(stripTrailingCommas(stripJsonComments(input)));
}

/**
 * `*_json` カラムを配列として読む。壊れた JSON や配列以外は空配列、
 * guard を通らない要素は捨てる。
 */
export function parseJsonArray<T>(text: string, guard: (value: unknown) => value is T): T[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return [];
  }
  return Array.isArray(parsed) ? parsed.filter(guard) : [];
}

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}
