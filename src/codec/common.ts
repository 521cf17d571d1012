/**
 * corepipe — コーデック共通処理
 */

import type { CoreEngine } from '../types/inbound.js';
import { CodecError } from '../utils/errors.js';
import type { JsonObject, JsonValue } from '../utils/json.js';
import { isJsonValue, isRecord, parseJsonc } from '../utils/json.js';

/**
 * JSON/JSONC をパースし、inbounds 配列を取り出す。
 * トップレベルの配列と `{ "inbounds": [...] }` の両方を受け付ける。
 */
export function readInboundElements(filename: string, raw: string, engine: CoreEngine): unknown[] {
  let doc: unknown;
  try {
    doc = parseJsonc(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CodecError(`${engine}: invalid JSON in ${filename}: ${message}`);
  }

  if (Array.isArray(doc)) {
    return doc;
  }
  if (isRecord(doc)) {
    if (doc.inbounds === undefined) {
      return [];
    }
    if (Array.isArray(doc.inbounds)) {
      return doc.inbounds;
    }
    throw new CodecError(`${engine}: "inbounds" in ${filename} is not an array`);
  }
  throw new CodecError(`${engine}: ${filename} must be an object or an array of inbounds`);
}

/** 検出用: パースできなければ undefined を返す（canParse は例外を投げない） */
export function sniffInboundElements(raw: string): Record<string, unknown>[] | undefined {
  let doc: unknown;
  try {
    doc = parseJsonc(raw);
  } catch {
    return undefined;
  }
  const elements = Array.isArray(doc) ? doc : isRecord(doc) ? doc.inbounds : undefined;
  if (!Array.isArray(elements)) {
    return undefined;
  }
  return elements.filter(isRecord);
}

/** 警告メッセージ用の inbound ラベル */
export function label(tag: string, index: number): string {
  return tag !== '' ? `inbound '${tag}'` : `inbound #${index}`;
}

/** 空文字・空配列・undefined のキーを落としたオブジェクトを返す */
export function compact(entries: Record<string, JsonValue | undefined>): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value === undefined || value === '') continue;
    if (Array.isArray(value) && value.length === 0) continue;
    out[key] = value;
  }
  return out;
}

/** unknown を JSON 値として取り出す。表現できなければ undefined。 */
export function jsonOrUndefined(value: unknown): JsonValue | undefined {
  return isJsonValue(value) ? value : undefined;
}

/** 文字列または文字列配列を配列にそろえる */
export function stringList(value: unknown): string[] {
  if (typeof value === 'string') return value === '' ? [] : [value];
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string');
  return [];
}

/** 文字列値だけを残したヘッダーマップ */
export function stringMap(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(value)) return out;
  for (const [key, v] of Object.entries(value)) {
    if (typeof v === 'string') out[key] = v;
  }
  return out;
}

/** 整形済み JSON テキスト（2 スペース） */
export function toJsonText(value: JsonValue): string {
  return JSON.stringify(value, null, 2);
}
