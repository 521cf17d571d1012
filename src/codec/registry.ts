/**
 * corepipe — Converter Registry
 *
 * エンジン名でコーデックを選び、パース・変換・自動判定を行う。
 * CoreEngine は閉じた union なので、ディスパッチは never で網羅性を検査する。
 */

import type { ConfigCodec, ParseOutcome } from '../types/codec.js';
import type { CoreEngine, Inbound } from '../types/inbound.js';
import { CORE_ENGINES } from '../types/inbound.js';
import { CodecError, ValidationError } from '../utils/errors.js';
import { singBoxCodec } from './sing-box-codec.js';
import { xrayCodec } from './xray-codec.js';
import { toJsonText } from './common.js';

/** 変換結果（ネイティブ JSON テキスト + 変換で失われた項目の警告） */
export interface ConvertOutcome {
  raw: string;
  warnings: string[];
}

/** 自動判定付きパースの結果 */
export interface DetectedParseOutcome extends ParseOutcome {
  engine: CoreEngine;
}

/** 大文字小文字・前後空白を無視して CoreEngine に正規化する。不明なら undefined。 */
export function normalizeCoreEngine(name: string): CoreEngine | undefined {
  const normalized = name.trim().toLowerCase();
  if (normalized === 'singbox' || normalized === 'sing_box') return 'sing-box';
  return CORE_ENGINES.find((engine) => engine === normalized);
}

/** 不明なエンジン名は ValidationError */
export function parseCoreEngine(name: string): CoreEngine {
  const engine = normalizeCoreEngine(name);
  if (engine === undefined) {
    throw new ValidationError(`unknown core engine: '${name}' (expected one of ${CORE_ENGINES.join(', ')})`);
  }
  return engine;
}

export function codecFor(engine: CoreEngine): ConfigCodec {
  switch (engine) {
    case 'sing-box':
      return singBoxCodec;
    case 'xray':
      return xrayCodec;
    default: {
      const _exhaustive: never = engine;
      throw new ValidationError(`unknown core engine: ${String(_exhaustive)}`);
    }
  }
}

/** 指定エンジンの形式としてパースする */
export function parse(raw: string, sourceEngine: CoreEngine, filename = 'config.json'): ParseOutcome {
  return codecFor(sourceEngine).parse(filename, raw);
}

/**
 * Inbound[] をターゲット形式の `{ "inbounds": [...] }` にする。
 * 変換は損失ありで、失われた項目は warnings に入る。
 */
export function convert(inbounds: Inbound[], targetEngine: CoreEngine): ConvertOutcome {
  const { inbounds: native, warnings } = codecFor(targetEngine).serialize(inbounds);
  return { raw: toJsonText({ inbounds: native }), warnings };
}

/**
 * 形式を自動判定する。Xray 固有キーを先に見る。
 * どちらとも判定できなければ undefined。
 */
export function detect(raw: string): CoreEngine | undefined {
  if (xrayCodec.canParse(raw)) return 'xray';
  if (singBoxCodec.canParse(raw)) return 'sing-box';
  return undefined;
}

/** 自動判定してからパースする。判定できなければ CodecError。 */
export function parseAny(filename: string, raw: string): DetectedParseOutcome {
  const engine = detect(raw);
  if (engine === undefined) {
    throw new CodecError(`${filename}: could not detect configuration format`);
  }
  return { engine, ...codecFor(engine).parse(filename, raw) };
}

/** 入力検証つきの変換（source → 正規形 → target）。パース時の警告も返す。 */
export function convertConfig(sourceEngine: string, targetEngine: string, raw: string): ConvertOutcome {
  if (sourceEngine.trim() === '') throw new ValidationError('source engine is required');
  if (targetEngine.trim() === '') throw new ValidationError('target engine is required');
  if (raw.trim() === '') throw new ValidationError('config is required');

  const source = parseCoreEngine(sourceEngine);
  const target = parseCoreEngine(targetEngine);

  const parsed = parse(raw, source);
  const converted = convert(parsed.inbounds, target);
  return { raw: converted.raw, warnings: [...parsed.warnings, ...converted.warnings] };
}
