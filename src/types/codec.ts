/**
 * corepipe — Codec types
 *
 * コーデックは DB にもエージェントにも依存しない。
 * パース結果と警告をまとめた中間表現を返す。
 */

import type { CoreEngine, Inbound } from './inbound.js';
import type { JsonObject } from '../utils/json.js';

/** パース結果（警告は要素単位のスキップ・部分的な読み捨てを表す） */
export interface ParseOutcome {
  inbounds: Inbound[];
  warnings: string[];
}

/** シリアライズ結果（ターゲット形式で表現できなかった項目は警告になる） */
export interface SerializeOutcome {
  inbounds: JsonObject[];
  warnings: string[];
}

export interface ConfigCodec {
  readonly engine: CoreEngine;
  /** ベストエフォートの判定。例外は投げない。 */
  canParse(raw: string): boolean;
  /** 不正な JSON は CodecError を投げる */
  parse(filename: string, raw: string): ParseOutcome;
  serialize(inbounds: Inbound[]): SerializeOutcome;
  /** 1 件分のネイティブ表現。表現できない inbound は undefined。 */
  serializeInbound(inbound: Inbound, warnings: string[], index?: number): JsonObject | undefined;
}
