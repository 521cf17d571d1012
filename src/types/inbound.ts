/**
 * corepipe — Canonical inbound model
 *
 * sing-box / Xray のどちらにも依存しない、リスナー 1 つ分の正規形。
 * 各コーデックはこの形へ読み込み、この形から書き出す。
 */

import type { JsonValue } from '../utils/json.js';
import { isRecord } from '../utils/json.js';

// ============================================================
// エンジン
// ============================================================

/** サポートするプロキシエンジン（閉じた集合） */
export const CORE_ENGINES = ['sing-box', 'xray'] as const;

export type CoreEngine = (typeof CORE_ENGINES)[number];

// ============================================================
// 能力トークン
// ============================================================

export const CAPABILITIES = [
  'reality',
  'multiplex',
  'brutal',
  'ech',
  'utls',
  'quic',
  'v2ray_api',
  'wireguard',
  'tun',
  'http3',
  'dhcp',
  'geoip',
  'geosite',
  'xtls',
  'splithttp',
  'meek',
  'mkcp',
  'domainsock',
  'stats',
] as const;

export type Capability = (typeof CAPABILITIES)[number];

export function isCapability(value: string): value is Capability {
  return (CAPABILITIES as readonly string[]).includes(value);
}

// ============================================================
// Inbound のサブ構造
// ============================================================

export interface TransportSettings {
  /** ws | grpc | http | httpupgrade | ... */
  type: string;
  path: string;
  host: string;
  serviceName: string;
  headers: Record<string, string>;
}

export interface RealityHandshake {
  server: string;
  serverPort: number;
}

export interface RealitySettings {
  enabled: boolean;
  shortIds: string[];
  serverName: string;
  /** Xray は serverNames を複数持てる。先頭は serverName に入る。 */
  alternateServerNames: string[];
  fingerprint: string;
  publicKey: string;
  privateKey: string;
  handshake?: RealityHandshake;
}

export interface TlsSettings {
  enabled: boolean;
  serverName: string;
  alpn: string[];
  certificatePath: string;
  keyPath: string;
  reality?: RealitySettings;
}

export interface BrutalSettings {
  enabled: boolean;
  upMbps: number;
  downMbps: number;
}

export interface MultiplexSettings {
  enabled: boolean;
  padding: boolean;
  brutal?: BrutalSettings;
}

/** 欠けている項目は空文字で埋める */
export interface InboundUser {
  uuid: string;
  email: string;
  password: string;
  flow: string;
  method: string;
}

// ============================================================
// Inbound
// ============================================================

export interface Inbound {
  /** vless | vmess | trojan | shadowsocks | hysteria2 | tuic | ... */
  type: string;
  tag: string;
  listen: string;
  listenPort: number;
  transport?: TransportSettings;
  tls?: TlsSettings;
  multiplex?: MultiplexSettings;
  users: InboundUser[];
  /** 構造化された置き場のないプロトコル固有スカラー */
  options: Record<string, JsonValue>;
  /** 実際に値が入っているサブ構造から導出する（宣言値ではない） */
  requiredCapabilities: Capability[];
}

export function emptyUser(): InboundUser {
  return { uuid: '', email: '', password: '', flow: '', method: '' };
}

export function emptyTransport(type: string): TransportSettings {
  return { type, path: '', host: '', serviceName: '', headers: {} };
}

export function emptyTls(): TlsSettings {
  return { enabled: false, serverName: '', alpn: [], certificatePath: '', keyPath: '' };
}

export function emptyReality(): RealitySettings {
  return {
    enabled: false,
    shortIds: [],
    serverName: '',
    alternateServerNames: [],
    fingerprint: '',
    publicKey: '',
    privateKey: '',
  };
}

/**
 * 有効化されたサブ構造から必要な能力を導出する。
 * 順序は reality, multiplex, brutal で固定、重複なし。
 */
export function deriveRequiredCapabilities(inbound: Omit<Inbound, 'requiredCapabilities'>): Capability[] {
  const caps: Capability[] = [];
  if (inbound.tls?.reality?.enabled === true) {
    caps.push('reality');
  }
  if (inbound.multiplex?.enabled === true) {
    caps.push('multiplex');
  }
  if (inbound.multiplex?.brutal?.enabled === true) {
    caps.push('brutal');
  }
  return caps;
}

/** requiredCapabilities を再計算した Inbound を返す */
export function withRequiredCapabilities(inbound: Omit<Inbound, 'requiredCapabilities'>): Inbound {
  return { ...inbound, requiredCapabilities: deriveRequiredCapabilities(inbound) };
}

/** 保存済み JSON やテンプレート引数が Inbound の形をしているか（トップレベルのみ検査） */
export function isInbound(value: unknown): value is Inbound {
  return (
    isRecord(value) &&
    typeof value.type === 'string' &&
    typeof value.tag === 'string' &&
    typeof value.listen === 'string' &&
    typeof value.listenPort === 'number' &&
    Array.isArray(value.users) &&
    isRecord(value.options) &&
    Array.isArray(value.requiredCapabilities)
  );
}

/** ネストしたサブ構造まで含めたディープコピー */
export function cloneInbound(inbound: Inbound): Inbound {
  return structuredClone(inbound);
}
