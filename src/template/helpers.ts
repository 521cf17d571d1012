/**
 * corepipe — テンプレートヘルパー
 *
 * Handlebars に登録する組み込みヘルパー。テンプレートから渡る値は unknown なので、
 * 各ヘルパーは型ガードで取り出してから使う。
 */

import type { Inbound, InboundUser } from '../types/inbound.js';
import { isInbound } from '../types/inbound.js';
import type { ProtocolUser, TemplateUser } from '../types/template.js';
import type { JsonObject, JsonValue } from '../utils/json.js';
import { isRecord } from '../utils/json.js';
import { serializeSingBoxInbound, VISION_FLOW } from '../codec/sing-box-codec.js';
import { serializeXrayInbound } from '../codec/xray-codec.js';

export type TemplateHelper = (...args: unknown[]) => unknown;

export const DEFAULT_API_LISTEN = '127.0.0.1:10085';

// ============================================================
// 型ガード
// ============================================================

function isTemplateUser(value: unknown): value is TemplateUser {
  return (
    isRecord(value) &&
    typeof value.uuid === 'string' &&
    typeof value.email === 'string' &&
    typeof value.enabled === 'boolean'
  );
}

function toUsers(value: unknown): TemplateUser[] {
  return Array.isArray(value) ? value.filter(isTemplateUser) : [];
}

function toInbounds(value: unknown): Inbound[] {
  return Array.isArray(value) ? value.filter(isInbound) : [];
}

function toStrings(value: unknown): string[] {
  return Array.isArray(value) ? value.map((v) => String(v)) : [];
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isNaN(n) ? 0 : n;
  }
  return 0;
}

function toText(value: unknown): string {
  return value === undefined || value === null ? '' : String(value);
}

// ============================================================
// ユーザー・タグ
// ============================================================

/**
 * 有効なユーザーをプロトコル向けに整形する。
 * shadowsocks / trojan / hysteria2 / tuic は UUID をパスワードとして使う。
 */
export function usersForProtocol(users: TemplateUser[], protocol: string): ProtocolUser[] {
  const result: ProtocolUser[] = [];
  for (const u of users) {
    if (!u.enabled) continue;
    const user: ProtocolUser = { name: u.email, uuid: u.uuid };
    switch (protocol) {
      case 'shadowsocks':
        user.password = u.uuid;
        delete user.uuid;
        break;
      case 'trojan':
      case 'hysteria2':
      case 'tuic':
        user.password = u.uuid;
        break;
      case 'vless':
        user.flow = VISION_FLOW;
        break;
    }
    result.push(user);
  }
  return result;
}

/** 統計対象ユーザー（有効かつ email あり） */
export function statsUsers(users: TemplateUser[]): string[] {
  return users.filter((u) => u.enabled && u.email !== '').map((u) => u.email);
}

export function inboundTags(inbounds: Inbound[]): string[] {
  return inbounds.filter((i) => i.tag !== '').map((i) => i.tag);
}

/** テンプレートユーザーを inbound のユーザーとして埋め込む */
function withContextUsers(inbound: Inbound, users: TemplateUser[] | undefined): Inbound {
  if (users === undefined) return inbound;
  const injected: InboundUser[] = usersForProtocol(users, inbound.type).map((u) => ({
    uuid: u.uuid ?? '',
    email: u.name,
    password: u.password ?? '',
    flow: u.flow ?? '',
    method: '',
  }));
  return { ...inbound, users: injected };
}

// ============================================================
// 既定ブロック
// ============================================================

export function v2rayApiConfig(listenAddr: string, inbounds: Inbound[], users: TemplateUser[]): JsonObject {
  return {
    listen: listenAddr || DEFAULT_API_LISTEN,
    stats: {
      enabled: true,
      inbounds: inboundTags(inbounds),
      users: statsUsers(users),
      outbounds: ['direct'],
    },
  };
}

export function defaultDns(): JsonObject {
  return {
    servers: [{ tag: 'dns-direct', address: 'local', detour: 'direct' }],
  };
}

export function defaultRoute(inbounds: Inbound[]): JsonObject {
  return {
    rules: [{ inbound: inboundTags(inbounds), outbound: 'direct' }],
    final: 'direct',
  };
}

/** "host:port" から Xray の API 設定一式を作る */
export function xrayApiConfig(listenAddr: string): JsonObject {
  const listen = listenAddr || DEFAULT_API_LISTEN;
  let host = '127.0.0.1';
  let port = 10085;
  const idx = listen.lastIndexOf(':');
  if (idx > 0) {
    host = listen.slice(0, idx);
    const parsed = Number.parseInt(listen.slice(idx + 1), 10);
    if (parsed > 0) port = parsed;
  }

  return {
    stats: {},
    api: { tag: 'api', listen, services: ['StatsService'] },
    policy: {
      levels: { '0': { statsUserUplink: true, statsUserDownlink: true } },
      system: {
        statsInboundUplink: true,
        statsInboundDownlink: true,
        statsOutboundUplink: true,
        statsOutboundDownlink: true,
      },
    },
    apiInbound: {
      tag: 'api',
      port,
      listen: host,
      protocol: 'dokodemo-door',
      settings: { address: host },
    },
    apiRoutingRule: { inboundTag: ['api'], outboundTag: 'api' },
  };
}

export function xrayDefaultOutbounds(): JsonObject[] {
  return [
    { protocol: 'freedom', tag: 'direct' },
    { protocol: 'blackhole', tag: 'block' },
  ];
}

export function xrayDefaultRouting(): JsonObject {
  return {
    domainStrategy: 'AsIs',
    rules: [{ type: 'field', inboundTag: ['api'], outboundTag: 'api' }],
  };
}

// ============================================================
// inbound のネイティブ化
// ============================================================

export type WarningSink = (warning: string) => void;

function nativeInbound(
  serialize: (inbound: Inbound, warnings: string[]) => JsonObject | undefined,
  sink: WarningSink,
): TemplateHelper {
  return (inbound, users) => {
    if (!isInbound(inbound)) return null;
    const injected = withContextUsers(inbound, users === undefined ? undefined : toUsers(users));
    const warnings: string[] = [];
    const native: JsonValue | undefined = serialize(injected, warnings);
    for (const warning of warnings) sink(warning);
    return native ?? null;
  };
}

/**
 * singboxInbound / xrayInbound。変換で落ちた項目の警告は sink に渡す。
 * Xray で動かないプロトコルは null になる。
 */
export function inboundHelpers(sink: WarningSink): Record<string, TemplateHelper> {
  return {
    singboxInbound: nativeInbound(serializeSingBoxInbound, sink),
    xrayInbound: nativeInbound(serializeXrayInbound, sink),
  };
}

// ============================================================
// 登録用テーブル
// ============================================================

function sequence(value: unknown): unknown[] | string | undefined {
  if (Array.isArray(value) || typeof value === 'string') return value;
  return undefined;
}

/**
 * 組み込みヘルパー一覧。呼び出し時の末尾 options 引数は登録側で取り除く。
 */
export const BUILTIN_HELPERS: Readonly<Record<string, TemplateHelper>> = Object.freeze({
  json: (v) => JSON.stringify(v ?? null),
  jsonIndent: (v) => JSON.stringify(v ?? null, null, 2),
  default: (def, val) => (val === undefined || val === null || val === '' || val === 0 ? def : val),
  join: (sep, items) => toStrings(items).join(toText(sep)),
  contains: (items, item) => toStrings(items).includes(toText(item)),
  quote: (s) => JSON.stringify(toText(s)),

  usersForProtocol: (users, protocol) => usersForProtocol(toUsers(users), toText(protocol)),
  statsUsers: (users) => statsUsers(toUsers(users)),
  inboundTags: (inbounds) => inboundTags(toInbounds(inbounds)),

  add: (a, b) => toNumber(a) + toNumber(b),
  sub: (a, b) => toNumber(a) - toNumber(b),
  mul: (a, b) => toNumber(a) * toNumber(b),
  div: (a, b) => (toNumber(b) === 0 ? 0 : Math.trunc(toNumber(a) / toNumber(b))),

  eq: (a, b) => a === b,
  ne: (a, b) => a !== b,
  gt: (a, b) => toNumber(a) > toNumber(b),
  lt: (a, b) => toNumber(a) < toNumber(b),
  ge: (a, b) => toNumber(a) >= toNumber(b),
  le: (a, b) => toNumber(a) <= toNumber(b),

  and: (a, b) => Boolean(a) && Boolean(b),
  or: (a, b) => Boolean(a) || Boolean(b),
  not: (a) => !a,

  lower: (s) => toText(s).toLowerCase(),
  upper: (s) => toText(s).toUpperCase(),
  trim: (s) => toText(s).trim(),
  replace: (s, from, to) => toText(s).split(toText(from)).join(toText(to)),
  hasPrefix: (s, prefix) => toText(s).startsWith(toText(prefix)),
  hasSuffix: (s, suffix) => toText(s).endsWith(toText(suffix)),

  first: (items) => {
    const seq = sequence(items);
    return seq !== undefined && seq.length > 0 ? seq[0] : null;
  },
  last: (items) => {
    const seq = sequence(items);
    return seq !== undefined && seq.length > 0 ? seq[seq.length - 1] : null;
  },
  len: (items) => sequence(items)?.length ?? 0,
  isLast: (index, length) => toNumber(index) === toNumber(length) - 1,
  isFirst: (index) => toNumber(index) === 0,

  hasCap: (capabilities, cap) => toStrings(capabilities).includes(toText(cap)),
  filterByType: (inbounds, type) => toInbounds(inbounds).filter((i) => i.type === toText(type)),

  v2rayApiConfig: (listen, inbounds, users) => v2rayApiConfig(toText(listen), toInbounds(inbounds), toUsers(users)),
  xrayApiConfig: (listen) => xrayApiConfig(toText(listen)),
  defaultDns: () => defaultDns(),
  defaultRoute: (inbounds) => defaultRoute(toInbounds(inbounds)),
  xrayDefaultOutbounds: () => xrayDefaultOutbounds(),
  xrayDefaultRouting: () => xrayDefaultRouting(),
});
