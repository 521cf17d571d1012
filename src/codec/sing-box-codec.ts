/**
 * corepipe — sing-box コーデック
 *
 * sing-box の inbounds 配列を Inbound 正規形へ読み込み、
 * 正規形から sing-box のネイティブ JSON を組み立てる。
 */

import type { ConfigCodec, ParseOutcome, SerializeOutcome } from '../types/codec.js';
import type {
  Inbound,
  InboundUser,
  MultiplexSettings,
  RealitySettings,
  TlsSettings,
  TransportSettings,
} from '../types/inbound.js';
import { emptyReality, emptyUser, withRequiredCapabilities } from '../types/inbound.js';
import type { JsonObject, JsonValue } from '../utils/json.js';
import { asBool, asInt, asString, isRecord } from '../utils/json.js';
import {
  compact,
  jsonOrUndefined,
  label,
  readInboundElements,
  sniffInboundElements,
  stringList,
  stringMap,
} from './common.js';

/** Inbound.options として保持・出力するトップレベルキー */
export const SING_BOX_OPTION_KEYS: readonly string[] = [
  'method',
  'password',
  'network',
  'version',
  'detour',
  'handshake',
  'congestion_control',
  'zero_rtt_handshake',
  'ignore_client_bandwidth',
  'up_mbps',
  'down_mbps',
  'obfs',
  'masquerade',
];

export const VISION_FLOW = 'xtls-rprx-vision';
export const DEFAULT_SHADOWSOCKS_METHOD = 'aes-256-gcm';

const SING_BOX_TRANSPORTS: readonly string[] = ['ws', 'grpc', 'http', 'httpupgrade', 'quic'];

// ============================================================
// 検出
// ============================================================

/** inbounds 要素が type を持ち、Xray 固有キーを持たなければ sing-box とみなす */
export function canParseSingBox(raw: string): boolean {
  const elements = sniffInboundElements(raw);
  if (elements === undefined || elements.length === 0) return false;
  const hasType = elements.some((el) => typeof el.type === 'string');
  const hasXrayKeys = elements.some((el) => 'protocol' in el || 'streamSettings' in el);
  return hasType && !hasXrayKeys;
}

// ============================================================
// パース
// ============================================================

function parseUsers(type: string, value: unknown, where: string, warnings: string[]): InboundUser[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    warnings.push(`${where}: "users" is not an array; users skipped`);
    return [];
  }

  const users: InboundUser[] = [];
  value.forEach((u, i) => {
    if (!isRecord(u)) {
      warnings.push(`${where}: user #${i} is not an object; skipped`);
      return;
    }
    users.push({
      ...emptyUser(),
      uuid: asString(u.uuid),
      // naive / socks / http は username、それ以外は name
      email: asString(u.name) || asString(u.username),
      password: asString(u.password),
      flow: type === 'vless' ? asString(u.flow) : '',
    });
  });
  return users;
}

function parseReality(value: unknown, serverName: string, where: string, warnings: string[]): RealitySettings | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    warnings.push(`${where}: "tls.reality" is not an object; Reality skipped`);
    return undefined;
  }
  if (Object.keys(value).length === 0) return undefined;

  const reality: RealitySettings = {
    ...emptyReality(),
    enabled: asBool(value.enabled),
    shortIds: stringList(value.short_id),
    serverName,
    privateKey: asString(value.private_key),
  };
  if (isRecord(value.handshake)) {
    reality.handshake = {
      server: asString(value.handshake.server),
      serverPort: asInt(value.handshake.server_port),
    };
  } else if (value.handshake !== undefined) {
    warnings.push(`${where}: "tls.reality.handshake" is not an object; handshake skipped`);
  }
  return reality;
}

function parseTls(value: unknown, where: string, warnings: string[]): TlsSettings | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    warnings.push(`${where}: "tls" is not an object; TLS skipped`);
    return undefined;
  }
  if (Object.keys(value).length === 0) return undefined;

  const serverName = asString(value.server_name);
  const tls: TlsSettings = {
    enabled: asBool(value.enabled),
    serverName,
    alpn: stringList(value.alpn),
    certificatePath: asString(value.certificate_path),
    keyPath: asString(value.key_path),
  };
  const reality = parseReality(value.reality, serverName, where, warnings);
  if (reality !== undefined) {
    tls.reality = reality;
  }
  return tls;
}

function parseMultiplex(value: unknown, where: string, warnings: string[]): MultiplexSettings | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    warnings.push(`${where}: "multiplex" is not an object; multiplex skipped`);
    return undefined;
  }
  if (Object.keys(value).length === 0) return undefined;

  const multiplex: MultiplexSettings = {
    enabled: asBool(value.enabled),
    padding: asBool(value.padding),
  };
  if (isRecord(value.brutal)) {
    multiplex.brutal = {
      enabled: asBool(value.brutal.enabled),
      upMbps: asInt(value.brutal.up_mbps),
      downMbps: asInt(value.brutal.down_mbps),
    };
  } else if (value.brutal !== undefined) {
    warnings.push(`${where}: "multiplex.brutal" is not an object; brutal skipped`);
  }
  return multiplex;
}

function parseTransport(value: unknown, where: string, warnings: string[]): TransportSettings | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    warnings.push(`${where}: "transport" is not an object; transport skipped`);
    return undefined;
  }
  if (Object.keys(value).length === 0) return undefined;

  const type = asString(value.type);
  if (type === '') {
    warnings.push(`${where}: "transport.type" is missing; transport skipped`);
    return undefined;
  }

  const headers = stringMap(value.headers);
  // ws は headers.Host、http / httpupgrade は host
  const host = headers['Host'] ?? stringList(value.host)[0] ?? '';
  delete headers['Host'];

  return {
    type,
    path: asString(value.path),
    host,
    serviceName: asString(value.service_name),
    headers,
  };
}

function parseOptions(el: Record<string, unknown>): Record<string, JsonValue> {
  const options: Record<string, JsonValue> = {};
  for (const key of SING_BOX_OPTION_KEYS) {
    const value = jsonOrUndefined(el[key]);
    if (value !== undefined) {
      options[key] = value;
    }
  }
  return options;
}

function parseInbound(el: Record<string, unknown>, index: number, warnings: string[]): Inbound | undefined {
  const type = asString(el.type);
  const tag = asString(el.tag);
  const where = label(tag, index);
  if (type === '') {
    warnings.push(`${where}: missing "type"; skipped`);
    return undefined;
  }

  const options = parseOptions(el);
  let users = parseUsers(type, el.users, where, warnings);

  if (type === 'shadowsocks') {
    const method = asString(options['method']);
    // 単一ユーザー構成: トップレベルの password を 1 ユーザーとして扱う
    if (users.length === 0 && typeof options['password'] === 'string') {
      users = [{ ...emptyUser(), password: options['password'] }];
      delete options['password'];
    }
    users = users.map((u) => ({ ...u, method }));
  }

  const tls = parseTls(el.tls, where, warnings);
  const multiplex = parseMultiplex(el.multiplex, where, warnings);
  const transport = parseTransport(el.transport, where, warnings);

  return withRequiredCapabilities({
    type,
    tag,
    listen: asString(el.listen),
    listenPort: asInt(el.listen_port),
    ...(transport !== undefined ? { transport } : {}),
    ...(tls !== undefined ? { tls } : {}),
    ...(multiplex !== undefined ? { multiplex } : {}),
    users,
    options,
  });
}

/**
 * sing-box 設定（JSON/JSONC）をパースして Inbound[] を返す。
 *
 * 不正な JSON は CodecError。オブジェクトでない要素や壊れたサブ構造は
 * 警告を出して読み捨てる。
 */
export function parseSingBox(filename: string, raw: string): ParseOutcome {
  const elements = readInboundElements(filename, raw, 'sing-box');
  const warnings: string[] = [];
  const inbounds: Inbound[] = [];

  elements.forEach((el, index) => {
    if (!isRecord(el)) {
      warnings.push(`inbound #${index}: not an object; skipped`);
      return;
    }
    const inbound = parseInbound(el, index, warnings);
    if (inbound !== undefined) {
      inbounds.push(inbound);
    }
  });

  return { inbounds, warnings };
}

// ============================================================
// シリアライズ
// ============================================================

function serializeUsers(inbound: Inbound): JsonObject[] {
  const realityOn = inbound.tls?.reality?.enabled === true;

  return inbound.users.map((u) => {
    switch (inbound.type) {
      case 'vless':
        // flow は Reality と組み合わせたときだけ書く
        return compact({ name: u.email, uuid: u.uuid, flow: realityOn ? u.flow || VISION_FLOW : '' });
      case 'vmess':
        return compact({ name: u.email, uuid: u.uuid, alterId: 0 });
      case 'trojan':
      case 'hysteria2':
      case 'shadowsocks':
        return compact({ name: u.email, password: u.password });
      case 'tuic':
        return compact({ name: u.email, uuid: u.uuid, password: u.password });
      case 'naive':
      case 'socks':
      case 'http':
      case 'mixed':
        return compact({ username: u.email, password: u.password });
      default:
        return compact({ name: u.email, uuid: u.uuid, password: u.password });
    }
  });
}

function serializeTls(inbound: Inbound, where: string, warnings: string[]): JsonObject | undefined {
  const tls = inbound.tls;
  if (tls === undefined) return undefined;

  const reality = tls.reality;
  const serverName = reality?.enabled === true && reality.serverName !== '' ? reality.serverName : tls.serverName;
  const out = compact({
    enabled: tls.enabled,
    server_name: serverName,
    alpn: tls.alpn,
    certificate_path: tls.certificatePath,
    key_path: tls.keyPath,
  });

  if (reality !== undefined) {
    const realityOut = compact({
      enabled: reality.enabled,
      private_key: reality.privateKey,
      short_id: reality.shortIds,
    });
    if (reality.handshake !== undefined) {
      realityOut['handshake'] = {
        server: reality.handshake.server,
        server_port: reality.handshake.serverPort,
      };
    }
    out['reality'] = realityOut;

    if (reality.alternateServerNames.length > 0) {
      warnings.push(
        `${where}: Reality server names ${reality.alternateServerNames.join(', ')} dropped (sing-box accepts a single server_name)`,
      );
    }
    if (reality.fingerprint !== '' || reality.publicKey !== '') {
      warnings.push(`${where}: Reality client fingerprint/public key dropped (no sing-box inbound equivalent)`);
    }
  }
  return out;
}

function serializeMultiplex(multiplex: MultiplexSettings): JsonObject {
  const out: JsonObject = { enabled: multiplex.enabled, padding: multiplex.padding };
  if (multiplex.brutal !== undefined) {
    out['brutal'] = {
      enabled: multiplex.brutal.enabled,
      up_mbps: multiplex.brutal.upMbps,
      down_mbps: multiplex.brutal.downMbps,
    };
  }
  return out;
}

function serializeTransport(transport: TransportSettings, where: string, warnings: string[]): JsonObject | undefined {
  if (!SING_BOX_TRANSPORTS.includes(transport.type)) {
    warnings.push(`${where}: transport '${transport.type}' has no sing-box equivalent; dropped`);
    return undefined;
  }

  switch (transport.type) {
    case 'ws': {
      const headers: Record<string, string> = { ...transport.headers };
      if (transport.host !== '') headers['Host'] = transport.host;
      const out = compact({ type: 'ws', path: transport.path });
      if (Object.keys(headers).length > 0) out['headers'] = headers;
      return out;
    }
    case 'grpc':
      return compact({ type: 'grpc', service_name: transport.serviceName });
    case 'http':
      return compact({ type: 'http', path: transport.path, host: transport.host !== '' ? [transport.host] : undefined });
    case 'httpupgrade':
      return compact({ type: 'httpupgrade', path: transport.path, host: transport.host });
    default:
      return { type: transport.type };
  }
}

/**
 * network の値を sing-box の表記に寄せる。両方（Xray の "tcp,udp"）は省略を表す ''。
 * tcp / udp 以外を含む値は undefined。
 */
function serializeNetwork(value: JsonValue): string | undefined {
  if (typeof value !== 'string') return undefined;
  const parts = new Set(
    value
      .split(',')
      .map((p) => p.trim().toLowerCase())
      .filter((p) => p !== ''),
  );
  if ([...parts].some((p) => p !== 'tcp' && p !== 'udp')) return undefined;
  return parts.size === 1 ? [...parts][0] : '';
}

/**
 * Inbound 1 件を sing-box のネイティブ inbound オブジェクトにする。
 * 表現できない項目は warnings に積んで落とす。
 */
export function serializeSingBoxInbound(inbound: Inbound, warnings: string[], index = 0): JsonObject {
  const where = label(inbound.tag, index);
  const out: JsonObject = {
    type: inbound.type,
    tag: inbound.tag,
    listen: inbound.listen || '::',
    listen_port: inbound.listenPort,
  };

  const handled = new Set<string>();
  if (inbound.type === 'shadowsocks') {
    handled.add('method');
    handled.add('password');
    const method =
      asString(inbound.options['method']) ||
      inbound.users.find((u) => u.method !== '')?.method ||
      DEFAULT_SHADOWSOCKS_METHOD;
    out['method'] = method;

    const serverPassword = asString(inbound.options['password']);
    const users = serializeUsers(inbound);
    if (serverPassword !== '') {
      out['password'] = serverPassword;
      if (users.length > 0) out['users'] = users;
    } else if (inbound.users.length === 1) {
      out['password'] = inbound.users[0].password;
    } else if (users.length > 0) {
      out['users'] = users;
    }
  } else {
    const users = serializeUsers(inbound);
    if (users.length > 0) out['users'] = users;
  }

  for (const [key, value] of Object.entries(inbound.options)) {
    if (handled.has(key)) continue;
    if (key === 'network') {
      const network = serializeNetwork(value);
      if (network === undefined) {
        const shown = typeof value === 'string' ? value : JSON.stringify(value);
        warnings.push(`${where}: network '${shown}' has no sing-box equivalent; dropped`);
      } else if (network !== '') {
        out['network'] = network;
      }
    } else if (SING_BOX_OPTION_KEYS.includes(key)) {
      out[key] = value;
    } else {
      warnings.push(`${where}: option '${key}' has no sing-box equivalent; dropped`);
    }
  }

  const tls = serializeTls(inbound, where, warnings);
  if (tls !== undefined) out['tls'] = tls;

  if (inbound.multiplex !== undefined) {
    out['multiplex'] = serializeMultiplex(inbound.multiplex);
  }

  if (inbound.transport !== undefined) {
    const transport = serializeTransport(inbound.transport, where, warnings);
    if (transport !== undefined) out['transport'] = transport;
  }

  return out;
}

export function serializeSingBox(inbounds: Inbound[]): SerializeOutcome {
  const warnings: string[] = [];
  return {
    inbounds: inbounds.map((inbound, i) => serializeSingBoxInbound(inbound, warnings, i)),
    warnings,
  };
}

export const singBoxCodec: ConfigCodec = {
  engine: 'sing-box',
  canParse: canParseSingBox,
  parse: parseSingBox,
  serialize: serializeSingBox,
  serializeInbound: serializeSingBoxInbound,
};
