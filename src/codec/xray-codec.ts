/**
 * corepipe — Xray コーデック
 *
 * Xray の inbounds（protocol / settings / streamSettings）を Inbound 正規形へ
 * 読み込み、正規形から Xray のネイティブ JSON を組み立てる。
 * Xray の設定ファイルはコメント・末尾カンマ付き（JSONC）のことが多い。
 */

import type { ConfigCodec, ParseOutcome, SerializeOutcome } from '../types/codec.js';
import type { Inbound, InboundUser, RealityHandshake, TlsSettings, TransportSettings } from '../types/inbound.js';
import { emptyReality, emptyUser, withRequiredCapabilities } from '../types/inbound.js';
import type { JsonObject, JsonValue } from '../utils/json.js';
import { asInt, asString, isRecord } from '../utils/json.js';
import {
  compact,
  label,
  readInboundElements,
  sniffInboundElements,
  stringList,
  stringMap,
} from './common.js';
import { DEFAULT_SHADOWSOCKS_METHOD, VISION_FLOW } from './sing-box-codec.js';

/** Xray がサーバーとして扱えないプロトコル（変換時は inbound ごと落とす） */
export const XRAY_UNSUPPORTED_PROTOCOLS: readonly string[] = [
  'hysteria',
  'hysteria2',
  'tuic',
  'naive',
  'shadowtls',
  'anytls',
  'mixed',
  'tun',
  'redirect',
  'tproxy',
];

const DEFAULT_REALITY_PORT = 443;

// ============================================================
// 検出
// ============================================================

/** inbounds 要素に protocol または streamSettings があれば Xray とみなす */
export function canParseXray(raw: string): boolean {
  const elements = sniffInboundElements(raw);
  if (elements === undefined) return false;
  return elements.some((el) => 'protocol' in el || 'streamSettings' in el);
}

// ============================================================
// パース
// ============================================================

/** "host:port" を分割する。ポートがなければ 443。 */
export function splitDest(dest: string): RealityHandshake {
  const idx = dest.lastIndexOf(':');
  if (idx === -1) {
    return /^\d+$/.test(dest)
      ? { server: '', serverPort: Number.parseInt(dest, 10) }
      : { server: dest, serverPort: DEFAULT_REALITY_PORT };
  }
  const server = dest.slice(0, idx).replace(/^\[(.*)\]$/, '$1');
  const port = Number.parseInt(dest.slice(idx + 1), 10);
  return { server, serverPort: Number.isNaN(port) ? DEFAULT_REALITY_PORT : port };
}

function readArray(settings: Record<string, unknown>, key: string, where: string, warnings: string[]): Record<string, unknown>[] {
  const value = settings[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    warnings.push(`${where}: "settings.${key}" is not an array; users skipped`);
    return [];
  }
  const out: Record<string, unknown>[] = [];
  value.forEach((item, i) => {
    if (isRecord(item)) {
      out.push(item);
    } else {
      warnings.push(`${where}: settings.${key}[${i}] is not an object; skipped`);
    }
  });
  return out;
}

interface SettingsResult {
  users: InboundUser[];
  options: Record<string, JsonValue>;
}

function parseSettings(
  protocol: string,
  settings: Record<string, unknown>,
  where: string,
  warnings: string[],
): SettingsResult {
  const options: Record<string, JsonValue> = {};

  switch (protocol) {
    case 'vless':
    case 'vmess': {
      const users = readArray(settings, 'clients', where, warnings).map((c) => ({
        ...emptyUser(),
        uuid: asString(c.id),
        email: asString(c.email),
        flow: asString(c.flow),
      }));
      return { users, options };
    }
    case 'trojan': {
      const users = readArray(settings, 'clients', where, warnings).map((c) => ({
        ...emptyUser(),
        password: asString(c.password),
        email: asString(c.email),
      }));
      return { users, options };
    }
    case 'shadowsocks': {
      const method = asString(settings.method);
      if (method !== '') options['method'] = method;
      if (typeof settings.network === 'string') options['network'] = settings.network;

      let users = readArray(settings, 'clients', where, warnings).map((c) => ({
        ...emptyUser(),
        password: asString(c.password),
        email: asString(c.email),
        method: asString(c.method) || method,
      }));
      const password = asString(settings.password);
      if (users.length === 0 && password !== '') {
        // 単一パスワード構成は 1 ユーザーとして扱う
        users = [{ ...emptyUser(), password, email: asString(settings.email), method }];
      } else if (password !== '') {
        options['password'] = password;
      }
      return { users, options };
    }
    case 'socks':
    case 'http': {
      const users = readArray(settings, 'accounts', where, warnings).map((a) => ({
        ...emptyUser(),
        email: asString(a.user),
        password: asString(a.pass),
      }));
      return { users, options };
    }
    default: {
      const users = readArray(settings, 'clients', where, warnings).map((c) => ({
        ...emptyUser(),
        uuid: asString(c.id),
        email: asString(c.email),
        password: asString(c.password),
      }));
      return { users, options };
    }
  }
}

function parseTransport(
  stream: Record<string, unknown>,
  network: string,
  where: string,
  warnings: string[],
): TransportSettings | undefined {
  if (network === '' || network === 'tcp' || network === 'raw') return undefined;

  const type = network === 'h2' ? 'http' : network;
  const key = `${type}Settings`;
  const value = stream[key];
  const transport: TransportSettings = { type, path: '', host: '', serviceName: '', headers: {} };
  if (value === undefined || value === null) return transport;
  if (!isRecord(value)) {
    warnings.push(`${where}: "streamSettings.${key}" is not an object; using defaults`);
    return transport;
  }

  const headers = stringMap(value.headers);
  transport.host = headers['Host'] ?? stringList(value.host)[0] ?? '';
  delete headers['Host'];
  transport.headers = headers;
  transport.path = asString(value.path);
  transport.serviceName = asString(value.serviceName);
  return transport;
}

function parseSecurity(
  stream: Record<string, unknown>,
  security: string,
  where: string,
  warnings: string[],
): TlsSettings | undefined {
  switch (security) {
    case '':
    case 'none':
      return undefined;
    case 'tls': {
      const ts = stream.tlsSettings;
      if (ts !== undefined && !isRecord(ts)) {
        warnings.push(`${where}: "streamSettings.tlsSettings" is not an object; TLS settings skipped`);
      }
      const settings = isRecord(ts) ? ts : {};
      const certs = Array.isArray(settings.certificates) ? settings.certificates.filter(isRecord) : [];
      const cert = certs[0];
      return {
        enabled: true,
        serverName: asString(settings.serverName),
        alpn: stringList(settings.alpn),
        certificatePath: cert !== undefined ? asString(cert.certificateFile) : '',
        keyPath: cert !== undefined ? asString(cert.keyFile) : '',
      };
    }
    case 'reality': {
      const rs = stream.realitySettings;
      if (!isRecord(rs)) {
        warnings.push(`${where}: "streamSettings.realitySettings" is missing or not an object; Reality skipped`);
        return undefined;
      }
      const names = stringList(rs.serverNames);
      const serverName = names[0] ?? '';
      const dest = asString(rs.dest) || asString(rs.target) || (typeof rs.dest === 'number' ? String(rs.dest) : '');
      return {
        enabled: true,
        serverName,
        alpn: [],
        certificatePath: '',
        keyPath: '',
        reality: {
          ...emptyReality(),
          enabled: true,
          shortIds: stringList(rs.shortIds),
          serverName,
          alternateServerNames: names.slice(1),
          fingerprint: asString(rs.fingerprint),
          publicKey: asString(rs.publicKey),
          privateKey: asString(rs.privateKey),
          ...(dest !== '' ? { handshake: splitDest(dest) } : {}),
        },
      };
    }
    default:
      warnings.push(`${where}: unknown security '${security}'; TLS skipped`);
      return undefined;
  }
}

function parseInbound(el: Record<string, unknown>, index: number, warnings: string[]): Inbound | undefined {
  const protocol = asString(el.protocol);
  const tag = asString(el.tag);
  const where = label(tag, index);
  if (protocol === '') {
    warnings.push(`${where}: missing "protocol"; skipped`);
    return undefined;
  }

  let settings: Record<string, unknown> = {};
  if (isRecord(el.settings)) {
    settings = el.settings;
  } else if (el.settings !== undefined && el.settings !== null) {
    warnings.push(`${where}: "settings" is not an object; settings skipped`);
  }
  const { users, options } = parseSettings(protocol, settings, where, warnings);

  let transport: TransportSettings | undefined;
  let tls: TlsSettings | undefined;
  if (isRecord(el.streamSettings)) {
    const stream = el.streamSettings;
    transport = parseTransport(stream, asString(stream.network), where, warnings);
    tls = parseSecurity(stream, asString(stream.security), where, warnings);
  } else if (el.streamSettings !== undefined && el.streamSettings !== null) {
    warnings.push(`${where}: "streamSettings" is not an object; transport and TLS skipped`);
  }

  return withRequiredCapabilities({
    type: protocol,
    tag,
    listen: asString(el.listen),
    listenPort: asInt(el.port),
    ...(transport !== undefined ? { transport } : {}),
    ...(tls !== undefined ? { tls } : {}),
    users,
    options,
  });
}

/**
 * Xray 設定（JSON/JSONC）をパースして Inbound[] を返す。
 */
export function parseXray(filename: string, raw: string): ParseOutcome {
  const elements = readInboundElements(filename, raw, 'xray');
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

function serializeSettings(inbound: Inbound, handled: Set<string>): JsonObject {
  const realityOn = inbound.tls?.reality?.enabled === true;
  const users = inbound.users;

  switch (inbound.type) {
    case 'vless':
      return {
        clients: users.map((u) =>
          compact({ id: u.uuid, email: u.email, level: 0, flow: realityOn ? u.flow || VISION_FLOW : u.flow }),
        ),
        decryption: 'none',
      };
    case 'vmess':
      return { clients: users.map((u) => compact({ id: u.uuid, email: u.email, level: 0, alterId: 0 })) };
    case 'trojan':
      return { clients: users.map((u) => compact({ password: u.password, email: u.email, level: 0 })) };
    case 'shadowsocks': {
      handled.add('method');
      handled.add('password');
      handled.add('network');
      const method =
        asString(inbound.options['method']) || users.find((u) => u.method !== '')?.method || DEFAULT_SHADOWSOCKS_METHOD;
      const network = asString(inbound.options['network']) || 'tcp,udp';
      const serverPassword = asString(inbound.options['password']);

      if (serverPassword === '' && users.length === 1) {
        return compact({ method, password: users[0].password, email: users[0].email, network });
      }
      return compact({
        method,
        password: serverPassword,
        clients: users.map((u) => compact({ password: u.password, email: u.email })),
        network,
      });
    }
    case 'socks':
    case 'http':
      return users.length > 0 ? { accounts: users.map((u) => ({ user: u.email, pass: u.password })) } : {};
    default:
      return users.length > 0
        ? { clients: users.map((u) => compact({ id: u.uuid, email: u.email, password: u.password })) }
        : {};
  }
}

function serializeTransportSettings(transport: TransportSettings): JsonObject {
  switch (transport.type) {
    case 'ws': {
      const headers: Record<string, string> = { ...transport.headers };
      if (transport.host !== '') headers['Host'] = transport.host;
      const out = compact({ path: transport.path });
      if (Object.keys(headers).length > 0) out['headers'] = headers;
      return out;
    }
    case 'grpc':
      return compact({ serviceName: transport.serviceName });
    case 'http':
      return compact({ path: transport.path, host: transport.host !== '' ? [transport.host] : undefined });
    default:
      return compact({ path: transport.path, host: transport.host });
  }
}

function serializeRealitySettings(tls: TlsSettings): JsonObject | undefined {
  const reality = tls.reality;
  if (reality === undefined || !reality.enabled) return undefined;

  const serverName = reality.serverName || tls.serverName;
  const handshake = reality.handshake;
  const dest =
    handshake !== undefined
      ? `${handshake.server}:${handshake.serverPort}`
      : `${serverName}:${DEFAULT_REALITY_PORT}`;

  return compact({
    show: false,
    dest,
    xver: 0,
    serverNames: [serverName, ...reality.alternateServerNames].filter((n) => n !== ''),
    privateKey: reality.privateKey,
    shortIds: reality.shortIds,
    fingerprint: reality.fingerprint,
    publicKey: reality.publicKey,
  });
}

function serializeStream(inbound: Inbound): JsonObject | undefined {
  const { transport, tls } = inbound;
  if (transport === undefined && (tls === undefined || !tls.enabled)) return undefined;

  const stream: JsonObject = { network: transport !== undefined ? transport.type : 'tcp' };
  if (transport !== undefined && transport.type !== 'quic') {
    stream[`${transport.type}Settings`] = serializeTransportSettings(transport);
  }

  const realitySettings = tls !== undefined ? serializeRealitySettings(tls) : undefined;
  if (realitySettings !== undefined) {
    stream['security'] = 'reality';
    stream['realitySettings'] = realitySettings;
  } else if (tls !== undefined && tls.enabled) {
    const certificates =
      tls.certificatePath !== '' || tls.keyPath !== ''
        ? [compact({ certificateFile: tls.certificatePath, keyFile: tls.keyPath })]
        : undefined;
    stream['security'] = 'tls';
    stream['tlsSettings'] = compact({ serverName: tls.serverName, alpn: tls.alpn, certificates });
  } else {
    stream['security'] = 'none';
  }
  return stream;
}

/**
 * Inbound 1 件を Xray のネイティブ inbound オブジェクトにする。
 * Xray で動かせないプロトコルは undefined（警告付き）。
 */
export function serializeXrayInbound(
  inbound: Inbound,
  warnings: string[],
  index = 0,
): JsonObject | undefined {
  const where = label(inbound.tag, index);
  if (XRAY_UNSUPPORTED_PROTOCOLS.includes(inbound.type)) {
    warnings.push(`${where}: protocol '${inbound.type}' is not supported by Xray; inbound skipped`);
    return undefined;
  }

  const handled = new Set<string>();
  const out: JsonObject = {
    protocol: inbound.type,
    tag: inbound.tag,
    listen: inbound.listen || '0.0.0.0',
    port: inbound.listenPort,
    settings: serializeSettings(inbound, handled),
  };

  const stream = serializeStream(inbound);
  if (stream !== undefined) out['streamSettings'] = stream;

  if (inbound.multiplex !== undefined) {
    const what = inbound.multiplex.brutal !== undefined ? 'multiplex/brutal' : 'multiplex';
    warnings.push(`${where}: ${what} dropped (Xray has no server-side multiplex settings)`);
  }
  for (const key of Object.keys(inbound.options)) {
    if (!handled.has(key)) {
      warnings.push(`${where}: option '${key}' has no Xray equivalent; dropped`);
    }
  }

  return out;
}

export function serializeXray(inbounds: Inbound[]): SerializeOutcome {
  const warnings: string[] = [];
  const out: JsonObject[] = [];
  inbounds.forEach((inbound, i) => {
    const native = serializeXrayInbound(inbound, warnings, i);
    if (native !== undefined) out.push(native);
  });
  return { inbounds: out, warnings };
}

export const xrayCodec: ConfigCodec = {
  engine: 'xray',
  canParse: canParseXray,
  parse: parseXray,
  serialize: serializeXray,
  serializeInbound: serializeXrayInbound,
};
