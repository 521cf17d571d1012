import { describe, it, expect } from 'vitest';
import {
  canParseSingBox,
  parseSingBox,
  serializeSingBox,
  serializeSingBoxInbound,
} from '../../src/codec/sing-box-codec.js';
import type { Inbound } from '../../src/types/inbound.js';
import { emptyReality, emptyUser } from '../../src/types/inbound.js';
import { CodecError } from '../../src/utils/errors.js';

// ---------------------------------------------------------------------------
// ヘルパー
// ---------------------------------------------------------------------------

function realityInbound(): Inbound {
  return {
    type: 'vless',
    tag: 'v',
    listen: '',
    listenPort: 443,
    tls: {
      enabled: true,
      serverName: 'a.example.com',
      alpn: [],
      certificatePath: '',
      keyPath: '',
      reality: {
        ...emptyReality(),
        enabled: true,
        serverName: 'r.example.com',
        alternateServerNames: ['b.example.com'],
        privateKey: 'test-private-key',
        shortIds: ['01'],
        handshake: { server: 'r.example.com', serverPort: 443 },
      },
    },
    users: [{ ...emptyUser(), uuid: 'u-1', email: 'alice' }],
    options: {},
    requiredCapabilities: ['reality'],
  };
}

// ---------------------------------------------------------------------------
// テスト
// ---------------------------------------------------------------------------

describe('canParseSingBox', () => {
  it('type を持つ inbounds を sing-box と判定する', () => {
    expect(canParseSingBox('{"inbounds": [{"type": "vless"}]}')).toBe(true);
  });

  it('protocol を含む場合は sing-box と判定しない', () => {
    expect(canParseSingBox('{"inbounds": [{"type": "vless", "protocol": "vless"}]}')).toBe(false);
  });

  it('空配列・不正な JSON は false を返す', () => {
    expect(canParseSingBox('{"inbounds": []}')).toBe(false);
    expect(canParseSingBox('{')).toBe(false);
  });
});

describe('parseSingBox', () => {
  it('Reality + multiplex/brutal 付きの vless を正規形にする', () => {
    const raw = JSON.stringify({
      inbounds: [
        {
          type: 'vless',
          tag: 'vless-in',
          listen: '::',
          listen_port: 443,
          users: [{ name: 'alice', uuid: 'u-1', flow: 'xtls-rprx-vision' }],
          tls: {
            enabled: true,
            server_name: 'www.example.com',
            reality: {
              enabled: true,
              handshake: { server: 'www.example.com', server_port: 443 },
              private_key: 'test-private-key',
              short_id: ['ab12'],
            },
          },
          multiplex: { enabled: true, padding: false, brutal: { enabled: true, up_mbps: 100, down_mbps: 200 } },
        },
      ],
    });

    const outcome = parseSingBox('config.json', raw);

    expect(outcome.warnings).toEqual([]);
    expect(outcome.inbounds).toEqual([
      {
        type: 'vless',
        tag: 'vless-in',
        listen: '::',
        listenPort: 443,
        tls: {
          enabled: true,
          serverName: 'www.example.com',
          alpn: [],
          certificatePath: '',
          keyPath: '',
          reality: {
            enabled: true,
            shortIds: ['ab12'],
            serverName: 'www.example.com',
            alternateServerNames: [],
            fingerprint: '',
            publicKey: '',
            privateKey: 'test-private-key',
            handshake: { server: 'www.example.com', serverPort: 443 },
          },
        },
        multiplex: { enabled: true, padding: false, brutal: { enabled: true, upMbps: 100, downMbps: 200 } },
        users: [{ uuid: 'u-1', email: 'alice', password: '', flow: 'xtls-rprx-vision', method: '' }],
        options: {},
        requiredCapabilities: ['reality', 'multiplex', 'brutal'],
      },
    ]);
  });

  it('shadowsocks の単一パスワードを 1 ユーザーとして扱う', () => {
    const raw = '[{"type": "shadowsocks", "tag": "ss", "listen_port": 8388, "method": "aes-128-gcm", "password": "test-secret"}]';

    const [inbound] = parseSingBox('config.json', raw).inbounds;

    expect(inbound.users).toEqual([
      { uuid: '', email: '', password: 'test-secret', flow: '', method: 'aes-128-gcm' },
    ]);
    expect(inbound.options).toEqual({ method: 'aes-128-gcm' });
  });

  it('ws の Host ヘッダーを transport.host に移す', () => {
    const raw = JSON.stringify([
      {
        type: 'vmess',
        tag: 'vm',
        listen_port: 10000,
        transport: { type: 'ws', path: '/ws', headers: { Host: 'cdn.example.com', 'X-Test': '1' } },
      },
    ]);

    const [inbound] = parseSingBox('config.json', raw).inbounds;

    expect(inbound.transport).toEqual({
      type: 'ws',
      path: '/ws',
      host: 'cdn.example.com',
      serviceName: '',
      headers: { 'X-Test': '1' },
    });
  });

  it('壊れた要素は警告を出して読み捨てる', () => {
    const raw = '[{"listen_port": 1}, 5, {"type": "vmess", "tag": "b", "users": "oops"}]';

    const outcome = parseSingBox('config.json', raw);

    expect(outcome.inbounds).toHaveLength(1);
    expect(outcome.inbounds[0].users).toEqual([]);
    expect(outcome.warnings).toEqual([
      'inbound #0: missing "type"; skipped',
      'inbound #1: not an object; skipped',
      `inbound 'b': "users" is not an array; users skipped`,
    ]);
  });

  it('不正な JSON は CodecError を投げる', () => {
    expect(() => parseSingBox('bad.json', '{')).toThrow(CodecError);
    expect(() => parseSingBox('bad.json', '{')).toThrow(/^sing-box: invalid JSON in bad\.json: /);
  });

  it('inbounds が配列でなければ CodecError を投げる', () => {
    expect(() => parseSingBox('config.json', '{"inbounds": {}}')).toThrow(
      'sing-box: "inbounds" in config.json is not an array',
    );
  });

  it('inbounds キーがなければ空の結果を返す', () => {
    expect(parseSingBox('config.json', '{"log": {}}')).toEqual({ inbounds: [], warnings: [] });
  });
});

describe('serializeSingBoxInbound', () => {
  it('Reality 有効時は flow を既定値で補い、serverName は Reality 側を使う', () => {
    const warnings: string[] = [];

    const out = serializeSingBoxInbound(realityInbound(), warnings);

    expect(out).toEqual({
      type: 'vless',
      tag: 'v',
      listen: '::',
      listen_port: 443,
      users: [{ name: 'alice', uuid: 'u-1', flow: 'xtls-rprx-vision' }],
      tls: {
        enabled: true,
        server_name: 'r.example.com',
        reality: {
          enabled: true,
          private_key: 'test-private-key',
          short_id: ['01'],
          handshake: { server: 'r.example.com', server_port: 443 },
        },
      },
    });
    expect(warnings).toEqual([
      `inbound 'v': Reality server names b.example.com dropped (sing-box accepts a single server_name)`,
    ]);
  });

  it('shadowsocks の単一ユーザーはトップレベルの password になる', () => {
    const inbound: Inbound = {
      type: 'shadowsocks',
      tag: 'ss',
      listen: '',
      listenPort: 8388,
      users: [{ ...emptyUser(), password: 'test-secret', method: 'chacha20-ietf-poly1305' }],
      options: {},
      requiredCapabilities: [],
    };

    expect(serializeSingBoxInbound(inbound, [])).toEqual({
      type: 'shadowsocks',
      tag: 'ss',
      listen: '::',
      listen_port: 8388,
      method: 'chacha20-ietf-poly1305',
      password: 'test-secret',
    });
  });

  it('表現できないオプションとトランスポートは警告付きで落とす', () => {
    const inbound: Inbound = {
      type: 'vless',
      tag: 'x',
      listen: '0.0.0.0',
      listenPort: 8443,
      transport: { type: 'splithttp', path: '/s', host: '', serviceName: '', headers: {} },
      users: [],
      options: { foo: 1 },
      requiredCapabilities: [],
    };

    const outcome = serializeSingBox([inbound]);

    expect(outcome.inbounds).toEqual([{ type: 'vless', tag: 'x', listen: '0.0.0.0', listen_port: 8443 }]);
    expect(outcome.warnings).toEqual([
      `inbound 'x': option 'foo' has no sing-box equivalent; dropped`,
      `inbound 'x': transport 'splithttp' has no sing-box equivalent; dropped`,
    ]);
  });
  it('Reality なしの vless ではユーザーの flow を書かない', () => {
    const inbound: Inbound = {
      type: 'vless',
      tag: 'plain',
      listen: '',
      listenPort: 8443,
      users: [{ ...emptyUser(), uuid: 'u-2', email: 'bob', flow: 'xtls-rprx-vision' }],
      options: {},
      requiredCapabilities: [],
    };

    expect(serializeSingBoxInbound(inbound, [])).toEqual({
      type: 'vless',
      tag: 'plain',
      listen: '::',
      listen_port: 8443,
      users: [{ name: 'bob', uuid: 'u-2' }],
    });
  });

  it('network は tcp,udp なら省略し、片方ならそのまま書き、それ以外は警告して落とす', () => {
    const ss = (tag: string, network: string): Inbound => ({
      type: 'shadowsocks',
      tag,
      listen: '',
      listenPort: 8388,
      users: [],
      options: { method: '2022-blake3-aes-128-gcm', password: 'test-secret', network },
      requiredCapabilities: [],
    });

    const outcome = serializeSingBox([ss('both', 'tcp,udp'), ss('udp-only', 'udp'), ss('odd', 'tcp,quic')]);

    expect(outcome.inbounds.map((native) => native['network'])).toEqual([undefined, 'udp', undefined]);
    expect(outcome.warnings).toEqual([`inbound 'odd': network 'tcp,quic' has no sing-box equivalent; dropped`]);
  });

  it('タグのない inbound は配列内の位置で警告に現れる', () => {
    const untagged: Inbound = {
      type: 'vless',
      tag: '',
      listen: '',
      listenPort: 9000,
      users: [],
      options: { foo: 1 },
      requiredCapabilities: [],
    };

    const outcome = serializeSingBox([{ ...untagged, tag: 'first', options: {} }, untagged]);

    expect(outcome.warnings).toEqual([`inbound #1: option 'foo' has no sing-box equivalent; dropped`]);
  });
});
