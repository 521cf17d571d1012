import { describe, it, expect } from 'vitest';
import {
  convertConfig,
  detect,
  normalizeCoreEngine,
  parse,
  parseAny,
  parseCoreEngine,
} from '../../src/codec/registry.js';
import { CodecError, ValidationError } from '../../src/utils/errors.js';

const SING_BOX_VMESS = JSON.stringify({
  inbounds: [
    {
      type: 'vmess',
      tag: 'vm',
      listen: '::',
      listen_port: 10000,
      users: [{ name: 'bob', uuid: 'u-2' }],
      transport: { type: 'ws', path: '/vm' },
    },
  ],
});

describe('normalizeCoreEngine', () => {
  it('表記ゆれを吸収する', () => {
    expect(normalizeCoreEngine(' SingBox ')).toBe('sing-box');
    expect(normalizeCoreEngine('XRAY')).toBe('xray');
    expect(normalizeCoreEngine('clash')).toBeUndefined();
  });

  it('parseCoreEngine - 不明なエンジンは ValidationError を投げる', () => {
    expect(() => parseCoreEngine('clash')).toThrow(ValidationError);
    expect(() => parseCoreEngine('clash')).toThrow("unknown core engine: 'clash' (expected one of sing-box, xray)");
  });
});

describe('detect / parseAny', () => {
  it('形式を自動判定する', () => {
    expect(detect(SING_BOX_VMESS)).toBe('sing-box');
    expect(detect('{"inbounds": [{"protocol": "trojan"}]}')).toBe('xray');
    expect(detect('{"inbounds": []}')).toBeUndefined();
  });

  it('parseAny - 判定結果のエンジン名を付けて返す', () => {
    const outcome = parseAny('config.json', SING_BOX_VMESS);

    expect(outcome.engine).toBe('sing-box');
    expect(outcome.inbounds.map((i) => i.tag)).toEqual(['vm']);
  });

  it('parseAny - 判定できなければ CodecError を投げる', () => {
    expect(() => parseAny('x.json', '{"inbounds": []}')).toThrow(CodecError);
    expect(() => parseAny('x.json', '{"inbounds": []}')).toThrow('x.json: could not detect configuration format');
  });
});

describe('convertConfig', () => {
  it('sing-box の vmess/ws を Xray 形式に変換する', () => {
    const outcome = convertConfig('sing-box', 'xray', SING_BOX_VMESS);

    expect(outcome.warnings).toEqual([]);
    expect(JSON.parse(outcome.raw)).toEqual({
      inbounds: [
        {
          protocol: 'vmess',
          tag: 'vm',
          listen: '::',
          port: 10000,
          settings: { clients: [{ id: 'u-2', email: 'bob', level: 0, alterId: 0 }] },
          streamSettings: { network: 'ws', wsSettings: { path: '/vm' }, security: 'none' },
        },
      ],
    });
  });

  it('出力は 2 スペースで整形される', () => {
    const outcome = convertConfig('sing-box', 'sing-box', '{"inbounds": [{"type": "socks", "tag": "s", "listen_port": 1080}]}');

    expect(outcome.raw).toBe(
      [
        '{',
        '  "inbounds": [',
        '    {',
        '      "type": "socks",',
        '      "tag": "s",',
        '      "listen": "::",',
        '      "listen_port": 1080',
        '    }',
        '  ]',
        '}',
      ].join('\n'),
    );
  });

  it('sing-box → Xray → sing-box の往復で multiplex/brutal は警告付きで消え、戻しても現れない', () => {
    const raw = JSON.stringify({
      inbounds: [
        {
          type: 'vmess',
          tag: 'vm',
          listen_port: 10000,
          users: [{ name: 'bob', uuid: 'u-2' }],
          multiplex: { enabled: true, brutal: { enabled: true, up_mbps: 100, down_mbps: 100 } },
        },
      ],
    });

    const toXray = convertConfig('sing-box', 'xray', raw);
    const back = convertConfig('xray', 'sing-box', toXray.raw);

    expect(toXray.warnings).toContain(
      "inbound 'vm': multiplex/brutal dropped (Xray has no server-side multiplex settings)",
    );
    expect(parse(toXray.raw, 'xray').inbounds[0].multiplex).toBeUndefined();
    expect(JSON.parse(back.raw)).not.toHaveProperty('inbounds.0.multiplex');
    expect(parse(back.raw, 'sing-box').inbounds[0].requiredCapabilities).toEqual([]);
  });

  it('Xray の shadowsocks の network "tcp,udp" は sing-box では省略する', () => {
    const raw = JSON.stringify({
      inbounds: [
        {
          protocol: 'shadowsocks',
          tag: 'ss',
          port: 8388,
          settings: { method: '2022-blake3-aes-128-gcm', password: 'test-secret', network: 'tcp,udp' },
        },
      ],
    });

    const outcome = convertConfig('xray', 'sing-box', raw);

    expect(outcome.warnings).toEqual([]);
    expect(JSON.parse(outcome.raw)).toEqual({
      inbounds: [
        {
          type: 'shadowsocks',
          tag: 'ss',
          listen: '::',
          listen_port: 8388,
          method: '2022-blake3-aes-128-gcm',
          password: 'test-secret',
        },
      ],
    });
  });

  it('入力が欠けていれば ValidationError を投げる', () => {
    expect(() => convertConfig('', 'xray', '{}')).toThrow('source engine is required');
    expect(() => convertConfig('sing-box', ' ', '{}')).toThrow('target engine is required');
    expect(() => convertConfig('sing-box', 'xray', '  ')).toThrow('config is required');
  });
});
