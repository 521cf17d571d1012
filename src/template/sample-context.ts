/**
 * corepipe — プレビュー用サンプルコンテキスト
 *
 * テンプレートのプレビュー・作成時検証に使う固定データ。呼び出しごとに新しいオブジェクトを返す。
 */

import { withRequiredCapabilities } from '../types/inbound.js';
import type { TemplateContext } from '../types/template.js';

export const SAMPLE_USER_UUIDS = [
  '00000000-0000-0000-0000-000000000001',
  '00000000-0000-0000-0000-000000000002',
] as const;

export function createSampleContext(): TemplateContext {
  return {
    inbounds: [
      withRequiredCapabilities({
        type: 'vless',
        tag: 'vless-in',
        listen: '::',
        listenPort: 443,
        users: [
          { uuid: SAMPLE_USER_UUIDS[0], email: 'user@example.com', password: '', flow: '', method: '' },
        ],
        tls: {
          enabled: true,
          serverName: 'example.com',
          alpn: [],
          certificatePath: '',
          keyPath: '',
          reality: {
            enabled: true,
            shortIds: ['0123456789abcdef'],
            serverName: 'example.com',
            alternateServerNames: [],
            fingerprint: '',
            publicKey: '',
            privateKey: 'sample-private-key',
            handshake: { server: 'www.google.com', serverPort: 443 },
          },
        },
        options: {},
      }),
      withRequiredCapabilities({
        type: 'shadowsocks',
        tag: 'ss-in',
        listen: '::',
        listenPort: 8388,
        users: [
          {
            uuid: '',
            email: 'user@example.com',
            password: 'password123',
            flow: '',
            method: '2022-blake3-aes-128-gcm',
          },
        ],
        options: { method: '2022-blake3-aes-128-gcm' },
      }),
    ],
    outbounds: [
      { type: 'direct', tag: 'direct', settings: {} },
      { type: 'block', tag: 'block', settings: {} },
    ],
    users: [
      { id: '1', uuid: SAMPLE_USER_UUIDS[0], email: 'user@example.com', enabled: true },
      { id: '2', uuid: SAMPLE_USER_UUIDS[1], email: 'user2@example.com', enabled: true },
    ],
    agent: {
      id: 'sample-agent',
      name: 'sample-agent',
      coreType: 'sing-box',
      coreVersion: '1.10.0',
      capabilities: ['reality', 'multiplex', 'v2ray_api'],
      buildTags: ['with_v2ray_api', 'with_quic'],
    },
    server: {
      logLevel: 'info',
      listenAddr: '::',
      dnsServer: '8.8.8.8',
      statsEnabled: true,
    },
    experimental: {
      v2rayApi: { listen: '127.0.0.1:10085', statsEnabled: true },
    },
  };
}
