import { describe, it, expect } from 'vitest';
import { statsUsers, usersForProtocol, xrayApiConfig } from '../../src/template/helpers.js';
import { TemplateEngine } from '../../src/template/engine.js';
import { createSampleContext } from '../../src/template/sample-context.js';
import type { TemplateUser } from '../../src/types/template.js';

const USERS: TemplateUser[] = [
  { id: '1', uuid: 'u1', email: 'a@example.com', enabled: true },
  { id: '2', uuid: 'u2', email: 'b@example.com', enabled: false },
  { id: '3', uuid: 'u3', email: '', enabled: true },
];

describe('usersForProtocol', () => {
  it('無効なユーザーを除外する', () => {
    expect(usersForProtocol(USERS, 'vmess')).toEqual([
      { name: 'a@example.com', uuid: 'u1' },
      { name: '', uuid: 'u3' },
    ]);
  });

  it('trojan は UUID をパスワードとしても使う', () => {
    expect(usersForProtocol(USERS.slice(0, 1), 'trojan')).toEqual([{ name: 'a@example.com', uuid: 'u1', password: 'u1' }]);
  });

  it('shadowsocks は UUID をパスワードに置き換える', () => {
    expect(usersForProtocol(USERS.slice(0, 1), 'shadowsocks')).toEqual([{ name: 'a@example.com', password: 'u1' }]);
  });

  it('vless は Vision フローを付ける', () => {
    expect(usersForProtocol(USERS.slice(0, 1), 'vless')).toEqual([
      { name: 'a@example.com', uuid: 'u1', flow: 'xtls-rprx-vision' },
    ]);
  });
});

describe('statsUsers', () => {
  it('有効かつ email のあるユーザーだけを返す', () => {
    expect(statsUsers(USERS)).toEqual(['a@example.com']);
  });
});

describe('xrayApiConfig', () => {
  it('listen アドレスから API inbound を作る', () => {
    const config = xrayApiConfig('0.0.0.0:9000');

    expect(config['api']).toEqual({ tag: 'api', listen: '0.0.0.0:9000', services: ['StatsService'] });
    expect(config['apiInbound']).toEqual({
      tag: 'api',
      port: 9000,
      listen: '0.0.0.0',
      protocol: 'dokodemo-door',
      settings: { address: '0.0.0.0' },
    });
  });

  it('空なら既定のアドレスを使う', () => {
    expect(xrayApiConfig('')['apiInbound']).toEqual({
      tag: 'api',
      port: 10085,
      listen: '127.0.0.1',
      protocol: 'dokodemo-door',
      settings: { address: '127.0.0.1' },
    });
  });
});

describe('組み込みヘルパー（テンプレート経由）', () => {
  const engine = new TemplateEngine();
  const render = (content: string): string => engine.renderRaw(content, createSampleContext());

  it('join と inboundTags', () => {
    expect(render('{{join ", " (inboundTags inbounds)}}')).toBe('vless-in, ss-in');
  });

  it('算術ヘルパー', () => {
    expect(render('{{div 7 2}} {{mul 3 4}} {{sub 5 8}} {{div 1 0}}')).toBe('3 12 -3 0');
  });

  it('default は空値のときに既定値を返す', () => {
    expect(render('{{default "fallback" ""}} {{default "fallback" "set"}}')).toBe('fallback set');
  });

  it('hasCap と len', () => {
    expect(render('{{#if (hasCap agent.capabilities "reality")}}yes{{else}}no{{/if}} {{len users}}')).toBe('yes 2');
  });

  it('filterByType と first', () => {
    expect(render('{{#with (first (filterByType inbounds "shadowsocks"))}}{{tag}}:{{listenPort}}{{/with}}')).toBe(
      'ss-in:8388',
    );
  });

  it('json はオブジェクトをそのまま JSON にする', () => {
    expect(render('{{json server}}')).toBe(
      '{"logLevel":"info","listenAddr":"::","dnsServer":"8.8.8.8","statsEnabled":true}',
    );
  });
});
