/**
 * corepipe — Capability derivation
 *
 * コア種別・バージョン・ビルドタグから能力集合を導出する。
 * バージョン表は不変データとしてモジュール読み込み時に凍結する。
 */

import semver from 'semver';
import type { AgentCapabilities, CapabilityRule } from '../types/capability.js';
import type { Capability } from '../types/inbound.js';
import { CAPABILITIES, isCapability } from '../types/inbound.js';
import { normalizeCoreEngine } from '../codec/registry.js';

// ============================================================
// バージョン表
// ============================================================

function freezeRules(rules: CapabilityRule[]): readonly CapabilityRule[] {
  return Object.freeze(rules.map((rule) => Object.freeze(rule)));
}

export const SING_BOX_VERSION_TABLE: readonly CapabilityRule[] = freezeRules([
  { capability: 'reality', minVersion: '1.3.0' },
  { capability: 'multiplex', minVersion: '1.3.0' },
  { capability: 'brutal', minVersion: '1.7.0' },
  { capability: 'ech', minVersion: '1.8.0' },
  { capability: 'v2ray_api', minVersion: '1.0.0', requiresBuildTag: 'with_v2ray_api' },
  { capability: 'quic', minVersion: '1.0.0' },
  { capability: 'http3', minVersion: '1.8.0' },
]);

export const XRAY_VERSION_TABLE: readonly CapabilityRule[] = freezeRules([
  { capability: 'reality', minVersion: '1.8.0' },
  { capability: 'xtls', minVersion: '1.0.0' },
  { capability: 'stats', minVersion: '1.0.0' },
  { capability: 'v2ray_api', minVersion: '1.0.0' },
  { capability: 'splithttp', minVersion: '1.8.11' },
  { capability: 'meek', minVersion: '1.6.0' },
  { capability: 'mkcp', minVersion: '1.0.0' },
  { capability: 'quic', minVersion: '1.3.0' },
  { capability: 'multiplex', minVersion: '1.8.0' },
  { capability: 'geoip', minVersion: '1.0.0' },
  { capability: 'geosite', minVersion: '1.0.0' },
  { capability: 'domainsock', minVersion: '1.0.0' },
  { capability: 'wireguard', minVersion: '1.8.0' },
]);

/** ビルドタグだけで有効になる能力 */
export const SING_BOX_BUILD_TAGS: Readonly<Record<string, Capability>> = Object.freeze({
  with_quic: 'quic',
  with_wireguard: 'wireguard',
  with_utls: 'utls',
  with_ech: 'ech',
  with_gvisor: 'tun',
  with_dhcp: 'dhcp',
});

export const XRAY_BUILD_TAGS: Readonly<Record<string, Capability>> = Object.freeze({
  with_geoip: 'geoip',
  with_geosite: 'geosite',
});

// ============================================================
// バージョン比較
// ============================================================

/**
 * "v1.8.0" や "1.10.0-beta.1" を比較可能な "x.y.z" にする。
 * 解釈できなければ undefined。
 */
export function normalizeVersion(version: string): string | undefined {
  const trimmed = version.trim();
  if (trimmed === '' || !/^v?\d/i.test(trimmed)) return undefined;
  return semver.coerce(trimmed)?.version;
}

/** a < b なら負、a > b なら正、等しければ 0。どちらかが解釈できなければ undefined。 */
export function compareVersions(a: string, b: string): number | undefined {
  const left = normalizeVersion(a);
  const right = normalizeVersion(b);
  if (left === undefined || right === undefined) return undefined;
  return semver.compare(left, right);
}

/** version >= minVersion。解釈できないバージョンは満たさない扱い。 */
export function versionAtLeast(version: string, minVersion: string): boolean {
  const cmp = compareVersions(version, minVersion);
  return cmp !== undefined && cmp >= 0;
}

/** 能力名の表記ゆれ（大文字・ハイフン・空白）を吸収する */
export function normalizeCapabilityName(name: string): string {
  return name.trim().toLowerCase().replace(/-/g, '_');
}

function sortCapabilities(caps: Iterable<Capability>): Capability[] {
  const set = new Set(caps);
  return CAPABILITIES.filter((cap) => set.has(cap));
}

// ============================================================
// 導出
// ============================================================

/**
 * コア種別・バージョン・ビルドタグから能力を導出する。
 * 不明なコア種別・解釈できないバージョンは空集合（fail closed）。
 */
export function deriveCapabilities(coreType: string, coreVersion: string, buildTags: string[]): Capability[] {
  const engine = normalizeCoreEngine(coreType);
  if (engine === undefined) return [];
  if (normalizeVersion(coreVersion) === undefined) return [];

  const tags = new Set(buildTags.map((tag) => tag.trim().toLowerCase()));
  let table: readonly CapabilityRule[];
  let tagCaps: Readonly<Record<string, Capability>>;
  switch (engine) {
    case 'sing-box':
      table = SING_BOX_VERSION_TABLE;
      tagCaps = SING_BOX_BUILD_TAGS;
      break;
    case 'xray':
      table = XRAY_VERSION_TABLE;
      tagCaps = XRAY_BUILD_TAGS;
      break;
    default: {
      const _exhaustive: never = engine;
      throw new Error(`Unknown core engine: ${String(_exhaustive)}`);
    }
  }

  const caps: Capability[] = [];
  for (const rule of table) {
    if (!versionAtLeast(coreVersion, rule.minVersion)) continue;
    if (rule.requiresBuildTag !== undefined && !tags.has(rule.requiresBuildTag)) continue;
    caps.push(rule.capability);
  }
  for (const [tag, cap] of Object.entries(tagCaps)) {
    if (tags.has(tag)) caps.push(cap);
  }
  return sortCapabilities(caps);
}

/** 報告された能力名を正規化し、未知のトークンは落とす */
export function normalizeCapabilities(reported: string[]): Capability[] {
  const caps: Capability[] = [];
  for (const name of reported) {
    const normalized = normalizeCapabilityName(name);
    if (isCapability(normalized)) caps.push(normalized);
  }
  return sortCapabilities(caps);
}

/**
 * エージェントの能力を確定する。
 * 報告が空でバージョンが分かる場合はバージョン表から導出する。
 */
export function resolveAgentCapabilities(
  coreType: string,
  coreVersion: string,
  reported: string[],
  buildTags: string[],
): AgentCapabilities {
  let caps = normalizeCapabilities(reported);
  if (caps.length === 0 && coreVersion.trim() !== '') {
    caps = deriveCapabilities(coreType, coreVersion, buildTags);
  }
  return {
    coreType,
    coreVersion,
    capabilities: new Set(caps),
    buildTags: [...buildTags],
  };
}
