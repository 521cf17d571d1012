/**
 * corepipe — Capability Filter
 *
 * エージェントが実行できない機能をテンプレートコンテキストから取り除く。
 * inbound は機能を落として縮退させる。出力先のコアが扱えないプロトコルの inbound だけは丸ごと外す。
 * 落とした内容は警告で返す。
 */

import type { AgentCapabilities, CompatibilityResult } from '../types/capability.js';
import type { Capability, Inbound } from '../types/inbound.js';
import { cloneInbound, deriveRequiredCapabilities } from '../types/inbound.js';
import type { TemplateContext } from '../types/template.js';
import { normalizeCoreEngine } from '../codec/registry.js';
import { XRAY_UNSUPPORTED_PROTOCOLS } from '../codec/xray-codec.js';
import {
  SING_BOX_VERSION_TABLE,
  XRAY_VERSION_TABLE,
  normalizeCapabilityName,
  versionAtLeast,
} from './derive.js';

export interface FilterOutcome {
  context: TemplateContext;
  warnings: string[];
}

const FEATURE_NAMES: Record<'reality' | 'multiplex' | 'brutal', string> = {
  reality: 'Reality',
  multiplex: 'Multiplex',
  brutal: 'Brutal',
};

export class CapabilityFilter {
  private readonly agent: AgentCapabilities;

  constructor(agent: AgentCapabilities) {
    this.agent = agent;
  }

  /** 表記ゆれを吸収した集合判定 */
  supportsCapability(cap: string): boolean {
    const normalized = normalizeCapabilityName(cap);
    for (const own of this.agent.capabilities) {
      if (own === normalized) return true;
    }
    return false;
  }

  /**
   * エージェントのバージョンが minVersion 以上か。
   * minVersion が空なら常に true。エージェントのバージョン不明なら false。
   */
  supportsVersion(minVersion: string): boolean {
    if (minVersion.trim() === '') return true;
    if (this.agent.coreVersion.trim() === '') return false;
    return versionAtLeast(this.agent.coreVersion, minVersion);
  }

  /** 警告文に載せる「要求バージョン」 */
  private requirementFor(cap: Capability): string {
    const engine = normalizeCoreEngine(this.agent.coreType);
    const table = engine === 'xray' ? XRAY_VERSION_TABLE : engine === 'sing-box' ? SING_BOX_VERSION_TABLE : [];
    const rule = table.find((r) => r.capability === cap);
    if (rule === undefined || engine === undefined) return 'not available for this core';
    const tag = rule.requiresBuildTag !== undefined ? ` with build tag ${rule.requiresBuildTag}` : '';
    return `requires ${engine} >= ${rule.minVersion}${tag}`;
  }

  private removalWarning(cap: 'reality' | 'multiplex' | 'brutal', tag: string): string {
    return `Removing ${FEATURE_NAMES[cap]} from inbound '${tag}' - not supported by agent (${this.requirementFor(cap)})`;
  }

  private filterInbound(inbound: Inbound, warnings: string[]): Inbound {
    const copy = cloneInbound(inbound);

    if (copy.tls?.reality !== undefined && copy.tls.reality.enabled && !this.supportsCapability('reality')) {
      delete copy.tls.reality;
      warnings.push(this.removalWarning('reality', copy.tag));
    }

    if (copy.multiplex !== undefined) {
      if (copy.multiplex.enabled && !this.supportsCapability('multiplex')) {
        // Brutal は multiplex の中にあるので一緒に消える
        delete copy.multiplex;
        warnings.push(this.removalWarning('multiplex', copy.tag));
      } else if (copy.multiplex.brutal !== undefined && copy.multiplex.brutal.enabled && !this.supportsCapability('brutal')) {
        delete copy.multiplex.brutal;
        warnings.push(this.removalWarning('brutal', copy.tag));
      }
    }

    copy.requiredCapabilities = deriveRequiredCapabilities(copy);
    return copy;
  }

  /** experimental.v2rayApi を残してよいか */
  private keepsV2RayApi(): boolean {
    const engine = normalizeCoreEngine(this.agent.coreType);
    switch (engine) {
      case 'xray':
        return true;
      case 'sing-box':
        return this.supportsCapability('v2ray_api') && this.agent.buildTags.includes('with_v2ray_api');
      default:
        return false;
    }
  }

  /** 出力先のコアがそのプロトコルを扱えるか。扱えなければ警告を積む。 */
  private servesProtocol(inbound: Inbound, target: string, warnings: string[]): boolean {
    if (normalizeCoreEngine(target) === 'xray' && XRAY_UNSUPPORTED_PROTOCOLS.includes(inbound.type)) {
      warnings.push(`Removing inbound '${inbound.tag}' - protocol '${inbound.type}' is not supported by xray`);
      return false;
    }
    return true;
  }

  /**
   * コンテキストのディープコピーから、未サポート機能を取り除く。
   * 出力先のコアは ctx.agent.coreType。元のコンテキストは変更しない。
   */
  filterContext(ctx: TemplateContext): FilterOutcome {
    const warnings: string[] = [];
    const inbounds = ctx.inbounds
      .filter((inbound) => this.servesProtocol(inbound, ctx.agent.coreType, warnings))
      .map((inbound) => this.filterInbound(inbound, warnings));

    const experimental = { ...ctx.experimental };
    if (experimental.v2rayApi !== undefined && !this.keepsV2RayApi()) {
      delete experimental.v2rayApi;
      warnings.push('Removing v2ray_api from experimental - not supported by agent (requires build tag with_v2ray_api)');
    }

    return {
      context: {
        ...structuredClone(ctx),
        inbounds,
        experimental,
      },
      warnings,
    };
  }

  /**
   * テンプレートの最低バージョンと必要能力をエージェントと突き合わせる。
   * バージョン不足は互換なし（errors）。能力の不足は警告のみ。
   * エージェントのバージョン不明は「互換性不明」として互換なし + 警告。
   */
  checkTemplateCompatibility(minVersion: string, requiredCaps: string[]): CompatibilityResult {
    const result: CompatibilityResult = { compatible: true, warnings: [], errors: [] };

    if (minVersion.trim() !== '') {
      if (this.agent.coreVersion.trim() === '') {
        result.compatible = false;
        result.warnings.push(`Template requires version ${minVersion}, agent version is unknown`);
      } else if (!this.supportsVersion(minVersion)) {
        result.compatible = false;
        result.errors.push(`Template requires version ${minVersion}, agent has ${this.agent.coreVersion}`);
      }
    }

    for (const cap of requiredCaps) {
      if (!this.supportsCapability(cap)) {
        result.warnings.push(`Template requires capability '${cap}', which the agent does not support`);
      }
    }

    return result;
  }
}
