/**
 * corepipe — Capability types
 */

import type { Capability } from './inbound.js';

/**
 * エージェント側コアの能力。
 * capabilities が空でも coreVersion があれば、検査前にバージョン表から導出済みであること。
 */
export interface AgentCapabilities {
  coreType: string;
  coreVersion: string;
  capabilities: ReadonlySet<Capability>;
  buildTags: string[];
}

/** バージョン表の 1 行 */
export interface CapabilityRule {
  readonly capability: Capability;
  readonly minVersion: string;
  /** このビルドタグがなければ提供されない */
  readonly requiresBuildTag?: string;
}

export interface CompatibilityResult {
  compatible: boolean;
  warnings: string[];
  errors: string[];
}
