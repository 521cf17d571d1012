/**
 * corepipe - Repository input / update type definitions
 *
 * Create types use `Omit` to strip auto-generated columns (id, createdAt, updatedAt).
 * Update types use `Partial<Pick<...>>` to allow selective field updates.
 */

import type {
  AgentCoreInstance,
  AgentCoreSwitchLog,
  AgentHost,
  ConfigTemplate,
  NodeUser,
  ServerNode,
  SwitchStatus,
} from './entities.js';

// ============================================================
// Create input types
// ============================================================

/** Input for registering a new AgentHost. */
export type CreateAgentHostInput = Omit<
  AgentHost,
  'id' | 'createdAt' | 'updatedAt' | 'coreVersion' | 'capabilities' | 'buildTags'
> &
  Partial<Pick<AgentHost, 'coreVersion' | 'capabilities' | 'buildTags'>>;

/** Input for creating a new ConfigTemplate (validity is computed by the service). */
export type CreateConfigTemplateInput = Omit<ConfigTemplate, 'id' | 'createdAt' | 'updatedAt'>;

/** Input for creating a new AgentCoreInstance. */
export type CreateAgentCoreInstanceInput = Omit<AgentCoreInstance, 'id' | 'createdAt' | 'updatedAt'>;

/** Input for creating a new switch log; the row always starts as `pending`. */
export type CreateSwitchLogInput = Omit<AgentCoreSwitchLog, 'id' | 'status' | 'completedAt' | 'createdAt'>;

/** Input for creating a new ServerNode. */
export type CreateServerNodeInput = Omit<ServerNode, 'id' | 'createdAt' | 'updatedAt'>;

/** Input for creating a new NodeUser. */
export type CreateNodeUserInput = Omit<NodeUser, 'id' | 'createdAt'>;

// ============================================================
// Update input types
// ============================================================

/** Capability report from an agent. */
export type ReportCapabilitiesInput = Pick<AgentHost, 'coreType' | 'coreVersion' | 'capabilities' | 'buildTags'>;

/** Updatable fields of a ConfigTemplate. */
export type UpdateConfigTemplateInput = Partial<
  Pick<
    ConfigTemplate,
    'name' | 'type' | 'content' | 'description' | 'minVersion' | 'capabilities' | 'isValid' | 'validationError'
  >
>;

/** Updatable fields of an AgentCoreInstance. */
export type UpdateAgentCoreInstanceInput = Partial<
  Pick<AgentCoreInstance, 'status' | 'errorMessage' | 'lastHeartbeatAt' | 'listenPorts'>
>;

// ============================================================
// Query filters
// ============================================================

/** Filter for listing switch logs. */
export interface SwitchLogFilter {
  agentHostId: string;
  status?: SwitchStatus;
  /** Inclusive lower bound on createdAt (ISO 8601). */
  startAt?: string;
  /** Inclusive upper bound on createdAt (ISO 8601). */
  endAt?: string;
  limit?: number;
  offset?: number;
}
