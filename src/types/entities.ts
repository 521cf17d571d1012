/**
 * corepipe - Entity type definitions
 *
 * These interfaces map to the SQL tables defined in src/db/schema.ts.
 * Property names are camelCase conversions of the snake_case column names.
 *
 * Conventions:
 *   TEXT           -> string
 *   INTEGER        -> number (0/1 flags -> boolean)
 *   *_json columns -> parsed arrays / objects
 *   nullable col   -> optional property (?)
 *   All IDs        -> string (UUID)
 *   All timestamps -> string (ISO 8601)
 */

import type { CoreEngine, Inbound } from './inbound.js';

// ============================================================
// agent_hosts
// ============================================================

/** A remote machine running a proxy core, reachable over the agent RPC. */
export interface AgentHost {
  id: string;
  name: string;
  /** "address" or "address:port"; the configured RPC port is used when absent. */
  host: string;
  token: string;
  coreType: string;
  coreVersion: string;
  capabilities: string[];
  buildTags: string[];
  templateId?: string;
  createdAt: string;
  updatedAt: string;
}

// ============================================================
// config_templates
// ============================================================

/** Admin-authored template text that renders into a core configuration. */
export interface ConfigTemplate {
  id: string;
  name: string;
  type: CoreEngine;
  content: string;
  description: string;
  minVersion: string;
  capabilities: string[];
  schemaVersion: number;
  isValid: boolean;
  validationError: string;
  createdAt: string;
  updatedAt: string;
}

// ============================================================
// agent_core_instances
// ============================================================

export const INSTANCE_STATUSES = ['running', 'stopped'] as const;

export type InstanceStatus = (typeof INSTANCE_STATUSES)[number];

/** A core process on an agent host, unique per (agentHostId, instanceId). */
export interface AgentCoreInstance {
  id: string;
  agentHostId: string;
  instanceId: string;
  coreType: string;
  status: InstanceStatus;
  configTemplateId?: string;
  configHash: string;
  listenPorts: number[];
  lastHeartbeatAt?: string;
  errorMessage: string;
  createdAt: string;
  updatedAt: string;
}

// ============================================================
// agent_core_switch_logs
// ============================================================

export const SWITCH_STATUSES = ['pending', 'in_progress', 'completed', 'failed'] as const;

export type SwitchStatus = (typeof SWITCH_STATUSES)[number];

/** Allowed status moves. completed / failed are terminal. */
export const SWITCH_TRANSITIONS: Readonly<Record<SwitchStatus, readonly SwitchStatus[]>> = Object.freeze({
  pending: ['in_progress', 'completed', 'failed'],
  in_progress: ['completed', 'failed'],
  completed: [],
  failed: [],
});

export function canTransition(from: SwitchStatus, to: SwitchStatus): boolean {
  return SWITCH_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: SwitchStatus): boolean {
  return SWITCH_TRANSITIONS[status].length === 0;
}

/** Statuses from which `to` may be entered. */
export function transitionSources(to: SwitchStatus): SwitchStatus[] {
  return SWITCH_STATUSES.filter((from) => canTransition(from, to));
}

/** Audit row for one create/switch attempt. */
export interface AgentCoreSwitchLog {
  id: string;
  agentHostId: string;
  /** Correlation ID sent to the agent. */
  switchId: string;
  fromInstanceId?: string;
  toInstanceId?: string;
  fromCoreType?: string;
  toCoreType: string;
  status: SwitchStatus;
  message: string;
  operatorId?: string;
  createdAt: string;
  completedAt?: string;
}

// ============================================================
// servers
// ============================================================

/** A proxy node served by an agent host. Its inbounds feed template rendering. */
export interface ServerNode {
  id: string;
  agentHostId: string;
  groupId?: string;
  name: string;
  inbounds: Inbound[];
  createdAt: string;
  updatedAt: string;
}

// ============================================================
// node_users
// ============================================================

/** A subscriber account that gets injected into rendered inbounds. */
export interface NodeUser {
  id: string;
  uuid: string;
  email: string;
  groupId?: string;
  enabled: boolean;
  expiresAt?: string;
  createdAt: string;
}
