import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { AgentCoreInstance, InstanceStatus } from '../../types/entities.js';
import type { CreateAgentCoreInstanceInput, UpdateAgentCoreInstanceInput } from '../../types/repository.js';
import { isInteger, parseJsonArray } from '../../utils/json.js';

/** Row shape returned by better-sqlite3 for the agent_core_instances table. */
interface AgentCoreInstanceRow {
  id: string;
  agent_host_id: string;
  instance_id: string;
  core_type: string;
  status: InstanceStatus;
  config_template_id: string | null;
  config_hash: string;
  listen_ports_json: string;
  last_heartbeat_at: string | null;
  error_message: string;
  created_at: string;
  updated_at: string;
}

const COLUMNS =
  'id, agent_host_id, instance_id, core_type, status, config_template_id, config_hash, listen_ports_json, last_heartbeat_at, error_message, created_at, updated_at';

/** Maps a snake_case DB row to a camelCase AgentCoreInstance entity. */
function rowToInstance(row: AgentCoreInstanceRow): AgentCoreInstance {
  return {
    id: row.id,
    agentHostId: row.agent_host_id,
    instanceId: row.instance_id,
    coreType: row.core_type,
    status: row.status,
    ...(row.config_template_id !== null ? { configTemplateId: row.config_template_id } : {}),
    configHash: row.config_hash,
    listenPorts: parseJsonArray(row.listen_ports_json, isInteger),
    ...(row.last_heartbeat_at !== null ? { lastHeartbeatAt: row.last_heartbeat_at } : {}),
    errorMessage: row.error_message,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Repository for the `agent_core_instances` table.
 *
 * (agent_host_id, instance_id) is UNIQUE; inserting a duplicate throws a
 * SQLITE_CONSTRAINT error from better-sqlite3.
 */
export class AgentCoreInstanceRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new AgentCoreInstance and return the full entity. */
  create(input: CreateAgentCoreInstanceInput): AgentCoreInstance {
    const id = crypto.randomUUID();
    const now = new Date().toISOString();

    this.db
      .prepare<
        [
          string,
          string,
          string,
          string,
          string,
          string | null,
          string,
          string,
          string | null,
          string,
          string,
          string,
        ]
      >(`INSERT INTO agent_core_instances (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`)
      .run(
        id,
        input.agentHostId,
        input.instanceId,
        input.coreType,
        input.status,
        input.configTemplateId ?? null,
        input.configHash,
        JSON.stringify(input.listenPorts),
        input.lastHeartbeatAt ?? null,
        input.errorMessage,
        now,
        now,
      );

    return {
      id,
      ...input,
      listenPorts: [...input.listenPorts],
      createdAt: now,
      updatedAt: now,
    };
  }

  /** Find an instance by its row UUID. Returns undefined if not found. */
  findById(id: string): AgentCoreInstance | undefined {
    const row = this.db
      .prepare<[string], AgentCoreInstanceRow>(`SELECT ${COLUMNS} FROM agent_core_instances WHERE id = ?`)
      .get(id);
    return row ? rowToInstance(row) : undefined;
  }

  /** Find an instance by its (agentHostId, instanceId) key. */
  findByInstanceId(agentHostId: string, instanceId: string): AgentCoreInstance | undefined {
    const row = this.db
      .prepare<[string, string], AgentCoreInstanceRow>(
        `SELECT ${COLUMNS} FROM agent_core_instances WHERE agent_host_id = ? AND instance_id = ?`,
      )
      .get(agentHostId, instanceId);
    return row ? rowToInstance(row) : undefined;
  }

  /** Return all instances of an agent host, oldest first. */
  findByAgentHostId(agentHostId: string): AgentCoreInstance[] {
    return this.db
      .prepare<[string], AgentCoreInstanceRow>(
        `SELECT ${COLUMNS} FROM agent_core_instances WHERE agent_host_id = ? ORDER BY created_at, instance_id`,
      )
      .all(agentHostId)
      .map(rowToInstance);
  }

  /**
   * Update an existing instance with the provided fields.
   * Always bumps `updated_at`. Returns the updated entity, or undefined if
   * the instance was not found.
   */
  update(id: string, input: UpdateAgentCoreInstanceInput): AgentCoreInstance | undefined {
    const setClauses: string[] = [];
    const params: (string | null)[] = [];

    if (input.status !== undefined) {
      setClauses.push('status = ?');
      params.push(input.status);
    }
    if (input.errorMessage !== undefined) {
      setClauses.push('error_message = ?');
      params.push(input.errorMessage);
    }
    if (input.lastHeartbeatAt !== undefined) {
      setClauses.push('last_heartbeat_at = ?');
      params.push(input.lastHeartbeatAt);
    }
    if (input.listenPorts !== undefined) {
      setClauses.push('listen_ports_json = ?');
      params.push(JSON.stringify(input.listenPorts));
    }

    setClauses.push('updated_at = ?');
    params.push(new Date().toISOString());
    params.push(id);

    const result = this.db
      .prepare(`UPDATE agent_core_instances SET ${setClauses.join(', ')} WHERE id = ?`)
      .run(...params);

    if (result.changes === 0) {
      return undefined;
    }
    return this.findById(id);
  }

  /** Delete an instance by row id. Returns true if a row was deleted. */
  delete(id: string): boolean {
    const result = this.db.prepare<[string]>('DELETE FROM agent_core_instances WHERE id = ?').run(id);
    return result.changes > 0;
  }
}
