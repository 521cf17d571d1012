import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { AgentHost } from '../../types/entities.js';
import type { CreateAgentHostInput, ReportCapabilitiesInput } from '../../types/repository.js';
import { isString, parseJsonArray } from '../../utils/json.js';

/** Row shape returned by better-sqlite3 for the agent_hosts table. */
interface AgentHostRow {
  id: string;
  name: string;
  host: string;
  token: string;
  core_type: string;
  core_version: string;
  capabilities_json: string;
  build_tags_json: string;
  template_id: string | null;
  created_at: string;
  updated_at: string;
}

const COLUMNS =
  'id, name, host, token, core_type, core_version, capabilities_json, build_tags_json, template_id, created_at, updated_at';

/** Maps a snake_case DB row to a camelCase AgentHost entity. */
function rowToAgentHost(row: AgentHostRow): AgentHost {
  return {
    id: row.id,
    name: row.name,
    host: row.host,
    token: row.token,
    coreType: row.core_type,
    coreVersion: row.core_version,
    capabilities: parseJsonArray(row.capabilities_json, isString),
    buildTags: parseJsonArray(row.build_tags_json, isString),
    ...(row.template_id !== null ? { templateId: row.template_id } : {}),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Repository for the `agent_hosts` table.
 */
export class AgentHostRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new AgentHost and return the full entity. */
  create(input: CreateAgentHostInput): AgentHost {
    const id = crypto.randomUUID();
    const now = new Date().toISOString();
    const capabilities = input.capabilities ?? [];
    const buildTags = input.buildTags ?? [];

    this.db
      .prepare<[string, string, string, string, string, string, string, string, string | null, string, string]>(
        `INSERT INTO agent_hosts (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        input.name,
        input.host,
        input.token,
        input.coreType,
        input.coreVersion ?? '',
        JSON.stringify(capabilities),
        JSON.stringify(buildTags),
        input.templateId ?? null,
        now,
        now,
      );

    return {
      id,
      name: input.name,
      host: input.host,
      token: input.token,
      coreType: input.coreType,
      coreVersion: input.coreVersion ?? '',
      capabilities: [...capabilities],
      buildTags: [...buildTags],
      ...(input.templateId !== undefined ? { templateId: input.templateId } : {}),
      createdAt: now,
      updatedAt: now,
    };
  }

  /** Find an AgentHost by its UUID. Returns undefined if not found. */
  findById(id: string): AgentHost | undefined {
    const row = this.db
      .prepare<[string], AgentHostRow>(`SELECT ${COLUMNS} FROM agent_hosts WHERE id = ?`)
      .get(id);
    return row ? rowToAgentHost(row) : undefined;
  }

  /** Return all AgentHosts ordered by name. */
  findAll(): AgentHost[] {
    const rows = this.db
      .prepare<[], AgentHostRow>(`SELECT ${COLUMNS} FROM agent_hosts ORDER BY name, created_at`)
      .all();
    return rows.map(rowToAgentHost);
  }

  /** Overwrite the reported core details. Returns the updated entity or undefined. */
  updateCapabilities(id: string, input: ReportCapabilitiesInput): AgentHost | undefined {
    const now = new Date().toISOString();
    const result = this.db
      .prepare<[string, string, string, string, string, string]>(
        `UPDATE agent_hosts
         SET core_type = ?, core_version = ?, capabilities_json = ?, build_tags_json = ?, updated_at = ?
         WHERE id = ?`,
      )
      .run(
        input.coreType,
        input.coreVersion,
        JSON.stringify(input.capabilities),
        JSON.stringify(input.buildTags),
        now,
        id,
      );
    return result.changes > 0 ? this.findById(id) : undefined;
  }

  /** Set or clear (undefined) the assigned template. Returns the updated entity or undefined. */
  assignTemplate(id: string, templateId: string | undefined): AgentHost | undefined {
    const now = new Date().toISOString();
    const result = this.db
      .prepare<[string | null, string, string]>(
        'UPDATE agent_hosts SET template_id = ?, updated_at = ? WHERE id = ?',
      )
      .run(templateId ?? null, now, id);
    return result.changes > 0 ? this.findById(id) : undefined;
  }

  /** Delete an AgentHost by its UUID. Returns true if a row was deleted. */
  delete(id: string): boolean {
    const result = this.db.prepare<[string]>('DELETE FROM agent_hosts WHERE id = ?').run(id);
    return result.changes > 0;
  }
}
