import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { ServerNode } from '../../types/entities.js';
import type { Inbound } from '../../types/inbound.js';
import { isInbound } from '../../types/inbound.js';
import type { CreateServerNodeInput } from '../../types/repository.js';
import { parseJsonArray } from '../../utils/json.js';

/** Row shape returned by better-sqlite3 for the servers table. */
interface ServerRow {
  id: string;
  agent_host_id: string;
  group_id: string | null;
  name: string;
  inbounds_json: string;
  created_at: string;
  updated_at: string;
}

const COLUMNS = 'id, agent_host_id, group_id, name, inbounds_json, created_at, updated_at';

/** Maps a snake_case DB row to a camelCase ServerNode entity. */
function rowToServer(row: ServerRow): ServerNode {
  return {
    id: row.id,
    agentHostId: row.agent_host_id,
    ...(row.group_id !== null ? { groupId: row.group_id } : {}),
    name: row.name,
    inbounds: parseJsonArray(row.inbounds_json, isInbound),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Repository for the `servers` table. Inbounds are stored as canonical
 * Inbound JSON so that any codec can serialize them.
 */
export class ServerRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new ServerNode and return the full entity. */
  create(input: CreateServerNodeInput): ServerNode {
    const id = crypto.randomUUID();
    const now = new Date().toISOString();

    this.db
      .prepare<[string, string, string | null, string, string, string, string]>(
        `INSERT INTO servers (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(id, input.agentHostId, input.groupId ?? null, input.name, JSON.stringify(input.inbounds), now, now);

    return {
      id,
      ...input,
      inbounds: structuredClone(input.inbounds),
      createdAt: now,
      updatedAt: now,
    };
  }

  /** Find a ServerNode by its UUID. Returns undefined if not found. */
  findById(id: string): ServerNode | undefined {
    const row = this.db.prepare<[string], ServerRow>(`SELECT ${COLUMNS} FROM servers WHERE id = ?`).get(id);
    return row ? rowToServer(row) : undefined;
  }

  /** Return all ServerNodes bound to an agent host. */
  findByAgentHostId(agentHostId: string): ServerNode[] {
    return this.db
      .prepare<[string], ServerRow>(`SELECT ${COLUMNS} FROM servers WHERE agent_host_id = ? ORDER BY name, created_at`)
      .all(agentHostId)
      .map(rowToServer);
  }

  /** Replace the stored inbounds. Returns the updated entity or undefined. */
  updateInbounds(id: string, inbounds: Inbound[]): ServerNode | undefined {
    const result = this.db
      .prepare<[string, string, string]>('UPDATE servers SET inbounds_json = ?, updated_at = ? WHERE id = ?')
      .run(JSON.stringify(inbounds), new Date().toISOString(), id);
    return result.changes > 0 ? this.findById(id) : undefined;
  }

  /** Delete a ServerNode by id. Returns true if a row was deleted. */
  delete(id: string): boolean {
    const result = this.db.prepare<[string]>('DELETE FROM servers WHERE id = ?').run(id);
    return result.changes > 0;
  }
}
