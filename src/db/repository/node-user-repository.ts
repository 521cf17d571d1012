import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { NodeUser } from '../../types/entities.js';
import type { CreateNodeUserInput } from '../../types/repository.js';

/** Row shape returned by better-sqlite3 for the node_users table. */
interface NodeUserRow {
  id: string;
  uuid: string;
  email: string;
  group_id: string | null;
  enabled: number;
  expires_at: string | null;
  created_at: string;
}

const COLUMNS = 'id, uuid, email, group_id, enabled, expires_at, created_at';

/** Maps a snake_case DB row to a camelCase NodeUser entity. */
function rowToNodeUser(row: NodeUserRow): NodeUser {
  return {
    id: row.id,
    uuid: row.uuid,
    email: row.email,
    ...(row.group_id !== null ? { groupId: row.group_id } : {}),
    enabled: row.enabled === 1,
    ...(row.expires_at !== null ? { expiresAt: row.expires_at } : {}),
    createdAt: row.created_at,
  };
}

/**
 * Repository for the `node_users` table.
 */
export class NodeUserRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new NodeUser and return the full entity. */
  create(input: CreateNodeUserInput): NodeUser {
    const id = crypto.randomUUID();
    const now = new Date().toISOString();

    this.db
      .prepare<[string, string, string, string | null, number, string | null, string]>(
        `INSERT INTO node_users (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(id, input.uuid, input.email, input.groupId ?? null, input.enabled ? 1 : 0, input.expiresAt ?? null, now);

    return { id, ...input, createdAt: now };
  }

  /** Find a NodeUser by its UUID. Returns undefined if not found. */
  findById(id: string): NodeUser | undefined {
    const row = this.db.prepare<[string], NodeUserRow>(`SELECT ${COLUMNS} FROM node_users WHERE id = ?`).get(id);
    return row ? rowToNodeUser(row) : undefined;
  }

  /**
   * Return the enabled, unexpired users of the given groups, ordered by email.
   * An empty group list returns no users.
   */
  findEnabledByGroupIds(groupIds: string[], now: string = new Date().toISOString()): NodeUser[] {
    if (groupIds.length === 0) {
      return [];
    }
    const placeholders = groupIds.map(() => '?').join(', ');
    return this.db
      .prepare<string[], NodeUserRow>(
        `SELECT ${COLUMNS} FROM node_users
         WHERE enabled = 1
           AND group_id IN (${placeholders})
           AND (expires_at IS NULL OR expires_at > ?)
         ORDER BY email, created_at`,
      )
      .all(...groupIds, now)
      .map(rowToNodeUser);
  }

  /** Enable or disable a user. Returns the updated entity or undefined. */
  setEnabled(id: string, enabled: boolean): NodeUser | undefined {
    const result = this.db
      .prepare<[number, string]>('UPDATE node_users SET enabled = ? WHERE id = ?')
      .run(enabled ? 1 : 0, id);
    return result.changes > 0 ? this.findById(id) : undefined;
  }

  /** Delete a NodeUser by id. Returns true if a row was deleted. */
  delete(id: string): boolean {
    const result = this.db.prepare<[string]>('DELETE FROM node_users WHERE id = ?').run(id);
    return result.changes > 0;
  }
}
