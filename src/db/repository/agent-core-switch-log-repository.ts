import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { AgentCoreSwitchLog, SwitchStatus } from '../../types/entities.js';
import { isTerminalStatus, transitionSources } from '../../types/entities.js';
import type { CreateSwitchLogInput, SwitchLogFilter } from '../../types/repository.js';

/** Row shape returned by better-sqlite3 for the agent_core_switch_logs table. */
interface SwitchLogRow {
  id: string;
  agent_host_id: string;
  switch_id: string;
  from_instance_id: string | null;
  to_instance_id: string | null;
  from_core_type: string | null;
  to_core_type: string;
  status: SwitchStatus;
  message: string;
  operator_id: string | null;
  created_at: string;
  completed_at: string | null;
}

const COLUMNS =
  'id, agent_host_id, switch_id, from_instance_id, to_instance_id, from_core_type, to_core_type, status, message, operator_id, created_at, completed_at';

/** Maps a snake_case DB row to a camelCase AgentCoreSwitchLog entity. */
function rowToSwitchLog(row: SwitchLogRow): AgentCoreSwitchLog {
  return {
    id: row.id,
    agentHostId: row.agent_host_id,
    switchId: row.switch_id,
    ...(row.from_instance_id !== null ? { fromInstanceId: row.from_instance_id } : {}),
    ...(row.to_instance_id !== null ? { toInstanceId: row.to_instance_id } : {}),
    ...(row.from_core_type !== null ? { fromCoreType: row.from_core_type } : {}),
    toCoreType: row.to_core_type,
    status: row.status,
    message: row.message,
    ...(row.operator_id !== null ? { operatorId: row.operator_id } : {}),
    createdAt: row.created_at,
    ...(row.completed_at !== null ? { completedAt: row.completed_at } : {}),
  };
}

/** Extra columns written together with a status transition. */
export interface SwitchLogTransitionFields {
  message?: string;
  toInstanceId?: string;
  /** Defaults to now when entering a terminal status. */
  completedAt?: string;
}

/** Builds the shared WHERE clause for findByFilter / countByFilter. */
function filterClause(filter: SwitchLogFilter): { where: string; params: string[] } {
  const clauses = ['agent_host_id = ?'];
  const params = [filter.agentHostId];

  if (filter.status !== undefined) {
    clauses.push('status = ?');
    params.push(filter.status);
  }
  if (filter.startAt !== undefined) {
    clauses.push('created_at >= ?');
    params.push(filter.startAt);
  }
  if (filter.endAt !== undefined) {
    clauses.push('created_at <= ?');
    params.push(filter.endAt);
  }

  return { where: clauses.join(' AND '), params };
}

/**
 * Repository for the `agent_core_switch_logs` table.
 *
 * Rows start as `pending`. Status updates are conditional on the current
 * status, so a terminal row (completed / failed) is never written twice.
 */
export class AgentCoreSwitchLogRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new `pending` switch log and return the full entity. */
  create(input: CreateSwitchLogInput): AgentCoreSwitchLog {
    const id = crypto.randomUUID();
    const now = new Date().toISOString();

    this.db
      .prepare<
        [
          string,
          string,
          string,
          string | null,
          string | null,
          string | null,
          string,
          string,
          string,
          string | null,
          string,
        ]
      >(
        `INSERT INTO agent_core_switch_logs (id, agent_host_id, switch_id, from_instance_id, to_instance_id, from_core_type, to_core_type, status, message, operator_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        input.agentHostId,
        input.switchId,
        input.fromInstanceId ?? null,
        input.toInstanceId ?? null,
        input.fromCoreType ?? null,
        input.toCoreType,
        'pending',
        input.message,
        input.operatorId ?? null,
        now,
      );

    return { id, ...input, status: 'pending', createdAt: now };
  }

  /** Find a switch log by its UUID. Returns undefined if not found. */
  findById(id: string): AgentCoreSwitchLog | undefined {
    const row = this.db
      .prepare<[string], SwitchLogRow>(`SELECT ${COLUMNS} FROM agent_core_switch_logs WHERE id = ?`)
      .get(id);
    return row ? rowToSwitchLog(row) : undefined;
  }

  /**
   * Apply a status transition if the stored status allows it (see
   * SWITCH_TRANSITIONS). Entering a terminal status stamps completed_at.
   * Returns false if the row is missing or the move is not allowed.
   */
  transition(id: string, to: SwitchStatus, fields: SwitchLogTransitionFields = {}): boolean {
    const sources = transitionSources(to);
    if (sources.length === 0) {
      return false;
    }

    const setClauses = ['status = ?'];
    const params: string[] = [to];

    if (fields.message !== undefined) {
      setClauses.push('message = ?');
      params.push(fields.message);
    }
    if (fields.toInstanceId !== undefined) {
      setClauses.push('to_instance_id = ?');
      params.push(fields.toInstanceId);
    }
    if (isTerminalStatus(to)) {
      setClauses.push('completed_at = ?');
      params.push(fields.completedAt ?? new Date().toISOString());
    }

    params.push(id, ...sources);
    const result = this.db
      .prepare(
        `UPDATE agent_core_switch_logs SET ${setClauses.join(', ')}
         WHERE id = ? AND status IN (${sources.map(() => '?').join(', ')})`,
      )
      .run(...params);
    return result.changes > 0;
  }

  /** Return one page of switch logs for a host, newest first. */
  findByFilter(filter: SwitchLogFilter): AgentCoreSwitchLog[] {
    const { where, params } = filterClause(filter);
    const limit = filter.limit ?? -1;
    const offset = filter.offset ?? 0;

    return this.db
      .prepare<(string | number)[], SwitchLogRow>(
        `SELECT ${COLUMNS} FROM agent_core_switch_logs
         WHERE ${where}
         ORDER BY created_at DESC, rowid DESC
         LIMIT ? OFFSET ?`,
      )
      .all(...params, limit, offset)
      .map(rowToSwitchLog);
  }

  /** Count all switch logs matching the filter, ignoring limit / offset. */
  countByFilter(filter: SwitchLogFilter): number {
    const { where, params } = filterClause(filter);
    const row = this.db
      .prepare<string[], { cnt: number }>(`SELECT COUNT(*) AS cnt FROM agent_core_switch_logs WHERE ${where}`)
      .get(...params);
    return row?.cnt ?? 0;
  }
}
