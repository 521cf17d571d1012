import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { ConfigTemplate } from '../../types/entities.js';
import type { CoreEngine } from '../../types/inbound.js';
import type { CreateConfigTemplateInput, UpdateConfigTemplateInput } from '../../types/repository.js';
import { isString, parseJsonArray } from '../../utils/json.js';

/**
 * Raw row shape returned by better-sqlite3 for the `config_templates` table.
 * `type` is constrained by a CHECK to 'sing-box' | 'xray'.
 */
interface ConfigTemplateRow {
  id: string;
  name: string;
  type: CoreEngine;
  content: string;
  description: string;
  min_version: string;
  capabilities_json: string;
  schema_version: number;
  is_valid: number;
  validation_error: string;
  created_at: string;
  updated_at: string;
}

const COLUMNS =
  'id, name, type, content, description, min_version, capabilities_json, schema_version, is_valid, validation_error, created_at, updated_at';

/** Maps a snake_case DB row to a camelCase ConfigTemplate entity. */
function rowToConfigTemplate(row: ConfigTemplateRow): ConfigTemplate {
  return {
    id: row.id,
    name: row.name,
    type: row.type,
    content: row.content,
    description: row.description,
    minVersion: row.min_version,
    capabilities: parseJsonArray(row.capabilities_json, isString),
    schemaVersion: row.schema_version,
    isValid: row.is_valid === 1,
    validationError: row.validation_error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Repository for the `config_templates` table.
 */
export class ConfigTemplateRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new ConfigTemplate and return the full entity. */
  create(input: CreateConfigTemplateInput): ConfigTemplate {
    const id = crypto.randomUUID();
    const now = new Date().toISOString();

    this.db
      .prepare<
        [string, string, string, string, string, string, string, number, number, string, string, string]
      >(`INSERT INTO config_templates (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`)
      .run(
        id,
        input.name,
        input.type,
        input.content,
        input.description,
        input.minVersion,
        JSON.stringify(input.capabilities),
        input.schemaVersion,
        input.isValid ? 1 : 0,
        input.validationError,
        now,
        now,
      );

    return {
      id,
      ...input,
      capabilities: [...input.capabilities],
      createdAt: now,
      updatedAt: now,
    };
  }

  /** Find a ConfigTemplate by its UUID. Returns undefined if not found. */
  findById(id: string): ConfigTemplate | undefined {
    const row = this.db
      .prepare<[string], ConfigTemplateRow>(`SELECT ${COLUMNS} FROM config_templates WHERE id = ?`)
      .get(id);
    return row ? rowToConfigTemplate(row) : undefined;
  }

  /** Return all ConfigTemplates, optionally restricted to one core type. */
  findAll(type?: CoreEngine): ConfigTemplate[] {
    if (type !== undefined) {
      return this.db
        .prepare<[string], ConfigTemplateRow>(
          `SELECT ${COLUMNS} FROM config_templates WHERE type = ? ORDER BY name, created_at`,
        )
        .all(type)
        .map(rowToConfigTemplate);
    }
    return this.db
      .prepare<[], ConfigTemplateRow>(`SELECT ${COLUMNS} FROM config_templates ORDER BY name, created_at`)
      .all()
      .map(rowToConfigTemplate);
  }

  /**
   * Update an existing ConfigTemplate with the provided fields.
   * Always bumps `updated_at`. Returns the updated entity, or undefined if
   * the template was not found.
   */
  update(id: string, input: UpdateConfigTemplateInput): ConfigTemplate | undefined {
    const setClauses: string[] = [];
    const params: (string | number)[] = [];

    if (input.name !== undefined) {
      setClauses.push('name = ?');
      params.push(input.name);
    }
    if (input.type !== undefined) {
      setClauses.push('type = ?');
      params.push(input.type);
    }
    if (input.content !== undefined) {
      setClauses.push('content = ?');
      params.push(input.content);
    }
    if (input.description !== undefined) {
      setClauses.push('description = ?');
      params.push(input.description);
    }
    if (input.minVersion !== undefined) {
      setClauses.push('min_version = ?');
      params.push(input.minVersion);
    }
    if (input.capabilities !== undefined) {
      setClauses.push('capabilities_json = ?');
      params.push(JSON.stringify(input.capabilities));
    }
    if (input.isValid !== undefined) {
      setClauses.push('is_valid = ?');
      params.push(input.isValid ? 1 : 0);
    }
    if (input.validationError !== undefined) {
      setClauses.push('validation_error = ?');
      params.push(input.validationError);
    }

    setClauses.push('updated_at = ?');
    params.push(new Date().toISOString());
    params.push(id);

    const result = this.db
      .prepare(`UPDATE config_templates SET ${setClauses.join(', ')} WHERE id = ?`)
      .run(...params);

    if (result.changes === 0) {
      return undefined;
    }
    return this.findById(id);
  }

  /** Delete a ConfigTemplate by id. Returns true if a row was deleted. */
  delete(id: string): boolean {
    const result = this.db.prepare<[string]>('DELETE FROM config_templates WHERE id = ?').run(id);
    return result.changes > 0;
  }
}
