import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { migrateDatabase, schemaVersion, SCHEMA_VERSION } from '../../src/db/migrate.js';
import { AgentHostRepository } from '../../src/db/repository/agent-host-repository.js';
import { AppError } from '../../src/utils/errors.js';

// ---------------------------------------------------------------------------
// ヘルパー
// ---------------------------------------------------------------------------

/** sqlite_master からテーブル名一覧を取得する */
function tableNames(db: InstanceType<typeof Database>): string[] {
  const rows = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'")
    .all() as Array<{ name: string }>;
  return rows.map((r) => r.name).sort();
}

/** sqlite_master からインデックス名一覧を取得する */
function indexNames(db: InstanceType<typeof Database>): string[] {
  const rows = db
    .prepare("SELECT name FROM sqlite_master WHERE type='index' AND name NOT LIKE 'sqlite_%'")
    .all() as Array<{ name: string }>;
  return rows.map((r) => r.name).sort();
}

// ---------------------------------------------------------------------------
// テスト
// ---------------------------------------------------------------------------

describe('migrateDatabase', () => {
  it('新規 DB にスキーマを作成し、最新バージョンを設定する', () => {
    const db = new Database(':memory:');

    migrateDatabase(db);

    expect(schemaVersion(db)).toBe(SCHEMA_VERSION);
    expect(SCHEMA_VERSION).toBe(1);
    expect(tableNames(db)).toEqual([
      'agent_core_instances',
      'agent_core_switch_logs',
      'agent_hosts',
      'config_templates',
      'node_users',
      'servers',
    ]);
    expect(indexNames(db)).toEqual([
      'idx_config_templates_type',
      'idx_node_users_group',
      'idx_servers_agent_host',
      'idx_switch_logs_host_created',
      'idx_switch_logs_status',
    ]);
  });

  it('2 回実行しても変化しない', () => {
    const db = new Database(':memory:');
    migrateDatabase(db);
    const repo = new AgentHostRepository(db);
    repo.create({ name: 'edge-1', host: '10.0.0.1', token: 'test-secret', coreType: '' });

    migrateDatabase(db);

    expect(schemaVersion(db)).toBe(1);
    expect(repo.findAll()).toHaveLength(1);
  });

  it('外部キー制約を有効にする', () => {
    const db = new Database(':memory:');
    migrateDatabase(db);

    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
  });

  it('現行より新しい版の DB はエラーにして手を付けない', () => {
    const db = new Database(':memory:');
    db.pragma('user_version = 2');

    expect(() => migrateDatabase(db)).toThrow(AppError);
    expect(() => migrateDatabase(db)).toThrow('database schema version 2 is newer than this build supports (1)');
    expect(tableNames(db)).toEqual([]);
  });

  it('版がないのにテーブルがある DB はエラーにして手を付けない', () => {
    const db = new Database(':memory:');
    db.exec('CREATE TABLE notes (id TEXT PRIMARY KEY)');

    expect(() => migrateDatabase(db)).toThrow('database has tables but no schema version; refusing to modify it');
    expect(tableNames(db)).toEqual(['notes']);
    expect(schemaVersion(db)).toBe(0);
  });
});
