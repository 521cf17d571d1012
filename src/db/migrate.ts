/**
 * corepipe — スキーマの作成と版管理
 *
 * 版は PRAGMA user_version に持つ。版 1 が初版で、その全体が SCHEMA_SQL。
 * 以後スキーマを変えるときは SCHEMA_VERSION を上げ、旧版からの差分をここに足す。
 */

import type Database from 'better-sqlite3';
import { SCHEMA_SQL } from './schema.js';
import { AppError } from '../utils/errors.js';

export const SCHEMA_VERSION = 1;

export function schemaVersion(db: Database.Database): number {
  const row = db.prepare('PRAGMA user_version').get() as { user_version: number };
  return row.user_version;
}

function userTableCount(db: Database.Database): number {
  const row = db
    .prepare("SELECT COUNT(*) AS cnt FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'")
    .get() as { cnt: number };
  return row.cnt;
}

/**
 * DB を SCHEMA_VERSION の形にする。何度呼んでもよい。
 *
 * - 版 0 で空の DB: SCHEMA_SQL を流して版を付ける
 * - 版 0 なのにテーブルがある DB: corepipe の DB ではないとみなしてエラー
 * - 現行より新しい版: 新しい corepipe が作った DB なのでエラー
 */
export function migrateDatabase(db: Database.Database): void {
  db.pragma('foreign_keys = ON');

  const version = schemaVersion(db);
  if (version === SCHEMA_VERSION) {
    return;
  }
  if (version > SCHEMA_VERSION) {
    throw new AppError(
      `database schema version ${version} is newer than this build supports (${SCHEMA_VERSION})`,
      500,
      'SCHEMA_VERSION',
    );
  }
  if (userTableCount(db) > 0) {
    throw new AppError('database has tables but no schema version; refusing to modify it', 500, 'SCHEMA_VERSION');
  }

  db.transaction(() => {
    db.exec(SCHEMA_SQL);
  })();
  db.pragma(`user_version = ${SCHEMA_VERSION}`);
}
