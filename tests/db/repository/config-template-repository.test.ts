import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { migrateDatabase } from '../../../src/db/migrate.js';
import { ConfigTemplateRepository } from '../../../src/db/repository/config-template-repository.js';
import type { CreateConfigTemplateInput } from '../../../src/types/repository.js';

function input(overrides: Partial<CreateConfigTemplateInput> = {}): CreateConfigTemplateInput {
  return {
    name: 'base',
    type: 'sing-box',
    content: '{"inbounds": []}',
    description: '',
    minVersion: '',
    capabilities: [],
    schemaVersion: 1,
    isValid: true,
    validationError: '',
    ...overrides,
  };
}

describe('ConfigTemplateRepository', () => {
  let db: InstanceType<typeof Database>;
  let repo: ConfigTemplateRepository;

  beforeEach(() => {
    db = new Database(':memory:');
    migrateDatabase(db);
    repo = new ConfigTemplateRepository(db);
  });

  it('create - ConfigTemplate を作成して返す', () => {
    const template = repo.create(input({ minVersion: '1.8.0', capabilities: ['reality'] }));

    expect(repo.findById(template.id)).toEqual(template);
    expect(template.capabilities).toEqual(['reality']);
  });

  it('不明な type は CHECK 制約で拒否される', () => {
    const insert = db.prepare(
      `INSERT INTO config_templates (id, name, type, content, created_at, updated_at)
       VALUES ('t1', 'bad', 'clash', '{}', '2024-01-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z')`,
    );

    expect(() => insert.run()).toThrow(/CHECK constraint failed/);
  });

  it('findAll - type で絞り込み、名前順に返す', () => {
    repo.create(input({ name: 'b-sing' }));
    repo.create(input({ name: 'a-xray', type: 'xray' }));
    repo.create(input({ name: 'a-sing' }));

    expect(repo.findAll().map((t) => t.name)).toEqual(['a-sing', 'a-xray', 'b-sing']);
    expect(repo.findAll('sing-box').map((t) => t.name)).toEqual(['a-sing', 'b-sing']);
  });

  it('update - 指定したフィールドだけを更新する', () => {
    const template = repo.create(input());

    const updated = repo.update(template.id, { isValid: false, validationError: 'broken' });

    expect(updated).toMatchObject({ name: 'base', content: '{"inbounds": []}', isValid: false, validationError: 'broken' });
  });

  it('update - 存在しない ID は undefined を返す', () => {
    expect(repo.update('no-such-id', { name: 'x' })).toBeUndefined();
  });

  it('delete - 削除して true を返す', () => {
    const template = repo.create(input());

    expect(repo.delete(template.id)).toBe(true);
    expect(repo.findById(template.id)).toBeUndefined();
  });
});
