import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { migrateDatabase } from '../../../src/db/migrate.js';
import { AgentHostRepository } from '../../../src/db/repository/agent-host-repository.js';
import { ConfigTemplateRepository } from '../../../src/db/repository/config-template-repository.js';

describe('AgentHostRepository', () => {
  let db: InstanceType<typeof Database>;
  let repo: AgentHostRepository;
  let templateRepo: ConfigTemplateRepository;

  beforeEach(() => {
    db = new Database(':memory:');
    migrateDatabase(db);
    repo = new AgentHostRepository(db);
    templateRepo = new ConfigTemplateRepository(db);
  });

  function createTemplate(): string {
    return templateRepo.create({
      name: 'base',
      type: 'sing-box',
      content: '{}',
      description: '',
      minVersion: '',
      capabilities: [],
      schemaVersion: 1,
      isValid: true,
      validationError: '',
    }).id;
  }

  it('create - AgentHost を作成して返す', () => {
    const host = repo.create({ name: 'edge-1', host: '10.0.0.1:7443', token: 'test-secret', coreType: 'sing-box' });

    expect(host.id).toBeDefined();
    expect(host.coreVersion).toBe('');
    expect(host.capabilities).toEqual([]);
    expect(host.templateId).toBeUndefined();
    expect(repo.findById(host.id)).toEqual(host);
  });

  it('findById - 存在しない ID は undefined を返す', () => {
    expect(repo.findById('no-such-id')).toBeUndefined();
  });

  it('findAll - 名前順で返す', () => {
    repo.create({ name: 'zeta', host: '10.0.0.2', token: '', coreType: '' });
    repo.create({ name: 'alpha', host: '10.0.0.1', token: '', coreType: '' });

    expect(repo.findAll().map((h) => h.name)).toEqual(['alpha', 'zeta']);
  });

  it('updateCapabilities - 報告内容を上書きする', () => {
    const host = repo.create({ name: 'edge-1', host: '10.0.0.1', token: '', coreType: '' });

    const updated = repo.updateCapabilities(host.id, {
      coreType: 'xray',
      coreVersion: '1.8.4',
      capabilities: ['reality', 'xtls'],
      buildTags: ['with_geoip'],
    });

    expect(updated).toMatchObject({
      coreType: 'xray',
      coreVersion: '1.8.4',
      capabilities: ['reality', 'xtls'],
      buildTags: ['with_geoip'],
    });
  });

  it('updateCapabilities - 存在しない ID は undefined を返す', () => {
    expect(
      repo.updateCapabilities('no-such-id', { coreType: 'xray', coreVersion: '', capabilities: [], buildTags: [] }),
    ).toBeUndefined();
  });

  it('assignTemplate - テンプレートの割り当てと解除', () => {
    const host = repo.create({ name: 'edge-1', host: '10.0.0.1', token: '', coreType: '' });
    const templateId = createTemplate();

    expect(repo.assignTemplate(host.id, templateId)?.templateId).toBe(templateId);
    expect(repo.assignTemplate(host.id, undefined)?.templateId).toBeUndefined();
  });

  it('テンプレート削除で割り当ては NULL になる', () => {
    const host = repo.create({ name: 'edge-1', host: '10.0.0.1', token: '', coreType: '' });
    const templateId = createTemplate();
    repo.assignTemplate(host.id, templateId);

    templateRepo.delete(templateId);

    expect(repo.findById(host.id)?.templateId).toBeUndefined();
  });

  it('存在しないテンプレートは割り当てられない', () => {
    const host = repo.create({ name: 'edge-1', host: '10.0.0.1', token: '', coreType: '' });

    expect(() => repo.assignTemplate(host.id, 'missing-template')).toThrow(/FOREIGN KEY/);
  });

  it('delete - 削除して true を返す', () => {
    const host = repo.create({ name: 'edge-1', host: '10.0.0.1', token: '', coreType: '' });

    expect(repo.delete(host.id)).toBe(true);
    expect(repo.delete(host.id)).toBe(false);
    expect(repo.findById(host.id)).toBeUndefined();
  });
});
