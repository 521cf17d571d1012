import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { migrateDatabase } from '../../../src/db/migrate.js';
import { AgentHostRepository } from '../../../src/db/repository/agent-host-repository.js';
import { AgentCoreInstanceRepository } from '../../../src/db/repository/agent-core-instance-repository.js';
import type { CreateAgentCoreInstanceInput } from '../../../src/types/repository.js';

describe('AgentCoreInstanceRepository', () => {
  let db: InstanceType<typeof Database>;
  let repo: AgentCoreInstanceRepository;
  let hostId: string;

  function input(instanceId: string): CreateAgentCoreInstanceInput {
    return {
      agentHostId: hostId,
      instanceId,
      coreType: 'sing-box',
      status: 'running',
      configHash: 'abc',
      listenPorts: [443, 8443],
      errorMessage: '',
    };
  }

  beforeEach(() => {
    db = new Database(':memory:');
    migrateDatabase(db);
    repo = new AgentCoreInstanceRepository(db);
    hostId = new AgentHostRepository(db).create({ name: 'edge-1', host: '10.0.0.1', token: '', coreType: '' }).id;
  });

  it('create - インスタンスを作成して返す', () => {
    const instance = repo.create(input('primary'));

    expect(repo.findById(instance.id)).toEqual(instance);
    expect(instance.listenPorts).toEqual([443, 8443]);
  });

  it('create - 同じホスト・インスタンス ID の重複は拒否される', () => {
    repo.create(input('primary'));

    expect(() => repo.create(input('primary'))).toThrow(/UNIQUE constraint failed/);
  });

  it('findByInstanceId - (ホスト, インスタンス ID) で検索する', () => {
    const instance = repo.create(input('primary'));

    expect(repo.findByInstanceId(hostId, 'primary')).toEqual(instance);
    expect(repo.findByInstanceId(hostId, 'other')).toBeUndefined();
  });

  it('findByAgentHostId - ホストのインスタンスを返す', () => {
    repo.create(input('b'));
    repo.create(input('a'));

    expect(repo.findByAgentHostId(hostId).map((i) => i.instanceId).sort()).toEqual(['a', 'b']);
    expect(repo.findByAgentHostId('other-host')).toEqual([]);
  });

  it('update - status と errorMessage を更新する', () => {
    const instance = repo.create(input('primary'));

    const updated = repo.update(instance.id, { status: 'stopped', errorMessage: 'replaced' });

    expect(updated).toMatchObject({ status: 'stopped', errorMessage: 'replaced', configHash: 'abc' });
  });

  it('update - 存在しない ID は undefined を返す', () => {
    expect(repo.update('no-such-id', { status: 'stopped' })).toBeUndefined();
  });

  it('ホスト削除でインスタンスも削除される', () => {
    const instance = repo.create(input('primary'));

    new AgentHostRepository(db).delete(hostId);

    expect(repo.findById(instance.id)).toBeUndefined();
  });

  it('delete - 削除して true を返す', () => {
    const instance = repo.create(input('primary'));

    expect(repo.delete(instance.id)).toBe(true);
    expect(repo.delete(instance.id)).toBe(false);
  });
});
