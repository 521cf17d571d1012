/**
 * corepipe — MCP Server 統合テスト
 *
 * InMemoryTransport でサーバーとクライアントをインメモリ接続し、
 * ツール経由でサービス層までの流れを検証する。
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { migrateDatabase } from '../../src/db/migrate.js';
import { createMcpServer } from '../../src/mcp/server.js';
import { loadDefaultTemplate } from '../../src/template/defaults.js';
import type { AgentClientFactory, SwitchCoreRequest, SwitchCoreResponse } from '../../src/types/agent-rpc.js';
import type { Logger } from '../../src/utils/logger.js';

type ToolResult = Awaited<ReturnType<Client['callTool']>>;

function textOf(result: ToolResult): string {
  return (result.content as Array<{ type: string; text: string }>)[0].text;
}

describe('MCP Server', () => {
  let db: InstanceType<typeof Database>;
  let client: Client;
  let requests: SwitchCoreRequest[];
  let nextResponse: SwitchCoreResponse;

  beforeEach(async () => {
    db = new Database(':memory:');
    migrateDatabase(db);
    requests = [];
    nextResponse = { success: true, newInstanceId: '', message: 'ok', error: '' };

    const clientFactory: AgentClientFactory = () => ({
      getCores: () => Promise.resolve([]),
      switchCore: (request) => {
        requests.push(request);
        return Promise.resolve(nextResponse);
      },
      close: () => undefined,
    });
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const server = createMcpServer(db, { clientFactory, logger });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    await server.connect(serverTransport);
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
  });

  async function createHost(): Promise<string> {
    const result = await client.callTool({
      name: 'create_agent_host',
      arguments: { name: 'edge-1', host: '10.0.0.1', token: 'test-secret' },
    });
    const host: unknown = JSON.parse(textOf(result));
    expect(host).toHaveProperty('id');
    return typeof host === 'object' && host !== null && 'id' in host ? String(host.id) : '';
  }

  // =========================================================
  // ツール登録確認
  // =========================================================

  it('22 ツールが登録されている', async () => {
    const result = await client.listTools();
    const toolNames = result.tools.map((t) => t.name).sort();

    expect(toolNames).toEqual(
      [
        'create_agent_host',
        'list_agent_hosts',
        'report_capabilities',
        'assign_template',
        'check_template_compatibility',
        'generate_config',
        'create_template',
        'update_template',
        'delete_template',
        'get_template',
        'list_templates',
        'validate_template',
        'preview_template',
        'get_default_template',
        'get_cores',
        'get_instances',
        'create_instance',
        'delete_instance',
        'switch_core',
        'get_switch_logs',
        'convert_config',
        'parse_config',
      ].sort(),
    );
  });

  // =========================================================
  // エラー変換
  // =========================================================

  it('AppError はコード付きの isError 結果になる', async () => {
    const result = await client.callTool({ name: 'get_template', arguments: { id: 'missing' } });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('NOT_FOUND: config template not found: missing');
  });

  it('互換性エラーは理由を箇条書きで添える', async () => {
    const hostId = await createHost();
    await client.callTool({
      name: 'report_capabilities',
      arguments: { agentHostId: hostId, coreType: 'sing-box', coreVersion: '1.6.0' },
    });
    const created = await client.callTool({
      name: 'create_template',
      arguments: { name: 'new', type: 'sing-box', minVersion: '1.8.0' },
    });
    const template: unknown = JSON.parse(textOf(created));
    const templateId = typeof template === 'object' && template !== null && 'id' in template ? String(template.id) : '';

    const assigned = await client.callTool({ name: 'assign_template', arguments: { agentHostId: hostId, templateId } });
    expect(assigned.isError).not.toBe(true);

    const result = await client.callTool({ name: 'generate_config', arguments: { agentHostId: hostId } });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe(
      'INCOMPATIBLE: template incompatible with agent\n- Template requires version 1.8.0, agent has 1.6.0',
    );
  });

  // =========================================================
  // エージェントホスト・テンプレート
  // =========================================================

  it('generate_config - テンプレート未割り当てならその旨を返す', async () => {
    const hostId = await createHost();

    const result = await client.callTool({ name: 'generate_config', arguments: { agentHostId: hostId } });

    expect(textOf(result)).toBe('No template assigned; the agent keeps its local configuration.');
  });

  it('preview_template / get_default_template', async () => {
    const preview = await client.callTool({ name: 'preview_template', arguments: { content: '{"n": {{len users}}}' } });
    expect(textOf(preview)).toBe('{\n  "n": 2\n}');

    const starter = await client.callTool({ name: 'get_default_template', arguments: { type: 'xray' } });
    expect(textOf(starter)).toBe(loadDefaultTemplate('xray'));
  });

  // =========================================================
  // 変換
  // =========================================================

  it('convert_config - sing-box の inbound を Xray 形式にする', async () => {
    const rawConfig = JSON.stringify({
      inbounds: [
        {
          type: 'vless',
          tag: 'vless-in',
          listen: '::',
          listen_port: 443,
          users: [{ name: 'alice@example.com', uuid: 'uuid-1' }],
        },
      ],
    });

    const result = await client.callTool({
      name: 'convert_config',
      arguments: { sourceEngine: 'sing-box', targetEngine: 'xray', rawConfig },
    });
    const body: unknown = JSON.parse(textOf(result));

    expect(body).toHaveProperty('warnings', []);
    expect(body).toHaveProperty('config');
    const config: unknown =
      typeof body === 'object' && body !== null && 'config' in body ? JSON.parse(String(body.config)) : undefined;
    expect(config).toHaveProperty('inbounds.0.protocol', 'vless');
    expect(config).toHaveProperty('inbounds.0.port', 443);
    expect(config).toHaveProperty('inbounds.0.tag', 'vless-in');
  });

  it('convert_config - 不明なエンジンは VALIDATION_ERROR', async () => {
    const result = await client.callTool({
      name: 'convert_config',
      arguments: { sourceEngine: 'clash', targetEngine: 'xray', rawConfig: '{}' },
    });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe("VALIDATION_ERROR: unknown core engine: 'clash' (expected one of sing-box, xray)");
  });

  // =========================================================
  // インスタンス・切り替え
  // =========================================================

  it('create_instance → switch_core → get_switch_logs', async () => {
    const hostId = await createHost();

    const created = await client.callTool({
      name: 'create_instance',
      arguments: { agentHostId: hostId, coreType: 'sing-box', instanceId: 'sb-1', configJson: '{}' },
    });
    expect(created.isError).not.toBe(true);

    nextResponse = { success: false, newInstanceId: '', message: '', error: 'config rejected' };
    const switched = await client.callTool({
      name: 'switch_core',
      arguments: {
        agentHostId: hostId,
        fromInstanceId: 'sb-1',
        toCoreType: 'xray',
        configJson: '{}',
        switchId: 'sw-1',
        listenPorts: [443],
      },
    });
    const result: unknown = JSON.parse(textOf(switched));
    expect(result).toMatchObject({ success: false, error: 'config rejected', fromInstanceId: 'sb-1', toCoreType: 'xray' });
    expect(requests.map((r) => r.switchId)).toEqual([`create-${hostId}-sb-1`, 'sw-1']);

    const page = await client.callTool({
      name: 'get_switch_logs',
      arguments: { agentHostId: hostId, status: 'failed' },
    });
    const logs: unknown = JSON.parse(textOf(page));
    expect(logs).toMatchObject({ total: 1, logs: [{ switchId: 'sw-1', status: 'failed', message: 'config rejected' }] });
  });

  it('create_instance - エージェントの失敗は監査ログ ID 付きのエラーになる', async () => {
    const hostId = await createHost();
    nextResponse = { success: false, newInstanceId: '', message: '', error: 'port in use' };

    const result = await client.callTool({
      name: 'create_instance',
      arguments: { agentHostId: hostId, coreType: 'xray', instanceId: 'xr-1', configJson: '{}' },
    });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toMatch(
      /^AGENT_RPC_ERROR: create instance failed: port in use \(switch log [0-9a-f-]{36}\)$/,
    );
  });

  it('delete_instance - 記録を消す', async () => {
    const hostId = await createHost();
    await client.callTool({
      name: 'create_instance',
      arguments: { agentHostId: hostId, coreType: 'sing-box', instanceId: 'sb-1', configJson: '{}' },
    });

    const deleted = await client.callTool({
      name: 'delete_instance',
      arguments: { agentHostId: hostId, instanceId: 'sb-1' },
    });
    const listed = await client.callTool({ name: 'get_instances', arguments: { agentHostId: hostId } });

    expect(textOf(deleted)).toBe('Deleted instance sb-1');
    expect(JSON.parse(textOf(listed))).toEqual([]);
  });
});
