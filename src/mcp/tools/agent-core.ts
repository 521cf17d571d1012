/**
 * corepipe — MCP agent core tools
 *
 * Tools: get_cores, get_instances, create_instance, delete_instance,
 * switch_core, get_switch_logs
 *
 * create_instance / switch_core forward the request's abort signal to the
 * agent call, so a cancelled request is recorded as a failed switch.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { AgentCoreService } from '../../engine/agent-core-service.js';
import { SWITCH_STATUSES } from '../../types/entities.js';
import { jsonResult, runTool, textResult } from './result.js';

const configSourceShape = {
  configTemplateId: z.string().optional().describe('Template to render for this host'),
  configJson: z.string().optional().describe('Raw core configuration; wins over configTemplateId'),
  operatorId: z.string().optional(),
};

export function registerAgentCoreTools(server: McpServer, cores: AgentCoreService): void {
  server.tool(
    'get_cores',
    'Ask the agent which proxy cores it has installed',
    { agentHostId: z.string() },
    async ({ agentHostId }, extra) => runTool(async () => jsonResult(await cores.getCores(agentHostId, extra.signal))),
  );

  server.tool('get_instances', 'List recorded core instances of an agent host', { agentHostId: z.string() }, async ({ agentHostId }) =>
    runTool(() => jsonResult(cores.getInstances(agentHostId))),
  );

  server.tool(
    'create_instance',
    'Start the first core instance on an agent host',
    {
      agentHostId: z.string(),
      coreType: z.string().describe('sing-box | xray'),
      instanceId: z.string(),
      ...configSourceShape,
    },
    async ({ agentHostId, coreType, instanceId, configTemplateId, configJson, operatorId }, extra) =>
      runTool(async () =>
        jsonResult(
          await cores.createInstance(
            {
              agentHostId,
              coreType,
              instanceId,
              ...(configTemplateId !== undefined ? { configTemplateId } : {}),
              ...(configJson !== undefined ? { configJson } : {}),
              ...(operatorId !== undefined ? { operatorId } : {}),
            },
            extra.signal,
          ),
        ),
      ),
  );

  server.tool(
    'delete_instance',
    'Remove a core instance record',
    { agentHostId: z.string(), instanceId: z.string() },
    async ({ agentHostId, instanceId }) =>
      runTool(() => {
        cores.deleteInstance(agentHostId, instanceId);
        return textResult(`Deleted instance ${instanceId}`);
      }),
  );

  server.tool(
    'switch_core',
    'Replace a running core instance on an agent host. Agent failures are returned with success=false and a switch log ID.',
    {
      agentHostId: z.string(),
      fromInstanceId: z.string(),
      toCoreType: z.string().describe('sing-box | xray'),
      switchId: z.string().optional(),
      listenPorts: z.array(z.number().int()).optional(),
      zeroDowntime: z.boolean().optional(),
      ...configSourceShape,
    },
    async (
      { agentHostId, fromInstanceId, toCoreType, switchId, listenPorts, zeroDowntime, configTemplateId, configJson, operatorId },
      extra,
    ) =>
      runTool(async () =>
        jsonResult(
          await cores.switchCore(
            {
              agentHostId,
              fromInstanceId,
              toCoreType,
              ...(switchId !== undefined ? { switchId } : {}),
              ...(listenPorts !== undefined ? { listenPorts } : {}),
              ...(zeroDowntime !== undefined ? { zeroDowntime } : {}),
              ...(configTemplateId !== undefined ? { configTemplateId } : {}),
              ...(configJson !== undefined ? { configJson } : {}),
              ...(operatorId !== undefined ? { operatorId } : {}),
            },
            extra.signal,
          ),
        ),
      ),
  );

  server.tool(
    'get_switch_logs',
    'List switch audit logs of an agent host, newest first',
    {
      agentHostId: z.string(),
      status: z.enum(SWITCH_STATUSES).optional(),
      startAt: z.string().optional().describe('ISO 8601, inclusive'),
      endAt: z.string().optional().describe('ISO 8601, inclusive'),
      limit: z.number().int().optional().describe('Default 50, max 200'),
      offset: z.number().int().optional(),
    },
    async ({ agentHostId, status, startAt, endAt, limit, offset }) =>
      runTool(() =>
        jsonResult(
          cores.getSwitchLogs({
            agentHostId,
            ...(status !== undefined ? { status } : {}),
            ...(startAt !== undefined ? { startAt } : {}),
            ...(endAt !== undefined ? { endAt } : {}),
            ...(limit !== undefined ? { limit } : {}),
            ...(offset !== undefined ? { offset } : {}),
          }),
        ),
      ),
  );
}
