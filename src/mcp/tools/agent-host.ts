/**
 * corepipe — MCP agent host tools
 *
 * Tools: create_agent_host, list_agent_hosts, report_capabilities,
 * assign_template, check_template_compatibility, generate_config
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { AgentHostService } from '../../engine/agent-host-service.js';
import { jsonResult, runTool, textResult } from './result.js';

export function registerAgentHostTools(server: McpServer, hosts: AgentHostService): void {
  server.tool(
    'create_agent_host',
    'Register an agent host. A random token is issued when none is given.',
    {
      name: z.string().describe('Display name'),
      host: z.string().describe('Agent address, "address" or "address:port"'),
      token: z.string().optional().describe('Bearer token the agent expects'),
    },
    async ({ name, host, token }) =>
      runTool(() => jsonResult(hosts.createAgentHost({ name, host, ...(token !== undefined ? { token } : {}) }))),
  );

  server.tool('list_agent_hosts', 'List registered agent hosts', {}, async () =>
    runTool(() => jsonResult(hosts.listAgentHosts())),
  );

  server.tool(
    'report_capabilities',
    'Store the core type, version, capabilities and build tags reported by an agent',
    {
      agentHostId: z.string(),
      coreType: z.string().optional().describe('sing-box | xray'),
      coreVersion: z.string().optional(),
      capabilities: z.array(z.string()).optional(),
      buildTags: z.array(z.string()).optional(),
    },
    async ({ agentHostId, coreType, coreVersion, capabilities, buildTags }) =>
      runTool(() =>
        jsonResult(
          hosts.reportCapabilities(agentHostId, {
            ...(coreType !== undefined ? { coreType } : {}),
            ...(coreVersion !== undefined ? { coreVersion } : {}),
            ...(capabilities !== undefined ? { capabilities } : {}),
            ...(buildTags !== undefined ? { buildTags } : {}),
          }),
        ),
      ),
  );

  server.tool(
    'assign_template',
    'Assign a config template to an agent host (empty templateId clears it). Compatibility problems are logged, not enforced.',
    {
      agentHostId: z.string(),
      templateId: z.string().describe('Template ID, or "" to clear'),
    },
    async ({ agentHostId, templateId }) => runTool(() => jsonResult(hosts.assignTemplate(agentHostId, templateId))),
  );

  server.tool(
    'check_template_compatibility',
    "Check a template's minimum version and required capabilities against an agent host",
    {
      agentHostId: z.string(),
      templateId: z.string(),
    },
    async ({ agentHostId, templateId }) =>
      runTool(() => jsonResult(hosts.checkTemplateCompatibility(agentHostId, templateId))),
  );

  server.tool(
    'generate_config',
    'Render the final core configuration for an agent host from its assigned template',
    {
      agentHostId: z.string(),
    },
    async ({ agentHostId }) =>
      runTool(() => {
        const config = hosts.generateConfig(agentHostId);
        return textResult(config ?? 'No template assigned; the agent keeps its local configuration.');
      }),
  );
}
