/**
 * corepipe — MCP config conversion tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { parseAny } from '../../codec/registry.js';
import type { AgentCoreService } from '../../engine/agent-core-service.js';
import { jsonResult, runTool } from './result.js';

export function registerConvertTools(server: McpServer, cores: AgentCoreService): void {
  server.tool(
    'convert_config',
    'Convert the inbounds of a sing-box or Xray config into the other format. Lossy; dropped fields are reported as warnings.',
    {
      sourceEngine: z.string().describe('sing-box | xray'),
      targetEngine: z.string().describe('sing-box | xray'),
      rawConfig: z.string().describe('Config JSON (comments and trailing commas allowed)'),
    },
    async ({ sourceEngine, targetEngine, rawConfig }) =>
      runTool(() => {
        const outcome = cores.convertConfig(sourceEngine, targetEngine, rawConfig);
        return jsonResult({ config: outcome.raw, warnings: outcome.warnings });
      }),
  );

  server.tool(
    'parse_config',
    'Detect the format of a config and return its inbounds in canonical form',
    {
      filename: z.string().default('config.json'),
      rawConfig: z.string(),
    },
    async ({ filename, rawConfig }) => runTool(() => jsonResult(parseAny(filename, rawConfig))),
  );
}
