/**
 * corepipe — MCP Server
 *
 * Creates and configures the MCP server with all tools.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import type { AgentClientFactory } from '../types/agent-rpc.js';
import { AgentCoreService } from '../engine/agent-core-service.js';
import { AgentHostService } from '../engine/agent-host-service.js';
import { ConfigTemplateService } from '../engine/config-template-service.js';
import { TemplateEngine } from '../template/engine.js';
import type { Logger } from '../utils/logger.js';
import { registerAgentCoreTools } from './tools/agent-core.js';
import { registerAgentHostTools } from './tools/agent-host.js';
import { registerConvertTools } from './tools/convert.js';
import { registerTemplateTools } from './tools/template.js';

export interface McpServerOptions {
  /** Replaces the HTTP agent client (tests). */
  clientFactory?: AgentClientFactory;
  logger?: Logger;
}

/**
 * Create a fully configured MCP server with all corepipe tools.
 */
export function createMcpServer(db: Database.Database, options: McpServerOptions = {}): McpServer {
  const server = new McpServer({
    name: 'corepipe',
    version: '0.1.0',
  });

  const engine = new TemplateEngine();
  const hosts = new AgentHostService(db, { engine, ...(options.logger !== undefined ? { logger: options.logger } : {}) });
  const templates = new ConfigTemplateService(db, engine);
  const cores = new AgentCoreService(db, {
    hostService: hosts,
    ...(options.clientFactory !== undefined ? { clientFactory: options.clientFactory } : {}),
    ...(options.logger !== undefined ? { logger: options.logger } : {}),
  });

  registerAgentHostTools(server, hosts);
  registerTemplateTools(server, templates);
  registerAgentCoreTools(server, cores);
  registerConvertTools(server, cores);

  return server;
}
