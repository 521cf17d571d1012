#!/usr/bin/env node
/**
 * corepipe — Agent core configuration pipeline
 *
 * MCP Server エントリポイント。
 * stdio トランスポートで接続する（stdout はプロトコル専用、ログは stderr）。
 */

import Database from 'better-sqlite3';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config } from './config.js';
import { migrateDatabase } from './db/migrate.js';
import { createMcpServer } from './mcp/server.js';
import { logger } from './utils/logger.js';

const db = new Database(config.dbPath);
migrateDatabase(db);

const server = createMcpServer(db);
const transport = new StdioServerTransport();
await server.connect(transport);
logger.info('corepipe MCP server started', { dbPath: config.dbPath });
