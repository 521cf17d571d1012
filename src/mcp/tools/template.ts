/**
 * corepipe — MCP config template tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ConfigTemplateService } from '../../engine/config-template-service.js';
import { CORE_ENGINES } from '../../types/inbound.js';
import { jsonResult, runTool, textResult } from './result.js';

export function registerTemplateTools(server: McpServer, templates: ConfigTemplateService): void {
  server.tool(
    'create_template',
    'Create a config template. Content defaults to the built-in starter template for the type.',
    {
      name: z.string(),
      type: z.string().describe('sing-box | xray'),
      content: z.string().optional().describe('Handlebars template producing JSON'),
      description: z.string().optional(),
      minVersion: z.string().optional().describe('Minimum core version, e.g. "1.8.0"'),
      capabilities: z.array(z.string()).optional().describe('Required capabilities, e.g. ["reality"]'),
    },
    async ({ name, type, content, description, minVersion, capabilities }) =>
      runTool(() =>
        jsonResult(
          templates.createTemplate({
            name,
            type,
            ...(content !== undefined ? { content } : {}),
            ...(description !== undefined ? { description } : {}),
            ...(minVersion !== undefined ? { minVersion } : {}),
            ...(capabilities !== undefined ? { capabilities } : {}),
          }),
        ),
      ),
  );

  server.tool(
    'update_template',
    'Update a config template. Content or type changes are re-validated.',
    {
      id: z.string(),
      name: z.string().optional(),
      type: z.string().optional(),
      content: z.string().optional(),
      description: z.string().optional(),
      minVersion: z.string().optional(),
      capabilities: z.array(z.string()).optional(),
    },
    async ({ id, name, type, content, description, minVersion, capabilities }) =>
      runTool(() =>
        jsonResult(
          templates.updateTemplate(id, {
            ...(name !== undefined ? { name } : {}),
            ...(type !== undefined ? { type } : {}),
            ...(content !== undefined ? { content } : {}),
            ...(description !== undefined ? { description } : {}),
            ...(minVersion !== undefined ? { minVersion } : {}),
            ...(capabilities !== undefined ? { capabilities } : {}),
          }),
        ),
      ),
  );

  server.tool('delete_template', 'Delete a config template', { id: z.string() }, async ({ id }) =>
    runTool(() => {
      templates.deleteTemplate(id);
      return textResult(`Deleted template ${id}`);
    }),
  );

  server.tool('get_template', 'Get a config template by ID', { id: z.string() }, async ({ id }) =>
    runTool(() => jsonResult(templates.getTemplate(id))),
  );

  server.tool(
    'list_templates',
    'List config templates, optionally by type',
    { type: z.enum(CORE_ENGINES).optional() },
    async ({ type }) => runTool(() => jsonResult(templates.listTemplates(type))),
  );

  server.tool(
    'validate_template',
    'Validate template content against sample data without saving it',
    {
      content: z.string(),
      type: z.string().describe('sing-box | xray'),
    },
    async ({ content, type }) => runTool(() => jsonResult(templates.validateTemplate(content, type))),
  );

  server.tool(
    'preview_template',
    'Render template content with the built-in sample context',
    { content: z.string() },
    async ({ content }) => runTool(() => textResult(templates.previewTemplate(content))),
  );

  server.tool(
    'get_default_template',
    'Return the built-in starter template for a core type',
    { type: z.enum(CORE_ENGINES) },
    async ({ type }) => runTool(() => textResult(templates.defaultTemplate(type).content)),
  );
}
