/**
 * MCP Server
 * Exposes the tool registry over the Model Context Protocol
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../base/utils/logger.js';
import { isVerboseDebugEnabled } from '../base/utils/debug.js';
import type { ToolRegistry } from '../core/tools/registry.js';
import type { ToolContext, ToolResult } from '../core/tools/types.js';

export const SERVER_NAME = 'vault-guard-mcp';
export const SERVER_VERSION = '0.1.0';

/**
 * Convert a tool result into MCP call output. Failures carry their error
 * text with isError set.
 */
export function toCallToolResult(result: ToolResult): CallToolResult {
  if (!result.success) {
    return {
      content: [{ type: 'text', text: result.error ?? 'Tool execution failed' }],
      isError: true,
    };
  }
  return { content: [{ type: 'text', text: result.output }] };
}

export function createVaultServer(registry: ToolRegistry, context: ToolContext): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: registry.getDefinitions() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.debug('MCP', 'Tool call', isVerboseDebugEnabled('mcp') ? { name, args } : { name });

    const result = await registry.execute(name, args ?? {}, context);
    if (!result.success) {
      logger.debug('MCP', 'Tool call failed', { name, error: result.error });
    }
    return toCallToolResult(result);
  });

  return server;
}
