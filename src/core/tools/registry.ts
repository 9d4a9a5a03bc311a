/**
 * Tool Registry - Manages available tools
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import { logger } from '../../base/utils/logger.js';
import { getErrorMessage, isVaultError } from '../vault/errors.js';
import { ToolInputSchemaSchema } from './types.js';
import type { Tool, ToolContext, ToolDefinition, ToolInputSchema, ToolResult } from './types.js';

function toInputSchema(tool: Tool): ToolInputSchema {
  const converted = zodToJsonSchema(tool.parameters, { $refStrategy: 'none', target: 'jsonSchema7' });
  const parsed = ToolInputSchemaSchema.safeParse(converted);
  if (!parsed.success) {
    throw new Error(`Tool ${tool.name} must take an object of named arguments`);
  }
  return parsed.data;
}

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();

  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  registerAll(tools: Tool[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Get tool definitions for MCP clients
   */
  getDefinitions(toolNames?: string[]): ToolDefinition[] {
    const names = toolNames ?? this.list();
    return names
      .map((name) => {
        const tool = this.tools.get(name);
        if (!tool) return null;

        return {
          name: tool.name,
          description: tool.description,
          inputSchema: toInputSchema(tool),
        };
      })
      .filter((t): t is ToolDefinition => t !== null);
  }

  /**
   * Execute a tool by name
   */
  async execute(name: string, input: unknown, context: ToolContext): Promise<ToolResult> {
    const tool = this.tools.get(name);

    if (!tool) {
      return {
        success: false,
        output: '',
        error: `Unknown tool: ${name}`,
      };
    }

    const parsed = tool.parameters.safeParse(input ?? {});
    if (!parsed.success) {
      return {
        success: false,
        output: '',
        error: `Invalid input: ${parsed.error.message}`,
      };
    }

    try {
      return await tool.execute(parsed.data, context);
    } catch (error) {
      if (isVaultError(error)) {
        logger.debug('Tools', `${name} failed`, { kind: error.kind });
        return { success: false, output: '', error: error.message };
      }
      logger.error('Tools', `${name} failed unexpectedly`, { error: getErrorMessage(error) });
      return { success: false, output: '', error: `Tool execution failed: ${getErrorMessage(error)}` };
    }
  }
}
