/**
 * Recent Changes Tool - recently modified files, newest first
 */

import type { Tool, ToolResult } from '../types.js';
import { GetRecentChangesInputSchema, jsonOutput, type GetRecentChangesInput } from '../types.js';

export const getRecentChangesTool: Tool<GetRecentChangesInput> = {
  name: 'get_recent_changes',
  description: 'Get recently modified files in the vault. Requires the Dataview plugin.',
  parameters: GetRecentChangesInputSchema,

  async execute(input, context): Promise<ToolResult> {
    const changes = await context.vault.getRecentChanges({ limit: input.limit, days: input.days });
    return jsonOutput(changes);
  },
};
