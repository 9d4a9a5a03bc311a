/**
 * Tags Tool
 */

import type { Tool, ToolResult } from '../types.js';
import { EmptyInputSchema, jsonOutput, type EmptyInput } from '../types.js';

export const getAllTagsTool: Tool<EmptyInput> = {
  name: 'get_all_tags',
  description:
    'List every tag used in the notes you can access, de-duplicated and sorted. Requires the Dataview plugin.',
  parameters: EmptyInputSchema,

  async execute(_input, context): Promise<ToolResult> {
    return jsonOutput(await context.vault.getAllTags());
  },
};
