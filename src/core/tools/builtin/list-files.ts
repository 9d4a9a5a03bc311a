/**
 * Listing Tools - vault root and single directory
 */

import type { Tool, ToolResult } from '../types.js';
import {
  EmptyInputSchema,
  ListFilesInDirInputSchema,
  jsonOutput,
  type EmptyInput,
  type ListFilesInDirInput,
} from '../types.js';

export const listFilesInVaultTool: Tool<EmptyInput> = {
  name: 'list_files_in_vault',
  description:
    'Lists all files and directories in the root directory of your Obsidian vault. Directories end with "/".',
  parameters: EmptyInputSchema,

  async execute(_input, context): Promise<ToolResult> {
    return jsonOutput(await context.vault.listFilesInVault());
  },
};

export const listFilesInDirTool: Tool<ListFilesInDirInput> = {
  name: 'list_files_in_dir',
  description:
    'Lists all files and directories that exist in a specific Obsidian directory. Entries are relative to that directory.',
  parameters: ListFilesInDirInputSchema,

  async execute(input, context): Promise<ToolResult> {
    return jsonOutput(await context.vault.listFilesInDir(input.dirpath));
  },
};
