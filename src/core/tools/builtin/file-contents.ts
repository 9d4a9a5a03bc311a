/**
 * File Content Tools - single and batch reads
 */

import type { BatchFileResult } from '../../vault/types.js';
import type { Tool, ToolResult } from '../types.js';
import {
  BatchGetFileContentsInputSchema,
  GetFileContentsInputSchema,
  textOutput,
  type BatchGetFileContentsInput,
  type GetFileContentsInput,
} from '../types.js';

export const getFileContentsTool: Tool<GetFileContentsInput> = {
  name: 'get_file_contents',
  description: 'Return the content of a single file in your vault.',
  parameters: GetFileContentsInputSchema,

  async execute(input, context): Promise<ToolResult> {
    return textOutput(await context.vault.getFileContents(input.filepath));
  },
};

/**
 * Render one block per requested file; failures take the place of the content
 */
export function formatBatchResults(results: readonly BatchFileResult[]): string {
  return results
    .map((result) => {
      const body = result.ok ? result.content : result.error;
      return `# ${result.path}\n\n${body}\n\n---\n\n`;
    })
    .join('');
}

export const batchGetFileContentsTool: Tool<BatchGetFileContentsInput> = {
  name: 'batch_get_file_contents',
  description:
    'Return the contents of multiple files in your vault, concatenated with headers. ' +
    'A file that cannot be read is reported in its own section.',
  parameters: BatchGetFileContentsInputSchema,

  async execute(input, context): Promise<ToolResult> {
    const results = await context.vault.getBatchFileContents(input.filepaths);
    return textOutput(formatBatchResults(results));
  },
};
