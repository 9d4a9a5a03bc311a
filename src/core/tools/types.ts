/**
 * Tool System Type Definitions
 */

import { z } from 'zod';
import type { GuardedVault } from '../vault/guarded-vault.js';
import { PeriodSchema } from '../vault/types.js';

// ============================================================================
// Tool Definition Types
// ============================================================================

export interface ToolContext {
  vault: GuardedVault;
}

export interface ToolResult {
  success: boolean;
  output: string;
  error?: string;
}

export interface Tool<TInput = unknown> {
  name: string;
  description: string;
  parameters: z.ZodSchema<TInput>;
  execute(input: TInput, context: ToolContext): Promise<ToolResult>;
}

/**
 * JSON Schema of a tool's arguments; MCP requires an object schema at the top
 */
export const ToolInputSchemaSchema = z
  .object({
    type: z.literal('object'),
    properties: z.record(z.unknown()).default({}),
    required: z.array(z.string()).optional(),
  })
  .passthrough();
export type ToolInputSchema = z.infer<typeof ToolInputSchemaSchema>;

/**
 * Tool definition as advertised to MCP clients
 */
export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

// ============================================================================
// Helper Functions
// ============================================================================

export function jsonOutput(value: unknown): ToolResult {
  return { success: true, output: JSON.stringify(value, null, 2) };
}

export function textOutput(text: string): ToolResult {
  return { success: true, output: text };
}

// ============================================================================
// Tool Input Types
// ============================================================================

export const EmptyInputSchema = z.object({});
export type EmptyInput = z.infer<typeof EmptyInputSchema>;

export const ListFilesInDirInputSchema = z.object({
  dirpath: z
    .string()
    .min(1)
    .describe('Path to list files from (relative to your vault root). Note that empty directories will not be returned.'),
});
export type ListFilesInDirInput = z.infer<typeof ListFilesInDirInputSchema>;

export const GetFileContentsInputSchema = z.object({
  filepath: z.string().min(1).describe('Path to the relevant file (relative to your vault root).'),
});
export type GetFileContentsInput = z.infer<typeof GetFileContentsInputSchema>;

export const BatchGetFileContentsInputSchema = z.object({
  filepaths: z
    .array(z.string().min(1).describe('Path to a file (relative to your vault root)'))
    .min(1)
    .describe('List of file paths to read'),
});
export type BatchGetFileContentsInput = z.infer<typeof BatchGetFileContentsInputSchema>;

export const SearchInputSchema = z.object({
  query: z.string().min(1).describe('Text to search for in the vault.'),
  context_length: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('How much context to return around the matching string (default: 100)'),
});
export type SearchInput = z.infer<typeof SearchInputSchema>;

export const ComplexSearchInputSchema = z.object({
  query: z
    .record(z.unknown())
    .describe('JsonLogic query object. Example: {"glob": ["*.md", {"var": "path"}]} matches all markdown files'),
});
export type ComplexSearchInput = z.infer<typeof ComplexSearchInputSchema>;

export const GetPeriodicNoteInputSchema = z.object({
  period: PeriodSchema.describe('The period type (daily, weekly, monthly, quarterly, yearly)'),
  type: z
    .enum(['content', 'metadata'])
    .optional()
    .describe("'content' returns the markdown only; 'metadata' adds path, tags, frontmatter and stat (default: content)"),
});
export type GetPeriodicNoteInput = z.infer<typeof GetPeriodicNoteInputSchema>;

export const GetRecentPeriodicNotesInputSchema = z.object({
  period: PeriodSchema.describe('The period type (daily, weekly, monthly, quarterly, yearly)'),
  limit: z.number().int().min(1).max(50).optional().describe('Maximum number of notes to return (default: 5)'),
  include_content: z.boolean().optional().describe('Whether to include note content (default: false)'),
});
export type GetRecentPeriodicNotesInput = z.infer<typeof GetRecentPeriodicNotesInputSchema>;

export const GetRecentChangesInputSchema = z.object({
  limit: z.number().int().min(1).max(100).optional().describe('Maximum number of files to return (default: 10)'),
  days: z.number().int().min(1).optional().describe('Only include files modified within this many days (default: 90)'),
});
export type GetRecentChangesInput = z.infer<typeof GetRecentChangesInputSchema>;
