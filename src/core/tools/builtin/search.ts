/**
 * Search Tools - simple text search and JsonLogic queries
 */

import type { SimpleSearchHit } from '../../vault/types.js';
import type { Tool, ToolResult } from '../types.js';
import {
  ComplexSearchInputSchema,
  SearchInputSchema,
  jsonOutput,
  type ComplexSearchInput,
  type SearchInput,
} from '../types.js';

export interface FormattedSearchHit {
  filename: string;
  score: number;
  matches: Array<{
    context: string;
    match_position: { start: number; end: number };
  }>;
}

export function formatSearchHits(hits: readonly SimpleSearchHit[]): FormattedSearchHit[] {
  return hits.map((hit) => ({
    filename: hit.filename,
    score: hit.score ?? 0,
    matches: hit.matches.map((match) => ({
      context: match.context,
      match_position: { start: match.match.start, end: match.match.end },
    })),
  }));
}

export const searchTool: Tool<SearchInput> = {
  name: 'search',
  description:
    'Simple search for documents matching a specified text query across all files in the vault. ' +
    'Use this tool when you want to do a simple text search.',
  parameters: SearchInputSchema,

  async execute(input, context): Promise<ToolResult> {
    const hits = await context.vault.search(input.query, input.context_length);
    return jsonOutput(formatSearchHits(hits));
  },
};

export const complexSearchTool: Tool<ComplexSearchInput> = {
  name: 'complex_search',
  description:
    'Complex search for documents using a JsonLogic query. Supports standard JsonLogic operators plus ' +
    "'glob' and 'regexp' for pattern matching. Results must be non-falsy.",
  parameters: ComplexSearchInputSchema,

  async execute(input, context): Promise<ToolResult> {
    return jsonOutput(await context.vault.complexSearch(input.query));
  },
};
