/**
 * Periodic Note Tools - current and recent daily/weekly/... notes
 */

import type { Tool, ToolResult } from '../types.js';
import {
  GetPeriodicNoteInputSchema,
  GetRecentPeriodicNotesInputSchema,
  jsonOutput,
  textOutput,
  type GetPeriodicNoteInput,
  type GetRecentPeriodicNotesInput,
} from '../types.js';

export const getPeriodicNoteTool: Tool<GetPeriodicNoteInput> = {
  name: 'get_periodic_note',
  description: 'Get the current periodic note for the specified period.',
  parameters: GetPeriodicNoteInputSchema,

  async execute(input, context): Promise<ToolResult> {
    const note = await context.vault.getPeriodicNote(input.period);
    if (input.type === 'metadata') {
      return jsonOutput(note);
    }
    return textOutput(note.content);
  },
};

export const getRecentPeriodicNotesTool: Tool<GetRecentPeriodicNotesInput> = {
  name: 'get_recent_periodic_notes',
  description: 'Get the most recent periodic notes for the specified period type.',
  parameters: GetRecentPeriodicNotesInputSchema,

  async execute(input, context): Promise<ToolResult> {
    const notes = await context.vault.getRecentPeriodicNotes(input.period, {
      limit: input.limit,
      includeContent: input.include_content,
    });
    return jsonOutput(notes);
  },
};
