/**
 * Vault Types - data returned by the Obsidian Local REST API and the
 * store contract the guarded vault consumes
 */

import { z } from 'zod';

// =============================================================================
// Periods
// =============================================================================

export const PERIODS = ['daily', 'weekly', 'monthly', 'quarterly', 'yearly'] as const;
export const PeriodSchema = z.enum(PERIODS);
export type Period = z.infer<typeof PeriodSchema>;

export function isPeriod(value: string): value is Period {
  return PERIODS.some((period) => period === value);
}

// =============================================================================
// Response Schemas
// =============================================================================

export const FileListSchema = z.object({
  files: z.array(z.string()),
});

export const SearchMatchSchema = z.object({
  match: z.object({ start: z.number(), end: z.number() }),
  context: z.string(),
});

export const SimpleSearchHitSchema = z.object({
  filename: z.string(),
  score: z.number().optional(),
  matches: z.array(SearchMatchSchema).default([]),
});
export type SimpleSearchHit = z.infer<typeof SimpleSearchHitSchema>;

/**
 * JsonLogic and Dataview results both come back as { filename, result };
 * older plugin versions used `path` instead of `filename`.
 */
export const QueryRowSchema = z
  .object({
    filename: z.string().optional(),
    path: z.string().optional(),
    result: z.unknown(),
  })
  .transform((row, ctx) => {
    const filename = row.filename ?? row.path;
    if (filename === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Result row has no filename' });
      return z.NEVER;
    }
    return { filename, result: row.result };
  });
export type QueryRow = z.infer<typeof QueryRowSchema>;

export type ComplexSearchHit = QueryRow;

export const NoteStatSchema = z.object({
  ctime: z.number(),
  mtime: z.number(),
  size: z.number(),
});

export const NoteJsonSchema = z.object({
  path: z.string(),
  content: z.string(),
  tags: z.array(z.string()).default([]),
  frontmatter: z.record(z.unknown()).default({}),
  stat: NoteStatSchema.optional(),
});
export type NoteJson = z.infer<typeof NoteJsonSchema>;

export const PeriodicNoteSummarySchema = z
  .object({
    path: z.string().optional(),
    filename: z.string().optional(),
    mtime: z.union([z.number(), z.string()]).optional(),
    content: z.string().optional(),
  })
  .transform((entry, ctx) => {
    const path = entry.path ?? entry.filename;
    if (path === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Periodic note entry has no path' });
      return z.NEVER;
    }
    return { path, mtime: entry.mtime, content: entry.content };
  });
export type PeriodicNoteSummary = z.infer<typeof PeriodicNoteSummarySchema>;

// =============================================================================
// Derived Records
// =============================================================================

export interface RecentChange {
  path: string;
  mtime: string | number | null;
}

export interface TaggedNote {
  path: string;
  tags: string[];
}

export type JsonLogicQuery = Record<string, unknown>;

export type BatchFileResult =
  | { path: string; ok: true; content: string }
  | { path: string; ok: false; error: string };

// =============================================================================
// Store Contract
// =============================================================================

export interface RecentPeriodicNotesOptions {
  limit?: number;
  includeContent: boolean;
}

export interface RecentChangesOptions {
  days: number;
  limit?: number;
}

/**
 * Raw, unfiltered access to the vault. Implementations may throw
 * NotFoundError or UpstreamError.
 */
export interface VaultStore {
  listFilesInVault(): Promise<string[]>;
  listFilesInDir(dirpath: string): Promise<string[]>;
  getFileContents(filepath: string): Promise<string>;
  search(query: string, contextLength: number): Promise<SimpleSearchHit[]>;
  complexSearch(query: JsonLogicQuery): Promise<ComplexSearchHit[]>;
  getPeriodicNote(period: Period): Promise<NoteJson>;
  getRecentPeriodicNotes(period: Period, options: RecentPeriodicNotesOptions): Promise<PeriodicNoteSummary[]>;
  /** Newest first; `limit` omitted means every candidate in the window */
  listRecentChanges(options: RecentChangesOptions): Promise<RecentChange[]>;
  listTaggedNotes(): Promise<TaggedNote[]>;
}
