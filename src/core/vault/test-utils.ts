/**
 * Shared test utilities for vault tests
 */

import { NotFoundError } from './errors.js';
import type {
  ComplexSearchHit,
  JsonLogicQuery,
  NoteJson,
  Period,
  PeriodicNoteSummary,
  RecentChange,
  RecentChangesOptions,
  RecentPeriodicNotesOptions,
  SimpleSearchHit,
  TaggedNote,
  VaultStore,
} from './types.js';

export interface FakeVaultData {
  files?: string[];
  directories?: Record<string, string[]>;
  contents?: Record<string, string>;
  searchHits?: SimpleSearchHit[];
  complexHits?: ComplexSearchHit[];
  periodicNotes?: Partial<Record<Period, NoteJson>>;
  recentPeriodicNotes?: PeriodicNoteSummary[];
  recentChanges?: RecentChange[];
  taggedNotes?: TaggedNote[];
}

export interface StoreCall {
  method: keyof VaultStore;
  args: unknown[];
}

/**
 * In-memory VaultStore that records every call made to it
 */
export class FakeVaultStore implements VaultStore {
  readonly calls: StoreCall[] = [];

  constructor(private readonly data: FakeVaultData = {}) {}

  callsTo(method: keyof VaultStore): StoreCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  async listFilesInVault(): Promise<string[]> {
    this.calls.push({ method: 'listFilesInVault', args: [] });
    return [...(this.data.files ?? [])];
  }

  async listFilesInDir(dirpath: string): Promise<string[]> {
    this.calls.push({ method: 'listFilesInDir', args: [dirpath] });
    const children = this.data.directories?.[dirpath];
    if (!children) {
      throw new NotFoundError('Error 40400: Not Found');
    }
    return [...children];
  }

  async getFileContents(filepath: string): Promise<string> {
    this.calls.push({ method: 'getFileContents', args: [filepath] });
    const content = this.data.contents?.[filepath];
    if (content === undefined) {
      throw new NotFoundError('Error 40400: Not Found');
    }
    return content;
  }

  async search(query: string, contextLength: number): Promise<SimpleSearchHit[]> {
    this.calls.push({ method: 'search', args: [query, contextLength] });
    return [...(this.data.searchHits ?? [])];
  }

  async complexSearch(query: JsonLogicQuery): Promise<ComplexSearchHit[]> {
    this.calls.push({ method: 'complexSearch', args: [query] });
    return [...(this.data.complexHits ?? [])];
  }

  async getPeriodicNote(period: Period): Promise<NoteJson> {
    this.calls.push({ method: 'getPeriodicNote', args: [period] });
    const note = this.data.periodicNotes?.[period];
    if (!note) {
      throw new NotFoundError('Error 40400: Not Found');
    }
    return note;
  }

  async getRecentPeriodicNotes(
    period: Period,
    options: RecentPeriodicNotesOptions
  ): Promise<PeriodicNoteSummary[]> {
    this.calls.push({ method: 'getRecentPeriodicNotes', args: [period, options] });
    const notes = this.data.recentPeriodicNotes ?? [];
    return options.limit === undefined ? [...notes] : notes.slice(0, options.limit);
  }

  async listRecentChanges(options: RecentChangesOptions): Promise<RecentChange[]> {
    this.calls.push({ method: 'listRecentChanges', args: [options] });
    const changes = this.data.recentChanges ?? [];
    return options.limit === undefined ? [...changes] : changes.slice(0, options.limit);
  }

  async listTaggedNotes(): Promise<TaggedNote[]> {
    this.calls.push({ method: 'listTaggedNotes', args: [] });
    return [...(this.data.taggedNotes ?? [])];
  }
}

export function note(path: string, content: string = `# ${path}`, tags: string[] = []): NoteJson {
  return { path, content, tags, frontmatter: {} };
}

export function hit(filename: string, context: string = '...'): SimpleSearchHit {
  return { filename, score: 1, matches: [{ match: { start: 0, end: 3 }, context }] };
}
