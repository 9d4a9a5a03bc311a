/**
 * Guarded Vault - whitelist enforcement over a VaultStore
 *
 * Targeted operations (file read, directory listing) are checked before the
 * store is called. Operations where the store produces the paths (listing,
 * search, recent changes, tags) are filtered after the call and before any
 * truncation.
 */

import { logger } from '../../base/utils/logger.js';
import type { AccessAudit } from '../permissions/audit.js';
import type { Whitelist } from '../permissions/whitelist.js';
import {
  InvalidArgumentError,
  NotFoundError,
  PermissionDeniedError,
  VaultError,
  unavailablePathMessage,
  unavailablePeriodicNoteMessage,
} from './errors.js';
import {
  isPeriod,
  type BatchFileResult,
  type ComplexSearchHit,
  type JsonLogicQuery,
  type NoteJson,
  type Period,
  type PeriodicNoteSummary,
  type RecentChange,
  type SimpleSearchHit,
  type VaultStore,
} from './types.js';

export const DEFAULT_CONTEXT_LENGTH = 100;
export const DEFAULT_RECENT_CHANGES_LIMIT = 10;
export const DEFAULT_RECENT_CHANGES_DAYS = 90;
export const DEFAULT_RECENT_PERIODIC_LIMIT = 5;
/** Candidates requested from the periodic notes endpoint under a restricted whitelist */
export const PERIODIC_CANDIDATE_LIMIT = 500;

export interface GuardedVaultOptions {
  audit?: AccessAudit;
}

/**
 * Normalize a caller-supplied vault path: trim, drop leading "/", and reject
 * anything that could step outside the literal path the whitelist checks.
 *
 * @throws InvalidArgumentError
 */
export function normalizeVaultPath(raw: string, label: string = 'path'): string {
  const trimmed = raw.trim().replace(/^\/+/, '');
  if (trimmed === '') {
    throw new InvalidArgumentError(`The ${label} must not be empty`);
  }
  if (trimmed.includes('\\')) {
    throw new InvalidArgumentError(`The ${label} must use "/" separators: ${raw}`);
  }
  const segments = trimmed.split('/');
  if (segments[segments.length - 1] === '') {
    segments.pop();
  }
  if (segments.some((segment) => segment === '')) {
    throw new InvalidArgumentError(`The ${label} must not contain empty segments: ${raw}`);
  }
  if (segments.some((segment) => segment === '.' || segment === '..')) {
    throw new InvalidArgumentError(`The ${label} must not contain "." or ".." segments: ${raw}`);
  }
  return trimmed;
}

function requirePositiveInteger(value: number, label: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError(`${label} must be a positive integer, got ${value}`);
  }
  return value;
}

function requirePeriod(value: string): Period {
  if (!isPeriod(value)) {
    throw new InvalidArgumentError(`Unknown period: ${value}`);
  }
  return value;
}

export class GuardedVault {
  private readonly audit?: AccessAudit;

  constructor(
    private readonly store: VaultStore,
    private readonly whitelist: Whitelist,
    options: GuardedVaultOptions = {}
  ) {
    this.audit = options.audit;
  }

  async listFilesInVault(): Promise<string[]> {
    const files = await this.store.listFilesInVault();
    return this.filterPaths('list_files_in_vault', files, (file) => file);
  }

  /**
   * Children are returned as the store names them (relative to the directory)
   * and checked as `<dirpath>/<child>`.
   */
  async listFilesInDir(dirpath: string): Promise<string[]> {
    const dir = normalizeVaultPath(dirpath, 'directory path').replace(/\/+$/, '');
    this.requireDirectoryAccess('list_files_in_dir', dir);

    const children = await this.withUniformNotFound(dir, () => this.store.listFilesInDir(dir));
    return this.filterPaths('list_files_in_dir', children, (child) => `${dir}/${child}`);
  }

  async getFileContents(filepath: string): Promise<string> {
    const file = normalizeVaultPath(filepath, 'file path');
    if (file.endsWith('/')) {
      throw new InvalidArgumentError(`The file path must not end with "/": ${filepath}`);
    }
    this.requireAccess('get_file_contents', file);

    return this.withUniformNotFound(file, () => this.store.getFileContents(file));
  }

  /**
   * Each path is checked and read independently; a denial or failure for one
   * path is reported in its own entry and never merged with other content.
   */
  async getBatchFileContents(filepaths: readonly string[]): Promise<BatchFileResult[]> {
    if (filepaths.length === 0) {
      throw new InvalidArgumentError('At least one file path is required');
    }

    const results: BatchFileResult[] = [];
    for (const filepath of filepaths) {
      try {
        const content = await this.getFileContents(filepath);
        results.push({ path: filepath, ok: true, content });
      } catch (error) {
        if (!(error instanceof VaultError)) {
          throw error;
        }
        results.push({ path: filepath, ok: false, error: error.message });
      }
    }
    return results;
  }

  async search(query: string, contextLength: number = DEFAULT_CONTEXT_LENGTH): Promise<SimpleSearchHit[]> {
    if (query.trim() === '') {
      throw new InvalidArgumentError('The search query must not be empty');
    }
    requirePositiveInteger(contextLength, 'contextLength');

    const hits = await this.store.search(query, contextLength);
    return this.filterPaths('search', hits, (hit) => hit.filename);
  }

  async complexSearch(query: JsonLogicQuery): Promise<ComplexSearchHit[]> {
    if (typeof query !== 'object' || query === null || Array.isArray(query) || Object.keys(query).length === 0) {
      throw new InvalidArgumentError('The query must be a non-empty JsonLogic object');
    }

    const hits = await this.store.complexSearch(query);
    return this.filterPaths('complex_search', hits, (hit) => hit.filename);
  }

  /**
   * A current note outside the whitelist is reported exactly like a missing one.
   */
  async getPeriodicNote(period: string): Promise<NoteJson> {
    const resolved = requirePeriod(period);

    let note: NoteJson;
    try {
      note = await this.store.getPeriodicNote(resolved);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new NotFoundError(unavailablePeriodicNoteMessage(resolved), error);
      }
      throw error;
    }

    if (!this.whitelist.isAllowed(note.path)) {
      this.audit?.record('get_periodic_note', note.path, 'denied');
      throw new NotFoundError(unavailablePeriodicNoteMessage(resolved));
    }
    this.audit?.record('get_periodic_note', note.path, 'allowed');
    return note;
  }

  async getRecentPeriodicNotes(
    period: string,
    options: { limit?: number; includeContent?: boolean } = {}
  ): Promise<PeriodicNoteSummary[]> {
    const resolved = requirePeriod(period);
    const limit = requirePositiveInteger(options.limit ?? DEFAULT_RECENT_PERIODIC_LIMIT, 'limit');

    const notes = await this.store.getRecentPeriodicNotes(resolved, {
      limit: this.whitelist.isUnrestricted ? limit : Math.max(limit, PERIODIC_CANDIDATE_LIMIT),
      includeContent: options.includeContent ?? false,
    });
    return this.filterPaths('get_recent_periodic_notes', notes, (note) => note.path).slice(0, limit);
  }

  /**
   * Filtering happens before truncation: disallowed files never count
   * against the requested limit.
   */
  async getRecentChanges(options: { limit?: number; days?: number } = {}): Promise<RecentChange[]> {
    const limit = requirePositiveInteger(options.limit ?? DEFAULT_RECENT_CHANGES_LIMIT, 'limit');
    const days = requirePositiveInteger(options.days ?? DEFAULT_RECENT_CHANGES_DAYS, 'days');

    const candidates = await this.store.listRecentChanges({ days, limit: this.upstreamLimit(limit) });
    return this.filterPaths('get_recent_changes', candidates, (change) => change.path).slice(0, limit);
  }

  /**
   * Tags inherit the visibility of the notes they come from: a tag used only
   * in disallowed notes is not returned.
   */
  async getAllTags(): Promise<string[]> {
    const notes = await this.store.listTaggedNotes();
    const visible = this.filterPaths('get_all_tags', notes, (note) => note.path);

    const tags = new Set<string>();
    for (const note of visible) {
      for (const tag of note.tags) {
        if (tag) tags.add(tag);
      }
    }
    return [...tags].sort();
  }

  // ===========================================================================
  // Enforcement helpers
  // ===========================================================================

  /**
   * Pushing the limit upstream is only safe when nothing will be filtered out.
   */
  private upstreamLimit(limit: number): number | undefined {
    return this.whitelist.isUnrestricted ? limit : undefined;
  }

  private requireAccess(operation: string, path: string): void {
    if (!this.whitelist.isAllowed(path)) {
      this.audit?.record(operation, path, 'denied');
      throw new PermissionDeniedError(path);
    }
    this.audit?.record(operation, path, 'allowed');
  }

  /**
   * A directory is allowed when either its bare path or its path with a
   * trailing "/" is, so "Work/" admits the directory "Work".
   */
  private requireDirectoryAccess(operation: string, dir: string): void {
    if (this.whitelist.isAllowed(dir) || this.whitelist.isAllowed(`${dir}/`)) {
      this.audit?.record(operation, dir, 'allowed');
      return;
    }
    this.audit?.record(operation, dir, 'denied');
    throw new PermissionDeniedError(dir);
  }

  private filterPaths<T>(operation: string, items: readonly T[], getPath: (item: T) => string): T[] {
    const kept = this.whitelist.filter(items, getPath);

    if (kept.length !== items.length) {
      const keptSet = new Set(kept);
      for (const item of items) {
        if (!keptSet.has(item)) {
          this.audit?.record(operation, getPath(item), 'filtered');
        }
      }
      logger.debug('Vault', 'Filtered result entries', {
        operation,
        received: items.length,
        returned: kept.length,
      });
    }

    return kept;
  }

  private async withUniformNotFound<T>(path: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new NotFoundError(unavailablePathMessage(path), error);
      }
      throw error;
    }
  }
}
