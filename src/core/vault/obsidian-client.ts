/**
 * Obsidian Local REST API client
 *
 * Raw, unfiltered vault access. Whitelist enforcement happens one layer up in
 * GuardedVault; nothing here knows about the access policy.
 */

import { Agent, fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { logger } from '../../base/utils/logger.js';
import { isVerboseDebugEnabled } from '../../base/utils/debug.js';
import { NotFoundError, UpstreamError, getErrorMessage } from './errors.js';
import {
  FileListSchema,
  NoteJsonSchema,
  PeriodicNoteSummarySchema,
  QueryRowSchema,
  SimpleSearchHitSchema,
  type ComplexSearchHit,
  type JsonLogicQuery,
  type NoteJson,
  type Period,
  type PeriodicNoteSummary,
  type QueryRow,
  type RecentChange,
  type RecentChangesOptions,
  type RecentPeriodicNotesOptions,
  type SimpleSearchHit,
  type TaggedNote,
  type VaultStore,
} from './types.js';

export const DEFAULT_PORT = 27124;
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_TIMEOUT_MS = 30 * 1000;

const CONTENT_TYPE_JSONLOGIC = 'application/vnd.olrapi.jsonlogic+json';
const CONTENT_TYPE_DQL = 'application/vnd.olrapi.dataview.dql+txt';
const ACCEPT_NOTE_JSON = 'application/vnd.olrapi.note+json';

const ApiErrorSchema = z.object({
  errorCode: z.number().optional(),
  message: z.string().optional(),
});

const MtimeResultSchema = z.object({
  'file.mtime': z.union([z.string(), z.number()]).nullable().optional(),
});

const TagsResultSchema = z.object({
  'file.tags': z.array(z.unknown()).nullable().optional(),
});

export interface ObsidianClientOptions {
  apiKey: string;
  protocol?: 'http' | 'https';
  host?: string;
  port?: number;
  /** The plugin serves a self-signed certificate, so this defaults to false */
  verifySsl?: boolean;
  timeoutMs?: number;
  /** Overrides the connection dispatcher (used by tests) */
  dispatcher?: Dispatcher;
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  query?: Record<string, string | number | boolean | undefined>;
  body?: string;
  contentType?: string;
  accept?: string;
}

/**
 * Encode each segment of a vault path for use in a URL
 */
export function encodeVaultPath(vaultPath: string): string {
  return vaultPath.split('/').map(encodeURIComponent).join('/');
}

export function buildRecentChangesQuery(options: RecentChangesOptions): string {
  const lines = [
    'TABLE file.mtime',
    `WHERE file.mtime >= date(today) - dur(${options.days} days)`,
    'SORT file.mtime DESC',
  ];
  if (options.limit !== undefined) {
    lines.push(`LIMIT ${options.limit}`);
  }
  return lines.join('\n');
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export const TAGS_QUERY = 'TABLE file.tags\nWHERE file.tags';

export class ObsidianClient implements VaultStore {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher;

  constructor(options: ObsidianClientOptions) {
    this.apiKey = options.apiKey;
    const protocol = options.protocol ?? 'https';
    const host = options.host ?? DEFAULT_HOST;
    const port = options.port ?? DEFAULT_PORT;
    this.baseUrl = `${protocol}://${host}:${port}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.dispatcher =
      options.dispatcher ??
      new Agent({ connect: { rejectUnauthorized: options.verifySsl ?? false } });
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  async listFilesInVault(): Promise<string[]> {
    const data = await this.requestJson('/vault/', FileListSchema);
    return data.files;
  }

  async listFilesInDir(dirpath: string): Promise<string[]> {
    const data = await this.requestJson(`/vault/${encodeVaultPath(dirpath)}/`, FileListSchema);
    return data.files;
  }

  async getFileContents(filepath: string): Promise<string> {
    return this.requestText(`/vault/${encodeVaultPath(filepath)}`);
  }

  async search(query: string, contextLength: number): Promise<SimpleSearchHit[]> {
    return this.requestJson('/search/simple/', z.array(SimpleSearchHitSchema), {
      method: 'POST',
      query: { query, contextLength },
    });
  }

  async complexSearch(query: JsonLogicQuery): Promise<ComplexSearchHit[]> {
    return this.requestJson('/search/', z.array(QueryRowSchema), {
      method: 'POST',
      body: JSON.stringify(query),
      contentType: CONTENT_TYPE_JSONLOGIC,
    });
  }

  async getPeriodicNote(period: Period): Promise<NoteJson> {
    return this.requestJson(`/periodic/${period}/`, NoteJsonSchema, { accept: ACCEPT_NOTE_JSON });
  }

  async getRecentPeriodicNotes(
    period: Period,
    options: RecentPeriodicNotesOptions
  ): Promise<PeriodicNoteSummary[]> {
    return this.requestJson(`/periodic/${period}/recent`, z.array(PeriodicNoteSummarySchema), {
      query: { limit: options.limit, includeContent: options.includeContent },
    });
  }

  async listRecentChanges(options: RecentChangesOptions): Promise<RecentChange[]> {
    const rows = await this.dataview(buildRecentChangesQuery(options));
    return rows.map((row) => {
      const parsed = MtimeResultSchema.safeParse(row.result);
      const mtime = parsed.success ? parsed.data['file.mtime'] ?? null : null;
      return { path: row.filename, mtime };
    });
  }

  async listTaggedNotes(): Promise<TaggedNote[]> {
    const rows = await this.dataview(TAGS_QUERY);
    return rows.map((row) => {
      const parsed = TagsResultSchema.safeParse(row.result);
      const raw = parsed.success ? parsed.data['file.tags'] ?? [] : [];
      const tags = raw.filter((tag): tag is string => typeof tag === 'string' && tag.length > 0);
      return { path: row.filename, tags };
    });
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  private async dataview(dql: string): Promise<QueryRow[]> {
    return this.requestJson('/search/', z.array(QueryRowSchema), {
      method: 'POST',
      body: dql,
      contentType: CONTENT_TYPE_DQL,
    });
  }

  private async requestJson<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    options: RequestOptions = {}
  ): Promise<z.output<S>> {
    const text = await this.requestText(endpoint, options);

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new UpstreamError(`Invalid JSON from ${endpoint}`, undefined, undefined, error);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError(
        `Unexpected response from ${endpoint}: ${parsed.error.message}`,
        undefined,
        undefined,
        parsed.error
      );
    }
    return parsed.data;
  }

  private async requestText(endpoint: string, options: RequestOptions = {}): Promise<string> {
    const method = options.method ?? 'GET';
    const url = new URL(endpoint, this.baseUrl);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
    };
    if (options.contentType) headers['Content-Type'] = options.contentType;
    if (options.accept) headers.Accept = options.accept;

    if (isVerboseDebugEnabled('vault')) {
      logger.debug('Vault', `${method} ${url.pathname}`, { query: url.search });
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: options.body,
        dispatcher: this.dispatcher,
        signal: controller.signal,
      });
      const text = await response.text();

      if (!response.ok) {
        throw this.toHttpError(response.status, text);
      }
      return text;
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof UpstreamError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new UpstreamError(
          `Request failed: timed out after ${this.timeoutMs}ms`,
          undefined,
          undefined,
          error
        );
      }
      const reason = error instanceof Error && error.cause !== undefined ? error.cause : error;
      throw new UpstreamError(`Request failed: ${getErrorMessage(reason)}`, undefined, undefined, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private toHttpError(status: number, body: string): NotFoundError | UpstreamError {
    let errorCode = -1;
    let message = '<unknown>';

    const parsed = ApiErrorSchema.safeParse(tryParseJson(body));
    if (parsed.success) {
      errorCode = parsed.data.errorCode ?? errorCode;
      message = parsed.data.message ?? message;
    }

    const text = `Error ${errorCode}: ${message}`;
    if (status === 404) {
      return new NotFoundError(text);
    }
    return new UpstreamError(text, status, errorCode);
  }
}
