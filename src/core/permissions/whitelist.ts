/**
 * Whitelist - the process-wide, immutable access policy
 *
 * Built once at startup from OBSIDIAN_WHITELIST and handed to the guarded
 * vault. An empty whitelist is unrestricted.
 */

import { classifyPattern, matchesAny } from './pattern-matcher.js';
import type { WhitelistPattern } from './types.js';

export class Whitelist {
  private readonly entries: readonly WhitelistPattern[];

  private constructor(entries: WhitelistPattern[]) {
    this.entries = Object.freeze(entries);
  }

  static unrestricted(): Whitelist {
    return new Whitelist([]);
  }

  /**
   * @throws Error if any pattern is blank
   */
  static fromPatterns(patterns: readonly string[]): Whitelist {
    return new Whitelist(patterns.map((raw) => classifyPattern(raw)));
  }

  get isUnrestricted(): boolean {
    return this.entries.length === 0;
  }

  get patterns(): readonly WhitelistPattern[] {
    return this.entries;
  }

  /**
   * Raw pattern strings, as normalized at construction
   */
  get sources(): string[] {
    return this.entries.map((entry) => entry.source);
  }

  isAllowed(path: string): boolean {
    return matchesAny(this.entries, path);
  }

  /**
   * Keep the items whose path is allowed. Always returns a new array.
   */
  filter<T>(items: readonly T[], getPath: (item: T) => string): T[] {
    if (this.isUnrestricted) {
      return [...items];
    }
    return items.filter((item) => this.isAllowed(getPath(item)));
  }
}

/**
 * Functional form of Whitelist.isAllowed
 */
export function isAllowed(path: string, whitelist: Whitelist): boolean {
  return whitelist.isAllowed(path);
}
