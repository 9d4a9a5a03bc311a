/**
 * Pattern Matcher - decides whether a vault path is covered by a whitelist pattern
 *
 * Pattern forms:
 * - "Work/plan.md"  exact path (case-sensitive, never a prefix)
 * - "Work/"         directory prefix, any depth beneath it
 * - "*.md", "a/**"  glob anchored to the whole path; * stays inside one
 *                   segment, ** crosses "/" boundaries
 */

import { Minimatch, type MinimatchOptions } from 'minimatch';
import type { WhitelistPattern } from './types.js';

const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  nocomment: true,
  nonegate: true,
  nobrace: true,
  noext: true,
  matchBase: false,
  platform: 'linux',
};

/**
 * Strip surrounding whitespace and any leading "/" from a raw pattern
 */
export function normalizePattern(raw: string): string {
  return raw.trim().replace(/^\/+/, '');
}

/**
 * Classify a raw pattern string into its tagged form
 *
 * @throws Error if the pattern is empty after normalization
 */
export function classifyPattern(raw: string): WhitelistPattern {
  const source = normalizePattern(raw);
  if (source === '') {
    throw new Error(`Empty whitelist pattern: "${raw}"`);
  }

  if (source.includes('*')) {
    return { kind: 'glob', source, matcher: new Minimatch(source, GLOB_OPTIONS) };
  }
  if (source.endsWith('/')) {
    return { kind: 'prefix', source };
  }
  return { kind: 'exact', source };
}

export function matchesPattern(pattern: WhitelistPattern, path: string): boolean {
  if (path === '') {
    return false;
  }

  switch (pattern.kind) {
    case 'exact':
      return path === pattern.source;
    case 'prefix':
      return path.startsWith(pattern.source);
    case 'glob':
      return pattern.matcher.match(path);
  }
}

/**
 * OR over the patterns; an empty pattern list permits everything
 */
export function matchesAny(patterns: readonly WhitelistPattern[], path: string): boolean {
  if (patterns.length === 0) {
    return true;
  }
  return patterns.some((pattern) => matchesPattern(pattern, path));
}
