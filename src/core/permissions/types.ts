/**
 * Whitelist Types
 */

import type { Minimatch } from 'minimatch';

/**
 * A whitelist entry, classified once when the whitelist is built.
 *
 * - exact:  `Work/plan.md` matches only that path
 * - prefix: `Work/` matches every path beneath that directory
 * - glob:   `**\/*.md`, `*` stays within a segment, `**` crosses segments
 */
export type WhitelistPattern =
  | { kind: 'exact'; source: string }
  | { kind: 'prefix'; source: string }
  | { kind: 'glob'; source: string; matcher: Minimatch };

export type PatternKind = WhitelistPattern['kind'];

// =============================================================================
// Audit Types
// =============================================================================

/**
 * allowed/denied are recorded for operations that name their target up front;
 * filtered is recorded for entries dropped from a listing or search result.
 */
export type AuditDecision = 'allowed' | 'denied' | 'filtered';

export interface AccessAuditEntry {
  timestamp: Date;
  operation: string;
  path: string;
  decision: AuditDecision;
}

export interface AccessAuditStats {
  total: number;
  allowed: number;
  denied: number;
  filtered: number;
  byOperation: Record<string, number>;
}
