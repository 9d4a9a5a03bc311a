/**
 * Access Control
 *
 * - Whitelist patterns (exact, directory prefix, glob)
 * - Immutable, process-wide whitelist
 * - In-memory access audit
 */

export * from './types.js';

export { Whitelist, isAllowed } from './whitelist.js';
export { classifyPattern, matchesPattern, matchesAny, normalizePattern } from './pattern-matcher.js';
export { AccessAudit } from './audit.js';
