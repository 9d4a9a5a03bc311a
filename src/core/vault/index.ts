/**
 * Vault access: Obsidian REST client plus the whitelist-enforcing façade
 */

export * from './types.js';
export * from './errors.js';
export { ObsidianClient, encodeVaultPath, buildRecentChangesQuery, TAGS_QUERY } from './obsidian-client.js';
export type { ObsidianClientOptions } from './obsidian-client.js';
export {
  GuardedVault,
  normalizeVaultPath,
  DEFAULT_CONTEXT_LENGTH,
  DEFAULT_RECENT_CHANGES_DAYS,
  DEFAULT_RECENT_CHANGES_LIMIT,
  DEFAULT_RECENT_PERIODIC_LIMIT,
  PERIODIC_CANDIDATE_LIMIT,
} from './guarded-vault.js';
export type { GuardedVaultOptions } from './guarded-vault.js';
