/**
 * vault-guard-mcp
 *
 * Read-only access to an Obsidian vault for MCP clients, restricted to the
 * paths an administrator whitelists.
 */

// Access control
export {
  Whitelist,
  isAllowed,
  classifyPattern,
  matchesPattern,
  matchesAny,
  normalizePattern,
  AccessAudit,
  type WhitelistPattern,
  type PatternKind,
  type AuditDecision,
  type AccessAuditEntry,
  type AccessAuditStats,
} from './core/permissions/index.js';

// Vault
export * from './core/vault/index.js';

// Tools
export {
  ToolRegistry,
  createDefaultRegistry,
  VAULT_TOOLS,
  type Tool,
  type ToolContext,
  type ToolResult,
  type ToolDefinition,
} from './core/tools/index.js';

// MCP server
export { createVaultServer, toCallToolResult, SERVER_NAME, SERVER_VERSION } from './mcp/index.js';

// Configuration
export { loadConfig, ConfigError, DEFAULT_CONFIG, ENV_KEYS, type VaultGuardConfig } from './base/config/index.js';

// Logging
export { logger, LogLevel, type LogContext } from './base/utils/logger.js';
