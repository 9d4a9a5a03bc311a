/**
 * Configuration Types
 *
 * Everything is read from the environment (optionally seeded from a .env
 * file by the CLI):
 *
 *   OBSIDIAN_API_KEY     bearer token for the Local REST API plugin (required)
 *   OBSIDIAN_PROTOCOL    "http" or "https" (default https)
 *   OBSIDIAN_HOST        default 127.0.0.1
 *   OBSIDIAN_PORT        default 27124
 *   OBSIDIAN_VERIFY_SSL  "true"/"1" to verify the plugin's certificate
 *   OBSIDIAN_TIMEOUT_MS  per-request timeout, default 30000
 *   OBSIDIAN_WHITELIST   comma-separated path patterns; empty means unrestricted
 */

export type Protocol = 'http' | 'https';

export interface VaultGuardConfig {
  apiKey: string;
  protocol: Protocol;
  host: string;
  port: number;
  verifySsl: boolean;
  timeoutMs: number;
  /** Raw whitelist patterns, already split and trimmed */
  whitelist: string[];
}

export const ENV_KEYS = {
  apiKey: 'OBSIDIAN_API_KEY',
  protocol: 'OBSIDIAN_PROTOCOL',
  host: 'OBSIDIAN_HOST',
  port: 'OBSIDIAN_PORT',
  verifySsl: 'OBSIDIAN_VERIFY_SSL',
  timeoutMs: 'OBSIDIAN_TIMEOUT_MS',
  whitelist: 'OBSIDIAN_WHITELIST',
} as const;

export const DEFAULT_CONFIG: Omit<VaultGuardConfig, 'apiKey'> = {
  protocol: 'https',
  host: '127.0.0.1',
  port: 27124,
  verifySsl: false,
  timeoutMs: 30000,
  whitelist: [],
};

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}
