/**
 * Configuration Loader - read and validate settings from the environment
 */

import { z } from 'zod';
import { ConfigError, DEFAULT_CONFIG, ENV_KEYS, type Protocol, type VaultGuardConfig } from './types.js';

const EnvSchema = z.object({
  [ENV_KEYS.apiKey]: z.string({ required_error: 'is required' }),
  [ENV_KEYS.protocol]: z
    .string()
    .optional()
    .transform((value): Protocol => (value?.toLowerCase() === 'http' ? 'http' : DEFAULT_CONFIG.protocol)),
  [ENV_KEYS.host]: z.string().default(DEFAULT_CONFIG.host),
  [ENV_KEYS.port]: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be an integer')
    .min(1, 'must be between 1 and 65535')
    .max(65535, 'must be between 1 and 65535')
    .default(DEFAULT_CONFIG.port),
  [ENV_KEYS.verifySsl]: z
    .string()
    .optional()
    .transform((value) =>
      value === undefined ? DEFAULT_CONFIG.verifySsl : ['true', '1'].includes(value.toLowerCase())
    ),
  [ENV_KEYS.timeoutMs]: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be an integer')
    .positive('must be positive')
    .default(DEFAULT_CONFIG.timeoutMs),
  [ENV_KEYS.whitelist]: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((pattern) => pattern.trim())
        .filter((pattern) => pattern !== '')
    ),
});

/**
 * Keep only the variables we read, trimmed, with blank values treated as unset
 */
function pickEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.values(ENV_KEYS)) {
    const value = env[key]?.trim();
    if (value) {
      picked[key] = value;
    }
  }
  return picked;
}

/**
 * Load configuration from environment variables
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VaultGuardConfig {
  const parsed = EnvSchema.safeParse(pickEnv(env));

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigError(problems);
  }

  const values = parsed.data;
  return {
    apiKey: values[ENV_KEYS.apiKey],
    protocol: values[ENV_KEYS.protocol],
    host: values[ENV_KEYS.host],
    port: values[ENV_KEYS.port],
    verifySsl: values[ENV_KEYS.verifySsl],
    timeoutMs: values[ENV_KEYS.timeoutMs],
    whitelist: values[ENV_KEYS.whitelist],
  };
}

