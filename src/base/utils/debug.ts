/**
 * Debug configuration module
 * Controls debug output for the vault guard components
 *
 * Debug Levels:
 * - VAULT_GUARD_DEBUG=0 or unset: No debug output (default)
 * - VAULT_GUARD_DEBUG=1: Standard debug output (access decisions, upstream calls)
 * - VAULT_GUARD_DEBUG=2: Verbose debug output (request parameters, result sizes)
 */

export type DebugLevel = 0 | 1 | 2;

export interface DebugConfig {
  level: DebugLevel;
  enabled: boolean; // level >= 1
  verbose: boolean; // level >= 2
  components: {
    whitelist: DebugLevel;
    vault: DebugLevel;
    tools: DebugLevel;
    mcp: DebugLevel;
  };
}

export type DebugComponent = keyof DebugConfig['components'];

const DEBUG_COMPONENTS: readonly DebugComponent[] = ['whitelist', 'vault', 'tools', 'mcp'];

export function isDebugComponent(value: string): value is DebugComponent {
  return DEBUG_COMPONENTS.some((component) => component === value);
}

let cachedConfig: DebugConfig | null = null;

function parseDebugLevel(value: string | undefined): DebugLevel {
  if (!value) return 0;
  const level = parseInt(value, 10);
  if (level === 2) return 2;
  if (level === 1) return 1;
  return 0;
}

/**
 * Get debug configuration based on environment variables
 *
 * - VAULT_GUARD_DEBUG=0|1|2: global level
 * - VAULT_GUARD_DEBUG_<COMPONENT>=1|2: component-specific level
 */
export function getDebugConfig(): DebugConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const globalLevel = parseDebugLevel(process.env.VAULT_GUARD_DEBUG);

  cachedConfig = {
    level: globalLevel,
    enabled: globalLevel >= 1,
    verbose: globalLevel >= 2,
    components: {
      whitelist: parseDebugLevel(process.env.VAULT_GUARD_DEBUG_WHITELIST) || globalLevel,
      vault: parseDebugLevel(process.env.VAULT_GUARD_DEBUG_VAULT) || globalLevel,
      tools: parseDebugLevel(process.env.VAULT_GUARD_DEBUG_TOOLS) || globalLevel,
      mcp: parseDebugLevel(process.env.VAULT_GUARD_DEBUG_MCP) || globalLevel,
    },
  };

  return cachedConfig;
}

export function isDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 1;
}

export function isVerboseDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 2;
}

/**
 * Reset cached config (useful for testing)
 */
export function resetDebugConfig(): void {
  cachedConfig = null;
}
