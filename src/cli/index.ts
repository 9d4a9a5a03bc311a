#!/usr/bin/env node
/**
 * vault-guard-mcp CLI - serve a whitelisted Obsidian vault over MCP stdio
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../base/config/index.js';
import { logger } from '../base/utils/logger.js';
import { AccessAudit } from '../core/permissions/audit.js';
import { Whitelist } from '../core/permissions/whitelist.js';
import { createDefaultRegistry } from '../core/tools/index.js';
import { GuardedVault } from '../core/vault/guarded-vault.js';
import { ObsidianClient } from '../core/vault/obsidian-client.js';
import { getErrorMessage } from '../core/vault/errors.js';
import { createVaultServer } from '../mcp/server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const whitelist = Whitelist.fromPatterns(config.whitelist);

  if (whitelist.isUnrestricted) {
    logger.warn('CLI', 'No whitelist configured; the whole vault is readable');
  } else {
    logger.info('CLI', 'Whitelist loaded', { patterns: whitelist.sources.join(',') });
  }

  const client = new ObsidianClient({
    apiKey: config.apiKey,
    protocol: config.protocol,
    host: config.host,
    port: config.port,
    verifySsl: config.verifySsl,
    timeoutMs: config.timeoutMs,
  });
  const audit = new AccessAudit();
  const vault = new GuardedVault(client, whitelist, { audit });
  const server = createVaultServer(createDefaultRegistry(), { vault });

  const shutdown = (): void => {
    const { total, allowed, denied, filtered } = audit.getStats();
    logger.info('CLI', 'Shutting down', { total, allowed, denied, filtered });
    server
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('CLI', 'Shutdown failed', { error: getErrorMessage(error) });
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await server.connect(new StdioServerTransport());
  logger.info('CLI', 'Serving vault over stdio', { baseUrl: client.getBaseUrl() });
}

main().catch((error: unknown) => {
  logger.error('CLI', 'Startup failed', { error: getErrorMessage(error) });
  process.exit(1);
});
