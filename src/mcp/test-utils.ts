/**
 * Shared test utilities for MCP server tests
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { Whitelist } from '../core/permissions/whitelist.js';
import { createDefaultRegistry } from '../core/tools/index.js';
import { GuardedVault } from '../core/vault/guarded-vault.js';
import type { VaultStore } from '../core/vault/types.js';
import { createVaultServer } from './server.js';

export interface ConnectedServer {
  client: Client;
  callText(name: string, args?: Record<string, unknown>): Promise<{ text: string; isError: boolean }>;
  close(): Promise<void>;
}

/**
 * Start a vault server over an in-memory transport and connect a client to it
 */
export async function connectVaultServer(store: VaultStore, patterns: string[]): Promise<ConnectedServer> {
  const vault = new GuardedVault(store, Whitelist.fromPatterns(patterns));
  const server = createVaultServer(createDefaultRegistry(), { vault });
  const client = new Client({ name: 'vault-guard-test', version: '0.0.0' });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);

  return {
    client,
    async callText(name, args = {}) {
      const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
      const first = result.content[0];
      return { text: first?.type === 'text' ? first.text : '', isError: result.isError ?? false };
    },
    async close() {
      await client.close();
      await server.close();
    },
  };
}
