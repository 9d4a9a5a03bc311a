/**
 * MCP Integration - Model Context Protocol server for the guarded vault
 */

export { createVaultServer, toCallToolResult, SERVER_NAME, SERVER_VERSION } from './server.js';
