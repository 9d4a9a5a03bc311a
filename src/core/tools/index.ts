/**
 * Tools System - vault tools and registry
 */

import { logger } from '../../base/utils/logger.js';
import { isDebugEnabled } from '../../base/utils/debug.js';

export * from './types.js';
export { ToolRegistry } from './registry.js';

export { listFilesInVaultTool, listFilesInDirTool } from './builtin/list-files.js';
export { getFileContentsTool, batchGetFileContentsTool, formatBatchResults } from './builtin/file-contents.js';
export { searchTool, complexSearchTool, formatSearchHits } from './builtin/search.js';
export type { FormattedSearchHit } from './builtin/search.js';
export { getPeriodicNoteTool, getRecentPeriodicNotesTool } from './builtin/periodic-notes.js';
export { getRecentChangesTool } from './builtin/recent-changes.js';
export { getAllTagsTool } from './builtin/tags.js';

import { ToolRegistry } from './registry.js';
import type { Tool } from './types.js';
import { listFilesInVaultTool, listFilesInDirTool } from './builtin/list-files.js';
import { getFileContentsTool, batchGetFileContentsTool } from './builtin/file-contents.js';
import { searchTool, complexSearchTool } from './builtin/search.js';
import { getPeriodicNoteTool, getRecentPeriodicNotesTool } from './builtin/periodic-notes.js';
import { getRecentChangesTool } from './builtin/recent-changes.js';
import { getAllTagsTool } from './builtin/tags.js';

/**
 * Every vault tool, in the order they are advertised
 */
export const VAULT_TOOLS: readonly Tool[] = [
  listFilesInVaultTool,
  listFilesInDirTool,
  getFileContentsTool,
  batchGetFileContentsTool,
  searchTool,
  complexSearchTool,
  getPeriodicNoteTool,
  getRecentPeriodicNotesTool,
  getRecentChangesTool,
  getAllTagsTool,
];

/**
 * Create a registry with all vault tools
 */
export function createDefaultRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.registerAll([...VAULT_TOOLS]);

  if (isDebugEnabled('tools')) {
    logger.debug('Tools', 'Registered vault tools', { count: registry.list().length });
  }

  return registry;
}
