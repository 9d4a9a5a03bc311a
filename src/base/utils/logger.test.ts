/**
 * Logger Tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { resetDebugConfig } from './debug.js';
import { formatContext, logger } from './logger.js';

describe('formatContext', () => {
  it('should quote strings and serialize objects', () => {
    expect(formatContext({ path: 'a.md', count: 2, missing: undefined, args: { limit: 1 } })).toBe(
      ' [path="a.md" count=2 missing=undefined args={"limit":1}]'
    );
  });

  it('should render nothing for an empty context', () => {
    expect(formatContext({})).toBe('');
  });
});

describe('logger', () => {
  const saved = { ...process.env };
  let lines: string[];

  beforeEach(() => {
    lines = [];
    jest.spyOn(console, 'error').mockImplementation((line: unknown) => {
      lines.push(String(line));
    });
    delete process.env.VAULT_GUARD_DEBUG;
    delete process.env.VAULT_GUARD_DEBUG_VAULT;
    resetDebugConfig();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.env = { ...saved };
    resetDebugConfig();
  });

  it('should write warnings to stderr with component and level', () => {
    logger.warn('CLI', 'No whitelist configured');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] CLI:warn - No whitelist configured$/);
  });

  it('should drop debug output unless enabled', () => {
    logger.debug('Vault', 'Filtered result entries');
    expect(lines).toHaveLength(0);
  });

  it('should honour a component debug level', () => {
    process.env.VAULT_GUARD_DEBUG_VAULT = '1';
    resetDebugConfig();

    logger.debug('Vault', 'Filtered result entries', { operation: 'search' });
    logger.debug('MCP', 'Tool call');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/Vault:debug - Filtered result entries \[operation="search"\]$/);
  });
});
