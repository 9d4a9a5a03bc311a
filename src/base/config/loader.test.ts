/**
 * Config Loader Tests
 */

import { describe, it, expect } from '@jest/globals';
import { loadConfig } from './loader.js';
import { ConfigError } from './types.js';

const BASE_ENV = { OBSIDIAN_API_KEY: 'test-secret' };

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig(BASE_ENV)).toEqual({
      apiKey: 'test-secret',
      protocol: 'https',
      host: '127.0.0.1',
      port: 27124,
      verifySsl: false,
      timeoutMs: 30000,
      whitelist: [],
    });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      OBSIDIAN_API_KEY: ' test-secret ',
      OBSIDIAN_PROTOCOL: 'HTTP',
      OBSIDIAN_HOST: 'vault.local',
      OBSIDIAN_PORT: '27123',
      OBSIDIAN_VERIFY_SSL: 'true',
      OBSIDIAN_TIMEOUT_MS: '5000',
      OBSIDIAN_WHITELIST: 'Work/, *.md ,,Inbox.md',
    });

    expect(config).toEqual({
      apiKey: 'test-secret',
      protocol: 'http',
      host: 'vault.local',
      port: 27123,
      verifySsl: true,
      timeoutMs: 5000,
      whitelist: ['Work/', '*.md', 'Inbox.md'],
    });
  });

  it('should fall back to https for any other protocol', () => {
    expect(loadConfig({ ...BASE_ENV, OBSIDIAN_PROTOCOL: 'ftp' }).protocol).toBe('https');
  });

  it('should accept 1 and reject other values for certificate checks', () => {
    expect(loadConfig({ ...BASE_ENV, OBSIDIAN_VERIFY_SSL: '1' }).verifySsl).toBe(true);
    expect(loadConfig({ ...BASE_ENV, OBSIDIAN_VERIFY_SSL: 'yes' }).verifySsl).toBe(false);
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ ...BASE_ENV, OBSIDIAN_HOST: '  ', OBSIDIAN_PORT: '', OBSIDIAN_WHITELIST: ' ' });
    expect(config.host).toBe('127.0.0.1');
    expect(config.port).toBe(27124);
    expect(config.whitelist).toEqual([]);
  });

  it('should require an API key', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ OBSIDIAN_API_KEY: '   ' })).toThrow('OBSIDIAN_API_KEY is required');
  });

  it('should list every problem at once', () => {
    let error: unknown;
    try {
      loadConfig({ OBSIDIAN_PORT: '70000', OBSIDIAN_TIMEOUT_MS: 'soon' });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty('problems', [
      'OBSIDIAN_API_KEY is required',
      'OBSIDIAN_PORT must be between 1 and 65535',
      'OBSIDIAN_TIMEOUT_MS must be a number',
    ]);
    expect(error).toHaveProperty(
      'message',
      'Invalid configuration:\n' +
        '  - OBSIDIAN_API_KEY is required\n' +
        '  - OBSIDIAN_PORT must be between 1 and 65535\n' +
        '  - OBSIDIAN_TIMEOUT_MS must be a number'
    );
  });
});
