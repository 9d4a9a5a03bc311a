/**
 * MCP Server Tests
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { FakeVaultStore } from '../core/vault/test-utils.js';
import { toCallToolResult } from './server.js';
import { connectVaultServer, type ConnectedServer } from './test-utils.js';

describe('toCallToolResult', () => {
  it('should wrap output as text content', () => {
    expect(toCallToolResult({ success: true, output: '# Plan' })).toEqual({
      content: [{ type: 'text', text: '# Plan' }],
    });
  });

  it('should flag failures', () => {
    expect(toCallToolResult({ success: false, output: '', error: 'Unknown tool: x' })).toEqual({
      content: [{ type: 'text', text: 'Unknown tool: x' }],
      isError: true,
    });
  });

  it('should fall back to a generic message when a failure has no error text', () => {
    expect(toCallToolResult({ success: false, output: '' })).toEqual({
      content: [{ type: 'text', text: 'Tool execution failed' }],
      isError: true,
    });
  });
});

describe('createVaultServer', () => {
  let connected: ConnectedServer | undefined;

  afterEach(async () => {
    await connected?.close();
    connected = undefined;
  });

  it('should list the vault tools with object schemas', async () => {
    connected = await connectVaultServer(new FakeVaultStore(), []);
    const { tools } = await connected.client.listTools();

    expect(tools).toHaveLength(10);
    expect(tools.find((t) => t.name === 'get_file_contents')?.inputSchema.required).toEqual(['filepath']);
  });

  it('should answer tool calls', async () => {
    connected = await connectVaultServer(new FakeVaultStore({ contents: { 'a.md': '# A' } }), []);

    expect(await connected.callText('get_file_contents', { filepath: 'a.md' })).toEqual({
      text: '# A',
      isError: false,
    });
  });

  it('should report failures as tool errors', async () => {
    connected = await connectVaultServer(new FakeVaultStore(), ['Work/']);

    expect(await connected.callText('get_file_contents', { filepath: 'a.md' })).toEqual({
      text: 'Not found or access denied: a.md',
      isError: true,
    });
    expect(await connected.callText('write_file', { filepath: 'a.md' })).toEqual({
      text: 'Unknown tool: write_file',
      isError: true,
    });
  });
});
