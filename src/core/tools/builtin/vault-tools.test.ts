/**
 * Vault Tool Tests
 */

import { describe, it, expect } from '@jest/globals';
import { Whitelist } from '../../permissions/whitelist.js';
import { GuardedVault } from '../../vault/guarded-vault.js';
import { FakeVaultStore, hit, note, type FakeVaultData } from '../../vault/test-utils.js';
import { createDefaultRegistry } from '../index.js';
import { formatBatchResults } from './file-contents.js';
import { formatSearchHits } from './search.js';

const DATA: FakeVaultData = {
  files: ['Inbox.md', 'Projects/', 'Private/'],
  directories: { Projects: ['plan.md'] },
  contents: {
    'Projects/plan.md': '# Plan',
    'Private/diary.md': '# Diary',
  },
  searchHits: [hit('Projects/plan.md', '...the plan...'), hit('Private/diary.md', '...the plan...')],
  complexHits: [
    { filename: 'Projects/plan.md', result: true },
    { filename: 'Private/diary.md', result: true },
  ],
  periodicNotes: { daily: note('Projects/daily.md', '# Today', ['daily']) },
  recentPeriodicNotes: [
    { path: 'Private/2024-01-02.md', mtime: 2, content: undefined },
    { path: 'Projects/2024-01-01.md', mtime: 1, content: undefined },
  ],
  recentChanges: [
    { path: 'Private/diary.md', mtime: 20 },
    { path: 'Projects/plan.md', mtime: 10 },
  ],
  taggedNotes: [
    { path: 'Projects/plan.md', tags: ['work'] },
    { path: 'Private/diary.md', tags: ['secret'] },
  ],
};

function setup(patterns: string[] = ['Inbox.md', 'Projects/']) {
  const store = new FakeVaultStore(DATA);
  const registry = createDefaultRegistry();
  const context = { vault: new GuardedVault(store, Whitelist.fromPatterns(patterns)) };
  return {
    store,
    run: (name: string, input: unknown = {}) => registry.execute(name, input, context),
  };
}

describe('vault tools', () => {
  it('list_files_in_vault should return visible entries as JSON', async () => {
    const { run } = setup();
    const result = await run('list_files_in_vault');
    expect(result).toEqual({ success: true, output: JSON.stringify(['Inbox.md', 'Projects/'], null, 2) });
  });

  it('list_files_in_dir should list an allowed directory', async () => {
    const { run } = setup();
    const result = await run('list_files_in_dir', { dirpath: 'Projects' });
    expect(JSON.parse(result.output)).toEqual(['plan.md']);
  });

  it('get_file_contents should return raw text', async () => {
    const { run } = setup();
    expect(await run('get_file_contents', { filepath: 'Projects/plan.md' })).toEqual({
      success: true,
      output: '# Plan',
    });
  });

  it('batch_get_file_contents should keep denials in their own section', async () => {
    const { run } = setup();
    const result = await run('batch_get_file_contents', { filepaths: ['Projects/plan.md', 'Private/diary.md'] });

    expect(result.output).toBe(
      '# Projects/plan.md\n\n# Plan\n\n---\n\n' +
        '# Private/diary.md\n\nNot found or access denied: Private/diary.md\n\n---\n\n'
    );
  });

  it('batch_get_file_contents should require at least one path', async () => {
    const { run } = setup();
    const result = await run('batch_get_file_contents', { filepaths: [] });
    expect(result.success).toBe(false);
    expect(result.error).toMatch(/^Invalid input: /);
  });

  it('search should format visible hits', async () => {
    const { run, store } = setup();
    const result = await run('search', { query: 'plan', context_length: 30 });

    expect(JSON.parse(result.output)).toEqual([
      {
        filename: 'Projects/plan.md',
        score: 1,
        matches: [{ context: '...the plan...', match_position: { start: 0, end: 3 } }],
      },
    ]);
    expect(store.callsTo('search')[0].args).toEqual(['plan', 30]);
  });

  it('complex_search should return visible rows', async () => {
    const { run } = setup();
    const result = await run('complex_search', { query: { glob: ['*.md', { var: 'path' }] } });
    expect(JSON.parse(result.output)).toEqual([{ filename: 'Projects/plan.md', result: true }]);
  });

  it('get_periodic_note should return content by default and JSON for metadata', async () => {
    const { run } = setup();

    expect((await run('get_periodic_note', { period: 'daily' })).output).toBe('# Today');

    const metadata = await run('get_periodic_note', { period: 'daily', type: 'metadata' });
    expect(JSON.parse(metadata.output)).toEqual({
      path: 'Projects/daily.md',
      content: '# Today',
      tags: ['daily'],
      frontmatter: {},
    });
  });

  it('get_periodic_note should reject unknown periods', async () => {
    const { run, store } = setup();
    const result = await run('get_periodic_note', { period: 'hourly' });

    expect(result.success).toBe(false);
    expect(store.calls).toHaveLength(0);
  });

  it('get_recent_periodic_notes should forward include_content', async () => {
    const { run, store } = setup();
    const result = await run('get_recent_periodic_notes', { period: 'daily', include_content: true });

    expect(JSON.parse(result.output)).toEqual([{ path: 'Projects/2024-01-01.md', mtime: 1 }]);
    expect(store.callsTo('getRecentPeriodicNotes')[0].args).toEqual([
      'daily',
      { limit: undefined, includeContent: true },
    ]);
  });

  it('get_recent_changes should return visible changes', async () => {
    const { run } = setup();
    const result = await run('get_recent_changes', { limit: 1 });
    expect(JSON.parse(result.output)).toEqual([{ path: 'Projects/plan.md', mtime: 10 }]);
  });

  it('get_recent_changes should validate the limit', async () => {
    const { run } = setup();
    const result = await run('get_recent_changes', { limit: 0 });
    expect(result.error).toMatch(/^Invalid input: /);
  });

  it('get_all_tags should return visible tags', async () => {
    const { run } = setup();
    expect((await run('get_all_tags')).output).toBe(JSON.stringify(['work'], null, 2));
  });
});

describe('formatBatchResults', () => {
  it('should return an empty string for no results', () => {
    expect(formatBatchResults([])).toBe('');
  });
});

describe('formatSearchHits', () => {
  it('should default a missing score to 0', () => {
    expect(formatSearchHits([{ filename: 'a.md', matches: [] }])).toEqual([
      { filename: 'a.md', score: 0, matches: [] },
    ]);
  });
});
