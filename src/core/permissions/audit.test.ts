/**
 * Access Audit Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { AccessAudit } from './audit.js';

describe('AccessAudit', () => {
  let audit: AccessAudit;

  beforeEach(() => {
    audit = new AccessAudit();
  });

  it('should record decisions in order', () => {
    audit.record('get_file_contents', 'Projects/plan.md', 'allowed');
    audit.record('get_file_contents', 'Private/diary.md', 'denied');

    const entries = audit.getAll();
    expect(entries.map((e) => [e.operation, e.path, e.decision])).toEqual([
      ['get_file_contents', 'Projects/plan.md', 'allowed'],
      ['get_file_contents', 'Private/diary.md', 'denied'],
    ]);
  });

  it('should drop the oldest entries beyond the bound', () => {
    const small = new AccessAudit({ maxEntries: 2 });
    small.record('search', 'a.md', 'filtered');
    small.record('search', 'b.md', 'filtered');
    small.record('search', 'c.md', 'filtered');

    expect(small.getAll().map((e) => e.path)).toEqual(['b.md', 'c.md']);
  });

  it('should return the most recent entries', () => {
    audit.record('search', 'a.md', 'filtered');
    audit.record('search', 'b.md', 'filtered');
    audit.record('search', 'c.md', 'filtered');

    expect(audit.getRecent(2).map((e) => e.path)).toEqual(['b.md', 'c.md']);
  });

  it('should query by operation and decision', () => {
    audit.record('search', 'a.md', 'filtered');
    audit.record('get_file_contents', 'b.md', 'denied');
    audit.record('get_file_contents', 'c.md', 'allowed');

    expect(audit.getByOperation('get_file_contents').map((e) => e.path)).toEqual(['b.md', 'c.md']);
    expect(audit.getByDecision('denied').map((e) => e.path)).toEqual(['b.md']);
  });

  it('should compute stats', () => {
    audit.record('search', 'a.md', 'filtered');
    audit.record('search', 'b.md', 'filtered');
    audit.record('get_file_contents', 'c.md', 'denied');
    audit.record('get_file_contents', 'd.md', 'allowed');

    expect(audit.getStats()).toEqual({
      total: 4,
      allowed: 1,
      denied: 1,
      filtered: 2,
      byOperation: { search: 2, get_file_contents: 2 },
    });
  });

  it('should clear all entries', () => {
    audit.record('search', 'a.md', 'filtered');
    audit.clear();
    expect(audit.getAll()).toEqual([]);
    expect(audit.getStats().total).toBe(0);
  });

  it('should format entries as a table', () => {
    const entry = {
      timestamp: new Date('2024-03-05T14:07:09.000Z'),
      operation: 'get_file_contents',
      path: 'Private/diary.md',
      decision: 'denied' as const,
    };

    expect(audit.formatEntry(entry)).toBe(
      `14:07:09  DENIED     ${'get_file_contents'.padEnd(26)}  Private/diary.md`
    );

    const table = audit.formatTable([entry]).split('\n');
    expect(table[0]).toBe('Time      Decision   Operation                   Path');
    expect(table[1]).toBe('-'.repeat(table[0].length));
    expect(table[2]).toBe(audit.formatEntry(entry));
  });
});
