/**
 * Access Audit - in-memory record of whitelist decisions
 *
 * Holds paths only, never vault content. Bounded; oldest entries drop first.
 */

import { logger } from '../../base/utils/logger.js';
import type { AccessAuditEntry, AccessAuditStats, AuditDecision } from './types.js';

const DEFAULT_MAX_ENTRIES = 1000;

export class AccessAudit {
  private entries: AccessAuditEntry[] = [];
  private readonly maxEntries: number;

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
  }

  record(operation: string, path: string, decision: AuditDecision): void {
    this.entries.push({ timestamp: new Date(), operation, path, decision });

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    if (decision !== 'allowed') {
      logger.debug('Whitelist', `Access ${decision}`, { operation, path });
    }
  }

  getRecent(count: number = 50): AccessAuditEntry[] {
    return this.entries.slice(-count);
  }

  getAll(): AccessAuditEntry[] {
    return [...this.entries];
  }

  getByOperation(operation: string): AccessAuditEntry[] {
    return this.entries.filter((e) => e.operation === operation);
  }

  getByDecision(decision: AuditDecision): AccessAuditEntry[] {
    return this.entries.filter((e) => e.decision === decision);
  }

  getStats(): AccessAuditStats {
    const stats: AccessAuditStats = {
      total: this.entries.length,
      allowed: 0,
      denied: 0,
      filtered: 0,
      byOperation: {},
    };

    for (const entry of this.entries) {
      stats[entry.decision]++;
      stats.byOperation[entry.operation] = (stats.byOperation[entry.operation] ?? 0) + 1;
    }

    return stats;
  }

  clear(): void {
    this.entries = [];
  }

  formatEntry(entry: AccessAuditEntry): string {
    const time = entry.timestamp.toISOString().slice(11, 19);
    const decision = entry.decision.toUpperCase().padEnd(9);
    const operation = entry.operation.padEnd(26);

    return `${time}  ${decision}  ${operation}  ${entry.path}`;
  }

  formatTable(entries: AccessAuditEntry[] = this.entries): string {
    const header = 'Time      Decision   Operation                   Path';
    const separator = '-'.repeat(header.length);
    const rows = entries.map((e) => this.formatEntry(e));

    return [header, separator, ...rows].join('\n');
  }
}
