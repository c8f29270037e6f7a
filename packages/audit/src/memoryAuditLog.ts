import { ValidationError } from '@pinrelay/shared';

import { aggregateEntries, filterEntries, toEntry } from './query';
import type { AuditEntry, AuditEntryInput, AuditLog, AuditQuery, AuditStats } from './types';

export function assertKeepCount(keepLastN: number): void {
  if (!Number.isInteger(keepLastN) || keepLastN < 0) {
    throw new ValidationError(`invalid_keep_count: ${keepLastN}`);
  }
}

export class MemoryAuditLog implements AuditLog {
  private entries: AuditEntry[] = [];
  private nextSequence = 1;

  constructor(private readonly options: { now?: () => Date } = {}) {}

  async append(entry: AuditEntryInput): Promise<number> {
    const sequence = this.nextSequence++;
    this.entries.push(toEntry(entry, sequence, this.options.now?.() ?? new Date()));
    return sequence;
  }

  async query(filters?: AuditQuery): Promise<AuditEntry[]> {
    return filterEntries(this.entries, filters).map((e) => structuredClone(e));
  }

  async aggregate(): Promise<AuditStats> {
    return aggregateEntries(this.entries);
  }

  async trim(keepLastN: number): Promise<number> {
    assertKeepCount(keepLastN);
    const removed = Math.max(0, this.entries.length - keepLastN);
    this.entries = this.entries.slice(removed);
    return removed;
  }

  async trimOlderThan(cutoff: Date): Promise<number> {
    const before = this.entries.length;
    const cutoffMs = cutoff.getTime();
    this.entries = this.entries.filter((e) => Date.parse(e.timestamp) >= cutoffMs);
    return before - this.entries.length;
  }
}
