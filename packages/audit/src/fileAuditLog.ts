import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import {
  AuditStoreError,
  describeError,
  getLogger,
  isMissingFileError,
  mutexFor,
  type AppLogger,
  type Mutex,
} from '@pinrelay/shared';

import { assertKeepCount } from './memoryAuditLog';
import { aggregateEntries, filterEntries, toEntry } from './query';
import {
  AUDIT_DOCUMENT_VERSION,
  AuditDocumentSchema,
  type AuditDocument,
  type AuditEntry,
  type AuditEntryInput,
  type AuditLog,
  type AuditQuery,
  type AuditStats,
} from './types';

/**
 * Audit log kept as one pretty-printed JSON document.
 *
 * Every mutation is read-whole-file, change-in-memory, rewrite-whole-file,
 * serialised per path inside this process. Writers in other processes are
 * not coordinated and can lose updates.
 */
export class FileAuditLog implements AuditLog {
  readonly path: string;
  private readonly log: AppLogger;

  constructor(
    path: string,
    private readonly options: { now?: () => Date; logger?: AppLogger } = {},
  ) {
    this.path = resolve(path);
    this.log = (options.logger ?? getLogger()).child({ component: 'audit' });
  }

  private get mutex(): Mutex {
    return mutexFor(this.path);
  }

  private now(): Date {
    return this.options.now?.() ?? new Date();
  }

  async append(entry: AuditEntryInput): Promise<number> {
    return this.mutex.runExclusive(async () => {
      const doc = await this.read();
      const sequence = doc.metadata.nextSequence;
      const record = toEntry(entry, sequence, this.now());
      doc.entries.push(record);
      doc.metadata.nextSequence = sequence + 1;
      await this.write(doc, record.timestamp);
      return sequence;
    });
  }

  async query(filters?: AuditQuery): Promise<AuditEntry[]> {
    const doc = await this.read();
    return filterEntries(doc.entries, filters);
  }

  async aggregate(): Promise<AuditStats> {
    const doc = await this.read();
    return aggregateEntries(doc.entries);
  }

  async trim(keepLastN: number): Promise<number> {
    assertKeepCount(keepLastN);
    return this.mutex.runExclusive(async () => {
      const doc = await this.read();
      const removed = Math.max(0, doc.entries.length - keepLastN);
      if (removed === 0) return 0;
      doc.entries = doc.entries.slice(removed);
      await this.commitTrim(doc, removed);
      return removed;
    });
  }

  async trimOlderThan(cutoff: Date): Promise<number> {
    const cutoffMs = cutoff.getTime();
    return this.mutex.runExclusive(async () => {
      const doc = await this.read();
      const kept = doc.entries.filter((e) => Date.parse(e.timestamp) >= cutoffMs);
      const removed = doc.entries.length - kept.length;
      if (removed === 0) return 0;
      doc.entries = kept;
      await this.commitTrim(doc, removed);
      return removed;
    });
  }

  /** Current document; a missing file reads as an empty one. */
  async read(): Promise<AuditDocument> {
    let raw: string;
    try {
      raw = await readFile(this.path, { encoding: 'utf8' });
    } catch (err) {
      if (isMissingFileError(err)) return this.emptyDocument();
      throw new AuditStoreError(`audit_read_failed: ${describeError(err)}`, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new AuditStoreError(`audit_file_corrupt: ${this.path} is not valid JSON`, err);
    }

    const parsed = AuditDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuditStoreError(`audit_file_corrupt: ${parsed.error.issues[0]?.message ?? 'invalid document'}`, parsed.error);
    }
    return parsed.data;
  }

  private emptyDocument(): AuditDocument {
    const createdAt = this.now().toISOString();
    return {
      metadata: {
        createdAt,
        version: AUDIT_DOCUMENT_VERSION,
        lastUpdated: createdAt,
        totalEntries: 0,
        nextSequence: 1,
      },
      entries: [],
    };
  }

  private async commitTrim(doc: AuditDocument, removed: number): Promise<void> {
    const at = this.now().toISOString();
    doc.metadata.lastTrimmedAt = at;
    await this.write(doc, at);
    this.log.info({ event: 'audit_trimmed', path: this.path, removed, remaining: doc.entries.length }, 'Audit log trimmed');
  }

  // Temp file + rename so readers never observe a half-written document.
  private async write(doc: AuditDocument, lastUpdated: string): Promise<void> {
    doc.metadata.lastUpdated = lastUpdated;
    doc.metadata.totalEntries = doc.entries.length;

    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${process.pid}.tmp`;
    try {
      await writeFile(tmp, `${JSON.stringify(doc, null, 2)}\n`, { encoding: 'utf8' });
      await rename(tmp, this.path);
    } catch (err) {
      throw new AuditStoreError(`audit_write_failed: ${describeError(err)}`, err);
    }
  }
}
