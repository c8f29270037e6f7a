import type { AuditEntry, AuditEntryInput, AuditQuery, AuditStats } from './types';

function entryName(entry: AuditEntry): string {
  return entry.type === 'upload' ? entry.payload.name : entry.payload.functionName;
}

// Transactions carry the content id they anchor in their parameters.
function entryContentId(entry: AuditEntry): string | null {
  return entry.type === 'upload' ? entry.payload.contentId : entry.payload.parameters?.contentId ?? null;
}

function matches(entry: AuditEntry, query: AuditQuery): boolean {
  if (query.type && entry.type !== query.type) return false;
  if (query.status && entry.status !== query.status) return false;
  if (query.contentId && entryContentId(entry) !== query.contentId) return false;

  if (query.txHash) {
    if (entry.type !== 'transaction') return false;
    if ((entry.payload.hash ?? '').toLowerCase() !== query.txHash.toLowerCase()) return false;
  }

  if (query.name && !entryName(entry).toLowerCase().includes(query.name.toLowerCase())) return false;

  const fromMs = query.from?.getTime();
  const toMs = query.to?.getTime();
  if (fromMs !== undefined || toMs !== undefined) {
    const ts = Date.parse(entry.timestamp);
    if (Number.isNaN(ts)) return false;
    if (fromMs !== undefined && ts < fromMs) return false;
    if (toMs !== undefined && ts > toMs) return false;
  }
  return true;
}

/** Entries are stored in sequence order; `limit` keeps the most recent matches. */
export function filterEntries(entries: readonly AuditEntry[], query: AuditQuery = {}): AuditEntry[] {
  let out = entries.filter((entry) => matches(entry, query));
  if (query.limit !== undefined && query.limit >= 0) {
    out = query.limit === 0 ? [] : out.slice(-query.limit);
  }
  return query.order === 'desc' ? out.reverse() : out;
}

/** Full scan; cost grows with the history. */
export function aggregateEntries(entries: readonly AuditEntry[]): AuditStats {
  const stats: AuditStats = {
    totalEntries: entries.length,
    byType: { upload: 0, transaction: 0 },
    byStatus: { success: 0, failed: 0, reverted: 0 },
    totalBytes: 0,
    totalGasUsed: '0',
    firstTimestamp: null,
    lastTimestamp: null,
    successRate: 0,
  };

  let gas = 0n;
  for (const entry of entries) {
    stats.byType[entry.type] += 1;
    stats.byStatus[entry.status] += 1;
    if (entry.type === 'upload' && entry.status === 'success') {
      stats.totalBytes += entry.payload.size;
    }
    if (entry.type === 'transaction' && entry.payload.gasUsed !== null) {
      gas += BigInt(entry.payload.gasUsed);
    }
    if (stats.firstTimestamp === null || entry.timestamp < stats.firstTimestamp) stats.firstTimestamp = entry.timestamp;
    if (stats.lastTimestamp === null || entry.timestamp > stats.lastTimestamp) stats.lastTimestamp = entry.timestamp;
  }

  stats.totalGasUsed = gas.toString();
  stats.successRate = entries.length === 0 ? 0 : Math.round((stats.byStatus.success / entries.length) * 10_000) / 100;
  return stats;
}

export function toEntry(input: AuditEntryInput, sequence: number, now: Date): AuditEntry {
  const timestamp = now.toISOString();
  // Stored entries never share objects with the caller.
  return input.type === 'upload'
    ? { sequence, timestamp, type: 'upload', status: input.status, payload: structuredClone(input.payload) }
    : { sequence, timestamp, type: 'transaction', status: input.status, payload: structuredClone(input.payload) };
}

const CSV_COLUMNS = [
  'sequence',
  'timestamp',
  'type',
  'status',
  'name',
  'backend',
  'contentId',
  'size',
  'txHash',
  'blockNumber',
  'gasUsed',
  'error',
] as const;

function csvCell(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** Flat export: one row per entry, type-specific columns left blank. */
export function toCsv(entries: readonly AuditEntry[]): string {
  const rows = entries.map((entry) => {
    const upload = entry.type === 'upload' ? entry.payload : null;
    const tx = entry.type === 'transaction' ? entry.payload : null;
    return [
      entry.sequence,
      entry.timestamp,
      entry.type,
      entry.status,
      entryName(entry),
      upload?.backend,
      entryContentId(entry),
      upload?.size,
      tx?.hash,
      tx?.blockNumber,
      tx?.gasUsed,
      entry.payload.error,
    ]
      .map(csvCell)
      .join(',');
  });
  return [CSV_COLUMNS.join(','), ...rows].join('\n') + '\n';
}
