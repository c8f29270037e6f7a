import { z } from 'zod';

export const AUDIT_DOCUMENT_VERSION = '1.0';

export const AuditEntryTypeSchema = z.enum(['upload', 'transaction']);
export type AuditEntryType = z.infer<typeof AuditEntryTypeSchema>;

export const AuditStatusSchema = z.enum(['success', 'failed', 'reverted']);
export type AuditStatus = z.infer<typeof AuditStatusSchema>;

export const UploadAuditPayloadSchema = z.object({
  name: z.string(),
  backend: z.string(),
  /** null when the attempt failed before an id existed */
  contentId: z.string().nullable(),
  contentHash: z.string(),
  size: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
  cachePath: z.string().nullable().optional(),
  metadata: z.record(z.string()).optional(),
  errorCode: z.string().optional(),
  error: z.string().optional(),
});
export type UploadAuditPayload = z.infer<typeof UploadAuditPayloadSchema>;

// bigint quantities are stored as decimal strings
export const TransactionAuditPayloadSchema = z.object({
  functionName: z.string(),
  parameters: z.record(z.string()).optional(),
  to: z.string(),
  from: z.string().nullable(),
  hash: z.string().nullable(),
  nonce: z.number().int().nonnegative().nullable(),
  gas: z.string().nullable(),
  gasPrice: z.string().nullable(),
  gasUsed: z.string().nullable(),
  blockNumber: z.string().nullable(),
  explorerUrl: z.string().nullable().optional(),
  durationMs: z.number().nonnegative(),
  errorCode: z.string().optional(),
  error: z.string().optional(),
});
export type TransactionAuditPayload = z.infer<typeof TransactionAuditPayloadSchema>;

const EntryBase = {
  sequence: z.number().int().positive(),
  timestamp: z.string(),
  status: AuditStatusSchema,
};

export const AuditEntrySchema = z.discriminatedUnion('type', [
  z.object({ ...EntryBase, type: z.literal('upload'), payload: UploadAuditPayloadSchema }),
  z.object({ ...EntryBase, type: z.literal('transaction'), payload: TransactionAuditPayloadSchema }),
]);
export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export type UploadAuditEntry = Extract<AuditEntry, { type: 'upload' }>;
export type TransactionAuditEntry = Extract<AuditEntry, { type: 'transaction' }>;

/** What callers hand to append(); the log assigns sequence and timestamp. */
export type AuditEntryInput =
  | { type: 'upload'; status: AuditStatus; payload: UploadAuditPayload }
  | { type: 'transaction'; status: AuditStatus; payload: TransactionAuditPayload };

export const AuditDocumentSchema = z.object({
  metadata: z.object({
    createdAt: z.string(),
    version: z.string(),
    lastUpdated: z.string(),
    totalEntries: z.number().int().nonnegative(),
    nextSequence: z.number().int().positive(),
    lastTrimmedAt: z.string().optional(),
  }),
  entries: z.array(AuditEntrySchema),
});
export type AuditDocument = z.infer<typeof AuditDocumentSchema>;

export type AuditQuery = {
  type?: AuditEntryType | undefined;
  status?: AuditStatus | undefined;
  contentId?: string | undefined;
  txHash?: string | undefined;
  /** Case-insensitive substring of the upload name or transaction function name. */
  name?: string | undefined;
  from?: Date | undefined;
  to?: Date | undefined;
  /** Most recent N matches. */
  limit?: number | undefined;
  order?: 'asc' | 'desc' | undefined;
};

export type AuditStats = {
  totalEntries: number;
  byType: Record<AuditEntryType, number>;
  byStatus: Record<AuditStatus, number>;
  /** Bytes of successful uploads. */
  totalBytes: number;
  /** Sum of gasUsed over confirmed transactions, decimal string. */
  totalGasUsed: string;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
  /** Percentage of entries with status success, 0 when empty. */
  successRate: number;
};

export type AuditLog = {
  append(entry: AuditEntryInput): Promise<number>;
  query(filters?: AuditQuery): Promise<AuditEntry[]>;
  aggregate(): Promise<AuditStats>;
  trim(keepLastN: number): Promise<number>;
  trimOlderThan(cutoff: Date): Promise<number>;
};
