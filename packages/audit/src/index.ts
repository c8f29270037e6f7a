export * from './types';
export { aggregateEntries, filterEntries, toCsv } from './query';
export { MemoryAuditLog } from './memoryAuditLog';
export { FileAuditLog } from './fileAuditLog';
