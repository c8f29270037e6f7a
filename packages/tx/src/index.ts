export * from './types';
export { ANCHOR_ABI, anchorCall } from './anchor';
export { TransactionPipeline, type TransactionPipelineOptions } from './transactionPipeline';
