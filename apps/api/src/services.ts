import { FileAuditLog, MemoryAuditLog, type AuditLog } from '@pinrelay/audit';
import type { AppConfig } from '@pinrelay/config';
import { RpcClient } from '@pinrelay/rpc';
import type { AppLogger } from '@pinrelay/shared';
import { ContentUploader, createBackends } from '@pinrelay/storage';
import { TransactionPipeline } from '@pinrelay/tx';

export type Services = {
  rpc: RpcClient;
  audit: AuditLog;
  uploader: ContentUploader;
  pipeline: TransactionPipeline;
};

export function createAuditLog(config: AppConfig, logger?: AppLogger): AuditLog {
  return config.audit.type === 'memory'
    ? new MemoryAuditLog()
    : new FileAuditLog(config.audit.path, logger ? { logger } : {});
}

/**
 * Wires the core components from config. Anything passed in `overrides` is
 * used as is, and the components built here share it (e.g. an injected audit
 * log receives upload and transaction entries).
 */
export function createServices(
  config: AppConfig,
  overrides: Partial<Services> = {},
  logger?: AppLogger,
): Services {
  const audit = overrides.audit ?? createAuditLog(config, logger);

  const rpc =
    overrides.rpc ??
    new RpcClient({
      endpoints: config.rpc.urls,
      policy: { maxAttempts: config.rpc.maxRetries, delayMs: config.rpc.retryDelayMs },
      timeoutMs: config.rpc.timeoutMs,
      failoverDelayMs: config.rpc.failoverDelayMs,
      probeMethod: config.rpc.probeMethod,
      // One client serves every HTTP request.
      exclusive: true,
      ...(logger ? { logger } : {}),
    });

  const uploader =
    overrides.uploader ??
    new ContentUploader({
      backends: createBackends(config.storage.backends),
      cache: config.storage.cacheDir,
      gateways: config.storage.gateways,
      uploadTimeoutMs: config.storage.uploadTimeoutMs,
      gatewayTimeoutMs: config.storage.gatewayTimeoutMs,
      maxBytes: config.storage.maxBytes,
      audit,
      ...(logger ? { logger } : {}),
    });

  const pipeline =
    overrides.pipeline ??
    new TransactionPipeline({
      rpc,
      chainId: config.tx.chainId,
      gasMarginPercent: config.tx.gasMarginPercent,
      receiptTimeoutMs: config.tx.receiptTimeoutMs,
      pollIntervalMs: config.tx.receiptPollIntervalMs,
      explorerTxBaseUrl: config.tx.explorerTxBaseUrl,
      audit,
      ...(logger ? { logger } : {}),
    });

  return { rpc, audit, uploader, pipeline };
}
