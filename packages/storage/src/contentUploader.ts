import type { AuditLog } from '@pinrelay/audit';
import {
  NotFoundError,
  ValidationError,
  describeError,
  getLogger,
  logError,
  logUploadAttempt,
  runWithPolicy,
  sha256Hex,
  sleep,
  type AppLogger,
  type AttemptOutcome,
  type RetryPolicy,
  type Sleep,
} from '@pinrelay/shared';

import { isLocalContentId, isValidContentId, localContentId } from './contentId';
import { StorageBackendError, mapUnknownError } from './errors';
import { LocalContentCache } from './localCache';
import type {
  BackendUploadResult,
  FetchLike,
  StorageBackend,
  UploadAttempt,
  UploadInput,
  UploadResult,
} from './types';

export const DEFAULT_GATEWAYS = [
  'https://ipfs.io/ipfs/',
  'https://gateway.pinata.cloud/ipfs/',
  'https://cloudflare-ipfs.com/ipfs/',
  'https://dweb.link/ipfs/',
];

export type ContentUploaderOptions = {
  /** Tried in this order. */
  backends: StorageBackend[];
  cache: LocalContentCache | string;
  gateways?: string[];
  uploadTimeoutMs?: number;
  gatewayTimeoutMs?: number;
  maxBytes?: number;
  /** Per-backend attempts; one by default. */
  policy?: RetryPolicy;
  audit?: AuditLog | null;
  fetch?: FetchLike;
  sleep?: Sleep;
  logger?: AppLogger;
};

export type StorageStatus = {
  backends: Array<{ name: string; enabled: boolean }>;
  enabledBackends: number;
  gateways: string[];
  cacheDir: string;
};

type BackendOutcome =
  | { kind: 'success'; result: BackendUploadResult; durationMs: number }
  | { kind: 'failure'; error: unknown; durationMs: number };

function trimSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Uploads through an ordered chain of storage backends with a local
 * content-addressed fallback, and reads content back from the cache or from
 * public gateways.
 *
 * upload() never fails for valid input: when every backend is disabled or
 * fails, the bytes are cached locally under a hash-derived id.
 */
export class ContentUploader {
  readonly cache: LocalContentCache;
  private readonly gateways: string[];
  private readonly uploadTimeoutMs: number;
  private readonly gatewayTimeoutMs: number;
  private readonly maxBytes: number;
  private readonly policy: RetryPolicy;
  private readonly log: AppLogger;

  constructor(private readonly options: ContentUploaderOptions) {
    this.cache = typeof options.cache === 'string' ? new LocalContentCache(options.cache) : options.cache;
    this.gateways = (options.gateways ?? DEFAULT_GATEWAYS).map(trimSlashes).filter((g) => g.length > 0);
    this.uploadTimeoutMs = options.uploadTimeoutMs ?? 60_000;
    this.gatewayTimeoutMs = options.gatewayTimeoutMs ?? 30_000;
    this.maxBytes = options.maxBytes ?? 1000 * 1024 * 1024;
    this.policy = options.policy ?? { maxAttempts: 1, delayMs: 0 };
    this.log = (options.logger ?? getLogger()).child({ component: 'storage' });
  }

  async upload(bytes: Uint8Array, name: string, metadata?: Record<string, string>): Promise<UploadResult> {
    if (bytes.byteLength === 0) {
      throw new ValidationError('empty_content: refusing to upload zero bytes');
    }
    if (bytes.byteLength > this.maxBytes) {
      throw new ValidationError(`content_too_large: ${bytes.byteLength} bytes exceeds ${this.maxBytes}`);
    }
    const fileName = name.trim();
    if (fileName.length === 0) {
      throw new ValidationError('empty_name');
    }

    const input: UploadInput = { bytes, name: fileName, contentHash: sha256Hex(bytes), metadata };
    const attempts: UploadAttempt[] = [];

    for (const backend of this.options.backends) {
      if (!backend.isEnabled()) continue;

      const outcome = await this.tryBackend(backend, input);
      const attempt: UploadAttempt = {
        backend: backend.name,
        contentHash: input.contentHash,
        size: bytes.byteLength,
        outcome: outcome.kind,
        durationMs: outcome.durationMs,
        ...(outcome.kind === 'failure' ? { error: describeError(outcome.error) } : {}),
      };
      attempts.push(attempt);
      logUploadAttempt(this.log, { ...attempt, name: fileName, size: bytes.byteLength });

      if (outcome.kind === 'success') {
        const result: UploadResult = {
          contentId: outcome.result.contentId,
          size: bytes.byteLength,
          backend: backend.name,
          attempts,
        };
        await this.audit(input, attempt, result.contentId, null);
        return result;
      }

      await this.audit(input, attempt, null, null, outcome.error);
    }

    return this.uploadLocal(input, attempts);
  }

  /** Pretty-printed JSON stored as `<name>.json`. */
  async uploadJson(value: unknown, name: string, metadata?: Record<string, string>): Promise<UploadResult> {
    // undefined for functions, symbols and undefined itself
    const text: string | undefined = JSON.stringify(value, null, 2);
    if (text === undefined) {
      throw new ValidationError('json_unserialisable');
    }
    const fileName = name.endsWith('.json') ? name : `${name}.json`;
    return this.upload(new TextEncoder().encode(text), fileName, metadata);
  }

  async download(contentId: string): Promise<Uint8Array> {
    if (!isValidContentId(contentId)) {
      throw new ValidationError(`invalid_content_id: ${contentId}`);
    }

    const cached = await this.cache.read(contentId);
    if (cached) {
      this.log.debug({ event: 'content_cache_hit', contentId }, 'Serving content from local cache');
      return cached;
    }

    // Fallback ids exist only here; gateways cannot resolve them.
    if (isLocalContentId(contentId)) {
      throw new NotFoundError(`content_not_found: ${contentId} is not in the local cache`);
    }

    const doFetch = this.options.fetch ?? fetch;
    for (const gateway of this.gateways) {
      const url = `${gateway}/${contentId}`;
      try {
        const res = await doFetch(url, { method: 'GET', signal: AbortSignal.timeout(this.gatewayTimeoutMs) });
        if (res.status === 200) {
          this.log.info({ event: 'content_downloaded', contentId, gateway }, 'Downloaded content from gateway');
          return new Uint8Array(await res.arrayBuffer());
        }
        this.log.debug({ event: 'gateway_miss', gateway, status: res.status }, 'Gateway did not serve content');
      } catch (err) {
        this.log.debug({ event: 'gateway_error', gateway, error: describeError(err) }, 'Gateway request failed');
      }
    }

    throw new NotFoundError(`content_not_found: ${contentId} (${this.gateways.length} gateways tried)`);
  }

  async downloadJson(contentId: string): Promise<unknown> {
    const bytes = await this.download(contentId);
    try {
      return JSON.parse(new TextDecoder().decode(bytes));
    } catch (err) {
      throw new ValidationError(`content_not_json: ${contentId} (${describeError(err)})`);
    }
  }

  ipfsUri(contentId: string): string {
    return `ipfs://${contentId}`;
  }

  gatewayUrl(contentId: string, gateway?: string): string | null {
    const base = gateway ? trimSlashes(gateway) : this.gateways[0];
    return base ? `${base}/${contentId}` : null;
  }

  getStatus(): StorageStatus {
    const backends = this.options.backends.map((b) => ({ name: b.name, enabled: b.isEnabled() }));
    return {
      backends,
      enabledBackends: backends.filter((b) => b.enabled).length,
      gateways: [...this.gateways],
      cacheDir: this.cache.dir,
    };
  }

  private async tryBackend(backend: StorageBackend, input: UploadInput): Promise<BackendOutcome> {
    const started = Date.now();
    const result = await runWithPolicy<BackendUploadResult>(
      this.policy,
      async (): Promise<AttemptOutcome<BackendUploadResult>> => {
        try {
          const value = await backend.upload(input, AbortSignal.timeout(this.uploadTimeoutMs));
          return { kind: 'success', value };
        } catch (err) {
          const error = mapUnknownError(backend.name, err);
          return error.retryable ? { kind: 'retryable', error } : { kind: 'terminal', error };
        }
      },
      { sleep: this.options.sleep ?? sleep },
    );

    const durationMs = Date.now() - started;
    return result.kind === 'success'
      ? { kind: 'success', result: result.value, durationMs }
      : { kind: 'failure', error: result.error, durationMs };
  }

  private async uploadLocal(input: UploadInput, attempts: UploadAttempt[]): Promise<UploadResult> {
    const started = Date.now();
    const contentId = localContentId(input.bytes);
    const cachePath = await this.cache.write(contentId, input.bytes);

    const attempt: UploadAttempt = {
      backend: 'local',
      contentHash: input.contentHash,
      size: input.bytes.byteLength,
      outcome: 'success',
      durationMs: Date.now() - started,
    };
    attempts.push(attempt);
    this.log.warn(
      { event: 'upload_fallback', name: input.name, contentId, cachePath, failedBackends: attempts.length - 1 },
      'No storage backend succeeded; content cached locally',
    );

    await this.audit(input, attempt, contentId, cachePath);
    return { contentId, size: input.bytes.byteLength, cachePath, backend: 'local', attempts };
  }

  private async audit(
    input: UploadInput,
    attempt: UploadAttempt,
    contentId: string | null,
    cachePath: string | null,
    error?: unknown,
  ): Promise<void> {
    if (!this.options.audit) return;
    try {
      await this.appendAudit(this.options.audit, input, attempt, contentId, cachePath, error);
    } catch (auditErr) {
      // The content is already pinned or cached; the upload result stands.
      logError(this.log, auditErr instanceof Error ? auditErr : new Error(describeError(auditErr)), {
        event: 'upload_audit_failed',
        backend: attempt.backend,
        contentId,
      });
    }
  }

  private async appendAudit(
    audit: AuditLog,
    input: UploadInput,
    attempt: UploadAttempt,
    contentId: string | null,
    cachePath: string | null,
    error?: unknown,
  ): Promise<void> {
    await audit.append({
      type: 'upload',
      status: attempt.outcome === 'success' ? 'success' : 'failed',
      payload: {
        name: input.name,
        backend: attempt.backend,
        contentId,
        contentHash: input.contentHash,
        size: attempt.size,
        durationMs: attempt.durationMs,
        ...(cachePath ? { cachePath } : {}),
        ...(input.metadata ? { metadata: input.metadata } : {}),
        ...(error instanceof StorageBackendError ? { errorCode: error.code } : {}),
        ...(attempt.error ? { error: attempt.error } : {}),
      },
    });
  }
}
