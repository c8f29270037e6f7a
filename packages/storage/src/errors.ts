export type StorageBackendErrorCode =
  | 'DISABLED'
  | 'TIMEOUT'
  | 'NETWORK'
  | 'UPSTREAM'
  | 'INVALID_RESPONSE'
  | 'UNKNOWN';

export class StorageBackendError extends Error {
  public readonly code: StorageBackendErrorCode;
  public readonly backend: string;
  public readonly status: number | null;
  public override readonly cause?: unknown;

  constructor(input: { code: StorageBackendErrorCode; backend: string; message: string; status?: number; cause?: unknown }) {
    super(input.message);
    this.name = 'StorageBackendError';
    this.code = input.code;
    this.backend = input.backend;
    this.status = input.status ?? null;
    this.cause = input.cause;
  }

  /** Worth another attempt on the same backend. */
  get retryable(): boolean {
    if (this.code === 'TIMEOUT' || this.code === 'NETWORK') return true;
    return this.code === 'UPSTREAM' && this.status !== null && (this.status === 429 || this.status >= 500);
  }
}

export function mapUnknownError(backend: string, err: unknown): StorageBackendError {
  if (err instanceof StorageBackendError) return err;

  if (err instanceof Error) {
    const message = err.message || 'unknown_error';
    const timedOut = err.name === 'TimeoutError' || err.name === 'AbortError' || message.toLowerCase().includes('timeout');
    // fetch() rejects with a TypeError on connection failures
    const code: StorageBackendErrorCode = timedOut ? 'TIMEOUT' : err instanceof TypeError ? 'NETWORK' : 'UNKNOWN';
    return new StorageBackendError({ code, backend, message, cause: err });
  }

  return new StorageBackendError({ code: 'UNKNOWN', backend, message: 'unknown_error', cause: err });
}
