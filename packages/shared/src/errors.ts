export type PinrelayErrorCode =
  | 'VALIDATION'
  | 'CONNECTIVITY'
  | 'RPC_RESPONSE'
  | 'GAS_ESTIMATION'
  | 'BROADCAST'
  | 'CONFIRMATION_TIMEOUT'
  | 'NOT_FOUND'
  | 'AUDIT_STORE';

export class PinrelayError extends Error {
  public readonly code: PinrelayErrorCode;
  public override readonly cause?: unknown;

  constructor(input: { code: PinrelayErrorCode; message: string; cause?: unknown }) {
    super(input.message);
    this.name = 'PinrelayError';
    this.code = input.code;
    this.cause = input.cause;
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message };
  }
}

/** Empty or malformed input, rejected before any network call. */
export class ValidationError extends PinrelayError {
  constructor(message: string) {
    super({ code: 'VALIDATION', message });
    this.name = 'ValidationError';
  }
}

export class ConnectivityError extends PinrelayError {
  public readonly endpointsTried: number;
  public readonly attempts: number;

  constructor(input: { endpointsTried: number; attempts: number; lastError?: unknown }) {
    super({
      code: 'CONNECTIVITY',
      message: `rpc_unreachable: ${input.endpointsTried} endpoints failed after ${input.attempts} attempts (${describeError(input.lastError)})`,
      cause: input.lastError,
    });
    this.name = 'ConnectivityError';
    this.endpointsTried = input.endpointsTried;
    this.attempts = input.attempts;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), endpointsTried: this.endpointsTried, attempts: this.attempts };
  }
}

/** The endpoint answered, but with a JSON-RPC error object. */
export class RpcResponseError extends PinrelayError {
  public readonly rpcCode: number;
  public readonly data?: unknown;

  constructor(input: { method: string; rpcCode: number; message: string; data?: unknown }) {
    super({ code: 'RPC_RESPONSE', message: `${input.method}: ${input.message}` });
    this.name = 'RpcResponseError';
    this.rpcCode = input.rpcCode;
    this.data = input.data;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), rpcCode: this.rpcCode };
  }
}

export class GasEstimationError extends PinrelayError {
  constructor(message: string, cause?: unknown) {
    super({ code: 'GAS_ESTIMATION', message, cause });
    this.name = 'GasEstimationError';
  }
}

export class BroadcastError extends PinrelayError {
  /** Hash of the signed payload, computed locally before sending. */
  public readonly hash: string;

  constructor(input: { hash: string; message: string; cause?: unknown }) {
    super({ code: 'BROADCAST', message: input.message, cause: input.cause });
    this.name = 'BroadcastError';
    this.hash = input.hash;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), hash: this.hash };
  }
}

/**
 * No receipt arrived within the bound. The transaction may still land:
 * re-query by hash, never resubmit.
 */
export class ConfirmationTimeoutError extends PinrelayError {
  public readonly hash: string;
  public readonly timeoutMs: number;

  constructor(input: { hash: string; timeoutMs: number; cause?: unknown }) {
    super({
      code: 'CONFIRMATION_TIMEOUT',
      message: `receipt_timeout: ${input.hash} not confirmed within ${input.timeoutMs}ms`,
      cause: input.cause,
    });
    this.name = 'ConfirmationTimeoutError';
    this.hash = input.hash;
    this.timeoutMs = input.timeoutMs;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), hash: this.hash, timeoutMs: this.timeoutMs };
  }
}

export class NotFoundError extends PinrelayError {
  constructor(message: string) {
    super({ code: 'NOT_FOUND', message });
    this.name = 'NotFoundError';
  }
}

export class AuditStoreError extends PinrelayError {
  constructor(message: string, cause?: unknown) {
    super({ code: 'AUDIT_STORE', message, cause });
    this.name = 'AuditStoreError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (err === undefined) return 'unknown_error';
  return String(err);
}

export function isPinrelayError(err: unknown): err is PinrelayError {
  return err instanceof PinrelayError;
}

/** ENOENT from node:fs. */
export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
