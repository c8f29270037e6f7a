import { RpcResponseError, type AttemptOutcome } from '@pinrelay/shared';

import type { FetchFn, JsonRpcRequest, JsonRpcResponse } from './types';

/** HTTP-level failure from an endpoint (anything but a 2xx or a 429). */
export class RpcHttpError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number,
  ) {
    super(`http_${status}`);
    this.name = 'RpcHttpError';
  }
}

export class RpcTransportError extends Error {
  public readonly reason: 'timeout' | 'network' | 'rate_limited' | 'malformed';

  constructor(reason: RpcTransportError['reason'], message: string, options?: { cause?: unknown }) {
    super(`${reason}: ${message}`, options);
    this.name = 'RpcTransportError';
    this.reason = reason;
  }
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

// Result shape is method-specific; typed helpers on RpcClient validate it.
function isRpcEnvelope<T>(value: unknown): value is JsonRpcResponse<T> {
  if (typeof value !== 'object' || value === null) return false;
  return 'result' in value || 'error' in value;
}

/**
 * Sends one JSON-RPC request to one endpoint and classifies what happened.
 *
 * - timeout / connection failure / 429: retryable on the same endpoint
 * - other HTTP status, unparseable body: terminal for this endpoint
 * - JSON-RPC `error` object: terminal, carried as RpcResponseError so the
 *   caller can stop without failing over
 */
export async function postJsonRpc<T>(params: {
  url: string;
  body: JsonRpcRequest;
  timeoutMs: number;
  fetch: FetchFn;
}): Promise<AttemptOutcome<T>> {
  let res: Response;
  try {
    res = await params.fetch(params.url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(params.body),
      signal: AbortSignal.timeout(params.timeoutMs),
    });
  } catch (err) {
    const reason = isTimeout(err) ? 'timeout' : 'network';
    const message = err instanceof Error ? err.message : String(err);
    return { kind: 'retryable', error: new RpcTransportError(reason, message, { cause: err }) };
  }

  if (res.status === 429) {
    return {
      kind: 'retryable',
      error: new RpcTransportError('rate_limited', params.url),
      backoff: 'linear',
    };
  }

  if (!res.ok) {
    return { kind: 'terminal', error: new RpcHttpError(params.url, res.status) };
  }

  let json: unknown;
  try {
    json = await res.json();
  } catch (err) {
    if (isTimeout(err)) {
      return { kind: 'retryable', error: new RpcTransportError('timeout', 'body read timed out', { cause: err }) };
    }
    return { kind: 'terminal', error: new RpcTransportError('malformed', 'response body is not JSON', { cause: err }) };
  }

  if (!isRpcEnvelope<T>(json)) {
    return { kind: 'terminal', error: new RpcTransportError('malformed', 'missing result and error') };
  }

  if ('error' in json) {
    return {
      kind: 'terminal',
      error: new RpcResponseError({
        method: params.body.method,
        rpcCode: json.error.code,
        message: json.error.message,
        data: json.error.data,
      }),
    };
  }

  return { kind: 'success', value: json.result };
}
