import { describe, expect, it, vi } from 'vitest';

import { ConnectivityError, RpcResponseError } from '@pinrelay/shared';

import { RpcClient } from '../src/rpcClient';
import type { FetchFn } from '../src/types';

const A = 'https://rpc-a.example';
const B = 'https://rpc-b.example';
const C = 'https://rpc-c.example';

type Handler = (method: string, params: unknown[]) => Response | Promise<Response>;

function timeoutError(): Error {
  const err = new Error('The operation was aborted due to timeout');
  err.name = 'TimeoutError';
  return err;
}

function rpcResult(result: unknown): Response {
  return new Response(JSON.stringify({ jsonrpc: '2.0', id: 1, result }), { status: 200 });
}

function rpcError(code: number, message: string): Response {
  return new Response(JSON.stringify({ jsonrpc: '2.0', id: 1, error: { code, message } }), { status: 200 });
}

function down(): Handler {
  return () => {
    throw timeoutError();
  };
}

function makeFetch(routes: Record<string, Handler>) {
  const calls: Array<{ url: string; method: string }> = [];
  const fetch = vi.fn<FetchFn>(async (url, init) => {
    const body: unknown = JSON.parse(String(init.body));
    const method = typeof body === 'object' && body !== null && 'method' in body ? String(body.method) : '';
    const params = typeof body === 'object' && body !== null && 'params' in body && Array.isArray(body.params) ? body.params : [];
    calls.push({ url, method });
    const handler = routes[url];
    if (!handler) throw new TypeError(`fetch failed: ${url}`);
    return handler(method, params);
  });
  return { fetch, calls };
}

function makeClient(routes: Record<string, Handler>, extra: { exclusive?: boolean; maxAttempts?: number } = {}) {
  const { fetch, calls } = makeFetch(routes);
  const sleep = vi.fn(async (_ms: number) => {});
  const client = new RpcClient({
    endpoints: [A, B, C],
    policy: { maxAttempts: extra.maxAttempts ?? 2, delayMs: 10 },
    failoverDelayMs: 250,
    timeoutMs: 1_000,
    fetch,
    sleep,
    ...(extra.exclusive !== undefined ? { exclusive: extra.exclusive } : {}),
  });
  return { client, fetch, calls, sleep };
}

describe('RpcClient.request', () => {
  it('fails over past timing-out endpoints and pins the one that answered', async () => {
    const { client, calls, sleep } = makeClient({
      [A]: down(),
      [B]: down(),
      [C]: () => rpcResult('0x10'),
    });

    await expect(client.request('eth_blockNumber')).resolves.toBe('0x10');
    expect(calls.map((c) => c.url)).toEqual([A, A, B, B, C]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 250, 10, 250]);
    expect(client.pool.currentIndex).toBe(2);

    await client.request('eth_blockNumber');
    expect(calls[5]?.url).toBe(C);
    expect(calls).toHaveLength(6);
  });

  it('raises ConnectivityError with endpoint and attempt counts when all endpoints fail', async () => {
    const { client } = makeClient({ [A]: down(), [B]: down(), [C]: down() });

    const error = await client.request('eth_chainId').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectivityError);
    if (!(error instanceof ConnectivityError)) return;
    expect(error.endpointsTried).toBe(3);
    expect(error.attempts).toBe(6);
    expect(error.code).toBe('CONNECTIVITY');
  });

  it('restores the sticky pointer after total failure', async () => {
    const { client } = makeClient({ [A]: down(), [B]: down(), [C]: down() });
    client.pool.pin(1);

    await expect(client.request('eth_chainId')).rejects.toBeInstanceOf(ConnectivityError);
    expect(client.pool.currentIndex).toBe(1);
  });

  it('retries a 429 on the same endpoint with linear backoff', async () => {
    let hits = 0;
    const { client, calls, sleep } = makeClient(
      {
        [A]: () => {
          hits += 1;
          return hits < 3 ? new Response('slow down', { status: 429 }) : rpcResult('0x1');
        },
      },
      { maxAttempts: 3 },
    );

    await expect(client.request('eth_chainId')).resolves.toBe('0x1');
    expect(calls.map((c) => c.url)).toEqual([A, A, A]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
    expect(client.pool.currentIndex).toBe(0);
  });

  it('fails over immediately on a non-429 HTTP error', async () => {
    const { client, calls } = makeClient({
      [A]: () => new Response('bad gateway', { status: 502 }),
      [B]: () => rpcResult('0x2'),
    });

    await expect(client.request('eth_chainId')).resolves.toBe('0x2');
    expect(calls.map((c) => c.url)).toEqual([A, B]);
    expect(client.pool.currentIndex).toBe(1);
  });

  it('treats a malformed body as terminal for the endpoint', async () => {
    const { client, calls } = makeClient({
      [A]: () => new Response('<html>', { status: 200 }),
      [B]: () => rpcResult('0x3'),
    });

    await expect(client.request('eth_chainId')).resolves.toBe('0x3');
    expect(calls.map((c) => c.url)).toEqual([A, B]);
  });

  it('surfaces a JSON-RPC error without failing over', async () => {
    const { client, calls } = makeClient({
      [A]: () => rpcError(-32000, 'execution reverted'),
      [B]: () => rpcResult('0x1'),
    });

    const error = await client.request('eth_estimateGas', [{}]).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RpcResponseError);
    if (!(error instanceof RpcResponseError)) return;
    expect(error.rpcCode).toBe(-32000);
    expect(error.message).toBe('eth_estimateGas: execution reverted');
    expect(calls.map((c) => c.url)).toEqual([A]);
  });

  it('honours failover: false and a per-request policy', async () => {
    const { client, calls } = makeClient({ [A]: down(), [B]: () => rpcResult('0x1') });

    const error = await client
      .request('eth_sendRawTransaction', ['0xdead'], { failover: false, policy: { maxAttempts: 1, delayMs: 0 } })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectivityError);
    if (!(error instanceof ConnectivityError)) return;
    expect(error.endpointsTried).toBe(1);
    expect(error.attempts).toBe(1);
    expect(calls.map((c) => c.url)).toEqual([A]);
  });

  it('serialises concurrent requests when exclusive', async () => {
    let inFlight = 0;
    let peak = 0;
    const slow: Handler = async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
      return rpcResult('0x1');
    };

    const shared = makeClient({ [A]: slow });
    await Promise.all([shared.client.request('eth_chainId'), shared.client.request('eth_chainId')]);
    expect(peak).toBe(2);

    peak = 0;
    const exclusive = makeClient({ [A]: slow }, { exclusive: true });
    await Promise.all([exclusive.client.request('eth_chainId'), exclusive.client.request('eth_chainId')]);
    expect(peak).toBe(1);
  });

  it('records endpoint health for status reporting', async () => {
    const { client } = makeClient({ [A]: down(), [B]: () => rpcResult('0x1') }, { maxAttempts: 1 });
    await client.request('eth_chainId');

    const status = client.getStatus();
    expect(status.currentIndex).toBe(1);
    expect(status.currentUrl).toBe(B);
    expect(status.endpoints[0]).toMatchObject({ url: A, failures: 1, observations: 1 });
    expect(status.endpoints[1]).toMatchObject({ url: B, failures: 0, observations: 1 });
  });
});

describe('RpcClient.testConnectivity', () => {
  it('returns true when the probe succeeds', async () => {
    const { client, calls } = makeClient({ [A]: () => rpcResult('0x99') });
    await expect(client.testConnectivity()).resolves.toBe(true);
    expect(calls[0]?.method).toBe('eth_blockNumber');
  });

  it('returns false instead of throwing when every endpoint fails', async () => {
    const { client } = makeClient({ [A]: down(), [B]: down(), [C]: down() });
    await expect(client.testConnectivity()).resolves.toBe(false);
  });

  it('returns false on a JSON-RPC error', async () => {
    const { client } = makeClient({ [A]: () => rpcError(-32601, 'method not found') });
    await expect(client.testConnectivity()).resolves.toBe(false);
  });
});

describe('RpcClient EVM helpers', () => {
  it('decodes hex quantities', async () => {
    const { client, calls } = makeClient({
      [A]: (method) => {
        switch (method) {
          case 'eth_chainId':
            return rpcResult('0x66eee');
          case 'eth_getBalance':
            return rpcResult('0xde0b6b3a7640000');
          case 'eth_getTransactionCount':
            return rpcResult('0x7');
          default:
            return rpcResult('0x5208');
        }
      },
    });

    await expect(client.chainId()).resolves.toBe(421614);
    await expect(client.getBalance('0x0000000000000000000000000000000000000001')).resolves.toBe(10n ** 18n);
    await expect(client.getTransactionCount('0x0000000000000000000000000000000000000001')).resolves.toBe(7);
    await expect(client.estimateGas({ to: '0x0000000000000000000000000000000000000002' })).resolves.toBe(21000n);
    expect(calls.map((c) => c.method)).toEqual(['eth_chainId', 'eth_getBalance', 'eth_getTransactionCount', 'eth_estimateGas']);
  });

  it('runs eth_call against a block tag and returns the raw data', async () => {
    const seen: unknown[][] = [];
    const { client } = makeClient({
      [A]: (_method, params) => {
        seen.push(params);
        return rpcResult('0x000000000000000000000000000000000000000000000000000000000000002a');
      },
    });
    const tx = { to: '0x0000000000000000000000000000000000000002', data: '0x06fdde03' } as const;

    await expect(client.call(tx)).resolves.toBe('0x000000000000000000000000000000000000000000000000000000000000002a');
    await client.call(tx, 'pending');
    expect(seen).toEqual([
      [tx, 'latest'],
      [tx, 'pending'],
    ]);
  });

  it('rejects a non-hex result', async () => {
    const { client } = makeClient({ [A]: () => rpcResult('not-hex') });
    await expect(client.gasPrice()).rejects.toBeInstanceOf(RpcResponseError);
  });

  it('parses a receipt and returns null while pending', async () => {
    const hash = `0x${'ab'.repeat(32)}` as const;
    let pending = true;
    const { client } = makeClient({
      [A]: () =>
        pending
          ? rpcResult(null)
          : rpcResult({
              transactionHash: hash,
              blockNumber: '0x10',
              gasUsed: '0x5208',
              status: '0x0',
              from: '0x0000000000000000000000000000000000000001',
              to: '0x0000000000000000000000000000000000000002',
            }),
    });

    await expect(client.getTransactionReceipt(hash)).resolves.toBeNull();
    pending = false;
    await expect(client.getTransactionReceipt(hash)).resolves.toEqual({
      transactionHash: hash,
      blockNumber: 16n,
      gasUsed: 21000n,
      status: 0,
      from: '0x0000000000000000000000000000000000000001',
      to: '0x0000000000000000000000000000000000000002',
    });
  });
});
