import { hexToBigInt, hexToNumber, isHex } from 'viem';

import {
  ConnectivityError,
  DEFAULT_RETRY_POLICY,
  Mutex,
  RpcResponseError,
  describeError,
  getLogger,
  logRpcFailover,
  runWithPolicy,
  sleep,
  type AppLogger,
  type AttemptOutcome,
  type RetryPolicy,
  type Sleep,
} from '@pinrelay/shared';

import { EndpointPool } from './endpointPool';
import { postJsonRpc } from './transport';
import type {
  BlockTag,
  EndpointConfig,
  EndpointHealth,
  FetchFn,
  HexString,
  RpcTxRequest,
  TransactionReceipt,
} from './types';

export type RpcClientOptions = {
  endpoints: ReadonlyArray<string | EndpointConfig> | EndpointPool;
  /** Per-endpoint attempts and the fixed delay between them. */
  policy?: RetryPolicy;
  timeoutMs?: number;
  /** Pause before moving to the next endpoint. */
  failoverDelayMs?: number;
  /** Read-only method used by testConnectivity(). */
  probeMethod?: string;
  /** Serialise concurrent request() calls on this instance. */
  exclusive?: boolean;
  fetch?: FetchFn;
  sleep?: Sleep;
  logger?: AppLogger;
};

export type RequestOptions = {
  policy?: RetryPolicy;
  /** false = only the current endpoint is tried. */
  failover?: boolean;
  timeoutMs?: number;
};

export type RpcClientStatus = {
  currentIndex: number;
  currentUrl: string;
  endpoints: EndpointHealth[];
};

function expectHex(method: string, value: unknown): HexString {
  if (!isHex(value)) {
    throw new RpcResponseError({ method, rpcCode: -32603, message: `unexpected_result: ${JSON.stringify(value)}` });
  }
  return value;
}

function optionalHex(value: unknown): HexString | null {
  return isHex(value) ? value : null;
}

/**
 * JSON-RPC client over an ordered endpoint pool.
 *
 * Keeps a sticky current endpoint across calls: a successful call pins the
 * pointer to the endpoint that answered. Instances are meant for a single
 * logical caller; pass `exclusive: true` when one must be shared.
 */
export class RpcClient {
  private static nextId = 1;

  readonly pool: EndpointPool;
  private readonly policy: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly failoverDelayMs: number;
  private readonly probeMethod: string;
  private readonly mutex: Mutex | null;
  private readonly log: AppLogger;

  constructor(private readonly options: RpcClientOptions) {
    this.pool = options.endpoints instanceof EndpointPool ? options.endpoints : new EndpointPool(options.endpoints);
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.timeoutMs = options.timeoutMs ?? 45_000;
    this.failoverDelayMs = options.failoverDelayMs ?? 1_000;
    this.probeMethod = options.probeMethod ?? 'eth_blockNumber';
    this.mutex = options.exclusive ? new Mutex() : null;
    this.log = (options.logger ?? getLogger()).child({ component: 'rpc' });
  }

  async request<T = unknown>(method: string, params: unknown[] = [], options: RequestOptions = {}): Promise<T> {
    if (this.mutex) {
      return this.mutex.runExclusive(() => this.execute<T>(method, params, options));
    }
    return this.execute<T>(method, params, options);
  }

  /** Probe with a read-only method; never throws. */
  async testConnectivity(): Promise<boolean> {
    try {
      await this.request(this.probeMethod, []);
      return true;
    } catch (err) {
      this.log.warn({ event: 'rpc_probe_failed', error: describeError(err) }, 'RPC connectivity probe failed');
      return false;
    }
  }

  getStatus(): RpcClientStatus {
    return {
      currentIndex: this.pool.currentIndex,
      currentUrl: this.pool.current().url,
      endpoints: this.pool.getHealth(),
    };
  }

  private async execute<T>(method: string, params: unknown[], options: RequestOptions): Promise<T> {
    const policy = options.policy ?? this.policy;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const wait = this.options.sleep ?? sleep;

    const startIndex = this.pool.currentIndex;
    const order = options.failover === false ? [startIndex] : this.pool.rotation();

    let totalAttempts = 0;
    let lastError: unknown;

    for (const [position, index] of order.entries()) {
      const result = await runWithPolicy<T>(
        policy,
        () => this.attempt<T>(index, method, params, timeoutMs),
        { sleep: wait },
      );
      totalAttempts += result.attempts;

      if (result.kind === 'success') {
        this.pool.pin(index);
        return result.value;
      }

      // The endpoint answered; another endpoint would give the same answer.
      if (result.error instanceof RpcResponseError) {
        throw result.error;
      }

      lastError = result.error;
      const next = order[position + 1];
      if (next !== undefined) {
        logRpcFailover(this.log, {
          method,
          fromUrl: this.pool.at(index).url,
          toUrl: this.pool.at(next).url,
          attempts: result.attempts,
          reason: describeError(result.error),
        });
        await wait(this.failoverDelayMs);
      }
    }

    this.pool.pin(startIndex);
    throw new ConnectivityError({ endpointsTried: order.length, attempts: totalAttempts, lastError });
  }

  private async attempt<T>(index: number, method: string, params: unknown[], timeoutMs: number): Promise<AttemptOutcome<T>> {
    const endpoint = this.pool.at(index);
    const started = Date.now();
    const outcome = await postJsonRpc<T>({
      url: endpoint.url,
      body: { jsonrpc: '2.0', id: RpcClient.nextId++, method, params },
      timeoutMs,
      fetch: this.options.fetch ?? fetch,
    });

    if (outcome.kind === 'success' || outcome.error instanceof RpcResponseError) {
      this.pool.recordSuccess(index, Date.now() - started);
    } else {
      this.pool.recordFailure(index, describeError(outcome.error));
      this.log.debug({ event: 'rpc_attempt_failed', url: endpoint.url, method, error: describeError(outcome.error) }, 'RPC attempt failed');
    }
    return outcome;
  }

  // ============ EVM helpers ============

  async chainId(): Promise<number> {
    return hexToNumber(expectHex('eth_chainId', await this.request('eth_chainId')));
  }

  async blockNumber(): Promise<bigint> {
    return hexToBigInt(expectHex('eth_blockNumber', await this.request('eth_blockNumber')));
  }

  async getBalance(address: string, block: BlockTag = 'latest'): Promise<bigint> {
    return hexToBigInt(expectHex('eth_getBalance', await this.request('eth_getBalance', [address, block])));
  }

  async getTransactionCount(address: string, block: BlockTag = 'pending'): Promise<number> {
    return hexToNumber(expectHex('eth_getTransactionCount', await this.request('eth_getTransactionCount', [address, block])));
  }

  async estimateGas(tx: RpcTxRequest): Promise<bigint> {
    return hexToBigInt(expectHex('eth_estimateGas', await this.request('eth_estimateGas', [tx])));
  }

  async gasPrice(): Promise<bigint> {
    return hexToBigInt(expectHex('eth_gasPrice', await this.request('eth_gasPrice')));
  }

  async call(tx: RpcTxRequest, block: BlockTag = 'latest'): Promise<HexString> {
    return expectHex('eth_call', await this.request('eth_call', [tx, block]));
  }

  async sendRawTransaction(raw: HexString, options?: RequestOptions): Promise<HexString> {
    return expectHex('eth_sendRawTransaction', await this.request('eth_sendRawTransaction', [raw], options));
  }

  /** Null while the transaction is unknown or still pending. */
  async getTransactionReceipt(hash: HexString, options?: RequestOptions): Promise<TransactionReceipt | null> {
    const raw = await this.request<unknown>('eth_getTransactionReceipt', [hash], options);
    if (raw === null || typeof raw !== 'object') return null;

    const fields = new Map(Object.entries(raw));
    const blockNumber = optionalHex(fields.get('blockNumber'));
    if (blockNumber === null) return null;

    const status = optionalHex(fields.get('status'));
    if (status !== '0x0' && status !== '0x1') {
      throw new RpcResponseError({
        method: 'eth_getTransactionReceipt',
        rpcCode: -32603,
        message: `unexpected_receipt_status: ${String(fields.get('status'))}`,
      });
    }

    const from = fields.get('from');
    const to = fields.get('to');
    return {
      transactionHash: optionalHex(fields.get('transactionHash')) ?? hash,
      blockNumber: hexToBigInt(blockNumber),
      gasUsed: hexToBigInt(expectHex('eth_getTransactionReceipt', fields.get('gasUsed'))),
      status: status === '0x1' ? 1 : 0,
      from: typeof from === 'string' ? from : null,
      to: typeof to === 'string' ? to : null,
    };
  }
}
