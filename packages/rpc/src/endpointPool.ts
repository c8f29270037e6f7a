import { ValidationError } from '@pinrelay/shared';

import type { Endpoint, EndpointConfig, EndpointHealth } from './types';

type EndpointStats = {
  // EWMA in [0..1]
  ewmaSuccess: number;
  // EWMA latency in ms, null until the first success
  ewmaLatencyMs: number | null;
  n: number;
  failures: number;
  lastError: string | null;
  lastUpdatedAt: number | null;
};

function toEndpoint(input: string | EndpointConfig, position: number): Endpoint {
  const config = typeof input === 'string' ? { url: input } : input;
  const url = config.url.trim();
  if (!/^https?:\/\//i.test(url)) {
    throw new ValidationError(`invalid_endpoint_url: ${config.url}`);
  }
  return Object.freeze({
    url,
    priority: config.priority ?? position,
    ...(config.latencyMs !== undefined ? { latencyMs: config.latencyMs } : {}),
  });
}

function compareEndpoints(a: { endpoint: Endpoint; position: number }, b: { endpoint: Endpoint; position: number }): number {
  if (a.endpoint.priority !== b.endpoint.priority) return a.endpoint.priority - b.endpoint.priority;
  const la = a.endpoint.latencyMs ?? Number.POSITIVE_INFINITY;
  const lb = b.endpoint.latencyMs ?? Number.POSITIVE_INFINITY;
  if (la !== lb) return la < lb ? -1 : 1;
  return a.position - b.position;
}

/**
 * Ordered, immutable set of JSON-RPC endpoints plus the sticky "current"
 * pointer that RpcClient moves on failover.
 *
 * Order is fixed at construction. Health figures are observational only
 * and never reorder the pool.
 */
export class EndpointPool {
  private readonly endpoints: readonly Endpoint[];
  private readonly stats: EndpointStats[];
  private index = 0;

  constructor(
    configs: ReadonlyArray<string | EndpointConfig>,
    private readonly params: { alpha?: number } = {},
  ) {
    if (configs.length === 0) {
      throw new ValidationError('endpoint_pool_empty');
    }

    this.endpoints = Object.freeze(
      configs
        .map((config, position) => ({ endpoint: toEndpoint(config, position), position }))
        .sort(compareEndpoints)
        .map((e) => e.endpoint),
    );

    this.stats = this.endpoints.map(() => ({
      ewmaSuccess: 1,
      ewmaLatencyMs: null,
      n: 0,
      failures: 0,
      lastError: null,
      lastUpdatedAt: null,
    }));
  }

  get size(): number {
    return this.endpoints.length;
  }

  get currentIndex(): number {
    return this.index;
  }

  list(): readonly Endpoint[] {
    return this.endpoints;
  }

  at(index: number): Endpoint {
    const endpoint = this.endpoints[index];
    if (!endpoint) {
      throw new RangeError(`endpoint_index_out_of_range: ${index}`);
    }
    return endpoint;
  }

  current(): Endpoint {
    return this.at(this.index);
  }

  /** Moves the pointer to the next endpoint, wrapping at the end. */
  advance(): number {
    this.index = (this.index + 1) % this.endpoints.length;
    return this.index;
  }

  pin(index: number): void {
    this.at(index);
    this.index = index;
  }

  /** Every index once, starting at `start` and wrapping. */
  orderFrom(start: number): number[] {
    this.at(start);
    return this.endpoints.map((_, offset) => (start + offset) % this.endpoints.length);
  }

  rotation(): number[] {
    return this.orderFrom(this.index);
  }

  recordSuccess(index: number, latencyMs: number): void {
    const s = this.statsAt(index);
    const alpha = this.params.alpha ?? 0.2;
    s.n += 1;
    s.ewmaSuccess = alpha * 1 + (1 - alpha) * s.ewmaSuccess;
    const latency = Math.max(0, latencyMs);
    s.ewmaLatencyMs = s.ewmaLatencyMs === null ? latency : alpha * latency + (1 - alpha) * s.ewmaLatencyMs;
    s.lastUpdatedAt = Date.now();
  }

  recordFailure(index: number, error: string): void {
    const s = this.statsAt(index);
    const alpha = this.params.alpha ?? 0.2;
    s.n += 1;
    s.failures += 1;
    s.ewmaSuccess = (1 - alpha) * s.ewmaSuccess;
    s.lastError = error;
    s.lastUpdatedAt = Date.now();
  }

  getHealth(): EndpointHealth[] {
    return this.endpoints.map((endpoint, index) => {
      const s = this.statsAt(index);
      return {
        url: endpoint.url,
        index,
        successRate: Math.round(s.ewmaSuccess * 100),
        latencyMs: s.ewmaLatencyMs === null ? null : Math.round(s.ewmaLatencyMs),
        observations: s.n,
        failures: s.failures,
        lastError: s.lastError,
        lastUpdatedAt: s.lastUpdatedAt,
      };
    });
  }

  private statsAt(index: number): EndpointStats {
    const s = this.stats[index];
    if (!s) {
      throw new RangeError(`endpoint_index_out_of_range: ${index}`);
    }
    return s;
  }
}
