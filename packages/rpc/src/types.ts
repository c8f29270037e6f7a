export type HexString = `0x${string}`;

export type JsonRpcRequest = {
  jsonrpc: '2.0';
  id: number;
  method: string;
  params: unknown[];
};

export type JsonRpcError = {
  code: number;
  message: string;
  data?: unknown;
};

export type JsonRpcResponse<T> =
  | { jsonrpc: '2.0'; id: number; result: T }
  | { jsonrpc: '2.0'; id: number; error: JsonRpcError };

export type EndpointConfig = {
  url: string;
  /** Lower runs first. Defaults to the position in the configured list. */
  priority?: number;
  /** Latency measured ahead of time (e.g. by a provider benchmark); breaks priority ties. */
  latencyMs?: number;
};

export type Endpoint = Readonly<{
  url: string;
  priority: number;
  latencyMs?: number;
}>;

export type EndpointHealth = {
  url: string;
  index: number;
  successRate: number;
  latencyMs: number | null;
  observations: number;
  failures: number;
  lastError: string | null;
  lastUpdatedAt: number | null;
};

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export type RpcTxRequest = {
  from?: string;
  to: string;
  data?: HexString;
  value?: HexString;
  gas?: HexString;
  gasPrice?: HexString;
};

export type BlockTag = 'latest' | 'pending' | 'earliest' | 'safe' | 'finalized';

export type TransactionReceipt = {
  transactionHash: HexString;
  blockNumber: bigint;
  gasUsed: bigint;
  /** 1 = success, 0 = reverted on-chain. */
  status: 0 | 1;
  from: string | null;
  to: string | null;
};
