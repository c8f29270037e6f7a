import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';

const BooleanFlagSchema = z.preprocess((v) => {
  if (typeof v === 'string') {
    const s = v.trim().toLowerCase();
    return s === '1' || s === 'true' || s === 'yes' || s === 'on';
  }
  return v;
}, z.boolean());

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(3001),

  // RPC
  // Comma-separated JSON-RPC endpoints; list order is failover order.
  RPC_URLS: z
    .string()
    .default(
      'https://sepolia-rollup.arbitrum.io/rpc,https://arbitrum-sepolia.publicnode.com,https://endpoints.omniatech.io/v1/arbitrum/sepolia/public',
    ),
  RPC_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  RPC_RETRY_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(2_000),
  RPC_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(45_000),
  RPC_FAILOVER_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(1_000),
  RPC_PROBE_METHOD: z.string().min(1).default('eth_blockNumber'),

  // Transactions
  CHAIN_ID: z.coerce.number().int().positive().default(421614),
  SIGNER_PRIVATE_KEY: z
    .string()
    .default('')
    .refine((v) => v === '' || /^0x[0-9a-fA-F]{64}$/.test(v), 'Expected a 0x-prefixed 32-byte hex key'),
  ANCHOR_CONTRACT_ADDRESS: z
    .string()
    .default('')
    .refine((v) => v === '' || /^0x[0-9a-fA-F]{40}$/.test(v), 'Invalid EVM address'),
  GAS_MARGIN_PERCENT: z.coerce.number().int().min(100).max(500).default(120),
  RECEIPT_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(30 * 60 * 1000).default(120_000),
  RECEIPT_POLL_INTERVAL_MS: z.coerce.number().int().min(50).max(60_000).default(2_000),
  EXPLORER_TX_BASE_URL: z.string().default('https://sepolia.arbiscan.io/tx'),

  // Storage backends (empty token = backend disabled)
  WEB3_STORAGE_TOKEN: z.string().default(''),
  WEB3_STORAGE_URL: z.string().default('https://api.web3.storage'),
  NFT_STORAGE_TOKEN: z.string().default(''),
  NFT_STORAGE_URL: z.string().default('https://api.nft.storage'),
  PINATA_JWT: z.string().default(''),
  PINATA_URL: z.string().default('https://api.pinata.cloud'),
  STORAGE_UPLOAD_TIMEOUT_MS: z.coerce.number().int().min(100).max(10 * 60 * 1000).default(60_000),
  STORAGE_MAX_BYTES: z.coerce.number().int().positive().default(1000 * 1024 * 1024),
  IPFS_GATEWAYS: z
    .string()
    .default('https://ipfs.io/ipfs/,https://gateway.pinata.cloud/ipfs/,https://cloudflare-ipfs.com/ipfs/,https://dweb.link/ipfs/'),
  GATEWAY_TIMEOUT_MS: z.coerce.number().int().min(100).max(5 * 60 * 1000).default(30_000),
  CONTENT_CACHE_DIR: z.string().default(''),

  // Audit log
  AUDIT_STORE: z.enum(['memory', 'file']).default('file'),
  AUDIT_LOG_PATH: z.string().default('./.data/audit-log.json'),
  AUDIT_RETENTION_KEEP: z.coerce.number().int().min(0).default(1000),

  // Observability
  METRICS_ENABLED: BooleanFlagSchema.default(true),
});

export type Env = z.infer<typeof EnvSchema>;

export type StorageBackendConfig = {
  name: 'web3.storage' | 'nft.storage' | 'pinata';
  url: string;
  token: string | null;
};

export type AppConfig = {
  nodeEnv: Env['NODE_ENV'];
  logLevel: Env['LOG_LEVEL'];
  host: string;
  port: number;
  rpc: {
    urls: string[];
    maxRetries: number;
    retryDelayMs: number;
    timeoutMs: number;
    failoverDelayMs: number;
    probeMethod: string;
  };
  tx: {
    chainId: number;
    signerPrivateKey: `0x${string}` | null;
    anchorContract: `0x${string}` | null;
    gasMarginPercent: number;
    receiptTimeoutMs: number;
    receiptPollIntervalMs: number;
    explorerTxBaseUrl: string | null;
  };
  storage: {
    backends: StorageBackendConfig[];
    uploadTimeoutMs: number;
    maxBytes: number;
    gateways: string[];
    gatewayTimeoutMs: number;
    cacheDir: string;
  };
  audit: {
    type: Env['AUDIT_STORE'];
    path: string;
    retentionKeep: number;
  };
  metrics: {
    enabled: boolean;
  };
};

function splitCsv(input: string): string[] {
  return input
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function nonEmpty(input: string): string | null {
  const trimmed = input.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function asHex(input: string): `0x${string}` | null {
  const value = nonEmpty(input);
  return value && value.startsWith('0x') ? `0x${value.slice(2)}` : null;
}

export function loadEnv(input: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(input);
}

export function loadConfig(input: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = loadEnv(input);
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    host: env.HOST,
    port: env.PORT,
    rpc: {
      urls: splitCsv(env.RPC_URLS),
      maxRetries: env.RPC_MAX_RETRIES,
      retryDelayMs: env.RPC_RETRY_DELAY_MS,
      timeoutMs: env.RPC_TIMEOUT_MS,
      failoverDelayMs: env.RPC_FAILOVER_DELAY_MS,
      probeMethod: env.RPC_PROBE_METHOD,
    },
    tx: {
      chainId: env.CHAIN_ID,
      signerPrivateKey: asHex(env.SIGNER_PRIVATE_KEY),
      anchorContract: asHex(env.ANCHOR_CONTRACT_ADDRESS),
      gasMarginPercent: env.GAS_MARGIN_PERCENT,
      receiptTimeoutMs: env.RECEIPT_TIMEOUT_MS,
      receiptPollIntervalMs: env.RECEIPT_POLL_INTERVAL_MS,
      explorerTxBaseUrl: nonEmpty(env.EXPLORER_TX_BASE_URL),
    },
    storage: {
      // Fixed order: web3.storage, then nft.storage, then Pinata.
      backends: [
        { name: 'web3.storage', url: env.WEB3_STORAGE_URL, token: nonEmpty(env.WEB3_STORAGE_TOKEN) },
        { name: 'nft.storage', url: env.NFT_STORAGE_URL, token: nonEmpty(env.NFT_STORAGE_TOKEN) },
        { name: 'pinata', url: env.PINATA_URL, token: nonEmpty(env.PINATA_JWT) },
      ],
      uploadTimeoutMs: env.STORAGE_UPLOAD_TIMEOUT_MS,
      maxBytes: env.STORAGE_MAX_BYTES,
      gateways: splitCsv(env.IPFS_GATEWAYS),
      gatewayTimeoutMs: env.GATEWAY_TIMEOUT_MS,
      cacheDir: nonEmpty(env.CONTENT_CACHE_DIR) ?? join(tmpdir(), 'pinrelay-cache'),
    },
    audit: {
      type: env.AUDIT_STORE,
      path: env.AUDIT_LOG_PATH,
      retentionKeep: env.AUDIT_RETENTION_KEEP,
    },
    metrics: {
      enabled: env.METRICS_ENABLED,
    },
  };
}
