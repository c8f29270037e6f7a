import fastify, { type FastifyInstance } from 'fastify';
import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import cors from '@fastify/cors';
import { serializerCompiler, validatorCompiler, type ZodTypeProvider } from 'fastify-type-provider-zod';
import type { Hex } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';

import { AuditEntryTypeSchema, AuditStatusSchema, toCsv, type AuditLog } from '@pinrelay/audit';
import { loadConfig, type AppConfig } from '@pinrelay/config';
import { readNetworkInfo, type RpcClient } from '@pinrelay/rpc';
import { Mutex, ValidationError, getLogger, isPinrelayError, type PinrelayErrorCode } from '@pinrelay/shared';
import { isLocalContentId, type ContentUploader, type UploadResult } from '@pinrelay/storage';
import { anchorCall, type TransactionPipeline, type TransactionResult } from '@pinrelay/tx';

import { createMetrics, type Metrics } from './obs/metrics';
import { createServices } from './services';

declare module 'fastify' {
  interface FastifyRequest {
    startedAt?: bigint;
  }
}

export type CreateServerOptions = {
  logger?: boolean;
  config?: AppConfig;
  rpc?: RpcClient;
  uploader?: ContentUploader;
  pipeline?: TransactionPipeline;
  audit?: AuditLog;
  metrics?: Metrics;
};

const STATUS_BY_CODE: Record<PinrelayErrorCode, number> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  GAS_ESTIMATION: 422,
  BROADCAST: 502,
  CONNECTIVITY: 503,
  CONFIRMATION_TIMEOUT: 504,
  RPC_RESPONSE: 500,
  AUDIT_STORE: 500,
};

const TxHashSchema = z.custom<Hex>(
  (v) => typeof v === 'string' && /^0x[0-9a-fA-F]{64}$/.test(v),
  'Expected a 0x-prefixed 32-byte transaction hash',
);

const UploadResponseSchema = z.object({
  contentId: z.string(),
  size: z.number(),
  backend: z.string(),
  cachePath: z.string().optional(),
  ipfsUri: z.string(),
  gatewayUrl: z.string().nullable(),
  attempts: z.array(
    z.object({
      backend: z.string(),
      outcome: z.enum(['success', 'failure']),
      durationMs: z.number(),
      error: z.string().optional(),
    }),
  ),
});

const TransactionResponseSchema = z.object({
  hash: z.string(),
  status: z.union([z.literal(0), z.literal(1)]),
  blockNumber: z.string(),
  gasUsed: z.string(),
  nonce: z.number(),
  gas: z.string(),
  gasPrice: z.string(),
  from: z.string(),
  explorerUrl: z.string().nullable(),
});

const AuditQuerySchema = z.object({
  type: AuditEntryTypeSchema.optional(),
  status: AuditStatusSchema.optional(),
  contentId: z.string().min(1).optional(),
  txHash: z.string().min(1).optional(),
  name: z.string().min(1).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  limit: z.coerce.number().int().positive().max(10_000).optional(),
  order: z.enum(['asc', 'desc']).optional(),
  format: z.enum(['json', 'csv']).default('json'),
});

const AuditTrimSchema = z
  .object({
    keep: z.number().int().min(0).optional(),
    olderThan: z.coerce.date().optional(),
  })
  .refine((v) => v.keep === undefined || v.olderThan === undefined, 'Pass either keep or olderThan, not both')
  .default({});

function toUploadResponse(uploader: ContentUploader, result: UploadResult) {
  return {
    ...result,
    ipfsUri: uploader.ipfsUri(result.contentId),
    gatewayUrl: isLocalContentId(result.contentId) ? null : uploader.gatewayUrl(result.contentId),
  };
}

function toTransactionResponse(result: TransactionResult) {
  return {
    ...result,
    blockNumber: result.blockNumber.toString(),
    gasUsed: result.gasUsed.toString(),
    gas: result.gas.toString(),
    gasPrice: result.gasPrice.toString(),
  };
}

export function createServer(options: CreateServerOptions = {}): FastifyInstance {
  const config = options.config ?? loadConfig(process.env);
  const services = createServices(
    config,
    {
      ...(options.rpc ? { rpc: options.rpc } : {}),
      ...(options.uploader ? { uploader: options.uploader } : {}),
      ...(options.pipeline ? { pipeline: options.pipeline } : {}),
      ...(options.audit ? { audit: options.audit } : {}),
    },
    getLogger(),
  );
  const { rpc, uploader, pipeline, audit } = services;

  const metrics = options.metrics ?? createMetrics({ collectDefault: true });
  const signer = config.tx.signerPrivateKey;
  const contract = config.tx.anchorContract;
  const signerAddress = signer ? privateKeyToAccount(signer).address : null;
  // Nonces come from the pending count; one submission at a time per signer.
  const submitLock = new Mutex();

  const app = fastify({
    logger: options.logger ?? {
      level: config.logLevel ?? (config.nodeEnv === 'production' ? 'info' : 'debug'),
      redact: {
        paths: ['req.headers.authorization', 'req.headers.cookie'],
        remove: true,
      },
    },
    genReqId: () => randomUUID(),
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.addContentTypeParser(
    'application/octet-stream',
    { parseAs: 'buffer', bodyLimit: config.storage.maxBytes },
    (_request, body, done) => {
      done(null, body);
    },
  );

  // Attach requestId and structured request/response logs.
  app.addHook('onRequest', async (request, reply) => {
    request.startedAt = process.hrtime.bigint();
    reply.header('x-request-id', request.id);
    request.log.info({ requestId: request.id, method: request.method, url: request.url }, 'request.start');
  });

  app.addHook('onResponse', async (request, reply) => {
    const start = request.startedAt;
    const durationMs = start ? Number((process.hrtime.bigint() - start) / 1_000_000n) : null;

    if (config.metrics.enabled && durationMs != null) {
      const route = request.routeOptions?.url ?? request.url;
      metrics.httpRequestDurationMs
        .labels({ method: request.method, route, status: String(reply.statusCode) })
        .observe(durationMs);
    }

    request.log.info(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        durationMs,
      },
      'request.end',
    );
  });

  app.setErrorHandler((error, request, reply) => {
    if (isPinrelayError(error)) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) {
        request.log.error({ err: error, code: error.code }, 'request.failed');
      }
      return reply.code(status).send(error.toJSON());
    }

    // Schema failures; zod errors arrive without `validation` set.
    if (error.validation || error.code === 'FST_ERR_VALIDATION') {
      return reply.code(400).send({ code: 'VALIDATION', message: error.message });
    }

    const status = error.statusCode ?? 500;
    if (status < 500) {
      return reply.code(status).send({ code: error.code ?? 'BAD_REQUEST', message: error.message });
    }

    request.log.error({ err: error }, 'request.failed');
    return reply.code(500).send({ code: 'INTERNAL', message: 'internal_error' });
  });

  app.register(cors, {
    origin: ['http://localhost:3000', 'http://localhost:3001'],
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  });

  const api = app.withTypeProvider<ZodTypeProvider>();

  api.get('/health', async () => {
    const rpcConnected = await rpc.testConnectivity();
    return {
      status: rpcConnected ? 'ok' : 'degraded',
      rpcConnected,
      currentEndpoint: rpc.getStatus().currentUrl,
      storage: uploader.getStatus(),
    };
  });

  api.post(
    '/v1/content',
    {
      schema: {
        querystring: z.object({ name: z.string().trim().min(1) }),
        body: z.instanceof(Buffer),
        response: { 200: UploadResponseSchema },
      },
    },
    async (request) => {
      const result = await uploader.upload(new Uint8Array(request.body), request.query.name);
      for (const attempt of result.attempts) {
        metrics.uploadAttemptsTotal.labels({ backend: attempt.backend, outcome: attempt.outcome }).inc();
      }
      return toUploadResponse(uploader, result);
    },
  );

  api.get(
    '/v1/content/:contentId',
    { schema: { params: z.object({ contentId: z.string().min(1) }) } },
    async (request, reply) => {
      const bytes = await uploader.download(request.params.contentId);
      reply.header('content-type', 'application/octet-stream');
      return Buffer.from(bytes);
    },
  );

  api.post(
    '/v1/anchors',
    {
      schema: {
        body: z.object({ contentId: z.string().trim().min(1) }),
        response: {
          200: TransactionResponseSchema.extend({ contentId: z.string() }),
          503: z.object({ code: z.string(), message: z.string() }),
        },
      },
    },
    async (request, reply) => {
      if (!signer || !contract) {
        return reply.code(503).send({ code: 'SIGNER_NOT_CONFIGURED', message: 'anchoring_disabled' });
      }

      const call = anchorCall(contract, request.body.contentId);
      try {
        const result = await submitLock.runExclusive(() => pipeline.submit(call, signer));
        metrics.transactionSubmissionsTotal.labels({ outcome: result.status === 1 ? 'success' : 'reverted' }).inc();
        return { ...toTransactionResponse(result), contentId: request.body.contentId };
      } catch (err) {
        metrics.transactionSubmissionsTotal.labels({ outcome: isPinrelayError(err) ? err.code : 'UNKNOWN' }).inc();
        throw err;
      }
    },
  );

  api.get(
    '/v1/transactions/:hash',
    { schema: { params: z.object({ hash: TxHashSchema }) } },
    async (request, reply) => {
      const receipt = await pipeline.getReceipt(request.params.hash);
      if (!receipt) {
        return reply.code(404).send({ code: 'NOT_FOUND', message: 'transaction_pending_or_unknown' });
      }
      return {
        hash: receipt.transactionHash,
        status: receipt.status,
        blockNumber: receipt.blockNumber.toString(),
        gasUsed: receipt.gasUsed.toString(),
        from: receipt.from,
        to: receipt.to,
        explorerUrl: pipeline.explorerUrl(receipt.transactionHash),
      };
    },
  );

  api.get('/v1/audit', { schema: { querystring: AuditQuerySchema } }, async (request, reply) => {
    const { format, ...filters } = request.query;
    if (filters.from && filters.to && filters.from > filters.to) {
      throw new ValidationError('invalid_range: from is after to');
    }

    const entries = await audit.query(filters);
    if (format === 'csv') {
      reply.header('content-type', 'text/csv; charset=utf-8');
      return toCsv(entries);
    }
    return { entries, count: entries.length };
  });

  api.get('/v1/audit/stats', async () => audit.aggregate());

  api.post('/v1/audit/trim', { schema: { body: AuditTrimSchema } }, async (request) => {
    const { keep, olderThan } = request.body;
    const removed = olderThan ? await audit.trimOlderThan(olderThan) : await audit.trim(keep ?? config.audit.retentionKeep);
    return { removed };
  });

  api.get('/v1/network', async () => readNetworkInfo(rpc, signerAddress, getLogger()));

  if (config.metrics.enabled) {
    api.get('/metrics', async (_request, reply) => {
      reply.header('content-type', metrics.registry.contentType);
      return metrics.registry.metrics();
    });
  }

  return app;
}
