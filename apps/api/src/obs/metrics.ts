import { Registry, collectDefaultMetrics, Counter, Histogram } from 'prom-client';

export type Metrics = {
  registry: Registry;
  httpRequestDurationMs: Histogram<'method' | 'route' | 'status'>;
  uploadAttemptsTotal: Counter<'backend' | 'outcome'>;
  transactionSubmissionsTotal: Counter<'outcome'>;
};

export function createMetrics(params?: { collectDefault?: boolean }): Metrics {
  const registry = new Registry();

  if (params?.collectDefault ?? true) {
    collectDefaultMetrics({ register: registry });
  }

  const httpRequestDurationMs = new Histogram({
    name: 'pinrelay_http_request_duration_ms',
    help: 'HTTP request duration in milliseconds',
    labelNames: ['method', 'route', 'status'] as const,
    buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000],
    registers: [registry],
  });

  const uploadAttemptsTotal = new Counter({
    name: 'pinrelay_upload_attempts_total',
    help: 'Storage backend upload attempts, labeled by backend and outcome',
    labelNames: ['backend', 'outcome'] as const,
    registers: [registry],
  });

  const transactionSubmissionsTotal = new Counter({
    name: 'pinrelay_transaction_submissions_total',
    help: 'Transaction submissions by final outcome',
    labelNames: ['outcome'] as const,
    registers: [registry],
  });

  return {
    registry,
    httpRequestDurationMs,
    uploadAttemptsTotal,
    transactionSubmissionsTotal,
  };
}
