import pino, { type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export interface LoggerConfig {
  environment: string;
  level?: string | undefined;
}

export function createLogger(config: LoggerConfig): AppLogger {
  const isProduction = config.environment === 'production';

  const baseOptions: LoggerOptions = {
    level: config.level ?? (config.environment === 'test' ? 'silent' : isProduction ? 'info' : 'debug'),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isProduction || config.environment === 'test') {
    // JSON output for log aggregation
    return pino({
      ...baseOptions,
      base: {
        service: 'pinrelay',
        env: config.environment,
      },
    });
  }

  // Development: pretty print
  return pino({
    ...baseOptions,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  });
}

// Singleton logger instance (initialized later)
let logger: AppLogger | null = null;

export function getLogger(): AppLogger {
  if (!logger) {
    // Fallback logger if not initialized; quiet under the test runner
    logger = pino({ level: process.env.NODE_ENV === 'test' ? 'silent' : 'info' });
  }
  return logger;
}

export function initLogger(config: LoggerConfig): AppLogger {
  logger = createLogger(config);
  return logger;
}

export function logError(log: AppLogger, error: Error, context?: Record<string, unknown>) {
  log.error({
    event: 'error',
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack,
    },
    ...context,
  }, error.message);
}

export function logRpcFailover(log: AppLogger, data: {
  method: string;
  fromUrl: string;
  toUrl: string;
  attempts: number;
  reason: string;
}) {
  log.warn({
    event: 'rpc_failover',
    ...data,
  }, 'Switching RPC endpoint');
}

export function logUploadAttempt(log: AppLogger, data: {
  backend: string;
  name: string;
  size: number;
  outcome: 'success' | 'failure';
  durationMs: number;
  error?: string | undefined;
}) {
  const level = data.outcome === 'success' ? 'info' : 'warn';
  log[level]({
    event: 'upload_attempt',
    ...data,
  }, `Upload via ${data.backend} ${data.outcome === 'success' ? 'succeeded' : 'failed'}`);
}
