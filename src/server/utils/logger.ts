// src/server/utils/logger.ts
import pino from 'pino';
import type { Logger } from 'pino';
import { TextFrameError } from '../core/errors';

const isDevelopment = process.env.NODE_ENV !== 'production';
const LOG_LEVEL = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,

  // ISO timestamps in production, epoch ms in dev
  ...(isDevelopment ? {} : {
    timestamp: pino.stdTimeFunctions.isoTime,
  }),

  base: {
    pid: process.pid,
    hostname: process.env.HOSTNAME || 'localhost',
    service: 'textframe-server',
  },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

export const logger = pino(baseConfig);

export type LogComponent =
  | 'text-file'
  | 'frame-store'
  | 'index-cache'
  | 'http'
  | 'startup';

export const createLogger = (component: LogComponent, context?: Record<string, unknown>): Logger => {
  return logger.child({ component, ...context });
};

export const textFileLogger = createLogger('text-file');
export const storeLogger = createLogger('frame-store');
export const cacheLogger = createLogger('index-cache');
export const httpLogger = createLogger('http');
export const startupLogger = createLogger('startup');

/**
 * Log how long `operation` took since `startTime`. When the metadata carries
 * a `bytes` count, throughput in MiB/s is added.
 */
export const logPerformance = (
  logger: Logger,
  operation: string,
  startTime: number,
  metadata?: Record<string, unknown>
) => {
  const duration = Date.now() - startTime;
  const bytes = metadata?.bytes;
  const throughput = typeof bytes === 'number' && duration > 0
    ? Math.round(bytes / 1_048_576 / (duration / 1000) * 10) / 10
    : undefined;

  logger.info({
    operation,
    duration,
    ...(throughput === undefined ? {} : { mibPerSec: throughput }),
    ...metadata,
  }, `${operation} completed in ${duration}ms`);
};

// Structured error logging; library errors carry their code along
export const logError = (
  logger: Logger,
  error: unknown,
  context?: Record<string, unknown>
) => {
  if (error instanceof TextFrameError) {
    logger.error({ err: error, code: error.code, ...context }, error.message);
  } else if (error instanceof Error) {
    logger.error({ err: error, ...context }, error.message);
  } else {
    logger.error({ error: String(error), ...context }, 'Unknown error occurred');
  }
};

export type { Logger };
