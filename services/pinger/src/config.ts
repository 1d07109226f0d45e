import type { OverrunPolicy } from './types';
import type { LogLevel } from './logger';

function parseOverrunPolicy(value: string | undefined): OverrunPolicy {
  return value === 'skip' ? 'skip' : 'immediate';
}

function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return 'info';
  }
}

export const config = {
  database: {
    url: process.env.DATABASE_URL || '',
  },
  targets: {
    file: process.env.TARGETS_FILE || './pingit-targets.json',
  },
  http: {
    host: process.env.HTTP_HOST || '0.0.0.0',
    port: parseInt(process.env.HTTP_PORT || '7030', 10),
  },
  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
  },
  prober: {
    deliveryGraceMs: parseInt(process.env.DELIVERY_GRACE_MS || '1000', 10),
    overrunPolicy: parseOverrunPolicy(process.env.OVERRUN_POLICY),
  },
  persistence: {
    maxQueueSize: parseInt(process.env.QUEUE_MAX_SIZE || '10000', 10),
    batchSize: parseInt(process.env.BATCH_SIZE || '500', 10),
    flushIntervalMs: parseInt(process.env.FLUSH_INTERVAL_MS || '10000', 10),
    maxRetries: parseInt(process.env.PERSIST_MAX_RETRIES || '3', 10),
    shutdownGraceMs: parseInt(process.env.SHUTDOWN_GRACE_MS || '5000', 10),
  },
  metrics: {
    drainOnScrape: process.env.METRICS_DRAIN_ON_SCRAPE !== 'false',
  },
};

export function validateConfig(): void {
  if (!config.database.url) {
    throw new Error('DATABASE_URL environment variable is required');
  }
}
