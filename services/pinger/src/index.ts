/**
 * PingIT probing service
 *
 * Probes every configured target on its own schedule, keeps per-target
 * health statistics, persists history to Postgres and serves /metrics.
 */

import type { Server } from 'http';
import { config, validateConfig } from './config';
import { createDatabase, ensureSchema } from './db';
import { PingEngine } from './engine';
import { createLogger, setLogLevel } from './logger';
import { createIcmpProbe } from './probe';
import { createApp } from './server';
import { loadTargetRegistry } from './targets';
import { PersistenceWriter } from './writers/persistence';
import { PostgresStore } from './writers/store';

const logger = createLogger('PingIT');

async function main() {
  setLogLevel(config.logging.level);
  logger.info('Starting service...');

  validateConfig();
  const registry = await loadTargetRegistry(config.targets.file);

  logger.info('Config:', {
    database: config.database.url.replace(/\/\/.*@/, '//<credentials>@'),
    targetsFile: config.targets.file,
    targets: registry.targets.length,
    reportEvery: registry.reportEvery,
    http: `${config.http.host}:${config.http.port}`,
    overrunPolicy: config.prober.overrunPolicy,
    drainOnScrape: config.metrics.drainOnScrape,
  });

  const database = createDatabase(config.database.url);
  await ensureSchema(database.db);
  logger.info('Connected to Postgres');

  const store = new PostgresStore(database.db);
  const writer = new PersistenceWriter(store, {
    maxQueueSize: config.persistence.maxQueueSize,
    batchSize: config.persistence.batchSize,
    flushIntervalMs: config.persistence.flushIntervalMs,
    maxRetries: config.persistence.maxRetries,
  });

  const engine = new PingEngine({
    registry,
    probe: createIcmpProbe(),
    writer,
    deliveryGraceMs: config.prober.deliveryGraceMs,
    overrunPolicy: config.prober.overrunPolicy,
  });
  await engine.recover();

  const app = createApp({ engine, store, drainOnScrape: config.metrics.drainOnScrape });
  const server: Server = await new Promise((resolve, reject) => {
    const listening = app.listen(config.http.port, config.http.host, () => resolve(listening));
    listening.once('error', reject);
  });
  logger.info(`Listening on ${config.http.host}:${config.http.port}`);

  engine.start();

  const reload = async () => {
    logger.info(`Reloading targets from ${config.targets.file}`);
    try {
      await engine.reload(await loadTargetRegistry(config.targets.file));
    } catch (error) {
      logger.error('Reload failed, keeping current targets:', error);
    }
  };

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);

    await new Promise<void>((resolve) => server.close(() => resolve()));
    await engine.stop(config.persistence.shutdownGraceMs);
    await database.close();

    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      logger.error('Shutdown failed:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGHUP', () => {
    reload().catch((error) => logger.error('Reload failed:', error));
  });
}

main().catch((error) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
