/**
 * Persistence Writer
 *
 * Buffers rows in a bounded FIFO queue and writes them to the store in
 * batches. Producers call the synchronous `enqueue*` methods, which never
 * block and never throw: when the queue is full the oldest item is
 * dropped. Store failures are retried with exponential backoff and then
 * logged and dropped.
 */

import { createLogger } from '../logger';
import { PersistenceError } from '../errors';
import type { StatsSnapshot } from '../aggregator';
import type { DisconnectRow, PingRow, SnapshotRow } from '../db';
import type { DisconnectEvent, ProbeResult } from '../types';
import type { PersistenceStore } from './store';

const logger = createLogger('Persistence');

export type WriteItem =
  | { kind: 'ping'; row: PingRow }
  | { kind: 'snapshot'; row: SnapshotRow }
  | { kind: 'disconnect'; row: DisconnectRow };

export interface PersistenceWriterOptions {
  maxQueueSize?: number;
  batchSize?: number;
  /** Flush cadence in ms; 0 disables the timer */
  flushIntervalMs?: number;
  /** Retries after the first failed attempt */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  maxRetryDelayMs?: number;
}

export interface PersistenceWriterStats {
  pending: number;
  written: number;
  dropped: number;
  failed: number;
}

export function toPingRow(result: ProbeResult): PingRow {
  return {
    targetName: result.targetName,
    host: result.host,
    timestamp: new Date(result.timestamp),
    success: result.success,
    responseTimeMs: result.responseTimeMs ?? null,
    errorKind: result.errorKind ?? null,
  };
}

export function toSnapshotRow(snapshot: StatsSnapshot): SnapshotRow {
  const { stats } = snapshot;
  return {
    targetName: stats.targetName,
    host: stats.host,
    totalPings: stats.pingCount,
    successfulPings: stats.successCount,
    failedPings: stats.failureCount,
    successRate: snapshot.successRate,
    avgResponseTime: stats.avgRt === null ? null : Math.round(stats.avgRt * 100) / 100,
    minResponseTime: stats.minRt,
    maxResponseTime: stats.maxRt,
    lastStatus: stats.currentState,
    timestamp: new Date(snapshot.takenAt),
  };
}

export function toDisconnectRow(event: DisconnectEvent): DisconnectRow {
  return {
    targetName: event.targetName,
    host: event.host,
    startTime: new Date(event.startTime),
    endTime: event.endTime === undefined ? null : new Date(event.endTime),
    disconnectCount: event.consecutiveFailureCount,
  };
}

/**
 * Keep only the latest row per (target_name, start_time); Postgres rejects
 * an upsert that touches the same row twice in one statement.
 */
export function collapseDisconnects(rows: DisconnectRow[]): DisconnectRow[] {
  const byKey = new Map<string, DisconnectRow>();
  for (const row of rows) {
    const key = `${row.targetName}\u0000${row.startTime.getTime()}`;
    byKey.delete(key);
    byKey.set(key, row);
  }
  return [...byKey.values()];
}

export class PersistenceWriter {
  private store: PersistenceStore;
  private queue: WriteItem[] = [];
  private maxQueueSize: number;
  private batchSize: number;
  private flushIntervalMs: number;
  private maxRetries: number;
  private retryBaseDelayMs: number;
  private maxRetryDelayMs: number;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private closed = false;
  private abandoned = false;
  private counters = { written: 0, dropped: 0, failed: 0 };

  constructor(store: PersistenceStore, options: PersistenceWriterOptions = {}) {
    this.store = store;
    this.maxQueueSize = Math.max(1, options.maxQueueSize ?? 10000);
    this.batchSize = Math.max(1, options.batchSize ?? 500);
    this.flushIntervalMs = options.flushIntervalMs ?? 10000;
    this.maxRetries = Math.max(0, options.maxRetries ?? 3);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? 10000;
  }

  start(): void {
    if (this.flushTimer || this.flushIntervalMs <= 0) return;

    this.flushTimer = setInterval(() => {
      this.flush().catch((error) => {
        logger.error('Scheduled flush failed:', error);
      });
    }, this.flushIntervalMs);
  }

  get stats(): PersistenceWriterStats {
    return { pending: this.queue.length, ...this.counters };
  }

  enqueue(item: WriteItem): void {
    if (this.closed) {
      this.counters.dropped += 1;
      logger.warn(`Writer is stopped, dropping ${item.kind} row`);
      return;
    }

    this.queue.push(item);

    if (this.queue.length > this.maxQueueSize) {
      const evicted = this.queue.shift();
      this.counters.dropped += 1;
      logger.warn(
        `Queue full (${this.maxQueueSize}), dropped oldest ${evicted?.kind ?? 'unknown'} row ` +
          `(${this.counters.dropped} dropped so far)`
      );
    }

    if (this.queue.length >= this.batchSize && !this.inFlight) {
      this.flush().catch((error) => {
        logger.error('Batch flush failed:', error);
      });
    }
  }

  enqueuePing(result: ProbeResult): void {
    this.enqueue({ kind: 'ping', row: toPingRow(result) });
  }

  enqueueSnapshot(snapshot: StatsSnapshot): void {
    this.enqueue({ kind: 'snapshot', row: toSnapshotRow(snapshot) });
  }

  enqueueDisconnect(event: DisconnectEvent): void {
    this.enqueue({ kind: 'disconnect', row: toDisconnectRow(event) });
  }

  /** Close disconnect rows a previous run left open. Run before `start`. */
  closeOpenDisconnects(): Promise<number> {
    return this.store.closeOpenDisconnects();
  }

  /**
   * Write one batch. Concurrent callers share the batch already in flight.
   */
  flush(): Promise<void> {
    if (this.inFlight) return this.inFlight;
    if (this.queue.length === 0) return Promise.resolve();

    this.inFlight = this.writeBatch().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /**
   * Stop the timer and drain the queue for at most `graceMs`; whatever is
   * left after that is discarded.
   */
  async stop(graceMs: number): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    this.closed = true;

    const drain = (async () => {
      while (!this.abandoned && (this.queue.length > 0 || this.inFlight)) {
        await this.flush();
      }
    })();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });

    const drained = await Promise.race([drain.then(() => true), expired]);
    clearTimeout(timer);

    if (!drained) {
      this.abandoned = true;
      const remaining = this.queue.length;
      this.queue = [];
      this.counters.dropped += remaining;
      logger.warn(`Shutdown grace of ${graceMs}ms elapsed, discarded ${remaining} pending rows`);
      drain.catch((error) => {
        logger.error('Drain failed after shutdown:', error);
      });
    }
  }

  private async writeBatch(): Promise<void> {
    const batch = this.queue.splice(0, this.batchSize);

    const pings: PingRow[] = [];
    const snapshots: SnapshotRow[] = [];
    const disconnects: DisconnectRow[] = [];

    for (const item of batch) {
      switch (item.kind) {
        case 'ping':
          pings.push(item.row);
          break;
        case 'snapshot':
          snapshots.push(item.row);
          break;
        case 'disconnect':
          disconnects.push(item.row);
          break;
      }
    }

    await this.writeWithRetry('ping_history', pings.length, () => this.store.insertPings(pings));
    await this.writeWithRetry('disconnect_events', disconnects.length, () =>
      this.store.upsertDisconnects(collapseDisconnects(disconnects))
    );
    await this.writeWithRetry('ping_statistics', snapshots.length, () =>
      this.store.insertSnapshots(snapshots)
    );
  }

  private async writeWithRetry(
    table: string,
    count: number,
    write: () => Promise<void>
  ): Promise<void> {
    if (count === 0) return;

    let lastError: unknown = null;
    const attempts = this.maxRetries + 1;

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        await write();
        this.counters.written += count;
        logger.debug(`Wrote ${count} rows to ${table}`);
        return;
      } catch (error) {
        lastError = error;
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Write to ${table} failed (attempt ${attempt + 1}/${attempts}): ${message}`);

        if (attempt < attempts - 1 && !this.abandoned) {
          const delay = Math.min(this.retryBaseDelayMs * Math.pow(2, attempt), this.maxRetryDelayMs);
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
        if (this.abandoned) break;
      }
    }

    this.counters.failed += count;
    logger.error(
      `Dropping ${count} rows for ${table}:`,
      new PersistenceError(`Write to ${table} failed`, attempts, { cause: lastError })
    );
  }
}
