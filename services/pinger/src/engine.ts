/**
 * Ping Engine
 *
 * Owns one prober and one aggregator per target. Every result is applied
 * to its target's aggregator, then recorded in the metrics collector, then
 * queued for persistence. All three steps are synchronous, so results of
 * one target reach every consumer in the order they were produced.
 */

import { TargetAggregator } from './aggregator';
import type { StatsSnapshot } from './aggregator';
import { createLogger } from './logger';
import { MetricsCollector } from './metrics';
import { Prober } from './prober';
import type { Probe } from './probe';
import { diffRegistries } from './targets';
import type { TargetRegistry } from './targets';
import type { DisconnectEvent, OverrunPolicy, ProbeResult, Target, TargetStats } from './types';
import type { PersistenceWriter } from './writers/persistence';

const logger = createLogger('Engine');

export interface PingEngineOptions {
  registry: TargetRegistry;
  probe: Probe;
  writer: PersistenceWriter;
  metrics?: MetricsCollector;
  deliveryGraceMs?: number;
  overrunPolicy?: OverrunPolicy;
  now?: () => number;
}

export interface TargetView {
  target: Target;
  stats: TargetStats;
  successRate: number;
  openEvent: DisconnectEvent | null;
}

interface RunningTarget {
  target: Target;
  aggregator: TargetAggregator;
  controller: AbortController | null;
  loop: Promise<void> | null;
}

export class PingEngine {
  readonly metrics: MetricsCollector;
  private registry: TargetRegistry;
  private reloading: Promise<void> = Promise.resolve();
  private probe: Probe;
  private writer: PersistenceWriter;
  private deliveryGraceMs: number;
  private overrunPolicy: OverrunPolicy;
  private now: () => number;
  private running = new Map<string, RunningTarget>();
  private started = false;
  private resultCount = 0;

  constructor(options: PingEngineOptions) {
    this.registry = options.registry;
    this.probe = options.probe;
    this.writer = options.writer;
    this.metrics = options.metrics ?? new MetricsCollector(options.registry.targets);
    this.deliveryGraceMs = options.deliveryGraceMs ?? 1000;
    this.overrunPolicy = options.overrunPolicy ?? 'immediate';
    this.now = options.now ?? Date.now;

    for (const target of this.registry.targets) {
      this.register(target);
    }
  }

  get isRunning(): boolean {
    return this.started;
  }

  /** Results handled since start, across all targets */
  get totalResults(): number {
    return this.resultCount;
  }

  get targets(): readonly Target[] {
    return this.registry.targets;
  }

  start(): void {
    if (this.started) {
      logger.warn('Engine already running');
      return;
    }
    this.started = true;

    this.metrics.setTargets(this.registry.targets);
    this.writer.start();

    for (const entry of this.running.values()) {
      this.launch(entry);
    }

    logger.info(
      `Probing ${this.registry.targets.length} targets, snapshot every ${this.registry.reportEvery} cycles`
    );
  }

  /**
   * Close disconnect rows a previous run left open, so a new event for the
   * same target never sits next to a stale open row. Run before `start`.
   */
  async recover(): Promise<void> {
    if (this.started) {
      throw new Error('recover() must run before start()');
    }

    const closed = await this.writer.closeOpenDisconnects();
    if (closed > 0) {
      logger.warn(`Closed ${closed} disconnect events left open by a previous run`);
    }
  }

  /**
   * Replace the target snapshot. Unchanged targets keep probing and keep
   * their statistics; removed and changed targets are stopped first and
   * their open disconnect events closed. Reloads run one at a time.
   */
  reload(next: TargetRegistry): Promise<void> {
    const run = this.reloading.then(() => this.applyReload(next));
    // Failures reach the caller through `run`; the chain itself keeps going
    this.reloading = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Stop every prober, wait for in-flight probes, close open disconnect
   * events, then drain the writer for at most `graceMs`.
   */
  async stop(graceMs: number): Promise<void> {
    if (!this.started) return;
    this.started = false;

    await this.reloading;

    const entries = [...this.running.values()];
    await Promise.all(entries.map((entry) => this.halt(entry)));
    for (const entry of entries) {
      this.closeOpenEvent(entry);
    }
    await this.writer.stop(graceMs);

    logger.info(`Stopped after ${this.resultCount} results`);
  }

  /**
   * Apply one result. Exposed so a caller can feed results without probers.
   */
  handleResult(result: ProbeResult): void {
    const entry = this.running.get(result.targetName);
    if (!entry) {
      logger.warn(`Dropping result for unknown target ${result.targetName}`);
      return;
    }

    this.resultCount += 1;

    const step = entry.aggregator.ingest(result);
    this.metrics.record(result, step);
    this.writer.enqueuePing(result);

    if (step.kind === 'went_down') {
      const reason = result.errorKind ?? 'unknown';
      logger.warn(`DISCONNECT: ${result.targetName} (${result.host}) - ${reason}`);
    } else if (step.kind === 'recovered' && step.closed) {
      const downFor = (step.closed.endTime ?? step.closed.startTime) - step.closed.startTime;
      logger.info(
        `RECOVERED: ${result.targetName} (${result.host}) after ` +
          `${step.closed.consecutiveFailureCount} failed probes, ${downFor}ms`
      );
    }
  }

  view(name: string): TargetView | undefined {
    const entry = this.running.get(name);
    if (!entry) return undefined;

    const snapshot = entry.aggregator.snapshot(this.now());
    return {
      target: entry.target,
      stats: snapshot.stats,
      successRate: snapshot.successRate,
      openEvent: snapshot.openEvent,
    };
  }

  views(): TargetView[] {
    const result: TargetView[] = [];
    for (const target of this.registry.targets) {
      const view = this.view(target.name);
      if (view) result.push(view);
    }
    return result;
  }

  private createAggregator(target: Target): TargetAggregator {
    return new TargetAggregator(target, this.registry.reportEvery, {
      onSnapshot: (snapshot: StatsSnapshot) => {
        logger.debug(
          `STATISTICS: ${target.name} - total ${snapshot.stats.pingCount}, ` +
            `ok ${snapshot.stats.successCount}, failed ${snapshot.stats.failureCount}, ` +
            `rate ${snapshot.successRate}%`
        );
        this.writer.enqueueSnapshot(snapshot);
      },
      onDisconnect: (event) => this.writer.enqueueDisconnect(event),
    });
  }

  private register(target: Target): RunningTarget {
    const entry: RunningTarget = {
      target,
      aggregator: this.createAggregator(target),
      controller: null,
      loop: null,
    };
    this.running.set(target.name, entry);
    return entry;
  }

  private launch(entry: RunningTarget): void {
    const { target } = entry;
    const controller = new AbortController();
    const prober = new Prober(target, {
      probe: this.probe,
      deliver: (result) => this.handleResult(result),
      deliveryGraceMs: this.deliveryGraceMs,
      overrunPolicy: this.overrunPolicy,
      now: this.now,
    });

    entry.controller = controller;
    entry.loop = prober.run(controller.signal).catch((error: unknown) => {
      logger.error(`Prober for ${target.name} crashed:`, error);
    });
  }

  private async applyReload(next: TargetRegistry): Promise<void> {
    const diff = diffRegistries(this.registry, next);
    const toStop = [...diff.removed, ...diff.changed];

    await Promise.all(toStop.map((target) => this.retire(target.name)));

    this.registry = next;
    this.metrics.setTargets(next.targets);

    for (const target of diff.unchanged) {
      this.running.get(target.name)?.aggregator.setReportEvery(next.reportEvery);
    }

    for (const target of [...diff.added, ...diff.changed]) {
      const entry = this.register(target);
      if (this.started) this.launch(entry);
    }

    logger.info(
      `Reloaded targets: ${diff.added.length} added, ${diff.removed.length} removed, ` +
        `${diff.changed.length} changed, ${diff.unchanged.length} unchanged`
    );
  }

  private async retire(name: string): Promise<void> {
    const entry = this.running.get(name);
    if (!entry) return;

    await this.halt(entry);
    this.closeOpenEvent(entry);
    this.running.delete(name);
  }

  private closeOpenEvent(entry: RunningTarget): void {
    const closed = entry.aggregator.closeOpenEvent();
    if (closed) {
      logger.info(
        `Closed open disconnect for ${closed.targetName} (${closed.host}) ` +
          `after ${closed.consecutiveFailureCount} failed probes`
      );
    }
  }

  private async halt(entry: RunningTarget): Promise<void> {
    if (!entry.controller) return;

    entry.controller.abort();
    await entry.loop;
    entry.controller = null;
    entry.loop = null;
  }
}
