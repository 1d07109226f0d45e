/**
 * Prober
 *
 * One independent loop per target. Each cycle runs a single probe bounded
 * by the target's timeout and hands exactly one ProbeResult downstream.
 * Cycles are spaced from their start times; what happens after a probe
 * overruns the interval is decided by the overrun policy.
 */

import { createLogger } from './logger';
import type { Probe, ProbeOutcome } from './probe';
import type { OverrunPolicy, ProbeResult, Target } from './types';

const logger = createLogger('Prober');

export type ResultSink = (result: ProbeResult) => void | Promise<void>;

export interface ProberOptions {
  probe: Probe;
  deliver: ResultSink;
  /** How long delivery may hold up the loop before it moves on */
  deliveryGraceMs?: number;
  overrunPolicy?: OverrunPolicy;
  now?: () => number;
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted || ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Delay until the next cycle may start, given how long the current one took.
 */
export function nextCycleDelay(intervalMs: number, elapsedMs: number, policy: OverrunPolicy): number {
  if (elapsedMs < intervalMs) {
    return intervalMs - elapsedMs;
  }
  if (policy === 'immediate') {
    return 0;
  }
  return Math.ceil(elapsedMs / intervalMs) * intervalMs - elapsedMs;
}

export class Prober {
  readonly target: Target;
  private probe: Probe;
  private deliver: ResultSink;
  private deliveryGraceMs: number;
  private overrunPolicy: OverrunPolicy;
  private now: () => number;
  private lastTimestamp = 0;
  private cycleCount = 0;
  private overrunCount = 0;

  constructor(target: Target, options: ProberOptions) {
    this.target = target;
    this.probe = options.probe;
    this.deliver = options.deliver;
    this.deliveryGraceMs = options.deliveryGraceMs ?? 1000;
    this.overrunPolicy = options.overrunPolicy ?? 'immediate';
    this.now = options.now ?? Date.now;
  }

  get cycles(): number {
    return this.cycleCount;
  }

  get overruns(): number {
    return this.overrunCount;
  }

  /**
   * Run cycles until `signal` aborts. An in-flight probe is allowed to
   * finish (it is bounded by the target timeout) and its result is
   * delivered; no new cycle starts after the abort is observed.
   */
  async run(signal: AbortSignal): Promise<void> {
    logger.debug(
      `Starting ${this.target.name} (${this.target.host}) every ${this.target.intervalMs}ms`
    );

    while (!signal.aborted) {
      const startedAt = this.now();

      const outcome = await this.runProbe();
      const result = this.toResult(outcome);
      this.cycleCount += 1;

      await this.deliverResult(result);

      const elapsed = this.now() - startedAt;
      if (elapsed >= this.target.intervalMs) {
        this.overrunCount += 1;
        logger.debug(
          `${this.target.name}: cycle took ${elapsed}ms, interval is ${this.target.intervalMs}ms`
        );
      }

      await sleep(nextCycleDelay(this.target.intervalMs, elapsed, this.overrunPolicy), signal);
    }

    logger.debug(`Stopped ${this.target.name} after ${this.cycleCount} cycles`);
  }

  private async runProbe(): Promise<ProbeOutcome> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<ProbeOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          success: false,
          errorKind: 'timeout',
          message: `No reply within ${this.target.timeoutMs}ms`,
        });
      }, this.target.timeoutMs);
    });

    const attempt = this.probe(this.target, controller.signal).catch(
      (error: unknown): ProbeOutcome => ({
        success: false,
        errorKind: 'unreachable',
        message: error instanceof Error ? error.message : String(error),
      })
    );

    try {
      return await Promise.race([attempt, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private toResult(outcome: ProbeOutcome): ProbeResult {
    // Timestamps never go backwards within one target's stream
    const timestamp = Math.max(this.now(), this.lastTimestamp);
    this.lastTimestamp = timestamp;

    const result: ProbeResult = {
      targetName: this.target.name,
      host: this.target.host,
      timestamp,
      success: outcome.success,
    };

    if (outcome.success) {
      if (outcome.responseTimeMs !== undefined) {
        result.responseTimeMs = outcome.responseTimeMs;
      }
    } else {
      result.errorKind = outcome.errorKind ?? 'unreachable';
      if (outcome.message) {
        result.message = outcome.message;
      }
    }

    const time = result.responseTimeMs !== undefined ? `${result.responseTimeMs.toFixed(2)}ms` : 'N/A';
    logger.debug(`[${result.success ? 'up' : 'down'}] ${this.target.name}: ${time}`);

    return result;
  }

  private async deliverResult(result: ProbeResult): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const delivery = Promise.resolve()
      .then(() => this.deliver(result))
      .then(
        () => true,
        (error: unknown) => {
          logger.error(`Delivery failed for ${this.target.name}:`, error);
          return true;
        }
      );

    const grace = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.deliveryGraceMs);
    });

    const delivered = await Promise.race([delivery, grace]);
    clearTimeout(timer);

    if (!delivered) {
      logger.warn(
        `Delivery for ${this.target.name} exceeded ${this.deliveryGraceMs}ms, continuing without waiting`
      );
    }
  }
}
