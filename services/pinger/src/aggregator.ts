/**
 * Statistics Aggregator
 *
 * One instance per target. `ingest` is synchronous, so each result is
 * applied completely before the next one is looked at and no other
 * target's aggregator is ever involved.
 */

import { initialDetectorState, transition } from './state-machine';
import type { DetectorState, Transition } from './state-machine';
import type { DisconnectEvent, ProbeResult, Target, TargetStats } from './types';

export interface StatsSnapshot {
  stats: TargetStats;
  successRate: number;
  openEvent: DisconnectEvent | null;
  takenAt: number;
}

export interface AggregatorHooks {
  /** Called every `reportEvery` results */
  onSnapshot?: (snapshot: StatsSnapshot) => void;
  /** Called when a disconnect event is opened, extended or closed */
  onDisconnect?: (event: DisconnectEvent) => void;
}

export class TargetAggregator {
  readonly target: Target;
  private stats: TargetStats;
  private detector: DetectorState = initialDetectorState();
  private reportEvery: number;
  private sinceReport = 0;
  private sampleCount = 0;
  private hooks: AggregatorHooks;

  constructor(target: Target, reportEvery: number, hooks: AggregatorHooks = {}) {
    this.target = target;
    this.reportEvery = Math.max(1, reportEvery);
    this.hooks = hooks;
    this.stats = {
      targetName: target.name,
      host: target.host,
      pingCount: 0,
      successCount: 0,
      failureCount: 0,
      minRt: null,
      maxRt: null,
      avgRt: null,
      currentState: 'UNKNOWN',
      lastResultAt: null,
    };
  }

  ingest(result: ProbeResult): Transition {
    if (result.targetName !== this.target.name) {
      throw new Error(
        `Result for ${result.targetName} routed to aggregator for ${this.target.name}`
      );
    }

    const stats = this.stats;
    stats.pingCount += 1;

    const rt = result.responseTimeMs;
    if (result.success) {
      stats.successCount += 1;
      if (rt !== undefined && Number.isFinite(rt)) {
        this.addSample(rt);
      }
    } else {
      stats.failureCount += 1;
    }

    stats.lastResultAt = result.timestamp;

    const step = transition(this.detector, result);
    this.detector = step.next;
    stats.currentState = step.next.state;

    const changed = step.transition.opened ?? step.transition.updated ?? step.transition.closed;
    if (changed) {
      this.hooks.onDisconnect?.(changed);
    }

    this.sinceReport += 1;
    if (this.sinceReport >= this.reportEvery) {
      this.sinceReport = 0;
      this.hooks.onSnapshot?.(this.snapshot(result.timestamp));
    }

    return step.transition;
  }

  /**
   * Close the open event, if any, without a recovering result. Used when
   * the target stops being probed; the end time defaults to the last result.
   */
  closeOpenEvent(endTime?: number): DisconnectEvent | null {
    const open = this.detector.openEvent;
    if (!open) return null;

    const closed: DisconnectEvent = {
      ...open,
      endTime: Math.max(endTime ?? this.stats.lastResultAt ?? open.startTime, open.startTime),
    };
    this.detector = { state: this.detector.state, openEvent: null };
    this.hooks.onDisconnect?.(closed);
    return closed;
  }

  setReportEvery(reportEvery: number): void {
    this.reportEvery = Math.max(1, reportEvery);
  }

  getStats(): TargetStats {
    return { ...this.stats };
  }

  getOpenEvent(): DisconnectEvent | null {
    return this.detector.openEvent ? { ...this.detector.openEvent } : null;
  }

  snapshot(takenAt: number = Date.now()): StatsSnapshot {
    const stats = this.getStats();
    const successRate =
      stats.pingCount > 0 ? Math.round((stats.successCount / stats.pingCount) * 10000) / 100 : 0;

    return {
      stats,
      successRate,
      openEvent: this.getOpenEvent(),
      takenAt,
    };
  }

  /**
   * Running min/max/mean over successful samples.
   */
  private addSample(rt: number): void {
    const stats = this.stats;
    this.sampleCount += 1;

    stats.minRt = stats.minRt === null ? rt : Math.min(stats.minRt, rt);
    stats.maxRt = stats.maxRt === null ? rt : Math.max(stats.maxRt, rt);

    const previous = stats.avgRt ?? 0;
    const mean = previous + (rt - previous) / this.sampleCount;
    // Floating point drift must not push the mean outside [min, max].
    stats.avgRt = Math.min(Math.max(mean, stats.minRt), stats.maxRt);
  }
}
