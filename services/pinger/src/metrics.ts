/**
 * Metrics Collector
 *
 * In-memory gauge and counter per target for the pull-based /metrics
 * endpoint. Draining swaps each metric's map for an empty one in a single
 * synchronous step, so every increment lands either in the drained
 * snapshot or in the next one.
 */

import type { Transition } from './state-machine';
import type { ProbeResult, Target } from './types';

export const PING_TIME_METRIC = 'pingit_ping_time_ms';
export const DISCONNECT_METRIC = 'pingit_disconnect_events_total';

export interface MetricSample {
  targetName: string;
  host: string;
  value: number;
}

export interface MetricsSnapshot {
  [PING_TIME_METRIC]: MetricSample[];
  [DISCONNECT_METRIC]: MetricSample[];
}

export class MetricsCollector {
  private pingTimes = new Map<string, MetricSample>();
  private disconnects = new Map<string, MetricSample>();
  private hosts = new Map<string, string>();

  constructor(targets: readonly Target[] = []) {
    this.setTargets(targets);
  }

  /**
   * Register the targets whose counters are always reported, even at zero.
   * Samples for targets no longer registered are discarded.
   */
  setTargets(targets: readonly Target[]): void {
    const hosts = new Map<string, string>();
    for (const target of targets) {
      hosts.set(target.name, target.host);
    }
    this.hosts = hosts;

    for (const name of [...this.pingTimes.keys()]) {
      if (!hosts.has(name)) this.pingTimes.delete(name);
    }
    for (const name of [...this.disconnects.keys()]) {
      if (!hosts.has(name)) this.disconnects.delete(name);
    }
  }

  record(result: ProbeResult, step?: Transition): void {
    if (result.success && result.responseTimeMs !== undefined) {
      this.pingTimes.set(result.targetName, {
        targetName: result.targetName,
        host: result.host,
        value: result.responseTimeMs,
      });
    }

    if (step?.kind === 'went_down') {
      this.incrementDisconnect(result.targetName, result.host);
    }
  }

  incrementDisconnect(targetName: string, host: string): void {
    const current = this.disconnects.get(targetName);
    if (current) {
      current.value += 1;
    } else {
      this.disconnects.set(targetName, { targetName, host, value: 1 });
    }
  }

  /**
   * Return current values and reset every gauge and counter.
   */
  drain(): MetricsSnapshot {
    const pingTimes = this.pingTimes;
    this.pingTimes = new Map();

    const disconnects = this.disconnects;
    this.disconnects = new Map();

    return this.buildSnapshot(pingTimes, disconnects);
  }

  /**
   * Return current values without clearing them.
   */
  peek(): MetricsSnapshot {
    return this.buildSnapshot(new Map(this.pingTimes), new Map(this.disconnects));
  }

  private buildSnapshot(
    pingTimes: Map<string, MetricSample>,
    disconnects: Map<string, MetricSample>
  ): MetricsSnapshot {
    const counters: MetricSample[] = [];
    for (const [targetName, host] of this.hosts) {
      const sample = disconnects.get(targetName);
      counters.push({ targetName, host, value: sample?.value ?? 0 });
    }
    // Counts for targets that were unregistered after the increment
    for (const [targetName, sample] of disconnects) {
      if (!this.hosts.has(targetName)) counters.push({ ...sample });
    }

    return {
      [PING_TIME_METRIC]: [...pingTimes.values()].map((sample) => ({ ...sample })),
      [DISCONNECT_METRIC]: counters,
    };
  }
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function formatLabels(sample: MetricSample): string {
  return `{target_name="${escapeLabelValue(sample.targetName)}",host="${escapeLabelValue(sample.host)}"}`;
}

/**
 * Prometheus text exposition format (version 0.0.4).
 */
export function renderMetrics(snapshot: MetricsSnapshot): string {
  const lines: string[] = [
    `# HELP ${PING_TIME_METRIC} Last successful ping response time in milliseconds`,
    `# TYPE ${PING_TIME_METRIC} gauge`,
  ];

  for (const sample of snapshot[PING_TIME_METRIC]) {
    lines.push(`${PING_TIME_METRIC}${formatLabels(sample)} ${sample.value}`);
  }

  lines.push(
    `# HELP ${DISCONNECT_METRIC} Disconnect events opened since the previous scrape`,
    `# TYPE ${DISCONNECT_METRIC} counter`
  );

  for (const sample of snapshot[DISCONNECT_METRIC]) {
    lines.push(`${DISCONNECT_METRIC}${formatLabels(sample)} ${sample.value}`);
  }

  return lines.join('\n') + '\n';
}

export const METRICS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';
