/**
 * Range dashboard
 *
 * Combines per-target aggregates read from history over a time window with
 * the live engine state into the `/api/data` payload.
 */

import type { TargetView } from './engine';
import type { TargetState } from './types';
import type { DisconnectSummaryRow, RangeSummaryRow, SeriesPointRow } from './writers/store';

export const DATA_RANGE_NAMES = ['1h', '24h', '30d'] as const;

export type DataRange = (typeof DATA_RANGE_NAMES)[number];

export interface RangeWindow {
  windowMs: number;
  /** Width of one time series point */
  bucketSeconds: number;
}

const HOUR_MS = 60 * 60 * 1000;

export const DATA_RANGES: Record<DataRange, RangeWindow> = {
  '1h': { windowMs: HOUR_MS, bucketSeconds: 60 },
  '24h': { windowMs: 24 * HOUR_MS, bucketSeconds: 15 * 60 },
  '30d': { windowMs: 30 * 24 * HOUR_MS, bucketSeconds: 6 * 60 * 60 },
};

export type DashboardStatus = 'up' | 'down' | 'unknown';

const STATUS: Record<TargetState, DashboardStatus> = {
  UP: 'up',
  DOWN: 'down',
  UNKNOWN: 'unknown',
};

export interface DashboardTarget {
  name: string;
  host: string;
  pings: number;
  successful_pings: number;
  failed_pings: number;
  success_rate: number;
  avg_response_time: number | null;
  min_response_time: number | null;
  max_response_time: number | null;
  jitter: number;
  disconnect_count: number;
  last_disconnect: number | null;
  status: DashboardStatus;
}

export interface DashboardDisconnect {
  target_name: string;
  host: string;
  disconnect_count: number;
  last_disconnect: number;
}

export interface DashboardSeries {
  timestamps: number[];
  avg_response_times: (number | null)[];
  min_response_times: (number | null)[];
  max_response_times: (number | null)[];
}

export interface DashboardData {
  time_range: DataRange;
  since: number;
  total_targets: number;
  total_pings: number;
  uptime: number;
  targets: DashboardTarget[];
  disconnects: DashboardDisconnect[];
  timeseries: Record<string, DashboardSeries>;
}

export interface DashboardInput {
  range: DataRange;
  since: Date;
  views: TargetView[];
  summaries: RangeSummaryRow[];
  disconnects: DisconnectSummaryRow[];
  series: SeriesPointRow[];
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function round2OrNull(value: number | null): number | null {
  return value === null ? null : round2(value);
}

/**
 * Registered targets come first in registry order, followed by targets that
 * only appear in history, by name.
 */
export function buildDashboard(input: DashboardInput): DashboardData {
  const summaries = new Map(input.summaries.map((row) => [row.targetName, row]));
  const disconnects = new Map(input.disconnects.map((row) => [row.targetName, row]));
  const views = new Map(input.views.map((view) => [view.target.name, view]));

  const historical = new Set<string>();
  for (const name of [...summaries.keys(), ...disconnects.keys()]) {
    if (!views.has(name)) historical.add(name);
  }
  const names = [...views.keys(), ...[...historical].sort()];

  let totalPings = 0;
  let totalSuccesses = 0;

  const targets = names.map((name): DashboardTarget => {
    const view = views.get(name);
    const summary = summaries.get(name);
    const disconnect = disconnects.get(name);

    const pings = summary?.pings ?? 0;
    const successes = summary?.successes ?? 0;
    totalPings += pings;
    totalSuccesses += successes;

    return {
      name,
      host: view?.target.host ?? summary?.host ?? disconnect?.host ?? '',
      pings,
      successful_pings: successes,
      failed_pings: pings - successes,
      success_rate: pings > 0 ? round2((successes / pings) * 100) : 0,
      avg_response_time: round2OrNull(summary?.avgResponseTime ?? null),
      min_response_time: round2OrNull(summary?.minResponseTime ?? null),
      max_response_time: round2OrNull(summary?.maxResponseTime ?? null),
      // Sample standard deviation; fewer than two samples means no jitter
      jitter: round2(summary?.jitter ?? 0),
      disconnect_count: disconnect?.disconnectCount ?? 0,
      last_disconnect: disconnect?.lastDisconnectAt ?? null,
      status: view ? STATUS[view.stats.currentState] : 'unknown',
    };
  });

  const timeseries: Record<string, DashboardSeries> = {};
  for (const name of names) {
    timeseries[name] = {
      timestamps: [],
      avg_response_times: [],
      min_response_times: [],
      max_response_times: [],
    };
  }
  for (const point of input.series) {
    const series = timeseries[point.targetName];
    if (!series) continue;
    series.timestamps.push(point.bucketStart);
    series.avg_response_times.push(round2OrNull(point.avgResponseTime));
    series.min_response_times.push(round2OrNull(point.minResponseTime));
    series.max_response_times.push(round2OrNull(point.maxResponseTime));
  }

  return {
    time_range: input.range,
    since: input.since.getTime(),
    total_targets: targets.length,
    total_pings: totalPings,
    uptime: totalPings > 0 ? round2((totalSuccesses / totalPings) * 100) : 0,
    targets,
    disconnects: input.disconnects.map((row) => ({
      target_name: row.targetName,
      host: row.host,
      disconnect_count: row.disconnectCount,
      last_disconnect: row.lastDisconnectAt,
    })),
    timeseries,
  };
}
