/**
 * Core data model shared by the prober, aggregator, metrics collector
 * and persistence writer.
 */

export interface Target {
  name: string;
  host: string;
  /** Milliseconds between cycle starts */
  intervalMs: number;
  /** Milliseconds before a single probe is abandoned */
  timeoutMs: number;
}

export type ProbeErrorKind = 'timeout' | 'unreachable' | 'host_resolution_failed';

export interface ProbeResult {
  targetName: string;
  host: string;
  /** Epoch milliseconds */
  timestamp: number;
  success: boolean;
  responseTimeMs?: number;
  errorKind?: ProbeErrorKind;
  message?: string;
}

export type TargetState = 'UNKNOWN' | 'UP' | 'DOWN';

export interface TargetStats {
  targetName: string;
  host: string;
  pingCount: number;
  successCount: number;
  failureCount: number;
  minRt: number | null;
  maxRt: number | null;
  avgRt: number | null;
  currentState: TargetState;
  lastResultAt: number | null;
}

export interface DisconnectEvent {
  targetName: string;
  host: string;
  startTime: number;
  endTime?: number;
  consecutiveFailureCount: number;
}

export type OverrunPolicy = 'immediate' | 'skip';
