/**
 * Disconnect detector
 *
 * Three-state machine (UNKNOWN / UP / DOWN) driven by probe outcomes.
 * The open event is part of the state, so "at most one open event per
 * target" holds by construction: there is exactly one slot for it.
 */

import type { DisconnectEvent, ProbeResult, TargetState } from './types';

export interface DetectorState {
  state: TargetState;
  openEvent: DisconnectEvent | null;
}

export type TransitionKind =
  | 'first_up'
  | 'first_down'
  | 'still_up'
  | 'went_down'
  | 'still_down'
  | 'recovered';

export interface Transition {
  kind: TransitionKind;
  from: TargetState;
  to: TargetState;
  /** Event opened by this result (went_down) */
  opened?: DisconnectEvent;
  /** Open event extended by this result (still_down) */
  updated?: DisconnectEvent;
  /** Event closed by this result (recovered) */
  closed?: DisconnectEvent;
}

export function initialDetectorState(): DetectorState {
  return { state: 'UNKNOWN', openEvent: null };
}

/**
 * Compute the next detector state. Does not mutate `current`; events in
 * the result are fresh objects.
 */
export function transition(
  current: DetectorState,
  result: ProbeResult
): { next: DetectorState; transition: Transition } {
  const from = current.state;

  if (from === 'UNKNOWN') {
    const to: TargetState = result.success ? 'UP' : 'DOWN';
    return {
      next: { state: to, openEvent: null },
      transition: { kind: result.success ? 'first_up' : 'first_down', from, to },
    };
  }

  if (from === 'UP') {
    if (result.success) {
      return {
        next: current,
        transition: { kind: 'still_up', from, to: 'UP' },
      };
    }

    const opened: DisconnectEvent = {
      targetName: result.targetName,
      host: result.host,
      startTime: result.timestamp,
      consecutiveFailureCount: 1,
    };
    return {
      next: { state: 'DOWN', openEvent: opened },
      transition: { kind: 'went_down', from, to: 'DOWN', opened: { ...opened } },
    };
  }

  // DOWN
  if (!result.success) {
    if (!current.openEvent) {
      // Entered DOWN from UNKNOWN; there is no event to extend.
      return {
        next: current,
        transition: { kind: 'still_down', from, to: 'DOWN' },
      };
    }

    const updated: DisconnectEvent = {
      ...current.openEvent,
      consecutiveFailureCount: current.openEvent.consecutiveFailureCount + 1,
    };
    return {
      next: { state: 'DOWN', openEvent: updated },
      transition: { kind: 'still_down', from, to: 'DOWN', updated: { ...updated } },
    };
  }

  if (!current.openEvent) {
    return {
      next: { state: 'UP', openEvent: null },
      transition: { kind: 'recovered', from, to: 'UP' },
    };
  }

  const closed: DisconnectEvent = {
    ...current.openEvent,
    endTime: Math.max(result.timestamp, current.openEvent.startTime),
  };
  return {
    next: { state: 'UP', openEvent: null },
    transition: { kind: 'recovered', from, to: 'UP', closed },
  };
}
