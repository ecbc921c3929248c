/**
 * Arbitration State
 * Layer: core
 *
 * Provided ports:
 *   - arbitration.observe
 *   - arbitration.phase
 *
 * Pure transitions over ArbitrationState. Every function returns a new
 * state without mutating its input; service calls happen in the tick.
 *
 * Phases (derived, never stored):
 *   serviceSuspendedByUs            -> contention-handled
 *   else contentionActive           -> contention-pending
 *   else                            -> idle
 *
 * Invariants:
 *   contentionStartedAt !== null  <=>  contentionActive
 *   a stop is only attempted while serviceSuspendedByUs is false
 */

import type { ArbitrationPhase, ArbitrationState, ProcessHandle } from './types';

export function createInitialState(): ArbitrationState {
  return {
    contentionActive: false,
    contentionStartedAt: null,
    serviceSuspendedByUs: false,
    lastMatched: [],
  };
}

// -----------------------------------------------------------------------------
// Port: arbitration.phase
// -----------------------------------------------------------------------------

export function phaseOf(state: ArbitrationState): ArbitrationPhase {
  if (state.serviceSuspendedByUs) return 'contention-handled';
  if (state.contentionActive) return 'contention-pending';
  return 'idle';
}

// -----------------------------------------------------------------------------
// Port: arbitration.observe
// -----------------------------------------------------------------------------

export interface ContentionUpdate {
  state: ArbitrationState;
  /** Contention began on this observation */
  started: boolean;
  /** Contention ended on this observation */
  cleared: boolean;
  /** How long the contention that just ended lasted (ms), null unless cleared */
  clearedAfterMs: number | null;
}

/**
 * Folds one classification result into the contention timer.
 */
export function observeContention(
  state: ArbitrationState,
  matched: readonly ProcessHandle[],
  nowMs: number,
): ContentionUpdate {
  if (matched.length > 0) {
    const started = !state.contentionActive;
    return {
      state: {
        ...state,
        contentionActive: true,
        contentionStartedAt: started ? nowMs : state.contentionStartedAt,
        lastMatched: matched,
      },
      started,
      cleared: false,
      clearedAfterMs: null,
    };
  }

  if (!state.contentionActive) {
    return { state, started: false, cleared: false, clearedAfterMs: null };
  }

  return {
    state: { ...state, contentionActive: false, contentionStartedAt: null, lastMatched: [] },
    started: false,
    cleared: true,
    clearedAfterMs: state.contentionStartedAt === null ? null : nowMs - state.contentionStartedAt,
  };
}

/**
 * True once contention has lasted at least the grace period.
 */
export function gracePeriodElapsed(
  state: ArbitrationState,
  nowMs: number,
  gracePeriodMs: number,
): boolean {
  return state.contentionStartedAt !== null && nowMs - state.contentionStartedAt >= gracePeriodMs;
}

/**
 * A stop is due when contention outlasted the grace period and we have
 * not already stopped the service.
 */
export function isStopDue(state: ArbitrationState, nowMs: number, gracePeriodMs: number): boolean {
  return (
    state.contentionActive &&
    !state.serviceSuspendedByUs &&
    gracePeriodElapsed(state, nowMs, gracePeriodMs)
  );
}

/**
 * A resume is owed when we stopped the service and contention is gone.
 */
export function isResumeDue(state: ArbitrationState): boolean {
  return state.serviceSuspendedByUs && !state.contentionActive;
}

export function markSuspended(state: ArbitrationState): ArbitrationState {
  return { ...state, serviceSuspendedByUs: true };
}

export function markResumed(state: ArbitrationState): ArbitrationState {
  return { ...state, serviceSuspendedByUs: false };
}
