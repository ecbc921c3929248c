/**
 * Single Arbitration Tick
 *
 * One pass of the state machine: snapshot, classify, update the contention
 * timer, then stop or start the service when a transition is due.
 *
 *   idle               --contention-->                   contention-pending
 *   contention-pending --cleared-->                      idle
 *   contention-pending --grace elapsed, active, stop ok--> contention-handled
 *   contention-handled --cleared, settle, start ok-->    idle
 *
 * A failed stop or start leaves the flags untouched so the action is
 * retried on a later tick.
 */

import type { ProcessClassifier } from '../classifier';
import type { EventSink } from '../events';
import type { SnapshotOutcome } from '../processes';
import type { ServiceController } from '../service';
import type { ArbitrationState, CoordinatorConfig } from '../types';
import {
  isResumeDue,
  isStopDue,
  markResumed,
  markSuspended,
  observeContention,
} from '../arbitration';

export interface TickDeps {
  snapshot: () => Promise<SnapshotOutcome>;
  classifier: ProcessClassifier;
  service: ServiceController;
  emit: EventSink;
  now: () => number;
  /** Settle delays; not interrupted by shutdown */
  sleep: (ms: number) => Promise<void>;
}

export type TickAction =
  | 'none'
  | 'skipped'
  | 'stopped'
  | 'stop-failed'
  | 'started'
  | 'start-failed';

export interface TickOutcome {
  state: ArbitrationState;
  action: TickAction;
}

export async function performTick(
  state: ArbitrationState,
  config: CoordinatorConfig,
  deps: TickDeps,
): Promise<TickOutcome> {
  const snapshot = await deps.snapshot();
  if (!snapshot.success) {
    // Observation error: keep the previous view of contention.
    deps.emit({ type: 'observation-failed', error: snapshot.error });
    return { state, action: 'skipped' };
  }

  const matched = deps.classifier.classify(snapshot.snapshot);
  const nowMs = deps.now();
  const update = observeContention(state, matched, nowMs);
  const next = update.state;

  if (update.started) {
    deps.emit({ type: 'contention-detected', processes: matched });
  }
  if (update.cleared) {
    deps.emit({ type: 'contention-cleared', durationMs: update.clearedAfterMs ?? 0 });
  }

  if (isStopDue(next, nowMs, config.gracePeriod)) {
    return suspendService(next, config, deps);
  }

  if (isResumeDue(next)) {
    // Settle only when the job has just left; retries go straight to start.
    if (update.cleared) {
      await deps.sleep(config.settleDelayAfterClear);
    }
    return resumeService(next, deps);
  }

  return { state: next, action: 'none' };
}

async function suspendService(
  state: ArbitrationState,
  config: CoordinatorConfig,
  deps: TickDeps,
): Promise<TickOutcome> {
  const { service } = deps;

  if (!(await service.isActive())) {
    return { state, action: 'none' };
  }

  const result = await service.stop();
  if (!result.success) {
    deps.emit({ type: 'service-stop-failed', serviceName: service.serviceName, error: result.error });
    return { state, action: 'stop-failed' };
  }
  if (!result.stopped) {
    // Went inactive between the query and the stop; not ours to restart.
    return { state, action: 'none' };
  }

  deps.emit({ type: 'service-stopped', serviceName: service.serviceName });
  await deps.sleep(config.settleDelayAfterStop);
  return { state: markSuspended(state), action: 'stopped' };
}

async function resumeService(state: ArbitrationState, deps: TickDeps): Promise<TickOutcome> {
  const { service } = deps;

  const result = await service.start();
  if (!result.success) {
    deps.emit({ type: 'service-start-failed', serviceName: service.serviceName, error: result.error });
    return { state, action: 'start-failed' };
  }

  deps.emit({ type: 'service-started', serviceName: service.serviceName });
  return { state: markResumed(state), action: 'started' };
}
