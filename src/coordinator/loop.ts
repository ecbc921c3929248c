/**
 * Coordinator Main Loop
 *
 * The polling loop around performTick, with cooperative cancellation and
 * guaranteed cleanup. Collaborators are injected for testability.
 */

import type { ProcessClassifier } from '../classifier';
import { createSubstringClassifier } from '../classifier';
import type { EventSink } from '../events';
import type { SnapshotOutcome } from '../processes';
import { createSnapshotSource } from '../processes';
import type { ServiceController } from '../service';
import { SystemdServiceController } from '../service';
import type { ArbitrationState, CoordinatorConfig } from '../types';
import { createInitialState } from '../arbitration';
import { errorMessage, sleep } from '../utils';
import { performTick } from './tick';
import type { ShutdownSignal } from './shutdown';
import { SHUTDOWN_SIGNALS, createShutdownHandler, resumeIfOwed } from './shutdown';

/**
 * Dependency injection interface for runCoordinatorLoop.
 * Production defaults come from createDefaultDeps.
 */
export interface LoopDeps {
  /** Installs a signal listener; returns a function removing it */
  registerSignal: (signal: ShutdownSignal, handler: () => void) => () => void;
  now: () => number;
  /** Resolves early when the signal aborts */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  snapshot: () => Promise<SnapshotOutcome>;
  classifier: ProcessClassifier;
  service: ServiceController;
  emit: EventSink;
}

export function createDefaultDeps(config: CoordinatorConfig, emit: EventSink): LoopDeps {
  return {
    registerSignal: (signal, handler) => {
      process.on(signal, handler);
      return () => {
        process.off(signal, handler);
      };
    },
    now: () => Date.now(),
    sleep,
    snapshot: createSnapshotSource({ timeoutMs: config.commandTimeout }),
    classifier: createSubstringClassifier(config),
    service: new SystemdServiceController({
      serviceName: config.serviceName,
      timeoutMs: config.commandTimeout,
      useSudo: config.useSudo,
    }),
    emit,
  };
}

// -----------------------------------------------------------------------------
// Coordinator main loop
// -----------------------------------------------------------------------------

/**
 * Runs until the cancellation controller aborts (SIGTERM/SIGINT).
 *
 * Each iteration: one tick, then the poll interval. Errors escaping a tick
 * are logged and the previous state is kept. However the loop ends, a
 * resume still owed is attempted before returning.
 *
 * @returns Final arbitration state after cleanup
 */
export async function runCoordinatorLoop(
  config: CoordinatorConfig,
  deps: LoopDeps,
  cancellation: AbortController = new AbortController(),
): Promise<ArbitrationState> {
  let state = createInitialState();
  const { signal } = cancellation;

  const onShutdown = createShutdownHandler(cancellation, deps.emit);
  const unregister = SHUTDOWN_SIGNALS.map((sig) => deps.registerSignal(sig, () => onShutdown(sig)));

  deps.emit({
    type: 'loop-started',
    serviceName: config.serviceName,
    literalPatterns: [...config.literalPatterns],
    keywordStems: [...config.keywordStems],
    pollIntervalMs: config.pollInterval,
    gracePeriodMs: config.gracePeriod,
  });

  const tickDeps = { ...deps, sleep: (ms: number) => deps.sleep(ms) };

  try {
    while (!signal.aborted) {
      try {
        const outcome = await performTick(state, config, tickDeps);
        state = outcome.state;
      } catch (error: unknown) {
        deps.emit({ type: 'tick-failed', error: errorMessage(error) });
      }

      if (signal.aborted) break;
      await deps.sleep(config.pollInterval, signal);
    }
  } finally {
    state = await resumeIfOwed(state, deps.service, deps.emit);
    for (const remove of unregister) remove();
    deps.emit({ type: 'loop-stopped', serviceSuspendedByUs: state.serviceSuspendedByUs });
  }

  return state;
}
