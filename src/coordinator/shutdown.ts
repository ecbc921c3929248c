/**
 * Shutdown & Cleanup
 *
 * Signal handling sets the cancellation token; it never exits the process
 * itself. Cleanup runs once the loop has returned, whatever ended it.
 */

import type { EventSink } from '../events';
import type { ServiceController } from '../service';
import type { ArbitrationState } from '../types';
import { markResumed } from '../arbitration';
import { errorMessage } from '../utils';

export const SHUTDOWN_SIGNALS = ['SIGTERM', 'SIGINT'] as const;

export type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];

/**
 * Creates a handler that aborts the cancellation controller.
 * Aborting is idempotent; a repeated signal is only logged.
 *
 * @param cancellation - Token read by the loop at tick boundaries
 * @param emit - Event sink
 */
export function createShutdownHandler(
  cancellation: AbortController,
  emit: EventSink,
): (signal: ShutdownSignal) => void {
  return (signal) => {
    emit({ type: 'shutdown-requested', signal });
    if (!cancellation.signal.aborted) {
      cancellation.abort(signal);
    }
  };
}

/**
 * Issues the resume still owed at exit, if any. One attempt, no retry.
 */
export async function resumeIfOwed(
  state: ArbitrationState,
  service: ServiceController,
  emit: EventSink,
): Promise<ArbitrationState> {
  if (!state.serviceSuspendedByUs) {
    return state;
  }

  emit({ type: 'cleanup-resume', serviceName: service.serviceName });

  try {
    const result = await service.start();
    if (result.success) {
      emit({ type: 'service-started', serviceName: service.serviceName });
      return markResumed(state);
    }
    emit({ type: 'service-start-failed', serviceName: service.serviceName, error: result.error });
  } catch (error: unknown) {
    emit({
      type: 'service-start-failed',
      serviceName: service.serviceName,
      error: errorMessage(error),
    });
  }

  return state;
}
