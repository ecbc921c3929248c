/**
 * Coordinator Events
 * Layer: core
 *
 * Discrete events emitted by the loop and the state machine.
 * Rendering is left to the sink (see logger.ts).
 */

import type { ProcessHandle } from './types';

export type CoordinatorEvent =
  | {
      type: 'loop-started';
      serviceName: string;
      literalPatterns: string[];
      keywordStems: string[];
      pollIntervalMs: number;
      gracePeriodMs: number;
    }
  | { type: 'contention-detected'; processes: readonly ProcessHandle[] }
  | { type: 'contention-cleared'; durationMs: number }
  | { type: 'service-stopped'; serviceName: string }
  | { type: 'service-started'; serviceName: string }
  | { type: 'service-stop-failed'; serviceName: string; error: string }
  | { type: 'service-start-failed'; serviceName: string; error: string }
  | { type: 'cleanup-resume'; serviceName: string }
  | { type: 'observation-failed'; error: string }
  | { type: 'tick-failed'; error: string }
  | { type: 'shutdown-requested'; signal: string }
  | { type: 'loop-stopped'; serviceSuspendedByUs: boolean };

export type CoordinatorEventType = CoordinatorEvent['type'];

export type EventSink = (event: CoordinatorEvent) => void;
