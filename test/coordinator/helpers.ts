/**
 * Shared test helpers for coordinator test modules.
 */

import type { ConfigOverrides } from '../../src/config';
import { createConfig } from '../../src/config';
import type { ServiceController, StartOutcome, StopOutcome } from '../../src/service';
import type { CoordinatorConfig, ProcessInfo, ProcessSnapshot } from '../../src/types';

export function makeProcess(pid: number, commandLine: string, name?: string): ProcessInfo {
  return { pid, name: name ?? commandLine.split(' ')[0] ?? '', commandLine };
}

export function makeSnapshot(processes: ProcessInfo[], takenAt = 0): ProcessSnapshot {
  return { takenAt, processes };
}

export function makeConfig(overrides: ConfigOverrides = {}): CoordinatorConfig {
  return createConfig({
    pollInterval: 1_000,
    gracePeriod: 8_000,
    settleDelayAfterStop: 3_000,
    settleDelayAfterClear: 2_000,
    ...overrides,
  });
}

export const BATCH_JOB = makeProcess(4242, 'python -m rdb --build', 'python');

export function makeClock(start = 0): { now: () => number; advance: (ms: number) => void } {
  let t = start;
  return {
    now: () => t,
    advance: (ms) => {
      t += ms;
    },
  };
}

/**
 * In-memory service. The next `stopFailures` / `startFailures` calls fail.
 * Every call is appended to `calls` so tests can assert ordering.
 */
export class FakeService implements ServiceController {
  readonly serviceName = 'vllm.service';
  lastKnownActive: boolean | null = null;
  active: boolean;
  stopFailures = 0;
  startFailures = 0;
  stopCalls = 0;
  startCalls = 0;
  calls: string[];

  constructor(active = true, calls: string[] = []) {
    this.active = active;
    this.calls = calls;
  }

  async isActive(): Promise<boolean> {
    this.calls.push('isActive');
    this.lastKnownActive = this.active;
    return this.active;
  }

  async stop(): Promise<StopOutcome> {
    this.stopCalls++;
    this.calls.push('stop');
    if (!this.active) {
      return { success: true, stopped: false };
    }
    if (this.stopFailures > 0) {
      this.stopFailures--;
      return { success: false, error: 'Job for vllm.service canceled.', exitCode: 1, timedOut: false };
    }
    this.active = false;
    return { success: true, stopped: true };
  }

  async start(): Promise<StartOutcome> {
    this.startCalls++;
    this.calls.push('start');
    if (this.startFailures > 0) {
      this.startFailures--;
      return { success: false, error: 'Unit vllm.service failed.', exitCode: 1, timedOut: false };
    }
    this.active = true;
    return { success: true };
  }
}
