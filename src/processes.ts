/**
 * Process Snapshot
 * Layer: infra
 *
 * Provided ports:
 *   - processes.snapshot
 *   - processes.source
 *
 * Enumerates live processes through ps-list. A process whose command line
 * cannot be read (permissions, kernel threads, exited mid-scan) is dropped
 * from the snapshot rather than reported. The coordinator and its launchers
 * (npm, tsx, a shell) are left out: their command lines carry the patterns
 * given as flags.
 */

import psList, { type ProcessDescriptor } from 'ps-list';
import type { ProcessInfo, ProcessSnapshot } from './types';
import { errorMessage, withTimeout } from './utils';

// -----------------------------------------------------------------------------
// Port: processes.snapshot
// -----------------------------------------------------------------------------

export interface SnapshotResult {
  success: true;
  snapshot: ProcessSnapshot;
}

export interface SnapshotError {
  success: false;
  error: string;
}

export type SnapshotOutcome = SnapshotResult | SnapshotError;

export type ProcessLister = () => Promise<ProcessDescriptor[]>;

export interface SnapshotOptions {
  /** Budget for the whole enumeration */
  timeoutMs: number;
  /** Left out of the snapshot with its ancestors; defaults to this process */
  selfPid?: number;
  now?: () => number;
  /** Defaults to ps-list over all users */
  list?: ProcessLister;
}

const listAll: ProcessLister = () => psList({ all: true });

/**
 * Returns selfPid and every ancestor found by walking ppid links.
 * Stops at pid 0, at a pid missing from the listing, or on a cycle.
 */
export function lineageOf(selfPid: number, listed: readonly ProcessDescriptor[]): Set<number> {
  const parents = new Map(listed.map((entry) => [entry.pid, entry.ppid]));
  const lineage = new Set<number>([selfPid]);

  let current = parents.get(selfPid);
  while (current !== undefined && current > 0 && !lineage.has(current)) {
    lineage.add(current);
    current = parents.get(current);
  }
  return lineage;
}

/**
 * Takes a point-in-time snapshot of the process table.
 */
export async function takeSnapshot(options: SnapshotOptions): Promise<SnapshotOutcome> {
  const selfPid = options.selfPid ?? process.pid;
  const now = options.now ?? Date.now;
  const list = options.list ?? listAll;

  try {
    const listed = await withTimeout(list(), options.timeoutMs, 'Process listing');
    const excluded = lineageOf(selfPid, listed);
    const processes: ProcessInfo[] = [];

    for (const entry of listed) {
      if (excluded.has(entry.pid)) continue;
      const commandLine = entry.cmd?.trim();
      if (!commandLine) continue;
      processes.push({ pid: entry.pid, name: entry.name, commandLine });
    }

    return {
      success: true,
      snapshot: Object.freeze({ takenAt: now(), processes: Object.freeze(processes) }),
    };
  } catch (err) {
    return { success: false, error: `Failed to list processes: ${errorMessage(err)}` };
  }
}

// -----------------------------------------------------------------------------
// Port: processes.source
// -----------------------------------------------------------------------------

/**
 * Snapshot provider for the loop. ps-list cannot cancel the `ps` it spawns,
 * so a listing abandoned at the time budget keeps running; while it does,
 * later calls fail fast instead of spawning another one.
 */
export function createSnapshotSource(
  options: SnapshotOptions,
): () => Promise<SnapshotOutcome> {
  const list = options.list ?? listAll;
  let pending: Promise<ProcessDescriptor[]> | null = null;

  const trackedList: ProcessLister = () => {
    const listing = list();
    pending = listing;
    const release = (): void => {
      if (pending === listing) pending = null;
    };
    void listing.then(release, release);
    return listing;
  };

  return async () => {
    if (pending !== null) {
      return {
        success: false,
        error: 'Failed to list processes: previous listing is still running',
      };
    }
    return takeSnapshot({ ...options, list: trackedList });
  };
}
