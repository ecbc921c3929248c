/**
 * Boundary types for gpu-coordinator
 *
 * These types define the contracts between modules.
 */

// -----------------------------------------------------------------------------
// ProcessInfo
// One live process as observed in a snapshot
// -----------------------------------------------------------------------------

export interface ProcessInfo {
  /** Process ID */
  pid: number;
  /** Short executable name */
  name: string;
  /** Full command line, arguments joined by spaces */
  commandLine: string;
}

// -----------------------------------------------------------------------------
// ProcessSnapshot
// Immutable point-in-time view of the process table, rebuilt every tick
// -----------------------------------------------------------------------------

export interface ProcessSnapshot {
  /** Epoch milliseconds when the snapshot was taken */
  readonly takenAt: number;
  readonly processes: readonly ProcessInfo[];
}

// -----------------------------------------------------------------------------
// ProcessHandle
// A process judged to need exclusive GPU access
// -----------------------------------------------------------------------------

export type MatchRule = 'literal' | 'keyword';

export interface ProcessHandle {
  pid: number;
  /** Display name (executable name) */
  name: string;
  /** Which matching rule classified this process */
  rule: MatchRule;
  /** The pattern or stem that matched */
  matched: string;
}

// -----------------------------------------------------------------------------
// ArbitrationState
// The only state carried across ticks. Held in memory, owned by the loop.
// -----------------------------------------------------------------------------

export interface ArbitrationState {
  /** Exclusive-access processes were observed on the last tick */
  contentionActive: boolean;
  /** Epoch ms when contention was first observed; non-null iff contentionActive */
  contentionStartedAt: number | null;
  /** The coordinator stopped the service and still owes a start */
  serviceSuspendedByUs: boolean;
  /** Processes matched on the most recent tick */
  lastMatched: readonly ProcessHandle[];
}

export type ArbitrationPhase = 'idle' | 'contention-pending' | 'contention-handled';

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export interface CoordinatorConfig {
  /** systemd unit to suspend and resume */
  readonly serviceName: string;
  /** Milliseconds between ticks */
  readonly pollInterval: number;
  /** Milliseconds contention is tolerated before the service is stopped */
  readonly gracePeriod: number;
  /** Milliseconds to wait after a successful stop, for device memory to be released */
  readonly settleDelayAfterStop: number;
  /** Milliseconds to wait after contention clears, before starting the service */
  readonly settleDelayAfterClear: number;
  /** Matched as exact substrings of the command line */
  readonly literalPatterns: ReadonlySet<string>;
  /** Matched as case-insensitive substrings of the command line */
  readonly keywordStems: ReadonlySet<string>;
  /** Budget in milliseconds for each external call */
  readonly commandTimeout: number;
  /** Prefix stop/start with `sudo -n` */
  readonly useSudo: boolean;
}

// -----------------------------------------------------------------------------
// Platform info
// -----------------------------------------------------------------------------

export type Platform = 'linux' | 'darwin' | 'win32' | 'unknown';

export interface PlatformInfo {
  platform: Platform;
  supported: boolean;
  reason?: string;
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const COORDINATOR_NAME = 'gpu-coordinator';
export const COORDINATOR_VERSION = '1.0.0';

export const LOG_LEVEL_ENV = 'GPU_COORDINATOR_LOG_LEVEL';
export const DEBUG_ENV = 'GPU_COORDINATOR_DEBUG';
