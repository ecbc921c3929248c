/**
 * Service Controller
 * Layer: infra
 *
 * Provided ports:
 *   - service.isActive
 *   - service.stop
 *   - service.start
 *
 * Queries, stops and starts one systemd unit through systemctl. Stop and
 * start run with elevated privilege (`sudo -n`, never prompting) unless
 * disabled. The controller does not retry; the state machine decides.
 */

import type { CommandOutcome, CommandRunner } from './command';
import { describeFailure, runCommand } from './command';

// -----------------------------------------------------------------------------
// Outcomes
// -----------------------------------------------------------------------------

export interface ServiceError {
  success: false;
  /** Diagnostic from the failed command */
  error: string;
  exitCode: number | null;
  timedOut: boolean;
}

export interface StopResult {
  success: true;
  /** False when the service was already inactive and nothing was done */
  stopped: boolean;
}

export interface StartResult {
  success: true;
}

export type StopOutcome = StopResult | ServiceError;
export type StartOutcome = StartResult | ServiceError;

export interface ServiceController {
  readonly serviceName: string;
  /** Result of the most recent status query; may be stale. */
  readonly lastKnownActive: boolean | null;
  isActive(): Promise<boolean>;
  stop(): Promise<StopOutcome>;
  start(): Promise<StartOutcome>;
}

export interface SystemdServiceOptions {
  serviceName: string;
  timeoutMs: number;
  useSudo: boolean;
  run?: CommandRunner;
}

// -----------------------------------------------------------------------------
// systemd implementation
// -----------------------------------------------------------------------------

export class SystemdServiceController implements ServiceController {
  readonly serviceName: string;
  private readonly timeoutMs: number;
  private readonly useSudo: boolean;
  private readonly run: CommandRunner;
  private lastActive: boolean | null = null;

  constructor(options: SystemdServiceOptions) {
    this.serviceName = options.serviceName;
    this.timeoutMs = options.timeoutMs;
    this.useSudo = options.useSudo;
    this.run = options.run ?? runCommand;
  }

  get lastKnownActive(): boolean | null {
    return this.lastActive;
  }

  /**
   * Port: service.isActive
   *
   * Any failure (systemctl missing, timeout, non-zero exit) reads as inactive.
   */
  async isActive(): Promise<boolean> {
    const outcome = await this.run(['systemctl', 'is-active', '--quiet', this.serviceName], {
      timeoutMs: this.timeoutMs,
    });
    this.lastActive = outcome.exitCode === 0;
    return this.lastActive;
  }

  /**
   * Port: service.stop
   *
   * No-op success when the service is already inactive.
   */
  async stop(): Promise<StopOutcome> {
    if (!(await this.isActive())) {
      return { success: true, stopped: false };
    }

    const outcome = await this.run(this.privileged(['systemctl', 'stop', this.serviceName]), {
      timeoutMs: this.timeoutMs,
    });
    if (outcome.exitCode !== 0) {
      return toServiceError(outcome);
    }

    this.lastActive = false;
    return { success: true, stopped: true };
  }

  /**
   * Port: service.start
   *
   * Issued unconditionally; callers only start what they stopped.
   */
  async start(): Promise<StartOutcome> {
    const outcome = await this.run(this.privileged(['systemctl', 'start', this.serviceName]), {
      timeoutMs: this.timeoutMs,
    });
    if (outcome.exitCode !== 0) {
      return toServiceError(outcome);
    }

    this.lastActive = true;
    return { success: true };
  }

  private privileged(argv: string[]): string[] {
    return this.useSudo ? ['sudo', '-n', ...argv] : argv;
  }
}

function toServiceError(outcome: CommandOutcome): ServiceError {
  return {
    success: false,
    error: describeFailure(outcome),
    exitCode: outcome.exitCode,
    timedOut: outcome.timedOut,
  };
}
