/**
 * Command Runner
 * Layer: infra
 *
 * Provided ports:
 *   - command.run
 *
 * Runs an external command without a shell, bounded by a timeout.
 * The returned promise always resolves; failures are described in the outcome.
 */

import { execFile } from 'child_process';

export interface CommandOutcome {
  /** Exit code, or null when the command could not be run or was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** True when the timeout killed the command */
  timedOut: boolean;
  /** Spawn or kill error, null when the command ran to an exit code */
  error: string | null;
}

export interface RunCommandOptions {
  timeoutMs: number;
}

export type CommandRunner = (
  argv: readonly string[],
  options: RunCommandOptions,
) => Promise<CommandOutcome>;

// -----------------------------------------------------------------------------
// Port: command.run
// -----------------------------------------------------------------------------

export const runCommand: CommandRunner = (argv, options) => {
  const [file, ...args] = argv;
  if (file === undefined) {
    return Promise.resolve({
      exitCode: null,
      stdout: '',
      stderr: '',
      timedOut: false,
      error: 'Empty command',
    });
  }

  return new Promise((resolve) => {
    execFile(
      file,
      args,
      { timeout: options.timeoutMs, killSignal: 'SIGKILL', encoding: 'utf8' },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false, error: null });
          return;
        }

        // A numeric code is the exit status; a string code is a spawn errno (e.g. ENOENT).
        if (typeof err.code === 'number') {
          resolve({ exitCode: err.code, stdout, stderr, timedOut: false, error: null });
          return;
        }

        const timedOut = err.killed === true && err.signal === 'SIGKILL';
        resolve({
          exitCode: null,
          stdout,
          stderr,
          timedOut,
          error: timedOut ? `Timed out after ${options.timeoutMs}ms` : err.message,
        });
      },
    );
  });
};

/**
 * Picks the most useful diagnostic for a failed command.
 */
export function describeFailure(outcome: CommandOutcome): string {
  const stderr = outcome.stderr.trim();
  if (stderr) return stderr;
  if (outcome.error) return outcome.error;
  return `exit code ${outcome.exitCode ?? 'unknown'}`;
}
