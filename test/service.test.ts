/**
 * Service Controller Tests
 *
 * A scripted CommandRunner stands in for systemctl.
 */

import { describe, it, expect, vi } from 'vitest';
import type { CommandOutcome, CommandRunner } from '../src/command';
import { SystemdServiceController } from '../src/service';

function outcome(exitCode: number | null, overrides: Partial<CommandOutcome> = {}): CommandOutcome {
  return { exitCode, stdout: '', stderr: '', timedOut: false, error: null, ...overrides };
}

/** Runner answering is-active with `active`, and stop/start with the given outcomes. */
function makeRunner(
  active: boolean,
  results: { stop?: CommandOutcome; start?: CommandOutcome } = {},
) {
  return vi.fn<CommandRunner>(async (argv) => {
    if (argv.includes('is-active')) return outcome(active ? 0 : 3);
    if (argv.includes('stop')) return results.stop ?? outcome(0);
    if (argv.includes('start')) return results.start ?? outcome(0);
    return outcome(1);
  });
}

function makeController(run: CommandRunner, useSudo = true): SystemdServiceController {
  return new SystemdServiceController({
    serviceName: 'vllm.service',
    timeoutMs: 10_000,
    useSudo,
    run,
  });
}

describe('SystemdServiceController', () => {
  describe('isActive', () => {
    it('queries systemctl without sudo and caches the answer', async () => {
      const run = makeRunner(true);
      const controller = makeController(run);

      expect(controller.lastKnownActive).toBeNull();
      expect(await controller.isActive()).toBe(true);
      expect(controller.lastKnownActive).toBe(true);
      expect(run).toHaveBeenCalledWith(['systemctl', 'is-active', '--quiet', 'vllm.service'], {
        timeoutMs: 10_000,
      });
    });

    it('treats a failed query as inactive', async () => {
      const run = vi.fn<CommandRunner>(async () =>
        outcome(null, { error: 'spawn systemctl ENOENT' }),
      );

      expect(await makeController(run).isActive()).toBe(false);
    });
  });

  describe('stop', () => {
    it('is a no-op when the service is already inactive', async () => {
      const run = makeRunner(false);

      const result = await makeController(run).stop();

      expect(result).toEqual({ success: true, stopped: false });
      expect(run).toHaveBeenCalledTimes(1);
    });

    it('stops an active service through sudo -n', async () => {
      const run = makeRunner(true);
      const controller = makeController(run);

      const result = await controller.stop();

      expect(result).toEqual({ success: true, stopped: true });
      expect(run).toHaveBeenLastCalledWith(['sudo', '-n', 'systemctl', 'stop', 'vllm.service'], {
        timeoutMs: 10_000,
      });
      expect(controller.lastKnownActive).toBe(false);
    });

    it('runs systemctl directly when sudo is disabled', async () => {
      const run = makeRunner(true);

      await makeController(run, false).stop();

      expect(run).toHaveBeenLastCalledWith(['systemctl', 'stop', 'vllm.service'], {
        timeoutMs: 10_000,
      });
    });

    it('returns the command diagnostic on failure', async () => {
      const run = makeRunner(true, {
        stop: outcome(1, { stderr: 'sudo: a password is required\n' }),
      });

      const result = await makeController(run).stop();

      expect(result).toEqual({
        success: false,
        error: 'sudo: a password is required',
        exitCode: 1,
        timedOut: false,
      });
    });

    it('reports a timed-out stop', async () => {
      const run = makeRunner(true, {
        stop: outcome(null, { timedOut: true, error: 'Timed out after 10000ms' }),
      });

      const result = await makeController(run).stop();

      expect(result).toEqual({
        success: false,
        error: 'Timed out after 10000ms',
        exitCode: null,
        timedOut: true,
      });
    });
  });

  describe('start', () => {
    it('starts unconditionally, without a status query', async () => {
      const run = makeRunner(true);
      const controller = makeController(run);

      const result = await controller.start();

      expect(result).toEqual({ success: true });
      expect(run).toHaveBeenCalledTimes(1);
      expect(run).toHaveBeenCalledWith(['sudo', '-n', 'systemctl', 'start', 'vllm.service'], {
        timeoutMs: 10_000,
      });
      expect(controller.lastKnownActive).toBe(true);
    });

    it('returns a ServiceError when the start fails', async () => {
      const run = makeRunner(false, { start: outcome(5) });

      const result = await makeController(run).start();

      expect(result).toEqual({
        success: false,
        error: 'exit code 5',
        exitCode: 5,
        timedOut: false,
      });
    });
  });
});
