/**
 * Host Check Tests
 *
 * Mocks: os.platform, fs.existsSync.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';

vi.mock('os', async () => {
  const actual = await vi.importActual<typeof import('os')>('os');
  return { ...actual, platform: vi.fn() };
});

vi.mock('fs', async () => {
  const actual = await vi.importActual<typeof import('fs')>('fs');
  return { ...actual, existsSync: vi.fn() };
});

import { SYSTEMD_RUNTIME_DIR, assertSupported, detect, isSupported } from '../src/platform';

function givenHost(platform: NodeJS.Platform, systemdRunning: boolean): void {
  vi.mocked(os.platform).mockReturnValue(platform);
  vi.mocked(fs.existsSync).mockReturnValue(systemdRunning);
}

describe('isSupported', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('accepts Linux booted with systemd', () => {
    givenHost('linux', true);

    expect(isSupported()).toEqual({ platform: 'linux', supported: true });
    expect(fs.existsSync).toHaveBeenCalledWith('/run/systemd/system');
  });

  it('rejects Linux without a running systemd', () => {
    givenHost('linux', false);

    expect(isSupported()).toEqual({
      platform: 'linux',
      supported: false,
      reason: `systemd is not the running service manager (${SYSTEMD_RUNTIME_DIR} is missing).`,
    });
  });

  it.each([
    ['darwin', 'darwin', 'macOS has no systemd; only Linux hosts are supported.'],
    ['win32', 'win32', 'Windows has no systemd; only Linux hosts are supported.'],
    ['freebsd', 'unknown', 'freebsd has no systemd; only Linux hosts are supported.'],
  ] as const)('rejects %s without looking for systemd', (host, platform, reason) => {
    givenHost(host, true);

    expect(isSupported()).toEqual({ platform, supported: false, reason });
    expect(fs.existsSync).not.toHaveBeenCalled();
  });
});

describe('detect', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('maps hosts it does not know to unknown', () => {
    givenHost('aix', false);

    expect(detect()).toBe('unknown');
  });
});

describe('assertSupported', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('passes on a systemd host', () => {
    givenHost('linux', true);

    expect(() => assertSupported()).not.toThrow();
  });

  it('fails fast inside a container without systemd', () => {
    givenHost('linux', false);

    expect(() => assertSupported()).toThrow(
      'Unsupported platform: systemd is not the running service manager',
    );
  });
});
