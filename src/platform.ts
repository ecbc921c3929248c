/**
 * Host Check
 * Layer: infra
 *
 * Provided ports:
 *   - platform.detect
 *   - platform.isSupported
 *
 * The coordinator suspends the inference service through systemctl, so the
 * host must be Linux and booted with systemd as its service manager.
 */

import * as fs from 'fs';
import * as os from 'os';
import type { Platform, PlatformInfo } from './types';

/** Exists only while systemd is the running service manager (sd_booted). */
export const SYSTEMD_RUNTIME_DIR = '/run/systemd/system';

const KNOWN_PLATFORMS: Readonly<Partial<Record<NodeJS.Platform, Platform>>> = {
  linux: 'linux',
  darwin: 'darwin',
  win32: 'win32',
};

const HOST_NAMES: Record<Exclude<Platform, 'linux' | 'unknown'>, string> = {
  darwin: 'macOS',
  win32: 'Windows',
};

// -----------------------------------------------------------------------------
// Port: platform.detect
// -----------------------------------------------------------------------------

export function detect(): Platform {
  return KNOWN_PLATFORMS[os.platform()] ?? 'unknown';
}

export function hasSystemd(): boolean {
  return fs.existsSync(SYSTEMD_RUNTIME_DIR);
}

// -----------------------------------------------------------------------------
// Port: platform.isSupported
// -----------------------------------------------------------------------------

export function isSupported(): PlatformInfo {
  const platform = detect();

  if (platform === 'unknown') {
    return {
      platform,
      supported: false,
      reason: `${os.platform()} has no systemd; only Linux hosts are supported.`,
    };
  }

  if (platform !== 'linux') {
    return {
      platform,
      supported: false,
      reason: `${HOST_NAMES[platform]} has no systemd; only Linux hosts are supported.`,
    };
  }

  if (!hasSystemd()) {
    return {
      platform,
      supported: false,
      reason: `systemd is not the running service manager (${SYSTEMD_RUNTIME_DIR} is missing).`,
    };
  }

  return { platform, supported: true };
}

/**
 * Throws when the host cannot run the coordinator; called once at startup.
 */
export function assertSupported(): void {
  const info = isSupported();
  if (!info.supported) {
    throw new Error(`Unsupported platform: ${info.reason}`);
  }
}
