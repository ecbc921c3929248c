/**
 * Configuration
 * Layer: core
 *
 * Provided ports:
 *   - config.create
 *
 * Compiled-in defaults and the frozen configuration structure passed into
 * the loop at construction. Nothing reads configuration as ambient state.
 */

import type { CoordinatorConfig } from './types';

// -----------------------------------------------------------------------------
// Defaults
// -----------------------------------------------------------------------------

export const DEFAULT_SERVICE_NAME = 'vllm.service';
export const DEFAULT_POLL_INTERVAL_MS = 3_000;
export const DEFAULT_GRACE_PERIOD_MS = 8_000;
export const DEFAULT_SETTLE_AFTER_STOP_MS = 3_000;
export const DEFAULT_SETTLE_AFTER_CLEAR_MS = 2_000;
export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

/** Programs known to need exclusive GPU access. */
export const DEFAULT_LITERAL_PATTERNS: readonly string[] = [
  'rdb',
  'python -m rdb',
  'embedding',
  'indexing',
  'trainer',
  'finetune',
];

// Substring stems: these also match unrelated command lines (e.g. "rebuild.sh").
export const DEFAULT_KEYWORD_STEMS: readonly string[] = [
  'embed',
  'index',
  'build',
  'train',
  'finetune',
];

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

// -----------------------------------------------------------------------------
// Port: config.create
// -----------------------------------------------------------------------------

export interface ConfigOverrides {
  serviceName?: string;
  pollInterval?: number;
  gracePeriod?: number;
  settleDelayAfterStop?: number;
  settleDelayAfterClear?: number;
  literalPatterns?: Iterable<string>;
  keywordStems?: Iterable<string>;
  commandTimeout?: number;
  useSudo?: boolean;
}

/**
 * Merges overrides over the defaults, validates, and returns a frozen config.
 *
 * @throws ConfigError listing every problem found
 */
export function createConfig(overrides: ConfigOverrides = {}): CoordinatorConfig {
  const config: CoordinatorConfig = {
    serviceName: (overrides.serviceName ?? DEFAULT_SERVICE_NAME).trim(),
    pollInterval: overrides.pollInterval ?? DEFAULT_POLL_INTERVAL_MS,
    gracePeriod: overrides.gracePeriod ?? DEFAULT_GRACE_PERIOD_MS,
    settleDelayAfterStop: overrides.settleDelayAfterStop ?? DEFAULT_SETTLE_AFTER_STOP_MS,
    settleDelayAfterClear: overrides.settleDelayAfterClear ?? DEFAULT_SETTLE_AFTER_CLEAR_MS,
    literalPatterns: new Set(overrides.literalPatterns ?? DEFAULT_LITERAL_PATTERNS),
    keywordStems: new Set(overrides.keywordStems ?? DEFAULT_KEYWORD_STEMS),
    commandTimeout: overrides.commandTimeout ?? DEFAULT_COMMAND_TIMEOUT_MS,
    useSudo: overrides.useSudo ?? true,
  };

  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return Object.freeze(config);
}

/**
 * Returns a list of problems; empty when the config is usable.
 */
export function validateConfig(config: CoordinatorConfig): string[] {
  const problems: string[] = [];

  if (config.serviceName === '') {
    problems.push('serviceName must not be empty');
  }

  const durations = {
    gracePeriod: config.gracePeriod,
    settleDelayAfterStop: config.settleDelayAfterStop,
    settleDelayAfterClear: config.settleDelayAfterClear,
  };
  for (const [name, value] of Object.entries(durations)) {
    if (!Number.isFinite(value) || value < 0) {
      problems.push(`${name} must be a non-negative number of milliseconds`);
    }
  }

  // A zero poll interval or timeout would spin the loop / fail every call.
  if (!Number.isFinite(config.pollInterval) || config.pollInterval <= 0) {
    problems.push('pollInterval must be a positive number of milliseconds');
  }
  if (!Number.isFinite(config.commandTimeout) || config.commandTimeout <= 0) {
    problems.push('commandTimeout must be a positive number of milliseconds');
  }

  if (config.literalPatterns.size === 0 && config.keywordStems.size === 0) {
    problems.push('at least one literal pattern or keyword stem is required');
  }
  for (const pattern of config.literalPatterns) {
    if (pattern.trim() === '') problems.push('literal patterns must not be blank');
  }
  for (const stem of config.keywordStems) {
    if (stem.trim() === '') problems.push('keyword stems must not be blank');
  }

  return problems;
}
