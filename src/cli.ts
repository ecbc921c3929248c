/**
 * Command-Line Entry
 * Layer: cli
 *
 * Parses flags with commander, builds the configuration, checks the
 * platform and runs the loop until a shutdown signal.
 *
 * Exit codes: 0 after help/version or a normal shutdown, 1 for invalid
 * flags, invalid configuration or an unsupported platform.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import type { Logger } from 'pino';
import type { ConfigOverrides } from './config';
import {
  ConfigError,
  DEFAULT_GRACE_PERIOD_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_SERVICE_NAME,
  createConfig,
} from './config';
import type { EventSink } from './events';
import type { LogLevel } from './logger';
import { LOG_LEVELS, createLogSink, createLogger, resolveLogLevel } from './logger';
import { assertSupported } from './platform';
import { createDefaultDeps, runCoordinatorLoop } from './coordinator/loop';
import type { ArbitrationState, CoordinatorConfig } from './types';
import { COORDINATOR_NAME, COORDINATOR_VERSION } from './types';
import { errorMessage } from './utils';

const DESCRIPTION = `Automatic GPU arbitration for an inference service.

Watches for processes that need exclusive GPU access (embedding, indexing,
training) and stops the managed systemd service while they run, so the two
never compete for device memory. The service is started again once the
processes finish, and on shutdown if it is still stopped.`;

// -----------------------------------------------------------------------------
// Argument parsing
// -----------------------------------------------------------------------------

interface CliOptions {
  service?: string;
  interval?: number;
  grace?: number;
  pattern?: string[];
  keyword?: string[];
  timeout?: number;
  sudo: boolean;
  logLevel?: LogLevel;
}

export type CliParseOutcome =
  | { action: 'run'; overrides: ConfigOverrides; logLevel: string | undefined }
  | { action: 'exit'; code: number; output: string };

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of seconds.');
  }
  return Math.round(seconds * 1000);
}

export function buildProgram(): Command {
  return new Command()
    .name(COORDINATOR_NAME)
    .description(DESCRIPTION)
    .version(COORDINATOR_VERSION)
    .option('-s, --service <unit>', `systemd unit to manage (default: ${DEFAULT_SERVICE_NAME})`)
    .option(
      '-i, --interval <seconds>',
      `seconds between checks (default: ${DEFAULT_POLL_INTERVAL_MS / 1000})`,
      parseSeconds,
    )
    .option(
      '-g, --grace <seconds>',
      `seconds of contention tolerated before stopping (default: ${DEFAULT_GRACE_PERIOD_MS / 1000})`,
      parseSeconds,
    )
    .option('--pattern <text...>', 'literal command-line patterns (replace the defaults)')
    .option('--keyword <stem...>', 'case-insensitive keyword stems (replace the defaults)')
    .option('--timeout <seconds>', 'budget for each external command', parseSeconds)
    .option('--no-sudo', 'run systemctl stop/start without sudo')
    .addOption(new Option('-l, --log-level <level>', 'log level').choices(LOG_LEVELS));
}

/**
 * Parses user arguments (without the node and script entries).
 * Never exits the process; help, version and errors come back as 'exit'.
 */
export function parseCliArgs(argv: readonly string[]): CliParseOutcome {
  let output = '';
  const program = buildProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        output += text;
      },
      writeErr: (text) => {
        output += text;
      },
    });

  try {
    program.parse([...argv], { from: 'user' });
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      return { action: 'exit', code: err.exitCode, output };
    }
    throw err;
  }

  const opts = program.opts<CliOptions>();
  const overrides: ConfigOverrides = { useSudo: opts.sudo };
  if (opts.service !== undefined) overrides.serviceName = opts.service;
  if (opts.interval !== undefined) overrides.pollInterval = opts.interval;
  if (opts.grace !== undefined) overrides.gracePeriod = opts.grace;
  if (opts.pattern !== undefined) overrides.literalPatterns = opts.pattern;
  if (opts.keyword !== undefined) overrides.keywordStems = opts.keyword;
  if (opts.timeout !== undefined) overrides.commandTimeout = opts.timeout;

  return { action: 'run', overrides, logLevel: opts.logLevel };
}

// -----------------------------------------------------------------------------
// Run
// -----------------------------------------------------------------------------

export type AppLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error' | 'fatal'>;

export interface RunDeps {
  createLogger: (level: LogLevel) => AppLogger;
  assertPlatform: () => void;
  runLoop: (config: CoordinatorConfig, emit: EventSink) => Promise<ArbitrationState>;
  /** Help, version and usage errors */
  write: (text: string) => void;
  env: NodeJS.ProcessEnv;
}

const defaultRunDeps: RunDeps = {
  createLogger: (level) => createLogger({ level }),
  assertPlatform: assertSupported,
  runLoop: (config, emit) => runCoordinatorLoop(config, createDefaultDeps(config, emit)),
  write: (text) => {
    process.stdout.write(text);
  },
  env: process.env,
};

/**
 * Runs the coordinator and resolves with the process exit code.
 */
export async function run(argv: readonly string[], deps: RunDeps = defaultRunDeps): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed.action === 'exit') {
    deps.write(parsed.output);
    return parsed.code;
  }

  const logger = deps.createLogger(resolveLogLevel(parsed.logLevel, deps.env));

  let config: CoordinatorConfig;
  try {
    config = createConfig(parsed.overrides);
    deps.assertPlatform();
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      logger.fatal({ problems: error.problems }, error.message);
    } else {
      logger.fatal(errorMessage(error));
    }
    return 1;
  }

  const finalState = await deps.runLoop(config, createLogSink(logger));
  // Resume owed but failed at cleanup: leave a trace for whoever restarts us.
  if (finalState.serviceSuspendedByUs) {
    logger.warn(`${config.serviceName} is still stopped; start it manually`);
  }
  return 0;
}
