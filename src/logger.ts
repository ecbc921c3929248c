/**
 * Logger
 * Layer: infra
 *
 * Provided ports:
 *   - logger.create
 *   - logger.sink
 *
 * pino logger writing JSON lines to stdout (collected by journald when run
 * as a systemd unit), and the sink that renders coordinator events onto it.
 */

import pino, { type DestinationStream, type Logger } from 'pino';
import type { CoordinatorEvent, CoordinatorEventType, EventSink } from './events';
import { COORDINATOR_NAME, DEBUG_ENV, LOG_LEVEL_ENV } from './types';
import { parseBooleanFlag } from './utils';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** The subset of a pino logger the event sink writes to. */
export type EventLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// -----------------------------------------------------------------------------
// Port: logger.create
// -----------------------------------------------------------------------------

export interface LoggerOptions {
  level: LogLevel;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions): Logger {
  const pinoOptions = { name: COORDINATOR_NAME, level: options.level };
  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

/**
 * Resolves the log level from, in order: the CLI flag, GPU_COORDINATOR_LOG_LEVEL,
 * GPU_COORDINATOR_DEBUG (truthy means debug). Falls back to info.
 */
export function resolveLogLevel(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  if (flag && isLogLevel(flag)) return flag;
  const fromEnv = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return parseBooleanFlag(env[DEBUG_ENV]) ? 'debug' : 'info';
}

// -----------------------------------------------------------------------------
// Port: logger.sink
// -----------------------------------------------------------------------------

const EVENT_LEVELS: Record<CoordinatorEventType, 'debug' | 'info' | 'warn' | 'error'> = {
  'loop-started': 'info',
  'contention-detected': 'info',
  'contention-cleared': 'info',
  'service-stopped': 'info',
  'service-started': 'info',
  'service-stop-failed': 'error',
  'service-start-failed': 'error',
  'cleanup-resume': 'info',
  'observation-failed': 'debug',
  'tick-failed': 'error',
  'shutdown-requested': 'warn',
  'loop-stopped': 'info',
};

export function describeEvent(event: CoordinatorEvent): string {
  switch (event.type) {
    case 'loop-started':
      return `GPU coordinator started, managing ${event.serviceName}`;
    case 'contention-detected':
      return `Exclusive GPU processes detected: ${event.processes
        .map((p) => `${p.name} (${p.pid})`)
        .join(', ')}`;
    case 'contention-cleared':
      return 'Exclusive GPU processes finished';
    case 'service-stopped':
      return `Stopped ${event.serviceName}`;
    case 'service-started':
      return `Started ${event.serviceName}`;
    case 'service-stop-failed':
      return `Failed to stop ${event.serviceName}: ${event.error}`;
    case 'service-start-failed':
      return `Failed to start ${event.serviceName}: ${event.error}`;
    case 'cleanup-resume':
      return `Cleanup: restarting ${event.serviceName}`;
    case 'observation-failed':
      return `Process snapshot failed: ${event.error}`;
    case 'tick-failed':
      return `Coordinator tick error: ${event.error}`;
    case 'shutdown-requested':
      return `Received ${event.signal}, shutting down`;
    case 'loop-stopped':
      return 'GPU coordinator stopped';
  }
}

/**
 * Creates a sink that writes each event as one structured log line:
 * `event` carries the type, the payload becomes fields.
 */
export function createLogSink(logger: EventLogger): EventSink {
  return (event) => {
    const { type, ...fields } = event;
    const level = EVENT_LEVELS[type];
    logger[level]({ event: type, ...fields }, describeEvent(event));
  };
}
