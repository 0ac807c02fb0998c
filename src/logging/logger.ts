/**
 * Root pino logger for the CLI and orchestrator.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

import type { LogLevel } from '../config/constants.js';

export type { Logger } from 'pino';

export interface LoggerConfig {
  level?: LogLevel;
  /** Pretty-print through pino-pretty (for terminals) */
  pretty?: boolean;
  /** Write JSON lines here instead of stderr. Ignored when pretty is set. */
  destination?: DestinationStream;
}

/**
 * Create the root logger. Output goes to stderr so it never interleaves with
 * the Ink view on stdout.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? 'info',
    base: { service: 'sandbox-forks' },
  };

  if (config.pretty === true) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        destination: 2,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname,service',
      },
    };
    return pino(options);
  }

  return pino(options, config.destination ?? pino.destination(2));
}

/**
 * Logger that discards everything. Default for library code given no logger.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
