/**
 * Per-fork log files.
 *
 * Each fork writes to its own file, `fork_<id>_<session>.log`, one
 * human-readable line per record:
 *
 *   [2025-01-31 14:02:11] INFO: Fork 3 - Starting agent execution
 */

import * as path from 'node:path';
import pino, { type Logger } from 'pino';
import { prettyFactory } from 'pino-pretty';

import type { LogLevel } from '../config/constants.js';

/** Longest tool result kept in the debug line */
export const RESULT_PREVIEW_LENGTH = 200;

export interface ForkLoggerOptions {
  /** Defaults to the construction time, `YYYYMMDD_HHMMSS` in local time */
  sessionTimestamp?: string;
  level?: LogLevel;
}

interface ForkLogEntry {
  logger: Logger;
  file: string;
  destination: ReturnType<typeof pino.destination>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as `YYYYMMDD_HHMMSS` in local time.
 */
export function formatSessionTimestamp(date: Date): string {
  return (
    `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

const formatLine = prettyFactory({
  colorize: false,
  translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
  ignore: 'pid,hostname,forkId',
  singleLine: true,
});

export class ForkLogger {
  readonly logDir: string;
  readonly sessionTimestamp: string;
  private readonly level: LogLevel;
  private readonly entries = new Map<number, ForkLogEntry>();

  constructor(logDir: string, options: ForkLoggerOptions = {}) {
    this.logDir = path.resolve(logDir);
    this.sessionTimestamp = options.sessionTimestamp ?? formatSessionTimestamp(new Date());
    this.level = options.level ?? 'debug';
  }

  /**
   * Create-or-get the logger for a fork. The first call opens its log file.
   */
  getLogger(forkId: number): Logger {
    return this.entry(forkId).logger;
  }

  log(forkId: number, message: string, level: LogLevel = 'info'): void {
    this.getLogger(forkId)[level](`Fork ${String(forkId)} - ${message}`);
  }

  logToolCall(
    forkId: number,
    toolName: string,
    parameters: Readonly<Record<string, unknown>>,
    resultPreview?: string
  ): void {
    this.log(forkId, `Tool call: ${toolName}`);
    this.log(forkId, `Parameters: ${JSON.stringify(parameters)}`, 'debug');
    if (resultPreview !== undefined) {
      const preview =
        resultPreview.length > RESULT_PREVIEW_LENGTH
          ? `${resultPreview.slice(0, RESULT_PREVIEW_LENGTH)}...`
          : resultPreview;
      this.log(forkId, `Result: ${preview}`, 'debug');
    }
  }

  logAgentTurn(forkId: number, turn: number, maxTurns: number, message: string): void {
    this.log(forkId, `Turn ${String(turn)}/${String(maxTurns)}: ${message}`);
  }

  getLogFile(forkId: number): string | undefined {
    return this.entries.get(forkId)?.file;
  }

  /**
   * Flush and close every open log file.
   */
  closeAll(): void {
    for (const entry of this.entries.values()) {
      entry.destination.flushSync();
      entry.destination.end();
    }
    this.entries.clear();
  }

  private entry(forkId: number): ForkLogEntry {
    const existing = this.entries.get(forkId);
    if (existing !== undefined) return existing;

    const file = path.join(
      this.logDir,
      `fork_${String(forkId)}_${this.sessionTimestamp}.log`
    );
    const destination = pino.destination({ dest: file, sync: true, mkdir: true });
    const root = pino(
      { level: this.level, base: null },
      {
        write: (chunk: string) => {
          destination.write(formatLine(chunk));
        },
      }
    );
    const entry: ForkLogEntry = { logger: root.child({ forkId }), file, destination };
    this.entries.set(forkId, entry);
    return entry;
  }
}
