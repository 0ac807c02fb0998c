/**
 * Tests for per-fork log files.
 */

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { ForkLogger, formatSessionTimestamp } from '../fork-logger.js';

const LINE = /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] (DEBUG|INFO|WARN|ERROR): (.*)$/;

function readLines(file: string): Array<{ level: string; message: string }> {
  return fs
    .readFileSync(file, 'utf-8')
    .split('\n')
    .filter((line) => line !== '')
    .map((line) => {
      const match = LINE.exec(line);
      if (match === null) throw new Error(`Unexpected log line: ${line}`);
      return { level: match[1] ?? '', message: match[2] ?? '' };
    });
}

describe('formatSessionTimestamp', () => {
  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(formatSessionTimestamp(new Date(2025, 0, 5, 9, 3, 7))).toBe('20250105_090307');
  });
});

describe('ForkLogger', () => {
  let logDir: string;
  let forkLogger: ForkLogger;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fork-logger-'));
    forkLogger = new ForkLogger(path.join(logDir, 'nested'), { sessionTimestamp: '20250101_120000' });
  });

  afterEach(() => {
    forkLogger.closeAll();
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it('creates one file per fork, creating directories as needed', () => {
    forkLogger.log(2, 'Starting agent execution');

    const file = forkLogger.getLogFile(2);
    expect(file).toBe(path.join(logDir, 'nested', 'fork_2_20250101_120000.log'));
    expect(forkLogger.getLogFile(3)).toBeUndefined();
    expect(readLines(path.join(logDir, 'nested', 'fork_2_20250101_120000.log'))).toEqual([
      { level: 'INFO', message: 'Fork 2 - Starting agent execution' },
    ]);
  });

  it('returns the same logger for repeated calls', () => {
    expect(forkLogger.getLogger(1)).toBe(forkLogger.getLogger(1));
    expect(forkLogger.getLogger(1)).not.toBe(forkLogger.getLogger(2));
  });

  it('keeps forks in separate files', () => {
    forkLogger.log(0, 'zero');
    forkLogger.log(1, 'one', 'error');

    expect(readLines(path.join(logDir, 'nested', 'fork_0_20250101_120000.log'))).toEqual([
      { level: 'INFO', message: 'Fork 0 - zero' },
    ]);
    expect(readLines(path.join(logDir, 'nested', 'fork_1_20250101_120000.log'))).toEqual([
      { level: 'ERROR', message: 'Fork 1 - one' },
    ]);
  });

  it('logs tool calls with a truncated result preview', () => {
    forkLogger.logToolCall(0, 'Read', { file_path: 'src/a.ts' }, 'x'.repeat(250));

    expect(readLines(path.join(logDir, 'nested', 'fork_0_20250101_120000.log'))).toEqual([
      { level: 'INFO', message: 'Fork 0 - Tool call: Read' },
      { level: 'DEBUG', message: 'Fork 0 - Parameters: {"file_path":"src/a.ts"}' },
      { level: 'DEBUG', message: `Fork 0 - Result: ${'x'.repeat(200)}...` },
    ]);
  });

  it('logs agent turns', () => {
    forkLogger.logAgentTurn(4, 3, 10, 'Calling model');

    expect(readLines(path.join(logDir, 'nested', 'fork_4_20250101_120000.log'))).toEqual([
      { level: 'INFO', message: 'Fork 4 - Turn 3/10: Calling model' },
    ]);
  });

  it('drops records below the configured level', () => {
    const infoLogger = new ForkLogger(logDir, { sessionTimestamp: 's', level: 'info' });
    infoLogger.log(0, 'hidden', 'debug');
    infoLogger.log(0, 'shown');
    infoLogger.closeAll();

    expect(readLines(path.join(logDir, 'fork_0_s.log'))).toEqual([
      { level: 'INFO', message: 'Fork 0 - shown' },
    ]);
  });

  it('forgets loggers after closeAll', () => {
    forkLogger.log(0, 'before');
    forkLogger.closeAll();

    expect(forkLogger.getLogFile(0)).toBeUndefined();
  });
});
