/**
 * The fork command: validate flags, load config, run the forks and render
 * progress and results with Ink.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import React from 'react';
import { render } from 'ink';

import { ForkProgress } from '../components/ForkProgress.js';
import { ForkSummary } from '../components/ForkSummary.js';
import { isModelAlias } from '../config/env.js';
import { loadConfig } from '../config/manager.js';
import type { AppConfig } from '../config/schema.js';
import { errorMessage, ForkCancelledError, ForkValidationError } from '../errors/index.js';
import { createLogger } from '../logging/logger.js';
import { ProgressTracker } from '../logging/progress.js';
import { createAnthropicCompletionService } from '../model/anthropic.js';
import type { CompletionService } from '../model/types.js';
import { runForks } from '../orchestrator/run-forks.js';
import type { ForkRunReport } from '../orchestrator/types.js';
import { initializeTelemetry, shutdown as shutdownTelemetry } from '../telemetry/setup.js';
import { EXIT_CODES, type ExitCode } from './constants.js';
import type { ForkCommandDeps, ForkCommandFlags, ViewHandle } from './types.js';

function defaultCompletionService(model: string, config: AppConfig): CompletionService {
  return createAnthropicCompletionService({
    model,
    apiKey: config.provider.apiKey,
    models: config.models,
  });
}

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

/**
 * Check that the work directory exists, is a directory and is writable.
 * Returns the problem, or undefined when it can be used.
 */
export function checkWorkDir(dir: string): string | undefined {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(dir);
  } catch {
    return `Work directory does not exist: ${dir}`;
  }
  if (!stat.isDirectory()) {
    return `Work directory is not a directory: ${dir}`;
  }
  try {
    fs.accessSync(dir, fs.constants.W_OK);
  } catch {
    return `Work directory is not writable: ${dir}`;
  }
  return undefined;
}

/**
 * Validate the flags that do not depend on config.
 */
function checkFlags(flags: ForkCommandFlags, config: AppConfig): string | undefined {
  if (flags.prompt === undefined || flags.prompt.trim() === '') {
    return '--prompt is required';
  }
  const { maxForks } = config.forks;
  if (!Number.isInteger(flags.forks) || flags.forks < 1 || flags.forks > maxForks) {
    return `--forks must be between 1 and ${String(maxForks)}`;
  }
  if (flags.model !== undefined && !isModelAlias(flags.model)) {
    return `Unknown model: ${flags.model} (expected sonnet, opus or haiku)`;
  }
  if (flags.maxTurns !== undefined && (!Number.isInteger(flags.maxTurns) || flags.maxTurns < 1)) {
    return '--max-turns must be a positive integer';
  }
  return undefined;
}

/**
 * Run the fork command and return the process exit code.
 */
export async function runForkCommand(
  flags: ForkCommandFlags,
  deps: ForkCommandDeps = {}
): Promise<ExitCode> {
  const writeError = deps.writeError ?? writeStderr;
  const renderView = deps.renderView ?? ((element: React.ReactElement): ViewHandle => render(element));

  const workdir = path.resolve(deps.cwd ?? process.cwd(), flags.workdir ?? '.');
  const workdirProblem = checkWorkDir(workdir);
  if (workdirProblem !== undefined) {
    writeError(`Error: ${workdirProblem}`);
    return EXIT_CODES.FAILURE;
  }

  const configResult = await (deps.loadConfig ?? loadConfig)(workdir);
  if (!configResult.success) {
    writeError(`Configuration error: ${configResult.message}`);
    return EXIT_CODES.FAILURE;
  }
  const config = configResult.result;

  const flagProblem = checkFlags(flags, config);
  if (flagProblem !== undefined) {
    writeError(`Error: ${flagProblem}`);
    return EXIT_CODES.FAILURE;
  }
  const prompt = flags.prompt ?? '';

  if (deps.createCompletionService === undefined && config.provider.apiKey === undefined) {
    writeError('Error: ANTHROPIC_API_KEY is not set');
    return EXIT_CODES.FAILURE;
  }
  const createCompletion = deps.createCompletionService ?? defaultCompletionService;

  const logger =
    deps.logger ?? createLogger({ level: flags.verbose ? 'debug' : config.logLevel, pretty: true });

  if (config.telemetry.enabled) {
    const telemetry = await initializeTelemetry({
      config: config.telemetry,
      onDebug: (message) => {
        logger.debug(message);
      },
    });
    if (!telemetry.success) {
      logger.warn(`Telemetry not started: ${telemetry.message}`);
    }
  }

  const progress = new ProgressTracker(flags.forks);
  const view = renderView(<ForkProgress status={progress.getStatus()} />);
  const unsubscribe = progress.onChange((status) => {
    view.rerender(<ForkProgress status={status} />);
  });

  let report: ForkRunReport;
  try {
    report = await runForks(
      {
        prompt,
        numForks: flags.forks,
        model: flags.model ?? config.forks.defaultModel,
        maxTurns: flags.maxTurns ?? config.forks.maxTurns,
        sandboxRoots: Array.from({ length: flags.forks }, () => workdir),
        repoUrl: flags.repoUrl,
        branch: flags.branch,
        logDir: flags.logDir,
        signal: deps.signal,
      },
      {
        config,
        createCompletionService: (model) => createCompletion(model, config),
        logger,
        progress,
      }
    );
  } catch (error) {
    if (error instanceof ForkCancelledError) {
      writeError(`Interrupted: ${String(error.completed.length)} of ${String(flags.forks)} forks finished`);
      return EXIT_CODES.INTERRUPTED;
    }
    if (error instanceof ForkValidationError) {
      writeError(`Error: ${error.message}`);
      return EXIT_CODES.FAILURE;
    }
    writeError(`Error: ${errorMessage(error)}`);
    return EXIT_CODES.FAILURE;
  } finally {
    unsubscribe();
    view.unmount();
    if (config.telemetry.enabled) {
      await shutdownTelemetry();
    }
  }

  const summaryView = renderView(
    <ForkSummary summary={report.summary} results={report.results} wallTime={report.wallTime} />
  );
  summaryView.unmount();

  return report.summary.failed > 0 ? EXIT_CODES.FAILURE : EXIT_CODES.SUCCESS;
}
