/**
 * Parallel fork execution.
 *
 * Every fork runs its own agent against its own sandbox root on a shared
 * p-queue pool. A fork that throws, at any point, still produces a
 * ForkResult, so the report always has one result per dispatched task.
 */

import { randomUUID } from 'node:crypto';
import * as path from 'node:path';
import type { Span } from '@opentelemetry/api';
import PQueue from 'p-queue';

import { Agent } from '../agent/agent.js';
import type { AgentRunResult } from '../agent/types.js';
import type { RetryConfig } from '../config/schema.js';
import {
  errorMessage,
  ForkCancelledError,
  ForkExecutionError,
  ForkValidationError,
} from '../errors/index.js';
import { ForkLogger } from '../logging/fork-logger.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { ProgressTracker } from '../logging/progress.js';
import type { WithRetryOptions } from '../model/retry.js';
import { LocalSandboxService } from '../sandbox/local.js';
import { SecurityPolicy } from '../security/policy.js';
import { toPolicyConfig } from '../security/policy-config.js';
import { endForkSpan, startForkSpan } from '../telemetry/spans.js';
import { ToolExecutor } from '../tools/executor.js';
import { aggregateResults, formatCost, formatSeconds, formatSummary, formatTokens } from './aggregate.js';
import type {
  ForkEnvironment,
  ForkResult,
  ForkRunDeps,
  ForkRunOptions,
  ForkRunReport,
  ForkTask,
  RunAgentFn,
} from './types.js';

const SUMMARY_RULE = '='.repeat(60);

/**
 * Throw ForkValidationError when the run cannot start.
 */
export function validateForkOptions(options: ForkRunOptions, maxForks: number): void {
  const { numForks } = options;
  if (!Number.isInteger(numForks)) {
    throw new ForkValidationError(`numForks must be an integer, got ${String(numForks)}`);
  }
  if (numForks < 1) {
    throw new ForkValidationError('numForks must be at least 1');
  }
  if (numForks > maxForks) {
    throw new ForkValidationError(`numForks exceeds maximum of ${String(maxForks)}`);
  }
  if (options.sandboxIds !== undefined && options.sandboxIds.length !== numForks) {
    throw new ForkValidationError(
      `sandboxIds length (${String(options.sandboxIds.length)}) must match numForks (${String(numForks)})`
    );
  }
  if (options.sandboxRoots !== undefined && options.sandboxRoots.length !== numForks) {
    throw new ForkValidationError(
      `sandboxRoots length (${String(options.sandboxRoots.length)}) must match numForks (${String(numForks)})`
    );
  }
  if (!Number.isInteger(options.maxTurns) || options.maxTurns < 1) {
    throw new ForkValidationError('maxTurns must be an integer of at least 1');
  }
  if (options.maxWorkers !== undefined && (!Number.isInteger(options.maxWorkers) || options.maxWorkers < 1)) {
    throw new ForkValidationError('maxWorkers must be an integer of at least 1');
  }
  if (options.prompt.trim() === '') {
    throw new ForkValidationError('prompt must not be empty');
  }
}

export function generateSandboxId(forkId: number): string {
  return `fork_${String(forkId)}_${randomUUID().slice(0, 8)}`;
}

export function retryOptionsFromConfig(retry: RetryConfig): WithRetryOptions {
  if (!retry.enabled) {
    return { maxRetries: 0 };
  }
  return {
    maxRetries: retry.maxRetries,
    baseDelayMs: retry.baseDelayMs,
    maxDelayMs: retry.maxDelayMs,
    enableJitter: retry.enableJitter,
  };
}

/**
 * Build the policy, executor and agent for one fork and run it.
 */
export const runAgentForTask: RunAgentFn = (task, env) => {
  const { config } = env;
  const policy = new SecurityPolicy(env.policy, task.sandboxRoot, {
    logger: env.logger.child({ forkId: task.forkId }),
  });
  const executor = new ToolExecutor({
    forkId: task.forkId,
    sandboxId: task.sandboxId,
    sandboxRoot: task.sandboxRoot,
    policy,
    sandbox: env.sandbox,
    forkLogger: env.forkLogger,
    bashTimeoutMs: config.forks.bashTimeoutMs,
    signal: env.signal,
  });
  const agent = new Agent({
    forkId: task.forkId,
    sandboxId: task.sandboxId,
    model: task.model,
    models: config.models,
    completion: env.createCompletionService(task.model),
    executor,
    forkLogger: env.forkLogger,
    pricing: config.pricing,
    maxTokens: config.forks.maxTokens,
    maxToolCallsPerTurn: config.forks.maxToolCallsPerTurn,
    repoUrl: task.repoUrl,
    branch: task.branch,
    retry: retryOptionsFromConfig(config.retry),
    signal: env.signal,
    parentSpan: env.span,
  });
  return agent.run(task.prompt, task.maxTurns);
};

function toForkResult(task: ForkTask, run: AgentRunResult, executionTime: number): ForkResult {
  const failed = run.errors > 0 || run.status === 'failed';
  return Object.freeze({
    forkId: task.forkId,
    sandboxId: task.sandboxId,
    success: run.success,
    finalResponse: run.finalResponse,
    turns: run.turns,
    toolCalls: run.toolCalls,
    errors: run.errors,
    totalTokens: run.totalTokens,
    totalCost: run.totalCost,
    executionTime,
    ...(failed ? { error: run.finalResponse } : {}),
    status: run.status,
  });
}

function crashedForkResult(task: ForkTask, error: unknown, executionTime: number): ForkResult {
  return Object.freeze({
    forkId: task.forkId,
    sandboxId: task.sandboxId,
    success: false,
    finalResponse: '',
    turns: 0,
    toolCalls: 0,
    errors: 1,
    totalTokens: 0,
    totalCost: 0,
    executionTime,
    error: errorMessage(error),
    status: 'failed',
  });
}

export interface SingleForkContext {
  env: ForkEnvironment;
  progress: ProgressTracker;
  runAgent: RunAgentFn;
  now: () => number;
}

/**
 * Run one fork to a ForkResult. A failing agent, or a failure while starting
 * the fork, yields a failed result instead of a rejection. Only the closing
 * progress and span updates can still throw.
 */
export async function runSingleFork(task: ForkTask, ctx: SingleForkContext): Promise<ForkResult> {
  const { forkLogger, logger } = ctx.env;
  const id = String(task.forkId);
  const start = ctx.now();
  const elapsed = (): number => (ctx.now() - start) / 1000;

  let span: Span | undefined;
  let result: ForkResult;
  try {
    ctx.progress.startFork();
    span = startForkSpan({ forkId: task.forkId, sandboxId: task.sandboxId, model: task.model });
    forkLogger.log(task.forkId, `Starting fork ${id} in sandbox ${task.sandboxId}`);
    forkLogger.log(
      task.forkId,
      `Repository: ${task.repoUrl ?? 'local'} (branch: ${task.branch ?? 'main'})`
    );
    forkLogger.log(task.forkId, `Model: ${task.model}, Max turns: ${String(task.maxTurns)}`);

    const run = await ctx.runAgent(task, { ...ctx.env, span });
    result = toForkResult(task, run, elapsed());
    forkLogger.log(
      task.forkId,
      `Fork ${id} completed: ${result.success ? 'SUCCESS' : 'FAILED'} ` +
        `(status=${result.status}, turns=${String(result.turns)}, tools=${String(result.toolCalls)}, ` +
        `errors=${String(result.errors)}, time=${formatSeconds(result.executionTime)})`,
      result.success ? 'info' : 'error'
    );
  } catch (error) {
    result = crashedForkResult(task, error, elapsed());
    const message = `Fork ${id} failed with exception: ${errorMessage(error)}`;
    try {
      forkLogger.log(task.forkId, message, 'error');
    } catch (logError) {
      logger.error({ forkId: task.forkId, logError: errorMessage(logError) }, message);
    }
  }

  if (span !== undefined) {
    endForkSpan(span, {
      status: result.status,
      turns: result.turns,
      toolCalls: result.toolCalls,
      errors: result.errors,
      totalTokens: result.totalTokens,
      totalCost: result.totalCost,
      errorType: result.status === 'failed' ? 'fork_failed' : undefined,
    });
  }
  ctx.progress.completeFork(result.success);
  return result;
}

function writeForkSummary(forkLogger: ForkLogger, result: ForkResult): void {
  const log = (message: string, level: 'info' | 'error' = 'info'): void => {
    forkLogger.log(result.forkId, message, level);
  };
  log(SUMMARY_RULE);
  log('EXECUTION SUMMARY');
  log(SUMMARY_RULE);
  log(`Success: ${String(result.success)}`);
  log(`Status: ${result.status}`);
  log(`Turns: ${String(result.turns)}`);
  log(`Tool calls: ${String(result.toolCalls)}`);
  log(`Errors: ${String(result.errors)}`);
  log(`Tokens: ${formatTokens(result.totalTokens)}`);
  log(`Cost: ${formatCost(result.totalCost)}`);
  log(`Execution time: ${formatSeconds(result.executionTime)}`);
  if (!result.success && result.error !== undefined) {
    log(`Error: ${result.error}`, 'error');
  }
  log(SUMMARY_RULE);
}

/**
 * Run `numForks` agents in parallel and collect their results, sorted by
 * fork id.
 *
 * @throws ForkValidationError before any fork starts
 * @throws ForkCancelledError when `signal` aborts; carries the finished results
 * @throws ForkExecutionError when the run cannot be set up
 */
export async function runForks(options: ForkRunOptions, deps: ForkRunDeps): Promise<ForkRunReport> {
  const { config } = deps;
  validateForkOptions(options, config.forks.maxForks);

  const now = deps.now ?? Date.now;
  const logger = deps.logger ?? createSilentLogger();
  const { numForks } = options;
  const sandboxIds = options.sandboxIds ?? Array.from({ length: numForks }, (_, i) => generateSandboxId(i));
  const sandboxRoots = (options.sandboxRoots ?? Array.from({ length: numForks }, () => process.cwd())).map(
    (root) => path.resolve(root)
  );
  const logDir = options.logDir ?? config.forks.logDir;
  const forkLogger = deps.forkLogger ?? new ForkLogger(logDir);
  const progress = deps.progress ?? new ProgressTracker(numForks);
  const sandbox = deps.sandbox ?? new LocalSandboxService({ logger });
  const workers = options.maxWorkers ?? Math.min(numForks, config.forks.maxWorkers);

  logger.info(`Starting ${String(numForks)} parallel forks`);
  logger.info(`Repository: ${options.repoUrl ?? 'local'} (branch: ${options.branch ?? 'main'})`);
  logger.info(`Model: ${options.model}, Max turns: ${String(options.maxTurns)}`);
  logger.info(`Log directory: ${path.resolve(logDir)}`);
  logger.info(`Using ${String(workers)} workers`);

  const queue = new PQueue({ concurrency: workers });
  const onAbort = (): void => {
    logger.warn(`Execution interrupted: dropping ${String(queue.size)} pending forks`);
    queue.clear();
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });

  const start = now();
  const results: ForkResult[] = [];

  try {
    const env: ForkEnvironment = {
      config,
      policy: toPolicyConfig(config.security),
      sandbox,
      forkLogger,
      logger,
      createCompletionService: deps.createCompletionService,
      signal: options.signal,
    };
    const context: SingleForkContext = {
      env,
      progress,
      runAgent: deps.runAgent ?? runAgentForTask,
      now,
    };

    const tasks: ForkTask[] = sandboxIds.map((sandboxId, forkId) => {
      const sandboxRoot = sandboxRoots[forkId] ?? process.cwd();
      sandbox.register(sandboxId, sandboxRoot);
      return Object.freeze({
        forkId,
        sandboxId,
        sandboxRoot,
        prompt: options.prompt,
        model: options.model,
        maxTurns: options.maxTurns,
        repoUrl: options.repoUrl,
        branch: options.branch,
      });
    });

    if (options.signal?.aborted === true) {
      onAbort();
    } else {
      for (const task of tasks) {
        // Tasks never reject; ones dropped by clear() never settle
        void queue.add(async () => {
          if (options.signal?.aborted === true) return;
          const taskStart = now();
          let result: ForkResult;
          try {
            result = await runSingleFork(task, context);
          } catch (error) {
            result = crashedForkResult(task, error, (now() - taskStart) / 1000);
            logger.error(`Fork ${String(task.forkId)} crashed: ${errorMessage(error)}`);
          }
          results.push(result);
          const status = progress.getStatus();
          logger.info(
            `Fork ${String(task.forkId)} completed ` +
              `(${String(status.completed + status.failed)}/${String(numForks)} done, ` +
              `${String(status.inProgress)} in progress)`
          );
        });
      }
      await queue.onIdle();
    }

    results.sort((a, b) => a.forkId - b.forkId);
    const summary = aggregateResults(results);
    const wallTime = (now() - start) / 1000;

    for (const result of results) {
      try {
        writeForkSummary(forkLogger, result);
      } catch (error) {
        logger.error(
          `Could not write summary for fork ${String(result.forkId)}: ${errorMessage(error)}`
        );
      }
    }

    if (options.signal?.aborted === true) {
      throw new ForkCancelledError(
        `Execution cancelled after ${String(results.length)} of ${String(numForks)} forks`,
        results
      );
    }

    for (const line of formatSummary(summary, results)) {
      logger.info(line);
    }
    logger.info(`Wall-clock time: ${formatSeconds(wallTime)}`);

    return { results, summary, wallTime };
  } catch (error) {
    if (error instanceof ForkCancelledError) {
      throw error;
    }
    logger.error(`Fork execution failed: ${errorMessage(error)}`);
    throw new ForkExecutionError(`Parallel execution failed: ${errorMessage(error)}`, error);
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
    forkLogger.closeAll();
  }
}
