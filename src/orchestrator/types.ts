/**
 * Records exchanged between the orchestrator, its forks and the CLI.
 */

import type { Span } from '@opentelemetry/api';

import type { AgentRunResult, AgentStatus } from '../agent/types.js';
import type { AppConfig } from '../config/schema.js';
import type { ForkLogger } from '../logging/fork-logger.js';
import type { Logger } from '../logging/logger.js';
import type { ProgressTracker } from '../logging/progress.js';
import type { CompletionService } from '../model/types.js';
import type { SandboxService } from '../sandbox/types.js';
import type { PolicyConfig } from '../security/policy-config.js';

/**
 * One unit of work, created at dispatch time.
 */
export type ForkTask = Readonly<{
  forkId: number;
  sandboxId: string;
  sandboxRoot: string;
  prompt: string;
  model: string;
  maxTurns: number;
  repoUrl?: string;
  branch?: string;
}>;

/**
 * Exactly one per dispatched task, frozen once built.
 */
export type ForkResult = Readonly<{
  forkId: number;
  sandboxId: string;
  success: boolean;
  finalResponse: string;
  turns: number;
  toolCalls: number;
  errors: number;
  totalTokens: number;
  totalCost: number;
  /** Seconds */
  executionTime: number;
  error?: string;
  status: AgentStatus;
}>;

export interface AggregateSummary {
  totalForks: number;
  successful: number;
  failed: number;
  /** 0..1 */
  successRate: number;
  totalTurns: number;
  totalToolCalls: number;
  totalErrors: number;
  totalTokens: number;
  totalCost: number;
  /** Sum of fork execution times, in seconds */
  totalTime: number;
  avgTurns: number;
  avgToolCalls: number;
  avgTokens: number;
  avgTime: number;
  avgCost: number;
  successfulForks: number[];
  failedForks: Array<{ forkId: number; error: string }>;
}

export interface ForkRunOptions {
  prompt: string;
  numForks: number;
  model: string;
  maxTurns: number;
  /** One per fork; defaults to the working directory for every fork */
  sandboxRoots?: readonly string[];
  /** One per fork; defaults to `fork_<i>_<8 hex>` */
  sandboxIds?: readonly string[];
  repoUrl?: string;
  branch?: string;
  /** Defaults to config.forks.logDir */
  logDir?: string;
  /** Defaults to min(numForks, config.forks.maxWorkers) */
  maxWorkers?: number;
  signal?: AbortSignal;
}

/**
 * Everything a fork needs besides its task.
 */
export interface ForkEnvironment {
  config: AppConfig;
  policy: PolicyConfig;
  sandbox: SandboxService;
  forkLogger: ForkLogger;
  logger: Logger;
  createCompletionService: (model: string) => CompletionService;
  signal?: AbortSignal;
  span?: Span;
}

export type RunAgentFn = (task: ForkTask, env: ForkEnvironment) => Promise<AgentRunResult>;

export interface ForkRunDeps {
  config: AppConfig;
  createCompletionService: (model: string) => CompletionService;
  /** Defaults to a silent logger */
  logger?: Logger;
  /** Defaults to a LocalSandboxService */
  sandbox?: SandboxService;
  forkLogger?: ForkLogger;
  progress?: ProgressTracker;
  /** Replaces the default agent construction */
  runAgent?: RunAgentFn;
  /** Milliseconds clock */
  now?: () => number;
}

export interface ForkRunReport {
  results: ForkResult[];
  summary: AggregateSummary;
  /** Wall-clock seconds for the whole run */
  wallTime: number;
}
