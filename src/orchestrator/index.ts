/**
 * Orchestrator module - runs agent forks in parallel and aggregates results.
 */

export {
  generateSandboxId,
  retryOptionsFromConfig,
  runAgentForTask,
  runForks,
  runSingleFork,
  validateForkOptions,
} from './run-forks.js';
export type { SingleForkContext } from './run-forks.js';
export {
  aggregateResults,
  formatCost,
  formatSeconds,
  formatSummary,
  formatTokens,
} from './aggregate.js';
export type {
  AggregateSummary,
  ForkEnvironment,
  ForkResult,
  ForkRunDeps,
  ForkRunOptions,
  ForkRunReport,
  ForkTask,
  RunAgentFn,
} from './types.js';
