/**
 * Types for the per-fork agent loop.
 */

import type { Span } from '@opentelemetry/api';

import type { ModelsConfig } from '../config/schema.js';
import type { ForkLogger } from '../logging/fork-logger.js';
import type { WithRetryOptions } from '../model/retry.js';
import type { CompletionService } from '../model/types.js';
import type { ToolExecutor } from '../tools/executor.js';
import type { RateTable } from './pricing.js';

/**
 * Terminal state of the turn loop.
 */
export type AgentStatus = 'completed' | 'truncated_by_turn_limit' | 'failed';

export interface AgentRunResult {
  status: AgentStatus;
  success: boolean;
  finalResponse: string;
  turns: number;
  toolCalls: number;
  errors: number;
  totalTokens: number;
  /** Estimated USD */
  totalCost: number;
}

export interface AgentOptions {
  forkId: number;
  sandboxId: string;
  /** Alias (sonnet, opus, haiku) or a provider model identifier */
  model: string;
  /** Alias table; defaults to the built-in identifiers */
  models?: ModelsConfig;
  completion: CompletionService;
  executor: ToolExecutor;
  forkLogger?: ForkLogger;
  pricing?: RateTable;
  maxTokens?: number;
  maxToolCallsPerTurn?: number;
  /** Replaces the system prompt template; placeholders are still substituted */
  systemPrompt?: string;
  repoUrl?: string;
  branch?: string;
  retry?: WithRetryOptions;
  signal?: AbortSignal;
  /** Fork span the completion and tool spans nest under */
  parentSpan?: Span;
}
