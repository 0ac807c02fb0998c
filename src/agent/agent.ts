/**
 * Per-fork agent: a bounded model/tool loop over one sandbox.
 *
 * Each turn calls the completion service, accounts tokens and cost, and
 * either finishes or runs the requested tool calls and feeds their results
 * back. Errors inside a turn end the run as `failed`; `run` never throws.
 */

import type { Span } from '@opentelemetry/api';

import {
  DEFAULT_MAX_TOKENS,
  MAX_AGENT_TURNS,
  MAX_TOOL_CALLS_PER_TURN,
  type LogLevel,
} from '../config/constants.js';
import { errorMessage } from '../errors/index.js';
import type { ForkLogger } from '../logging/fork-logger.js';
import { mapErrorToCode } from '../model/base.js';
import { resolveModelIdentifier } from '../model/models.js';
import { withRetry, type WithRetryOptions } from '../model/retry.js';
import type {
  CompletionResponse,
  CompletionService,
  ConversationMessage,
  ToolCallRequest,
  ToolDefinition,
} from '../model/types.js';
import { SecurityViolation } from '../security/violation.js';
import { endLLMSpan, endToolSpan, startLLMSpan, startToolSpan } from '../telemetry/spans.js';
import type { ToolExecutor } from '../tools/executor.js';
import { calculateCost, DEFAULT_RATE_TABLE, type RateTable } from './pricing.js';
import { forkPlaceholders, loadSystemPromptTemplate, replacePlaceholders } from './prompts.js';
import type { AgentOptions, AgentRunResult, AgentStatus } from './types.js';

export const TURN_LIMIT_MESSAGE = 'Task incomplete: reached maximum turn limit';

type ToolResultMessage = Extract<ConversationMessage, { role: 'tool' }>;

/** Longest task excerpt written to the fork log */
const TASK_PREVIEW_LENGTH = 200;

export class Agent {
  readonly forkId: number;
  readonly sandboxId: string;
  readonly model: string;
  readonly modelIdentifier: string;

  private readonly completion: CompletionService;
  private readonly executor: ToolExecutor;
  private readonly forkLogger?: ForkLogger;
  private readonly pricing: RateTable;
  private readonly maxTokens: number;
  private readonly maxToolCallsPerTurn: number;
  private readonly systemPromptOverride?: string;
  private readonly repoUrl?: string;
  private readonly branch?: string;
  private readonly retry: WithRetryOptions;
  private readonly signal?: AbortSignal;
  private readonly parentSpan?: Span;

  private turns = 0;
  private toolCalls = 0;
  private errors = 0;
  private totalTokens = 0;
  private totalCost = 0;

  constructor(options: AgentOptions) {
    this.forkId = options.forkId;
    this.sandboxId = options.sandboxId;
    this.model = options.model;
    this.modelIdentifier = resolveModelIdentifier(options.model, options.models);
    this.completion = options.completion;
    this.executor = options.executor;
    this.forkLogger = options.forkLogger;
    this.pricing = options.pricing ?? DEFAULT_RATE_TABLE;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.maxToolCallsPerTurn = options.maxToolCallsPerTurn ?? MAX_TOOL_CALLS_PER_TURN;
    this.systemPromptOverride = options.systemPrompt;
    this.repoUrl = options.repoUrl;
    this.branch = options.branch;
    this.retry = options.retry ?? {};
    this.signal = options.signal;
    this.parentSpan = options.parentSpan;
  }

  /**
   * Run the task to a terminal state. Counters start from zero on every call.
   */
  async run(prompt: string, maxTurns: number = MAX_AGENT_TURNS): Promise<AgentRunResult> {
    this.resetMetrics();
    this.log('Starting agent execution');
    this.log(`Task: ${prompt.slice(0, TASK_PREVIEW_LENGTH)}`, 'debug');

    let outcome: { status: AgentStatus; finalResponse: string };
    try {
      outcome = await this.runLoop(prompt, maxTurns);
    } catch (error) {
      this.log(`Agent execution failed: ${errorMessage(error)}`, 'error');
      this.errors += 1;
      outcome = { status: 'failed', finalResponse: `Error: ${errorMessage(error)}` };
    }
    const { status, finalResponse } = outcome;

    const result: AgentRunResult = {
      status,
      success: status !== 'truncated_by_turn_limit' && this.errors === 0,
      finalResponse,
      turns: this.turns,
      toolCalls: this.toolCalls,
      errors: this.errors,
      totalTokens: this.totalTokens,
      totalCost: this.totalCost,
    };
    this.log(
      `Agent finished: status=${status}, turns=${String(result.turns)}, ` +
        `tool_calls=${String(result.toolCalls)}, errors=${String(result.errors)}`
    );
    return result;
  }

  private async runLoop(
    prompt: string,
    maxTurns: number
  ): Promise<{ status: AgentStatus; finalResponse: string }> {
    const system = replacePlaceholders(await this.resolveSystemPrompt(), { TASK_PROMPT: prompt });
    const tools = this.executor.toolDefinitions();
    const messages: ConversationMessage[] = [{ role: 'user', content: prompt }];

    while (this.turns < maxTurns) {
      this.signal?.throwIfAborted();
      this.turns += 1;
      this.forkLogger?.logAgentTurn(this.forkId, this.turns, maxTurns, 'Calling model');

      const response = await this.complete(system, messages, tools);
      this.totalTokens += response.usage.inputTokens + response.usage.outputTokens;
      this.totalCost = calculateCost(this.totalTokens, this.modelIdentifier, this.pricing);

      switch (response.stopReason) {
        case 'end_turn':
          this.log('Agent completed task (end_turn)');
          return { status: 'completed', finalResponse: response.text };
        case 'tool_use': {
          const results = await this.processToolCalls(response.toolCalls);
          messages.push(
            { role: 'assistant', content: response.text, toolCalls: response.toolCalls },
            ...results
          );
          break;
        }
        case 'max_tokens':
          this.log('Response truncated due to max_tokens', 'warn');
          return { status: 'completed', finalResponse: response.text };
        default:
          this.log(`Unexpected stop_reason: ${response.stopReason}`, 'warn');
          return { status: 'completed', finalResponse: response.text };
      }
    }

    this.log(`Reached max_turns limit (${String(maxTurns)})`, 'warn');
    return { status: 'truncated_by_turn_limit', finalResponse: TURN_LIMIT_MESSAGE };
  }

  private resetMetrics(): void {
    this.turns = 0;
    this.toolCalls = 0;
    this.errors = 0;
    this.totalTokens = 0;
    this.totalCost = 0;
  }

  private async resolveSystemPrompt(): Promise<string> {
    const template =
      this.systemPromptOverride ??
      (await loadSystemPromptTemplate(undefined, (message) => {
        this.log(message, 'warn');
      }));
    return replacePlaceholders(
      template,
      forkPlaceholders({
        forkId: this.forkId,
        sandboxId: this.sandboxId,
        sandboxRoot: this.executor.sandboxRoot,
        repoUrl: this.repoUrl,
        branch: this.branch,
      })
    );
  }

  private async complete(
    system: string,
    messages: readonly ConversationMessage[],
    tools: readonly ToolDefinition[]
  ): Promise<CompletionResponse> {
    const span = startLLMSpan({
      modelName: this.modelIdentifier,
      maxTokens: this.maxTokens,
      conversationId: String(this.forkId),
      parent: this.parentSpan,
    });

    try {
      const response = await withRetry(
        () =>
          this.completion.complete({
            system,
            messages,
            tools,
            maxTokens: this.maxTokens,
            signal: this.signal,
          }),
        {
          ...this.retry,
          signal: this.signal,
          onRetry: (context) => {
            this.log(
              `Model call failed (${context.error}), retry ${String(context.attempt)}/` +
                `${String(context.maxRetries)} in ${String(context.delayMs)}ms: ${context.message}`,
              'warn'
            );
            this.retry.onRetry?.(context);
          },
        }
      );
      endLLMSpan(span, {
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
        finishReason: response.stopReason,
      });
      return response;
    } catch (error) {
      endLLMSpan(span, { errorType: mapErrorToCode(error) });
      throw error;
    }
  }

  private async processToolCalls(calls: readonly ToolCallRequest[]): Promise<ToolResultMessage[]> {
    const results: ToolResultMessage[] = [];
    for (const [index, call] of calls.entries()) {
      if (index >= this.maxToolCallsPerTurn) {
        const limit = String(this.maxToolCallsPerTurn);
        this.log(`Skipping tool call ${call.name}: over ${limit} per turn`, 'warn');
        results.push({
          role: 'tool',
          toolCallId: call.id,
          content: `ERROR: Tool call skipped: exceeds ${limit} calls per turn`,
          isError: true,
        });
        continue;
      }
      results.push(await this.executeToolCall(call));
    }
    return results;
  }

  private async executeToolCall(call: ToolCallRequest): Promise<ToolResultMessage> {
    const span = startToolSpan({
      toolName: call.name,
      toolCallId: call.id,
      arguments: call.input,
      parent: this.parentSpan,
    });

    try {
      const invocation = this.executor.parseInvocation(call.name, call.input);
      const execution = await this.executor.execute(invocation);
      this.toolCalls += 1;
      endToolSpan(span, { success: !execution.isError, errorType: execution.code });
      return {
        role: 'tool',
        toolCallId: call.id,
        content: execution.output,
        isError: execution.isError,
      };
    } catch (error) {
      this.errors += 1;
      if (error instanceof SecurityViolation) {
        this.log(`Security violation in ${call.name}: ${error.reason}`, 'warn');
        endToolSpan(span, { success: false, errorType: error.rule });
        return {
          role: 'tool',
          toolCallId: call.id,
          content: `SECURITY VIOLATION: ${error.reason}`,
          isError: true,
        };
      }

      this.log(`Tool ${call.name} failed: ${errorMessage(error)}`, 'error');
      endToolSpan(span, {
        success: false,
        errorType: error instanceof Error ? error.name : 'Error',
      });
      return {
        role: 'tool',
        toolCallId: call.id,
        content: `ERROR: ${errorMessage(error)}`,
        isError: true,
      };
    }
  }

  private log(message: string, level: LogLevel = 'info'): void {
    this.forkLogger?.log(this.forkId, message, level);
  }
}
