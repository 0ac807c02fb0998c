/**
 * Span helpers for forks, completion calls and tool calls.
 *
 * Completion and tool spans follow the GenAI semantic conventions:
 * https://opentelemetry.io/docs/specs/semconv/gen-ai/gen-ai-spans/
 *
 * Every helper works against the global tracer, so with telemetry off
 * they create no-op spans.
 */

import { SpanKind, SpanStatusCode, context, trace } from '@opentelemetry/api';
import type { Context, Span } from '@opentelemetry/api';

import { getTracer, isSensitiveDataEnabled } from './setup.js';
import {
  ATTR_ERROR_TYPE,
  ATTR_FORK_COST_USD,
  ATTR_FORK_ERRORS,
  ATTR_FORK_ID,
  ATTR_FORK_SANDBOX_ID,
  ATTR_FORK_STATUS,
  ATTR_FORK_TOOL_CALLS,
  ATTR_FORK_TOTAL_TOKENS,
  ATTR_FORK_TURNS,
  ATTR_GEN_AI_CONVERSATION_ID,
  ATTR_GEN_AI_OPERATION_NAME,
  ATTR_GEN_AI_PROVIDER_NAME,
  ATTR_GEN_AI_REQUEST_MAX_TOKENS,
  ATTR_GEN_AI_REQUEST_MODEL,
  ATTR_GEN_AI_RESPONSE_FINISH_REASONS,
  ATTR_GEN_AI_TOOL_CALL_ARGUMENTS,
  ATTR_GEN_AI_TOOL_CALL_ID,
  ATTR_GEN_AI_TOOL_NAME,
  ATTR_GEN_AI_USAGE_INPUT_TOKENS,
  ATTR_GEN_AI_USAGE_OUTPUT_TOKENS,
  GEN_AI_OPERATION,
  GEN_AI_PROVIDER_ANTHROPIC,
} from './conventions.js';
import type {
  ForkSpanEndOptions,
  ForkSpanOptions,
  LLMSpanEndOptions,
  LLMSpanOptions,
  ToolSpanEndOptions,
  ToolSpanOptions,
} from './types.js';

const TRACER_NAME = 'sandbox-forks.genai';

function parentContext(parent: Span | undefined): Context {
  return parent === undefined ? context.active() : trace.setSpan(context.active(), parent);
}

function endWithStatus(span: Span, errorType: string | undefined): void {
  if (errorType !== undefined) {
    span.setAttribute(ATTR_ERROR_TYPE, errorType);
    span.setStatus({ code: SpanStatusCode.ERROR, message: errorType });
  } else {
    span.setStatus({ code: SpanStatusCode.OK });
  }
  span.end();
}

// -----------------------------------------------------------------------------
// Fork Spans
// -----------------------------------------------------------------------------

/**
 * Start the root span of one fork. Pass it as `parent` to the completion
 * and tool span helpers to nest their spans under it.
 */
export function startForkSpan(options: ForkSpanOptions): Span {
  const name = `${GEN_AI_OPERATION.INVOKE_AGENT} fork_${String(options.forkId)}`;
  return getTracer(TRACER_NAME).startSpan(name, {
    kind: SpanKind.INTERNAL,
    attributes: {
      [ATTR_GEN_AI_OPERATION_NAME]: GEN_AI_OPERATION.INVOKE_AGENT,
      [ATTR_GEN_AI_REQUEST_MODEL]: options.model,
      [ATTR_FORK_ID]: options.forkId,
      [ATTR_FORK_SANDBOX_ID]: options.sandboxId,
    },
  });
}

export function endForkSpan(span: Span, options: ForkSpanEndOptions): void {
  span.setAttributes({
    [ATTR_FORK_STATUS]: options.status,
    [ATTR_FORK_TURNS]: options.turns,
    [ATTR_FORK_TOOL_CALLS]: options.toolCalls,
    [ATTR_FORK_ERRORS]: options.errors,
    [ATTR_FORK_TOTAL_TOKENS]: options.totalTokens,
    [ATTR_FORK_COST_USD]: options.totalCost,
  });
  endWithStatus(span, options.errorType);
}

// -----------------------------------------------------------------------------
// Completion Spans
// -----------------------------------------------------------------------------

export function startLLMSpan(options: LLMSpanOptions): Span {
  const span = getTracer(TRACER_NAME).startSpan(
    `${GEN_AI_OPERATION.CHAT} ${options.modelName}`,
    {
      kind: SpanKind.CLIENT,
      attributes: {
        [ATTR_GEN_AI_OPERATION_NAME]: GEN_AI_OPERATION.CHAT,
        [ATTR_GEN_AI_PROVIDER_NAME]: options.providerName ?? GEN_AI_PROVIDER_ANTHROPIC,
        [ATTR_GEN_AI_REQUEST_MODEL]: options.modelName,
      },
    },
    parentContext(options.parent)
  );
  if (options.maxTokens !== undefined) {
    span.setAttribute(ATTR_GEN_AI_REQUEST_MAX_TOKENS, options.maxTokens);
  }
  if (options.conversationId !== undefined) {
    span.setAttribute(ATTR_GEN_AI_CONVERSATION_ID, options.conversationId);
  }
  return span;
}

export function endLLMSpan(span: Span, options: LLMSpanEndOptions = {}): void {
  if (options.inputTokens !== undefined) {
    span.setAttribute(ATTR_GEN_AI_USAGE_INPUT_TOKENS, options.inputTokens);
  }
  if (options.outputTokens !== undefined) {
    span.setAttribute(ATTR_GEN_AI_USAGE_OUTPUT_TOKENS, options.outputTokens);
  }
  if (options.finishReason !== undefined) {
    span.setAttribute(ATTR_GEN_AI_RESPONSE_FINISH_REASONS, [options.finishReason]);
  }
  endWithStatus(span, options.errorType);
}

// -----------------------------------------------------------------------------
// Tool Spans
// -----------------------------------------------------------------------------

export function startToolSpan(options: ToolSpanOptions): Span {
  const span = getTracer(TRACER_NAME).startSpan(
    `${GEN_AI_OPERATION.EXECUTE_TOOL} ${options.toolName}`,
    {
      kind: SpanKind.INTERNAL,
      attributes: {
        [ATTR_GEN_AI_OPERATION_NAME]: GEN_AI_OPERATION.EXECUTE_TOOL,
        [ATTR_GEN_AI_TOOL_NAME]: options.toolName,
      },
    },
    parentContext(options.parent)
  );
  if (options.toolCallId !== undefined) {
    span.setAttribute(ATTR_GEN_AI_TOOL_CALL_ID, options.toolCallId);
  }
  if (isSensitiveDataEnabled() && options.arguments !== undefined) {
    span.setAttribute(ATTR_GEN_AI_TOOL_CALL_ARGUMENTS, JSON.stringify(options.arguments));
  }
  return span;
}

export function endToolSpan(span: Span, options: ToolSpanEndOptions): void {
  if (options.success) {
    endWithStatus(span, undefined);
    return;
  }
  endWithStatus(span, options.errorType ?? 'tool_error');
}
