/**
 * Tests for fork, completion and tool span helpers.
 */

import { SpanStatusCode } from '@opentelemetry/api';
import { afterEach, describe, expect, it } from '@jest/globals';

import {
  ATTR_ERROR_TYPE,
  ATTR_FORK_COST_USD,
  ATTR_FORK_ID,
  ATTR_FORK_SANDBOX_ID,
  ATTR_FORK_STATUS,
  ATTR_FORK_TURNS,
  ATTR_GEN_AI_CONVERSATION_ID,
  ATTR_GEN_AI_PROVIDER_NAME,
  ATTR_GEN_AI_REQUEST_MAX_TOKENS,
  ATTR_GEN_AI_RESPONSE_FINISH_REASONS,
  ATTR_GEN_AI_TOOL_CALL_ARGUMENTS,
  ATTR_GEN_AI_TOOL_CALL_ID,
  ATTR_GEN_AI_USAGE_INPUT_TOKENS,
  ATTR_GEN_AI_USAGE_OUTPUT_TOKENS,
  endForkSpan,
  endLLMSpan,
  endToolSpan,
  shutdown,
  startForkSpan,
  startLLMSpan,
  startToolSpan,
} from '../index.js';
import { initializeTestTelemetry } from './test-helpers.js';

describe('span helpers', () => {
  afterEach(async () => {
    await shutdown();
  });

  it('creates no recorded spans while telemetry is off', () => {
    const span = startLLMSpan({ modelName: 'claude-test' });

    expect(span.isRecording()).toBe(false);
    endLLMSpan(span);
  });

  it('records a fork span with its final metrics', async () => {
    const capture = await initializeTestTelemetry();

    const span = startForkSpan({ forkId: 2, sandboxId: 'fork_2_abc', model: 'sonnet' });
    endForkSpan(span, {
      status: 'completed',
      turns: 3,
      toolCalls: 4,
      errors: 0,
      totalTokens: 1200,
      totalCost: 0.0036,
    });

    const recorded = capture.getSpan('invoke_agent fork_2');
    expect(recorded.attributes[ATTR_FORK_ID]).toBe(2);
    expect(recorded.attributes[ATTR_FORK_SANDBOX_ID]).toBe('fork_2_abc');
    expect(recorded.attributes[ATTR_FORK_STATUS]).toBe('completed');
    expect(recorded.attributes[ATTR_FORK_TURNS]).toBe(3);
    expect(recorded.attributes[ATTR_FORK_COST_USD]).toBe(0.0036);
    expect(recorded.status.code).toBe(SpanStatusCode.OK);
  });

  it('marks a failed fork span as an error', async () => {
    const capture = await initializeTestTelemetry();

    const span = startForkSpan({ forkId: 0, sandboxId: 's', model: 'haiku' });
    endForkSpan(span, {
      status: 'failed',
      turns: 1,
      toolCalls: 0,
      errors: 1,
      totalTokens: 0,
      totalCost: 0,
      errorType: 'ModelError',
    });

    const recorded = capture.getSpan('invoke_agent fork_0');
    expect(recorded.status).toEqual({ code: SpanStatusCode.ERROR, message: 'ModelError' });
    expect(recorded.attributes[ATTR_ERROR_TYPE]).toBe('ModelError');
  });

  it('nests completion spans under the fork span', async () => {
    const capture = await initializeTestTelemetry();

    const fork = startForkSpan({ forkId: 1, sandboxId: 's', model: 'sonnet' });
    const llm = startLLMSpan({
      modelName: 'claude-test',
      maxTokens: 8192,
      conversationId: '1',
      parent: fork,
    });
    endLLMSpan(llm, { inputTokens: 100, outputTokens: 20, finishReason: 'tool_use' });
    endForkSpan(fork, {
      status: 'completed',
      turns: 1,
      toolCalls: 0,
      errors: 0,
      totalTokens: 120,
      totalCost: 0,
    });

    const recorded = capture.getSpan('chat claude-test');
    expect(recorded.parentSpanContext?.spanId).toBe(fork.spanContext().spanId);
    expect(recorded.attributes[ATTR_GEN_AI_PROVIDER_NAME]).toBe('anthropic');
    expect(recorded.attributes[ATTR_GEN_AI_REQUEST_MAX_TOKENS]).toBe(8192);
    expect(recorded.attributes[ATTR_GEN_AI_CONVERSATION_ID]).toBe('1');
    expect(recorded.attributes[ATTR_GEN_AI_USAGE_INPUT_TOKENS]).toBe(100);
    expect(recorded.attributes[ATTR_GEN_AI_USAGE_OUTPUT_TOKENS]).toBe(20);
    expect(recorded.attributes[ATTR_GEN_AI_RESPONSE_FINISH_REASONS]).toEqual(['tool_use']);
  });

  it('leaves tool arguments out unless sensitive data is enabled', async () => {
    const capture = await initializeTestTelemetry();

    const span = startToolSpan({
      toolName: 'Bash',
      toolCallId: 'call_1',
      arguments: { command: 'ls' },
    });
    endToolSpan(span, { success: true });

    const recorded = capture.getSpan('execute_tool Bash');
    expect(recorded.attributes[ATTR_GEN_AI_TOOL_CALL_ID]).toBe('call_1');
    expect(recorded.attributes[ATTR_GEN_AI_TOOL_CALL_ARGUMENTS]).toBeUndefined();
  });

  it('records tool arguments when sensitive data is enabled', async () => {
    const capture = await initializeTestTelemetry({ enableSensitiveData: true });

    const span = startToolSpan({ toolName: 'Read', arguments: { file_path: 'a.txt' } });
    endToolSpan(span, { success: false });

    const recorded = capture.getSpan('execute_tool Read');
    expect(recorded.attributes[ATTR_GEN_AI_TOOL_CALL_ARGUMENTS]).toBe('{"file_path":"a.txt"}');
    expect(recorded.status).toEqual({ code: SpanStatusCode.ERROR, message: 'tool_error' });
  });
});
