/**
 * Tests for the LangChain completion service.
 */

import { describe, expect, it, jest } from '@jest/globals';
import { AIMessage, HumanMessage, SystemMessage, ToolMessage } from '@langchain/core/messages';
import { z } from 'zod';

import { FakeChatModel } from '../../../tests/fixtures/completion.js';
import { ModelError } from '../base.js';
import { extractText, LangChainCompletionService, toLangChainMessages } from '../completion.js';
import type { CompletionRequest } from '../types.js';

const readDefinition = {
  name: 'Read',
  description: 'Read a file',
  schema: z.object({ file_path: z.string() }),
};

function request(overrides: Partial<CompletionRequest> = {}): CompletionRequest {
  return {
    system: 'You are fork 0',
    messages: [{ role: 'user', content: 'List files' }],
    tools: [readDefinition],
    maxTokens: 8192,
    ...overrides,
  };
}

describe('toLangChainMessages', () => {
  it('maps each conversation role to a LangChain message', () => {
    const messages = toLangChainMessages('system text', [
      { role: 'user', content: 'hi' },
      {
        role: 'assistant',
        content: 'reading',
        toolCalls: [{ id: 'toolu_1', name: 'Read', input: { file_path: 'a.txt' } }],
      },
      { role: 'tool', toolCallId: 'toolu_1', content: 'ERROR: File not found', isError: true },
    ]);

    expect(messages).toHaveLength(4);
    expect(messages[0]).toBeInstanceOf(SystemMessage);
    expect(messages[0]?.content).toBe('system text');
    expect(messages[1]).toBeInstanceOf(HumanMessage);

    const assistant = messages[2];
    expect(assistant).toBeInstanceOf(AIMessage);
    if (assistant instanceof AIMessage) {
      expect(assistant.tool_calls).toEqual([
        { id: 'toolu_1', name: 'Read', args: { file_path: 'a.txt' }, type: 'tool_call' },
      ]);
    }

    const tool = messages[3];
    expect(tool).toBeInstanceOf(ToolMessage);
    if (tool instanceof ToolMessage) {
      expect(tool.tool_call_id).toBe('toolu_1');
      expect(tool.status).toBe('error');
      expect(tool.content).toBe('ERROR: File not found');
    }
  });
});

describe('extractText', () => {
  it('joins text blocks', () => {
    expect(extractText('plain')).toBe('plain');
    expect(
      extractText([
        { type: 'text', text: 'first' },
        { type: 'text', text: 'second' },
      ])
    ).toBe('first\nsecond');
  });
});

describe('LangChainCompletionService', () => {
  it('returns tool calls, stop reason and usage', async () => {
    const model = new FakeChatModel([
      new AIMessage({
        content: 'Let me look',
        tool_calls: [
          { id: 'toolu_1', name: 'Read', args: { file_path: 'a.txt' }, type: 'tool_call' },
        ],
        response_metadata: { stop_reason: 'tool_use' },
        usage_metadata: { input_tokens: 100, output_tokens: 20, total_tokens: 120 },
      }),
    ]);
    const service = new LangChainCompletionService({ createModel: () => model });

    const response = await service.complete(request());

    expect(response).toEqual({
      stopReason: 'tool_use',
      text: 'Let me look',
      toolCalls: [{ id: 'toolu_1', name: 'Read', input: { file_path: 'a.txt' } }],
      usage: { inputTokens: 100, outputTokens: 20 },
    });
    expect(model.boundTools).toEqual([[readDefinition]]);
    expect(model.received[0]?.[1]).toBeInstanceOf(HumanMessage);
  });

  it('infers end_turn and zero usage when the provider reports neither', async () => {
    const model = new FakeChatModel([new AIMessage({ content: 'Done.' })]);
    const service = new LangChainCompletionService({ createModel: () => model });

    const response = await service.complete(request());

    expect(response.stopReason).toBe('end_turn');
    expect(response.text).toBe('Done.');
    expect(response.usage).toEqual({ inputTokens: 0, outputTokens: 0 });
  });

  it('keeps max_tokens as the stop reason', async () => {
    const model = new FakeChatModel([
      new AIMessage({ content: 'partial', response_metadata: { stop_reason: 'max_tokens' } }),
    ]);
    const service = new LangChainCompletionService({ createModel: () => model });

    expect((await service.complete(request())).stopReason).toBe('max_tokens');
  });

  it('wraps provider failures in a classified ModelError', async () => {
    const model = new FakeChatModel([
      Object.assign(new Error('Too many requests'), { status: 429 }),
    ]);
    const service = new LangChainCompletionService({ createModel: () => model });

    const failure = await service.complete(request()).then(
      () => undefined,
      (error: unknown) => error
    );

    expect(failure).toBeInstanceOf(ModelError);
    if (failure instanceof ModelError) {
      expect(failure.code).toBe('RATE_LIMITED');
      expect(failure.message).toBe('Too many requests');
    }
  });

  it('builds one model per token budget', async () => {
    const createModel = jest.fn(
      () => new FakeChatModel([new AIMessage({ content: 'a' }), new AIMessage({ content: 'b' })])
    );
    const service = new LangChainCompletionService({ createModel });

    await service.complete(request());
    await service.complete(request());

    expect(createModel).toHaveBeenCalledTimes(1);
    expect(createModel).toHaveBeenCalledWith(8192);
  });
});
