/**
 * CompletionService backed by a LangChain chat model with bound tools.
 */

import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  ToolMessage,
  type AIMessageChunk,
  type BaseMessage,
} from '@langchain/core/messages';

import { ModelError, mapErrorToCode } from './base.js';
import type {
  CompletionRequest,
  CompletionResponse,
  CompletionService,
  ConversationMessage,
  ToolCallRequest,
  ToolDefinition,
} from './types.js';

/**
 * Runnable returned by bindTools.
 */
export interface ChatModelInvoker {
  invoke(
    messages: BaseMessage[],
    options?: { signal?: AbortSignal }
  ): Promise<AIMessage | AIMessageChunk>;
}

/**
 * The part of a LangChain chat model this service uses.
 * ChatAnthropic satisfies it.
 */
export interface ToolCallingChatModel {
  bindTools(tools: ToolDefinition[]): ChatModelInvoker;
}

export interface LangChainCompletionServiceOptions {
  /** Builds a model for a max_tokens budget; models are cached per budget */
  createModel: (maxTokens: number) => ToolCallingChatModel;
}

/**
 * Convert conversation entries to LangChain messages.
 */
export function toLangChainMessages(
  system: string,
  messages: readonly ConversationMessage[]
): BaseMessage[] {
  const converted: BaseMessage[] = [new SystemMessage(system)];

  for (const message of messages) {
    switch (message.role) {
      case 'user':
        converted.push(new HumanMessage(message.content));
        break;
      case 'assistant':
        converted.push(
          new AIMessage({
            content: message.content,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              name: call.name,
              args: call.input,
              type: 'tool_call' as const,
            })),
          })
        );
        break;
      case 'tool':
        converted.push(
          new ToolMessage({
            content: message.content,
            tool_call_id: message.toolCallId,
            status: message.isError ? 'error' : 'success',
          })
        );
        break;
    }
  }

  return converted;
}

/**
 * Text blocks of a message, joined with newlines.
 */
export function extractText(content: AIMessage['content']): string {
  if (typeof content === 'string') return content;

  const parts: string[] = [];
  for (const block of content) {
    if (typeof block === 'string') {
      parts.push(block);
    } else if (block.type === 'text' && 'text' in block && typeof block.text === 'string') {
      parts.push(block.text);
    }
  }
  return parts.join('\n');
}

function stopReasonOf(metadata: Record<string, unknown>, toolCalls: ToolCallRequest[]): string {
  const reported = metadata['stop_reason'];
  if (typeof reported === 'string' && reported !== '') return reported;
  return toolCalls.length > 0 ? 'tool_use' : 'end_turn';
}

export class LangChainCompletionService implements CompletionService {
  private readonly createModel: (maxTokens: number) => ToolCallingChatModel;
  private readonly models = new Map<number, ToolCallingChatModel>();

  constructor(options: LangChainCompletionServiceOptions) {
    this.createModel = options.createModel;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const bound = this.getModel(request.maxTokens).bindTools([...request.tools]);

    let response: AIMessage | AIMessageChunk;
    try {
      response = await bound.invoke(toLangChainMessages(request.system, request.messages), {
        signal: request.signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Completion request failed';
      throw new ModelError(message, mapErrorToCode(error), { cause: error });
    }

    const toolCalls: ToolCallRequest[] = (response.tool_calls ?? []).map((call, index) => ({
      id: call.id ?? `toolu_${String(index)}`,
      name: call.name,
      input: call.args,
    }));

    return {
      stopReason: stopReasonOf(response.response_metadata, toolCalls),
      text: extractText(response.content),
      toolCalls,
      usage: {
        inputTokens: response.usage_metadata?.input_tokens ?? 0,
        outputTokens: response.usage_metadata?.output_tokens ?? 0,
      },
    };
  }

  private getModel(maxTokens: number): ToolCallingChatModel {
    let model = this.models.get(maxTokens);
    if (model === undefined) {
      model = this.createModel(maxTokens);
      this.models.set(maxTokens, model);
    }
    return model;
  }
}
