/**
 * Scripted completion services and chat models for agent and model tests.
 */

import type { AIMessage, BaseMessage } from '@langchain/core/messages';

import type {
  ChatModelInvoker,
  ToolCallingChatModel,
} from '../../src/model/completion.js';
import type {
  CompletionRequest,
  CompletionResponse,
  CompletionService,
  ToolCallRequest,
  ToolDefinition,
} from '../../src/model/types.js';

/**
 * Chat model double: records bound tools and received messages, answers
 * with queued messages or errors.
 */
export class FakeChatModel implements ToolCallingChatModel {
  readonly boundTools: ToolDefinition[][] = [];
  readonly received: BaseMessage[][] = [];
  private readonly responses: Array<AIMessage | Error>;

  constructor(responses: Array<AIMessage | Error>) {
    this.responses = [...responses];
  }

  bindTools(tools: ToolDefinition[]): ChatModelInvoker {
    this.boundTools.push(tools);
    return {
      invoke: async (messages: BaseMessage[]) => {
        this.received.push(messages);
        const next = this.responses.shift();
        if (next === undefined) throw new Error('FakeChatModel has no response queued');
        if (next instanceof Error) throw next;
        return next;
      },
    };
  }
}

/**
 * Completion service answering from a script. Requests are recorded with a
 * copy of the messages as they were at call time.
 */
export class ScriptedCompletionService implements CompletionService {
  readonly requests: CompletionRequest[] = [];
  private readonly script: Array<CompletionResponse | Error>;

  constructor(script: Array<CompletionResponse | Error>) {
    this.script = [...script];
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const next = this.script.shift();
    if (next === undefined) throw new Error('ScriptedCompletionService script exhausted');
    if (next instanceof Error) throw next;
    return next;
  }
}

export function endTurn(text: string, inputTokens = 10, outputTokens = 5): CompletionResponse {
  return { stopReason: 'end_turn', text, toolCalls: [], usage: { inputTokens, outputTokens } };
}

export function toolUse(
  toolCalls: ToolCallRequest[],
  text = '',
  inputTokens = 10,
  outputTokens = 5
): CompletionResponse {
  return { stopReason: 'tool_use', text, toolCalls, usage: { inputTokens, outputTokens } };
}

export function toolCall(
  id: string,
  name: string,
  input: Record<string, unknown>
): ToolCallRequest {
  return { id, name, input };
}
