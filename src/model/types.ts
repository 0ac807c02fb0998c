/**
 * Type definitions for the completion service contract.
 * Messages and responses are provider-neutral; the LangChain adapter maps
 * them to and from chat model messages.
 */

import type { z } from 'zod';

/**
 * Error codes for model operations.
 */
export type ModelErrorCode =
  | 'AUTHENTICATION_ERROR' // API key invalid or missing
  | 'RATE_LIMITED' // Rate limit exceeded or provider overloaded
  | 'MODEL_NOT_FOUND' // Model name not available
  | 'CONTEXT_LENGTH_EXCEEDED' // Input too long
  | 'NETWORK_ERROR' // Connection failed
  | 'TIMEOUT' // Request timed out
  | 'INVALID_RESPONSE' // Malformed response or unsupported model
  | 'UNKNOWN'; // Unexpected errors

/**
 * Error codes that are safe to retry (transient failures).
 */
export type RetryableErrorCode = 'RATE_LIMITED' | 'NETWORK_ERROR' | 'TIMEOUT';

/**
 * Token usage for one completion call.
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * A tool call requested by the model.
 */
export interface ToolCallRequest {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/**
 * Name, description and input schema of a tool, as bound to the model.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  schema: z.ZodType;
}

/**
 * One entry of the conversation sent to the model.
 */
export type ConversationMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls: ToolCallRequest[] }
  | { role: 'tool'; toolCallId: string; content: string; isError: boolean };

/**
 * Known stop reasons; providers may report others.
 */
export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | (string & {});

export interface CompletionRequest {
  system: string;
  messages: readonly ConversationMessage[];
  tools: readonly ToolDefinition[];
  maxTokens: number;
  signal?: AbortSignal;
}

export interface CompletionResponse {
  stopReason: StopReason;
  /** Text blocks of the reply, joined with newlines */
  text: string;
  toolCalls: ToolCallRequest[];
  usage: TokenUsage;
}

/**
 * Anything that can answer a completion request.
 * Throws ModelError on failure.
 */
export interface CompletionService {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * Context passed to retry callbacks.
 */
export interface RetryContext {
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: ModelErrorCode;
  message: string;
}

/**
 * Configuration options for retry operations.
 */
export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  enableJitter?: boolean;
  onRetry?: (context: RetryContext) => void;
}
