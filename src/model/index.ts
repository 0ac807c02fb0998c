/**
 * Model module - completion service abstraction, Anthropic via LangChain,
 * model alias resolution and retry.
 *
 * @example
 * ```typescript
 * const completion = createAnthropicCompletionService({ model: 'sonnet' });
 * const response = await withRetry(() =>
 *   completion.complete({ system, messages, tools, maxTokens: 8192 })
 * );
 * ```
 */

export type {
  CompletionRequest,
  CompletionResponse,
  CompletionService,
  ConversationMessage,
  ModelErrorCode,
  RetryableErrorCode,
  RetryContext,
  RetryOptions,
  StopReason,
  TokenUsage,
  ToolCallRequest,
  ToolDefinition,
} from './types.js';

export { ModelError, isRetryableCode, mapErrorToCode } from './base.js';
export { calculateRetryDelay, withRetry } from './retry.js';
export type { WithRetryOptions } from './retry.js';
export {
  LangChainCompletionService,
  extractText,
  toLangChainMessages,
} from './completion.js';
export type {
  ChatModelInvoker,
  LangChainCompletionServiceOptions,
  ToolCallingChatModel,
} from './completion.js';
export { createAnthropicCompletionService, createAnthropicModel } from './anthropic.js';
export type { AnthropicModelOptions } from './anthropic.js';
export { resolveModelIdentifier } from './models.js';
