/**
 * Anthropic chat model factory.
 */

import { ChatAnthropic } from '@langchain/anthropic';

import type { ModelsConfig } from '../config/schema.js';
import { LangChainCompletionService } from './completion.js';
import { resolveModelIdentifier } from './models.js';

export interface AnthropicModelOptions {
  /** Alias (sonnet, opus, haiku) or full model identifier */
  model: string;
  /** Falls back to ANTHROPIC_API_KEY */
  apiKey?: string;
  models?: ModelsConfig;
}

/**
 * Create a ChatAnthropic instance for one max_tokens budget.
 */
export function createAnthropicModel(
  options: AnthropicModelOptions,
  maxTokens: number
): ChatAnthropic {
  return new ChatAnthropic({
    model: resolveModelIdentifier(options.model, options.models),
    anthropicApiKey: options.apiKey,
    maxTokens,
  });
}

/**
 * Completion service talking to Anthropic through LangChain.
 */
export function createAnthropicCompletionService(
  options: AnthropicModelOptions
): LangChainCompletionService {
  return new LangChainCompletionService({
    createModel: (maxTokens) => createAnthropicModel(options, maxTokens),
  });
}
