/**
 * Agent module - the per-fork turn loop, cost estimation and system prompt.
 */

export { Agent, TURN_LIMIT_MESSAGE } from './agent.js';
export type { AgentOptions, AgentRunResult, AgentStatus } from './types.js';
export { calculateCost, rateFor, DEFAULT_RATE_TABLE } from './pricing.js';
export type { RateTable } from './pricing.js';
export {
  DEFAULT_BRANCH,
  DEFAULT_REPO_URL,
  FALLBACK_SYSTEM_PROMPT,
  forkPlaceholders,
  getDefaultPromptPath,
  loadSystemPromptTemplate,
  replacePlaceholders,
  stripYamlFrontMatter,
} from './prompts.js';
export type { ForkPromptContext, PlaceholderValues } from './prompts.js';
