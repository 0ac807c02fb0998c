/**
 * Span attribute names.
 *
 * Completion and tool spans use the OpenTelemetry GenAI semantic
 * conventions (https://opentelemetry.io/docs/specs/semconv/gen-ai/).
 * Fork spans add a small `fork.*` namespace of their own.
 */

// -----------------------------------------------------------------------------
// GenAI Attributes
// -----------------------------------------------------------------------------

export const ATTR_GEN_AI_OPERATION_NAME = 'gen_ai.operation.name';
export const ATTR_GEN_AI_PROVIDER_NAME = 'gen_ai.provider.name';
export const ATTR_GEN_AI_REQUEST_MODEL = 'gen_ai.request.model';
export const ATTR_GEN_AI_REQUEST_MAX_TOKENS = 'gen_ai.request.max_tokens';
export const ATTR_GEN_AI_USAGE_INPUT_TOKENS = 'gen_ai.usage.input_tokens';
export const ATTR_GEN_AI_USAGE_OUTPUT_TOKENS = 'gen_ai.usage.output_tokens';
export const ATTR_GEN_AI_RESPONSE_FINISH_REASONS = 'gen_ai.response.finish_reasons';
export const ATTR_GEN_AI_TOOL_NAME = 'gen_ai.tool.name';
export const ATTR_GEN_AI_TOOL_CALL_ID = 'gen_ai.tool.call.id';
/** Only recorded when sensitive data is enabled */
export const ATTR_GEN_AI_TOOL_CALL_ARGUMENTS = 'gen_ai.tool.call.arguments';
export const ATTR_GEN_AI_CONVERSATION_ID = 'gen_ai.conversation.id';

/** Error type or exception name */
export const ATTR_ERROR_TYPE = 'error.type';

// -----------------------------------------------------------------------------
// Fork Attributes
// -----------------------------------------------------------------------------

export const ATTR_FORK_ID = 'fork.id';
export const ATTR_FORK_SANDBOX_ID = 'fork.sandbox_id';
export const ATTR_FORK_STATUS = 'fork.status';
export const ATTR_FORK_TURNS = 'fork.turns';
export const ATTR_FORK_TOOL_CALLS = 'fork.tool_calls';
export const ATTR_FORK_ERRORS = 'fork.errors';
export const ATTR_FORK_TOTAL_TOKENS = 'fork.total_tokens';
export const ATTR_FORK_COST_USD = 'fork.cost_usd';

// -----------------------------------------------------------------------------
// Well-Known Values
// -----------------------------------------------------------------------------

export const GEN_AI_OPERATION = {
  CHAT: 'chat',
  EXECUTE_TOOL: 'execute_tool',
  INVOKE_AGENT: 'invoke_agent',
} as const;

export type GenAIOperationName = (typeof GEN_AI_OPERATION)[keyof typeof GEN_AI_OPERATION];

export const GEN_AI_PROVIDER_ANTHROPIC = 'anthropic';
