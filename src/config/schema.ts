/**
 * Zod schemas for configuration validation.
 * Types are inferred from schemas using z.infer<> - no manual type definitions.
 */

import { z } from 'zod';
import {
  CONFIG_VERSION,
  MODEL_ALIASES,
  DEFAULT_MODEL,
  DEFAULT_MODEL_IDENTIFIERS,
  DEFAULT_PRICING_RATES,
  DEFAULT_PRICING_FALLBACK,
  MAX_FORKS,
  THREAD_POOL_MAX_WORKERS,
  MAX_AGENT_TURNS,
  MAX_TOOL_CALLS_PER_TURN,
  DEFAULT_MAX_TOKENS,
  DEFAULT_LOG_DIR,
  BASH_TIMEOUT_MS,
  DEFAULT_MAX_FILE_SIZE_MB,
  DEFAULT_STRICT_PATH_VALIDATION,
  DEFAULT_ALLOWED_PATHS,
  DEFAULT_BLOCKED_PATHS,
  DEFAULT_BLOCKED_COMMANDS,
  DEFAULT_BLOCKED_COMMAND_PATTERNS,
  DEFAULT_ESCAPE_IDIOMS,
  LOG_LEVELS,
  DEFAULT_LOG_LEVEL,
  DEFAULT_TELEMETRY_ENABLED,
  DEFAULT_ENABLE_SENSITIVE_DATA,
  DEFAULT_RETRY_ENABLED,
  DEFAULT_MAX_RETRIES,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_ENABLE_JITTER,
} from './constants.js';

// -----------------------------------------------------------------------------
// Fork Execution Schema
// -----------------------------------------------------------------------------

/**
 * Fork execution limits and defaults.
 */
export const ForksConfigSchema = z.object({
  maxForks: z
    .number()
    .int()
    .positive()
    .default(MAX_FORKS)
    .describe('Upper bound for the number of forks in one run'),
  maxWorkers: z
    .number()
    .int()
    .positive()
    .default(THREAD_POOL_MAX_WORKERS)
    .describe('Maximum forks running at the same time'),
  maxTurns: z
    .number()
    .int()
    .positive()
    .default(MAX_AGENT_TURNS)
    .describe('Maximum agent turns per fork'),
  defaultModel: z.enum(MODEL_ALIASES).default(DEFAULT_MODEL).describe('Model alias used by default'),
  logDir: z.string().default(DEFAULT_LOG_DIR).describe('Directory for per-fork log files'),
  maxToolCallsPerTurn: z
    .number()
    .int()
    .positive()
    .default(MAX_TOOL_CALLS_PER_TURN)
    .describe('Tool calls executed per agent turn'),
  maxTokens: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_TOKENS)
    .describe('max_tokens sent with each completion request'),
  bashTimeoutMs: z
    .number()
    .int()
    .positive()
    .max(BASH_TIMEOUT_MS)
    .default(BASH_TIMEOUT_MS)
    .describe('Wall-clock limit for a single Bash tool call'),
});

export type ForksConfig = z.infer<typeof ForksConfigSchema>;

// -----------------------------------------------------------------------------
// Security Schema
// -----------------------------------------------------------------------------

/**
 * Check that a string compiles as a regular expression.
 */
function isValidRegex(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}

/**
 * Security policy applied to every tool call.
 */
export const SecurityConfigSchema = z.object({
  allowedPathPrefixes: z
    .array(z.string())
    .default(() => [...DEFAULT_ALLOWED_PATHS])
    .describe('Sandbox-relative prefixes file tools may touch under strict validation'),
  blockedPathPrefixes: z
    .array(z.string())
    .default(() => [...DEFAULT_BLOCKED_PATHS])
    .describe('Absolute (or ~) directories no tool may touch'),
  blockedCommandSubstrings: z
    .array(z.string())
    .default(() => [...DEFAULT_BLOCKED_COMMANDS])
    .describe('Bash commands containing any of these are rejected'),
  blockedCommandPatterns: z
    .array(
      z.string().refine(isValidRegex, {
        message: 'blockedCommandPatterns entries must be valid regular expressions',
      })
    )
    .default(() => [...DEFAULT_BLOCKED_COMMAND_PATTERNS])
    .describe('Case-insensitive regular expressions rejected for Bash'),
  maxFileSizeMb: z
    .number()
    .positive()
    .default(DEFAULT_MAX_FILE_SIZE_MB)
    .describe('Largest content Write/Edit may produce'),
  strictPathValidation: z
    .boolean()
    .default(DEFAULT_STRICT_PATH_VALIDATION)
    .describe('Require file tool paths to be under an allowed prefix'),
  escapeIdioms: z
    .array(z.string())
    .default(() => [...DEFAULT_ESCAPE_IDIOMS])
    .describe('Bash idioms that are logged as warnings'),
});

export type SecurityConfig = z.infer<typeof SecurityConfigSchema>;

// -----------------------------------------------------------------------------
// Model Schemas
// -----------------------------------------------------------------------------

/**
 * Model alias to provider identifier mapping.
 */
export const ModelsConfigSchema = z.object({
  sonnet: z.string().default(DEFAULT_MODEL_IDENTIFIERS.sonnet),
  opus: z.string().default(DEFAULT_MODEL_IDENTIFIERS.opus),
  haiku: z.string().default(DEFAULT_MODEL_IDENTIFIERS.haiku),
});

export type ModelsConfig = z.infer<typeof ModelsConfigSchema>;

/**
 * Cost estimation rate table (USD per million tokens).
 */
export const PricingConfigSchema = z.object({
  rates: z
    .record(z.string(), z.number().nonnegative())
    .default(() => ({ ...DEFAULT_PRICING_RATES }))
    .describe('Rate per model identifier'),
  fallback: z
    .number()
    .nonnegative()
    .default(DEFAULT_PRICING_FALLBACK)
    .describe('Rate for models missing from the table'),
});

export type PricingConfig = z.infer<typeof PricingConfigSchema>;

/**
 * Anthropic provider configuration.
 */
export const ProviderConfigSchema = z.object({
  apiKey: z.string().optional().describe('Anthropic API key'),
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

// -----------------------------------------------------------------------------
// Retry Schema
// -----------------------------------------------------------------------------

/**
 * Retry configuration for completion calls.
 */
export const RetryConfigSchema = z
  .object({
    enabled: z.boolean().default(DEFAULT_RETRY_ENABLED).describe('Enable retry logic'),
    maxRetries: z
      .number()
      .int()
      .min(0)
      .max(10)
      .default(DEFAULT_MAX_RETRIES)
      .describe('Maximum retry attempts'),
    baseDelayMs: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_BASE_DELAY_MS)
      .describe('Base delay in milliseconds'),
    maxDelayMs: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_MAX_DELAY_MS)
      .describe('Maximum delay in milliseconds'),
    enableJitter: z
      .boolean()
      .default(DEFAULT_ENABLE_JITTER)
      .describe('Add jitter to prevent thundering herd'),
  })
  .refine((data) => data.maxDelayMs >= data.baseDelayMs, {
    message: 'maxDelayMs must be greater than or equal to baseDelayMs',
    path: ['maxDelayMs'],
  });

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

// -----------------------------------------------------------------------------
// Telemetry Schema
// -----------------------------------------------------------------------------

/**
 * Telemetry configuration.
 */
export const TelemetryConfigSchema = z.object({
  enabled: z.boolean().default(DEFAULT_TELEMETRY_ENABLED).describe('Enable telemetry collection'),
  enableSensitiveData: z
    .boolean()
    .default(DEFAULT_ENABLE_SENSITIVE_DATA)
    .describe('Include prompts and tool arguments in spans'),
  otlpEndpoint: z.url().optional().describe('OpenTelemetry Protocol endpoint'),
});

export type TelemetryConfig = z.infer<typeof TelemetryConfigSchema>;

// -----------------------------------------------------------------------------
// Root Application Config Schema
// -----------------------------------------------------------------------------

/**
 * Root application configuration schema.
 */
export const AppConfigSchema = z.object({
  version: z.string().default(CONFIG_VERSION).describe('Configuration schema version'),
  forks: ForksConfigSchema.default(() => ForksConfigSchema.parse({})).describe(
    'Fork execution configuration'
  ),
  security: SecurityConfigSchema.default(() => SecurityConfigSchema.parse({})).describe(
    'Tool call security policy'
  ),
  models: ModelsConfigSchema.default(() => ModelsConfigSchema.parse({})).describe(
    'Model alias mapping'
  ),
  pricing: PricingConfigSchema.default(() => PricingConfigSchema.parse({})).describe(
    'Cost estimation rates'
  ),
  provider: ProviderConfigSchema.default(() => ProviderConfigSchema.parse({})).describe(
    'Completion provider settings'
  ),
  retry: RetryConfigSchema.default(() => RetryConfigSchema.parse({})).describe(
    'Retry configuration for completion calls'
  ),
  telemetry: TelemetryConfigSchema.default(() => TelemetryConfigSchema.parse({})).describe(
    'Telemetry configuration'
  ),
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL).describe('Root logger level'),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// -----------------------------------------------------------------------------
// Utility Functions
// -----------------------------------------------------------------------------

/**
 * Get the default configuration with all defaults applied.
 */
export function getDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

/**
 * Parse and validate a configuration object.
 * Applies schema defaults and returns the parsed config.
 * Unknown fields are stripped by Zod.
 */
export function parseConfig(input: unknown): z.ZodSafeParseResult<AppConfig> {
  return AppConfigSchema.safeParse(input);
}
