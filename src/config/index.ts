/**
 * Configuration module public API.
 *
 * @module config
 *
 * @example
 * import { loadConfig } from './config/index.js';
 *
 * const result = await loadConfig();
 * if (result.success) {
 *   console.log('Workers:', result.result.forks.maxWorkers);
 * }
 */

export {
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
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
  GREP_MAX_RESULTS,
  LOG_LEVELS,
  DEFAULT_LOG_LEVEL,
} from './constants.js';

export type { ModelAlias, LogLevel } from './constants.js';

export {
  ForksConfigSchema,
  SecurityConfigSchema,
  ModelsConfigSchema,
  PricingConfigSchema,
  ProviderConfigSchema,
  RetryConfigSchema,
  TelemetryConfigSchema,
  AppConfigSchema,
  getDefaultConfig,
  parseConfig,
} from './schema.js';

export type {
  ForksConfig,
  SecurityConfig,
  ModelsConfig,
  PricingConfig,
  ProviderConfig,
  RetryConfig,
  TelemetryConfig,
  AppConfig,
} from './schema.js';

export { ProcessEnvReader, readEnvConfig, isModelAlias } from './env.js';
export type { IEnvReader } from './env.js';

export { ConfigError, successResponse, errorResponse } from './types.js';
export type {
  IFileSystem,
  ConfigCallbacks,
  ConfigSource,
  ConfigValidationError,
  ConfigErrorCode,
  ConfigResponse,
  ConfigManagerOptions,
} from './types.js';

export { ConfigManager, NodeFileSystem, deepMerge, formatZodErrors, loadConfig } from './manager.js';
