/**
 * Environment variable parsing utilities for configuration.
 * Maps environment variables to config paths with type coercion.
 */

import type { LogLevel, ModelAlias } from './constants.js';
import { LOG_LEVELS, MODEL_ALIASES } from './constants.js';

/**
 * Interface for reading environment variables.
 * Enables dependency injection for testing.
 */
export interface IEnvReader {
  /**
   * Get a string environment variable.
   */
  get(name: string): string | undefined;

  /**
   * Get a boolean environment variable with coercion.
   * Recognizes 'true', '1', 'yes' as true; 'false', '0', 'no' as false.
   */
  getBoolean(name: string): boolean | undefined;

  /**
   * Get a number environment variable with coercion.
   */
  getNumber(name: string): number | undefined;
}

/**
 * Default implementation using process.env.
 */
export class ProcessEnvReader implements IEnvReader {
  get(name: string): string | undefined {
    return process.env[name];
  }

  getBoolean(name: string): boolean | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;

    const lower = value.toLowerCase();
    if (lower === 'true' || lower === '1' || lower === 'yes') return true;
    if (lower === 'false' || lower === '0' || lower === 'no') return false;

    return undefined;
  }

  getNumber(name: string): number | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;

    const num = Number(value);
    return Number.isNaN(num) ? undefined : num;
  }
}

/**
 * Validator function type for env values.
 */
type EnvValidator = (value: string) => boolean;

/**
 * Environment variable to config path mapping.
 */
interface EnvMapping {
  envVar: string;
  path: string[];
  type: 'string' | 'boolean' | 'number';
  /** If provided and returns false, the value is dropped */
  validate?: EnvValidator;
}

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

function isValidLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function isModelAlias(value: string): value is ModelAlias {
  return MODEL_ALIASES.some((alias) => alias === value);
}

/**
 * Validates the raw string before number coercion.
 */
function isPositiveInteger(value: string): boolean {
  const num = Number(value);
  return !Number.isNaN(num) && Number.isInteger(num) && num > 0;
}

/**
 * Static environment variable mappings.
 * Invalid values for validated fields are dropped (fall back to lower layers).
 */
const ENV_MAPPINGS: EnvMapping[] = [
  { envVar: 'ANTHROPIC_API_KEY', path: ['provider', 'apiKey'], type: 'string' },

  { envVar: 'FORKS_LOG_DIR', path: ['forks', 'logDir'], type: 'string' },
  { envVar: 'FORKS_LOG_LEVEL', path: ['logLevel'], type: 'string', validate: isValidLogLevel },
  {
    envVar: 'FORKS_MAX_WORKERS',
    path: ['forks', 'maxWorkers'],
    type: 'number',
    validate: isPositiveInteger,
  },
  {
    envVar: 'FORKS_MAX_TURNS',
    path: ['forks', 'maxTurns'],
    type: 'number',
    validate: isPositiveInteger,
  },
  { envVar: 'FORKS_MODEL', path: ['forks', 'defaultModel'], type: 'string', validate: isModelAlias },

  {
    envVar: 'FORKS_STRICT_PATHS',
    path: ['security', 'strictPathValidation'],
    type: 'boolean',
  },

  { envVar: 'FORKS_ENABLE_OTEL', path: ['telemetry', 'enabled'], type: 'boolean' },
  {
    envVar: 'FORKS_OTLP_ENDPOINT',
    path: ['telemetry', 'otlpEndpoint'],
    type: 'string',
    validate: isValidUrl,
  },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a value at a nested path in an object.
 * Creates intermediate objects as needed.
 */
function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  if (path.length === 0) return;

  let current = obj;
  for (let i = 0; i < path.length - 1; i++) {
    const key = path[i];
    if (key === undefined) continue;
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Read environment variables and return a partial config object.
 * Only includes values that are present in environment variables.
 * The result is unvalidated; ConfigManager runs it through the schema after merging.
 */
export function readEnvConfig(
  envReader: IEnvReader = new ProcessEnvReader()
): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const mapping of ENV_MAPPINGS) {
    let value: string | boolean | number | undefined;
    const rawValue = envReader.get(mapping.envVar);

    if (rawValue === undefined) {
      continue;
    }

    // Validate before type coercion for booleans/numbers
    if (mapping.validate !== undefined && !mapping.validate(rawValue)) {
      continue;
    }

    switch (mapping.type) {
      case 'boolean':
        value = envReader.getBoolean(mapping.envVar);
        break;
      case 'number':
        value = envReader.getNumber(mapping.envVar);
        break;
      default:
        value = rawValue;
    }

    if (value !== undefined) {
      setNestedValue(config, mapping.path, value);
    }
  }

  return config;
}
