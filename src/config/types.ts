/**
 * Interfaces and types for configuration management.
 * Provides abstractions for file system, environment, and callbacks.
 */

import type { AppConfig } from './schema.js';
import type { IEnvReader } from './env.js';

export type { IEnvReader } from './env.js';

// -----------------------------------------------------------------------------
// File System Abstraction
// -----------------------------------------------------------------------------

/**
 * File system operations needed to load configuration.
 * Injected so tests can run against an in-memory map.
 */
export interface IFileSystem {
  /**
   * Read file contents as string.
   * @throws Error if file doesn't exist or can't be read
   */
  readFile(path: string): Promise<string>;

  /** Check if a file or directory exists. */
  exists(path: string): Promise<boolean>;

  /** Resolve a path, expanding ~ to home directory. */
  resolvePath(path: string): string;

  joinPath(...segments: string[]): string;

  getCwd(): string;
}

// -----------------------------------------------------------------------------
// Callback Interfaces
// -----------------------------------------------------------------------------

/**
 * Callbacks for configuration events.
 */
export interface ConfigCallbacks {
  /** Called after each layer is merged, and once more with the validated result. */
  onConfigLoad?: (config: AppConfig, source: ConfigSource) => void;

  /** Called when a validation error occurs. */
  onValidationError?: (errors: ConfigValidationError[]) => void;
}

/**
 * Source of configuration data.
 */
export type ConfigSource = 'defaults' | 'user' | 'project' | 'environment' | 'merged';

// -----------------------------------------------------------------------------
// Error Types
// -----------------------------------------------------------------------------

/**
 * Validation error details for a specific field.
 */
export interface ConfigValidationError {
  path: string;
  message: string;
  code: string;
}

/**
 * Error codes for configuration errors.
 */
export type ConfigErrorCode =
  | 'VALIDATION_FAILED'
  | 'FILE_NOT_FOUND'
  | 'FILE_READ_ERROR'
  | 'PARSE_ERROR'
  | 'INVALID_PATH';

/**
 * Custom error class for configuration failures.
 */
export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly path?: string;
  public readonly details?: ConfigValidationError[];

  constructor(
    message: string,
    code: ConfigErrorCode,
    path?: string,
    details?: ConfigValidationError[]
  ) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.path = path;
    this.details = details;

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

// -----------------------------------------------------------------------------
// Response Pattern
// -----------------------------------------------------------------------------

/**
 * Successful configuration operation.
 */
export interface ConfigSuccessResponse<T> {
  success: true;
  result: T;
  message: string;
}

/**
 * Failed configuration operation.
 */
export interface ConfigErrorResponse {
  success: false;
  error: ConfigErrorCode;
  message: string;
}

/**
 * Discriminated union for configuration operations.
 */
export type ConfigResponse<T> = ConfigSuccessResponse<T> | ConfigErrorResponse;

export function successResponse<T>(result: T, message: string): ConfigSuccessResponse<T> {
  return { success: true, result, message };
}

export function errorResponse(error: ConfigErrorCode, message: string): ConfigErrorResponse {
  return { success: false, error, message };
}

// -----------------------------------------------------------------------------
// Config Manager Options
// -----------------------------------------------------------------------------

/**
 * Options for ConfigManager constructor.
 */
export interface ConfigManagerOptions {
  /** File system implementation (defaults to NodeFileSystem). */
  fileSystem?: IFileSystem;

  /** Environment reader implementation (defaults to ProcessEnvReader). */
  envReader?: IEnvReader;

  callbacks?: ConfigCallbacks;

  /** User config directory (defaults to ~/.sandbox-forks). */
  userConfigDir?: string;

  /** Project config directory name (defaults to .sandbox-forks). */
  projectConfigDirName?: string;
}
