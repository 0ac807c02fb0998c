/**
 * Configuration manager for loading and validating config.
 * Implements hierarchical config merging: defaults < user < project < env
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import type { ZodError } from 'zod';

import { CONFIG_DIR_NAME, CONFIG_FILE_NAME } from './constants.js';
import { ProcessEnvReader, readEnvConfig, type IEnvReader } from './env.js';
import { AppConfigSchema, getDefaultConfig, type AppConfig } from './schema.js';
import type {
  ConfigCallbacks,
  ConfigManagerOptions,
  ConfigResponse,
  ConfigValidationError,
  IFileSystem,
} from './types.js';
import { ConfigError, errorResponse, successResponse } from './types.js';

// -----------------------------------------------------------------------------
// Deep Merge Utility
// -----------------------------------------------------------------------------

/**
 * Check if a value is a plain object (not null, array, or other special types).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Deep merge two plain objects, with source values overriding target values.
 * Arrays are replaced (not concatenated). Undefined source values are skipped.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// -----------------------------------------------------------------------------
// Node.js File System Implementation
// -----------------------------------------------------------------------------

/**
 * Default file system implementation using Node.js fs module.
 */
export class NodeFileSystem implements IFileSystem {
  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  resolvePath(inputPath: string): string {
    if (inputPath.startsWith('~')) {
      return path.join(os.homedir(), inputPath.slice(1));
    }
    return path.resolve(inputPath);
  }

  joinPath(...segments: string[]): string {
    return path.join(...segments);
  }

  getCwd(): string {
    return process.cwd();
  }
}

// -----------------------------------------------------------------------------
// Config Manager
// -----------------------------------------------------------------------------

/**
 * ConfigManager handles loading and validating configuration.
 *
 * Config hierarchy (highest to lowest priority):
 * 1. Environment variables
 * 2. Project config (./.sandbox-forks/settings.json)
 * 3. User config (~/.sandbox-forks/settings.json)
 * 4. Schema defaults
 */
export class ConfigManager {
  private readonly fileSystem: IFileSystem;
  private readonly envReader: IEnvReader;
  private readonly callbacks?: ConfigCallbacks;
  private readonly userConfigDir: string;
  private readonly projectConfigDirName: string;

  constructor(options: ConfigManagerOptions = {}) {
    this.fileSystem = options.fileSystem ?? new NodeFileSystem();
    this.envReader = options.envReader ?? new ProcessEnvReader();
    this.callbacks = options.callbacks;
    this.userConfigDir = options.userConfigDir ?? `~/${CONFIG_DIR_NAME}`;
    this.projectConfigDirName = options.projectConfigDirName ?? CONFIG_DIR_NAME;
  }

  getDefaults(): AppConfig {
    return getDefaultConfig();
  }

  getUserConfigPath(): string {
    return this.fileSystem.resolvePath(
      this.fileSystem.joinPath(this.userConfigDir, CONFIG_FILE_NAME)
    );
  }

  /**
   * Get the project config file path.
   * @param projectPath - Optional project root path (defaults to cwd)
   */
  getProjectConfigPath(projectPath?: string): string {
    const root = projectPath ?? this.fileSystem.getCwd();
    return this.fileSystem.joinPath(root, this.projectConfigDirName, CONFIG_FILE_NAME);
  }

  /**
   * Load configuration from a JSON file.
   * @returns The parsed object, or undefined if the file doesn't exist
   */
  private async loadConfigFile(filePath: string): Promise<Record<string, unknown> | undefined> {
    if (!(await this.fileSystem.exists(filePath))) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await this.fileSystem.readFile(filePath));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigError(`Invalid JSON in config file: ${filePath}`, 'PARSE_ERROR', filePath);
      }
      throw error;
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigError(
        `Config file must contain a JSON object: ${filePath}`,
        'PARSE_ERROR',
        filePath
      );
    }
    return parsed;
  }

  /**
   * Load and merge configuration from all sources.
   * Hierarchy: defaults < user < project < environment
   *
   * @param projectPath - Optional project root path for project config
   */
  async load(projectPath?: string): Promise<ConfigResponse<AppConfig>> {
    try {
      let merged: Record<string, unknown> = { ...this.getDefaults() };

      const userConfig = await this.loadConfigFile(this.getUserConfigPath());
      if (userConfig) {
        merged = this.applyLayer(merged, userConfig, 'user');
      }

      const projectConfig = await this.loadConfigFile(this.getProjectConfigPath(projectPath));
      if (projectConfig) {
        merged = this.applyLayer(merged, projectConfig, 'project');
      }

      const envConfig = readEnvConfig(this.envReader);
      if (Object.keys(envConfig).length > 0) {
        merged = this.applyLayer(merged, envConfig, 'environment');
      }

      const validation = this.validate(merged);
      if (validation.success) {
        this.callbacks?.onConfigLoad?.(validation.result, 'merged');
        return successResponse(validation.result, 'Configuration loaded successfully');
      }
      return validation;
    } catch (error) {
      if (error instanceof ConfigError) {
        return errorResponse(error.code, error.message);
      }
      const message = error instanceof Error ? error.message : 'Unknown error loading config';
      return errorResponse('FILE_READ_ERROR', message);
    }
  }

  /**
   * Merge one layer and notify listeners when the intermediate result is valid.
   */
  private applyLayer(
    base: Record<string, unknown>,
    layer: Record<string, unknown>,
    source: 'user' | 'project' | 'environment'
  ): Record<string, unknown> {
    const merged = deepMerge(base, layer);
    const onConfigLoad = this.callbacks?.onConfigLoad;
    if (onConfigLoad !== undefined) {
      const parsed = AppConfigSchema.safeParse(merged);
      if (parsed.success) {
        onConfigLoad(parsed.data, source);
      }
    }
    return merged;
  }

  /**
   * Validate a configuration object.
   */
  validate(config: unknown): ConfigResponse<AppConfig> {
    const validation = AppConfigSchema.safeParse(config);

    if (!validation.success) {
      const errors = formatZodErrors(validation.error);
      this.callbacks?.onValidationError?.(errors);
      const first = errors[0];
      const detail = first !== undefined ? `${first.path}: ${first.message}` : 'Unknown error';
      return errorResponse('VALIDATION_FAILED', `Config validation failed: ${detail}`);
    }

    return successResponse(validation.data, 'Configuration is valid');
  }
}

/**
 * Format Zod validation errors into ConfigValidationError array.
 */
export function formatZodErrors(error: ZodError): ConfigValidationError[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Convenience function to load config with default options.
 */
export async function loadConfig(projectPath?: string): Promise<ConfigResponse<AppConfig>> {
  const manager = new ConfigManager();
  return manager.load(projectPath);
}
