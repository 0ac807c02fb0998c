/**
 * CLI type definitions.
 */

import type React from 'react';

import type { AppConfig } from '../config/schema.js';
import type { ConfigResponse } from '../config/types.js';
import type { Logger } from '../logging/logger.js';
import type { CompletionService } from '../model/types.js';

/**
 * Flags parsed from the command line.
 * These map to meow options in src/index.tsx.
 */
export interface ForkCommandFlags {
  /** Repository the forks are told about (first positional argument) */
  repoUrl?: string;
  prompt?: string;
  forks: number;
  branch: string;
  /** Alias; defaults to config.forks.defaultModel */
  model?: string;
  /** Defaults to config.forks.maxTurns */
  maxTurns?: number;
  /** Defaults to config.forks.logDir */
  logDir?: string;
  /** Sandbox root shared by every fork; defaults to the working directory */
  workdir?: string;
  verbose: boolean;
}

/**
 * The parts of an Ink instance the command drives.
 */
export interface ViewHandle {
  rerender(element: React.ReactElement): void;
  unmount(): void;
}

export interface ForkCommandDeps {
  loadConfig?: (projectPath?: string) => Promise<ConfigResponse<AppConfig>>;
  createCompletionService?: (model: string, config: AppConfig) => CompletionService;
  /** Defaults to Ink's render */
  renderView?: (element: React.ReactElement) => ViewHandle;
  logger?: Logger;
  /** Error lines; defaults to stderr */
  writeError?: (line: string) => void;
  signal?: AbortSignal;
  cwd?: string;
}
