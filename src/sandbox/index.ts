/**
 * Sandbox module: where each fork's tools run.
 */

export { LocalSandboxService } from './local.js';
export type { LocalSandboxServiceOptions } from './local.js';
export { SandboxError } from './types.js';
export type {
  BackgroundHandle,
  CommandResult,
  CreateSandboxOptions,
  EntryInfo,
  EntryType,
  RunCommandOptions,
  SandboxErrorCode,
  SandboxHandle,
  SandboxService,
} from './types.js';
