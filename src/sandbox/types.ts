/**
 * Type definitions for sandbox functionality.
 */

/**
 * A sandbox the tools of one fork operate in.
 */
export interface SandboxHandle {
  sandboxId: string;
  /** Absolute directory every relative tool path resolves against */
  root: string;
}

export interface CreateSandboxOptions {
  /** Name of a template directory to copy; unused by the local service */
  template?: string;
  /** Sandbox lifetime in milliseconds; unused by the local service */
  timeoutMs?: number;
  /** Environment passed to every command run in the sandbox */
  envs?: Record<string, string>;
}

export interface RunCommandOptions {
  cwd?: string;
  envs?: Record<string, string>;
  /** Accepted for remote sandboxes; the local service runs as the current user */
  user?: string;
  timeoutMs: number;
  background?: boolean;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

export interface BackgroundHandle {
  pid: number;
}

export type EntryType = 'file' | 'dir' | 'symlink';

export interface EntryInfo {
  name: string;
  /** Path relative to the sandbox root, forward slashes */
  path: string;
  type: EntryType;
  size: number;
  modifiedTime: Date;
}

/**
 * Operations the orchestrator and tools need from a sandbox provider.
 */
export interface SandboxService {
  register(sandboxId: string, root: string): SandboxHandle;
  createSandbox(options?: CreateSandboxOptions): Promise<SandboxHandle>;
  runCommand(
    sandboxId: string,
    cmd: string,
    options: RunCommandOptions & { background: true }
  ): Promise<BackgroundHandle>;
  runCommand(
    sandboxId: string,
    cmd: string,
    options: RunCommandOptions & { background?: false }
  ): Promise<CommandResult>;
  /** Relative paths resolve against the sandbox root */
  readFile(sandboxId: string, path: string): Promise<Buffer>;
  writeFile(sandboxId: string, path: string, data: string | Buffer): Promise<{ bytesWritten: number }>;
  listDirectory(sandboxId: string, path: string, depth: number): Promise<EntryInfo[]>;
  removeFile(sandboxId: string, path: string): Promise<void>;
  kill(sandboxId: string): Promise<void>;
}

/**
 * Error codes for sandbox operations.
 */
export type SandboxErrorCode =
  | 'SANDBOX_NOT_FOUND'
  | 'NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'PERMISSION_DENIED'
  | 'IO_ERROR';

export class SandboxError extends Error {
  public readonly code: SandboxErrorCode;
  public readonly sandboxId?: string;

  constructor(message: string, code: SandboxErrorCode, sandboxId?: string) {
    super(message);
    this.name = 'SandboxError';
    this.code = code;
    this.sandboxId = sandboxId;

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, SandboxError);
    }
  }
}
