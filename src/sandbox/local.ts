/**
 * Sandbox service backed by local directories.
 *
 * Relative paths resolve against the sandbox root and absolute paths are
 * host paths. Access control belongs to the SecurityPolicy that gates every
 * tool call before it reaches the service.
 */

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Logger } from 'pino';

import { createSilentLogger } from '../logging/logger.js';
import { spawnBackground, spawnShell } from '../runtime/subprocess.js';
import type {
  BackgroundHandle,
  CommandResult,
  CreateSandboxOptions,
  EntryInfo,
  EntryType,
  RunCommandOptions,
  SandboxHandle,
  SandboxService,
} from './types.js';
import { SandboxError } from './types.js';

export interface LocalSandboxServiceOptions {
  /** Parent directory for sandboxes made by createSandbox (defaults to the OS temp dir) */
  baseDir?: string;
  logger?: Logger;
}

interface LocalSandbox extends SandboxHandle {
  envs: Record<string, string>;
  /** Created by this service, so kill() removes the directory */
  owned: boolean;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class LocalSandboxService implements SandboxService {
  private readonly baseDir: string;
  private readonly logger: Logger;
  private readonly sandboxes = new Map<string, LocalSandbox>();

  constructor(options: LocalSandboxServiceOptions = {}) {
    this.baseDir = path.resolve(options.baseDir ?? os.tmpdir());
    this.logger = options.logger ?? createSilentLogger();
  }

  register(sandboxId: string, root: string): SandboxHandle {
    const sandbox: LocalSandbox = { sandboxId, root: path.resolve(root), envs: {}, owned: false };
    this.sandboxes.set(sandboxId, sandbox);
    return { sandboxId, root: sandbox.root };
  }

  async createSandbox(options: CreateSandboxOptions = {}): Promise<SandboxHandle> {
    const sandboxId = `sbx_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
    const root = path.join(this.baseDir, sandboxId);
    await fs.mkdir(root, { recursive: true });

    this.sandboxes.set(sandboxId, { sandboxId, root, envs: options.envs ?? {}, owned: true });
    this.logger.debug({ sandboxId, root }, 'Created local sandbox');
    return { sandboxId, root };
  }

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
  async runCommand(
    sandboxId: string,
    cmd: string,
    options: RunCommandOptions
  ): Promise<CommandResult | BackgroundHandle> {
    const sandbox = this.get(sandboxId);
    const cwd = options.cwd !== undefined ? this.resolve(sandbox, options.cwd) : sandbox.root;
    const env = { ...sandbox.envs, ...options.envs };

    if (options.user !== undefined) {
      this.logger.debug({ sandboxId, user: options.user }, 'Ignoring user for local command');
    }

    if (options.background === true) {
      return { pid: spawnBackground(cmd, { cwd, env }) };
    }

    return spawnShell(cmd, { cwd, env, timeoutMs: options.timeoutMs });
  }

  async readFile(sandboxId: string, filePath: string): Promise<Buffer> {
    const sandbox = this.get(sandboxId);
    const target = this.resolve(sandbox, filePath);
    try {
      return await fs.readFile(target);
    } catch (error) {
      throw this.mapError(error, sandboxId, filePath);
    }
  }

  /**
   * Write through a temp file and rename, creating parent directories.
   */
  async writeFile(
    sandboxId: string,
    filePath: string,
    data: string | Buffer
  ): Promise<{ bytesWritten: number }> {
    const sandbox = this.get(sandboxId);
    const target = this.resolve(sandbox, filePath);
    const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
    const dir = path.dirname(target);
    const tempPath = path.join(dir, `.${path.basename(target)}.tmp.${randomUUID().slice(0, 8)}`);
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tempPath, buffer);
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw this.mapError(error, sandboxId, filePath);
    }
    return { bytesWritten: buffer.length };
  }

  /**
   * List entries below a directory. Depth 1 lists direct children only.
   */
  async listDirectory(sandboxId: string, dirPath: string, depth: number): Promise<EntryInfo[]> {
    const sandbox = this.get(sandboxId);
    const target = this.resolve(sandbox, dirPath);
    const entries: EntryInfo[] = [];

    const walk = async (dir: string, level: number): Promise<void> => {
      let dirents;
      try {
        dirents = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        throw this.mapError(error, sandboxId, dirPath);
      }
      dirents.sort((a, b) => a.name.localeCompare(b.name));

      for (const dirent of dirents) {
        const full = path.join(dir, dirent.name);
        const stats = await fs.lstat(full);
        const type: EntryType = stats.isSymbolicLink()
          ? 'symlink'
          : stats.isDirectory()
            ? 'dir'
            : 'file';
        entries.push({
          name: dirent.name,
          path: path.relative(sandbox.root, full).split(path.sep).join('/'),
          type,
          size: stats.size,
          modifiedTime: stats.mtime,
        });
        if (type === 'dir' && level < depth) {
          await walk(full, level + 1);
        }
      }
    };

    await walk(target, 1);
    return entries;
  }

  async removeFile(sandboxId: string, filePath: string): Promise<void> {
    const sandbox = this.get(sandboxId);
    const target = this.resolve(sandbox, filePath);
    try {
      await fs.rm(target, { recursive: true });
    } catch (error) {
      throw this.mapError(error, sandboxId, filePath);
    }
  }

  /**
   * Forget the sandbox. Directories made by createSandbox are deleted;
   * registered ones are left alone.
   */
  async kill(sandboxId: string): Promise<void> {
    const sandbox = this.get(sandboxId);
    this.sandboxes.delete(sandboxId);
    if (sandbox.owned) {
      await fs.rm(sandbox.root, { recursive: true, force: true });
    }
  }

  private get(sandboxId: string): LocalSandbox {
    const sandbox = this.sandboxes.get(sandboxId);
    if (sandbox === undefined) {
      throw new SandboxError(`Sandbox not found: ${sandboxId}`, 'SANDBOX_NOT_FOUND', sandboxId);
    }
    return sandbox;
  }

  private resolve(sandbox: LocalSandbox, inputPath: string): string {
    return path.resolve(sandbox.root, inputPath);
  }

  private mapError(error: unknown, sandboxId: string, target: string): SandboxError {
    if (error instanceof SandboxError) return error;
    const message = error instanceof Error ? error.message : String(error);
    switch (isErrnoException(error) ? error.code : undefined) {
      case 'ENOENT':
        return new SandboxError(`Path not found: ${target}`, 'NOT_FOUND', sandboxId);
      case 'EACCES':
      case 'EPERM':
        return new SandboxError(message, 'PERMISSION_DENIED', sandboxId);
      case 'EISDIR':
      case 'ENOTDIR':
        return new SandboxError(message, 'INVALID_ARGUMENT', sandboxId);
      default:
        return new SandboxError(message, 'IO_ERROR', sandboxId);
    }
  }
}
