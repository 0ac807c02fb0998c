/**
 * Filesystem helpers shared by the file tools: path resolution against the
 * sandbox root, error mapping, glob matching and directory walking.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { SandboxError, type SandboxErrorCode } from '../sandbox/types.js';
import { relativeToRoot, resolveToolPath } from '../security/paths.js';
import type { ToolErrorCode } from './types.js';

const SANDBOX_ERROR_CODES: Record<SandboxErrorCode, ToolErrorCode> = {
  SANDBOX_NOT_FOUND: 'IO_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_ARGUMENT: 'VALIDATION_ERROR',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  IO_ERROR: 'IO_ERROR',
};

/** Binary detection sample size */
export const BINARY_CHECK_SIZE = 8192;

/**
 * Absolute path for a tool argument; relative paths resolve against the sandbox root.
 */
export function resolveInSandbox(inputPath: string, sandboxRoot: string): string {
  return resolveToolPath(inputPath, sandboxRoot);
}

/**
 * Sandbox-relative display path, or the absolute path when it lies outside the root.
 */
export function displayPath(absolutePath: string, sandboxRoot: string): string {
  return relativeToRoot(absolutePath, sandboxRoot) ?? absolutePath;
}

/**
 * Map sandbox errors and Node.js system errors to tool error codes.
 */
export function mapSystemErrorToToolError(error: unknown): {
  code: ToolErrorCode;
  message: string;
} {
  if (error instanceof SandboxError) {
    return { code: SANDBOX_ERROR_CODES[error.code], message: error.message };
  }
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    switch (code) {
      case 'ENOENT':
        return { code: 'NOT_FOUND', message: error.message };
      case 'EACCES':
      case 'EPERM':
        return { code: 'PERMISSION_DENIED', message: error.message };
      case 'EISDIR':
      case 'ENOTDIR':
        return { code: 'VALIDATION_ERROR', message: error.message };
      default:
        return { code: 'IO_ERROR', message: error.message };
    }
  }
  return { code: 'UNKNOWN', message: String(error) };
}

/**
 * Compile a glob into an anchored regular expression.
 * `**` spans directories (and `**\/` may match nothing), `*` stays within a
 * segment and `?` matches one character.
 */
export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*\*\//g, '{{GLOBSTAR_DIR}}')
    .replace(/\*\*/g, '{{GLOBSTAR}}')
    .replace(/\*/g, '[^/]*')
    .replace(/\?/g, '[^/]')
    .replace(/{{GLOBSTAR_DIR}}/g, '(?:.*/)?')
    .replace(/{{GLOBSTAR}}/g, '.*');
  return new RegExp(`^${source}$`);
}

export function matchGlob(relativePath: string, pattern: string): boolean {
  return globToRegExp(pattern).test(relativePath);
}

/**
 * All regular files below a directory, skipping dot entries, as paths
 * relative to that directory with forward slashes. Unreadable directories
 * are skipped.
 */
export async function walkFiles(baseDir: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(currentDir: string): Promise<void> {
    let dirents;
    try {
      dirents = await fs.readdir(currentDir, { withFileTypes: true });
    } catch {
      return;
    }

    for (const dirent of dirents) {
      if (dirent.name.startsWith('.')) continue;

      const entryPath = path.join(currentDir, dirent.name);
      if (dirent.isDirectory()) {
        await walk(entryPath);
      } else if (dirent.isFile()) {
        files.push(path.relative(baseDir, entryPath).split(path.sep).join('/'));
      }
    }
  }

  await walk(baseDir);
  return files;
}

/**
 * Check for a null byte in the first chunk of a file.
 */
export function isBinaryContent(content: Buffer): boolean {
  return content.subarray(0, BINARY_CHECK_SIZE).includes(0);
}

