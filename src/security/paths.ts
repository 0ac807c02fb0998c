/**
 * Path helpers shared by the security policy and the file tools.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/** Symlink hops followed before giving up on a chain */
const MAX_LINK_DEPTH = 40;

/**
 * Expand a leading ~ to the given home directory.
 */
export function expandHome(inputPath: string, homeDir: string = os.homedir()): string {
  if (inputPath === '~') return homeDir;
  if (inputPath.startsWith('~/')) {
    return path.join(homeDir, inputPath.slice(2));
  }
  return inputPath;
}

/**
 * Resolve a tool path against a sandbox root, expanding ~ first.
 */
export function resolveToolPath(
  inputPath: string,
  sandboxRoot: string,
  homeDir: string = os.homedir()
): string {
  return path.resolve(sandboxRoot, expandHome(inputPath, homeDir));
}

function tryRealpath(target: string): string | undefined {
  try {
    return fs.realpathSync(target);
  } catch {
    return undefined;
  }
}

function tryReadlink(target: string): string | undefined {
  try {
    return fs.readlinkSync(target);
  } catch {
    return undefined;
  }
}

/**
 * Absolute path with every symlink resolved. Components that do not exist
 * yet are appended to the real path of their nearest existing ancestor, and
 * a dangling link resolves to where it points.
 */
export function resolveRealPath(target: string, depth = 0): string {
  const absolute = path.resolve(target);
  const real = tryRealpath(absolute);
  if (real !== undefined) return real;

  const parent = path.dirname(absolute);
  if (parent === absolute || depth > MAX_LINK_DEPTH) return absolute;

  const link = tryReadlink(absolute);
  if (link !== undefined) {
    return resolveRealPath(path.resolve(parent, link), depth + 1);
  }
  return path.join(resolveRealPath(parent, depth), path.basename(absolute));
}

/**
 * Check if a path is within another path (child of or equal to).
 * Uses path.relative() so `/etc2` is not treated as inside `/etc`, while a
 * child named `..cache` still is.
 */
export function isPathWithin(child: string, parent: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child));
  if (relative === '') return true;
  if (path.isAbsolute(relative)) return false;
  return relative !== '..' && !relative.startsWith(`..${path.sep}`);
}

/**
 * Sandbox-relative form of an absolute path, using forward slashes.
 * Returns undefined when the path lies outside the root.
 */
export function relativeToRoot(absolutePath: string, root: string): string | undefined {
  if (!isPathWithin(absolutePath, root)) return undefined;
  return path.relative(path.resolve(root), path.resolve(absolutePath)).split(path.sep).join('/');
}
