/**
 * Runtime boundary module: every child process the tools start.
 */

export { spawnProcess, spawnShell, spawnBackground } from './subprocess.js';
export type { SpawnOptions, SubprocessResult } from './subprocess.js';
