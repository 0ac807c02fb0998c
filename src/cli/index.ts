/**
 * CLI module exports.
 */

export type { ForkCommandDeps, ForkCommandFlags, ViewHandle } from './types.js';
export { EXIT_CODES } from './constants.js';
export type { ExitCode } from './constants.js';
export { checkWorkDir, runForkCommand } from './fork.js';
