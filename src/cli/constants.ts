/**
 * CLI exit codes.
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Bad flags, bad config, or at least one failed fork */
  FAILURE: 1,
  /** SIGINT */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
