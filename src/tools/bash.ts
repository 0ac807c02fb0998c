/**
 * Bash tool - shell command execution inside the fork's sandbox.
 *
 * Commands run through the SandboxService with the sandbox root as working
 * directory and a hard timeout. A non-zero exit code is reported in the
 * output text; only a timeout or a failure to start the command is an error.
 */

import { z } from 'zod';

import { BASH_TIMEOUT_MS } from '../config/constants.js';
import { errorMessage } from '../errors/index.js';
import type { CommandResult } from '../sandbox/types.js';
import { Tool } from './tool.js';

const NO_OUTPUT = 'Command executed successfully (no output)';

interface BashMetadata extends Tool.Metadata {
  command: string;
  /** -1 when the command was killed or never started */
  exitCode: number;
  timedOut: boolean;
  durationMs: number;
}

/**
 * Join stdout, stderr and a non-zero exit code the way the model sees them.
 */
export function formatCommandOutput(stdout: string, stderr: string, exitCode: number): string {
  let output = stdout;
  if (stderr !== '') {
    output += `\nSTDERR:\n${stderr}`;
  }
  if (exitCode !== 0) {
    output += `\nExit code: ${String(exitCode)}`;
  }
  return output === '' ? NO_OUTPUT : output;
}

/**
 * Effective timeout: the configured value, never above the hard limit.
 */
export function effectiveTimeoutMs(configured: number): number {
  return configured > 0 ? Math.min(configured, BASH_TIMEOUT_MS) : BASH_TIMEOUT_MS;
}

const parameters = z.object({
  command: z.string().describe('The bash command to execute'),
});

export const bashTool = Tool.define<typeof parameters, BashMetadata>('Bash', {
  description:
    'Execute a bash command in the sandbox. The working directory is the sandbox root. ' +
    'Returns stdout, stderr and the exit code when it is non-zero.',
  parameters,
  execute: async (args, ctx) => {
    const timeoutMs = effectiveTimeoutMs(ctx.bashTimeoutMs);
    const started = Date.now();
    const metadata: BashMetadata = {
      command: args.command,
      exitCode: -1,
      timedOut: false,
      durationMs: 0,
    };

    if (ctx.abort.aborted) {
      return Tool.failure(args.command, metadata, 'UNKNOWN', 'Command aborted before start');
    }

    let result: CommandResult;
    try {
      result = await ctx.sandbox.runCommand(ctx.sandboxId, args.command, {
        cwd: ctx.sandboxRoot,
        timeoutMs,
      });
    } catch (error) {
      metadata.durationMs = Date.now() - started;
      return Tool.failure(args.command, metadata, 'IO_ERROR', errorMessage(error));
    }

    metadata.exitCode = result.exitCode;
    metadata.timedOut = result.timedOut;
    metadata.durationMs = Date.now() - started;

    if (result.timedOut) {
      return Tool.failure(
        args.command,
        metadata,
        'TIMEOUT',
        `Command timed out after ${String(timeoutMs / 1000)} seconds`
      );
    }

    return {
      title: args.command,
      metadata,
      output: formatCommandOutput(result.stdout, result.stderr, result.exitCode),
    };
  },
});
