/**
 * Tool namespace - definition pattern shared by every sandbox tool.
 *
 * @example
 * ```typescript
 * const readTool = Tool.define('Read', {
 *   description: 'Read a file from the sandbox filesystem',
 *   parameters: z.object({ file_path: z.string() }),
 *   execute: async (args, ctx) => ({
 *     title: `Read ${args.file_path}`,
 *     metadata: { path: args.file_path },
 *     output: (await ctx.sandbox.readFile(ctx.sandboxId, args.file_path)).toString('utf-8'),
 *   }),
 * });
 * ```
 */

import type { z } from 'zod';

import type { SandboxService } from '../sandbox/types.js';
import type { ToolErrorCode } from './types.js';

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace Tool {
  /**
   * Base metadata type. A set `error` marks the result as a failure.
   */
  export interface Metadata {
    error?: ToolErrorCode;
    [key: string]: unknown;
  }

  /**
   * Everything a tool needs to act inside one fork's sandbox.
   */
  export interface Context {
    forkId: number;
    sandboxId: string;
    /** Absolute root relative tool paths resolve against */
    sandboxRoot: string;
    sandbox: SandboxService;
    /** Wall-clock limit for one Bash call */
    bashTimeoutMs: number;
    abort: AbortSignal;
  }

  export interface Result<M extends Metadata = Metadata> {
    /** Short title describing what was done */
    title: string;
    metadata: M;
    /** Text output (consumed by the model) */
    output: string;
  }

  export interface Info<P extends z.ZodType = z.ZodType, M extends Metadata = Metadata> {
    /** Tool name as the model sees it */
    id: string;
    description: string;
    parameters: P;
    execute(args: z.output<P>, ctx: Context): Promise<Result<M>>;
  }

  /**
   * Create a tool definition with the given id.
   */
  export function define<P extends z.ZodType, M extends Metadata = Metadata>(
    id: string,
    definition: Omit<Info<P, M>, 'id'>
  ): Info<P, M> {
    return { id, ...definition };
  }

  /**
   * Build the standard failure result: metadata.error set, `ERROR: ` output.
   */
  export function failure<M extends Metadata>(
    title: string,
    metadata: M,
    code: ToolErrorCode,
    message: string
  ): Result<M> {
    return {
      title: `Error: ${title}`,
      metadata: { ...metadata, error: code },
      output: `ERROR: ${message}`,
    };
  }
}
