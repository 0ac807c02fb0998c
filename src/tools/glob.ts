/**
 * Glob tool - find files by pattern.
 *
 * Patterns match paths relative to the base directory; results are listed
 * relative to the sandbox root and sorted lexicographically.
 */

import * as path from 'node:path';
import { z } from 'zod';

import { Tool } from './tool.js';
import { displayPath, globToRegExp, resolveInSandbox, walkFiles } from './workspace.js';

interface GlobMetadata extends Tool.Metadata {
  pattern: string;
  fileCount: number;
}

const parameters = z.object({
  pattern: z.string().min(1).describe('Glob pattern (e.g., "**/*.ts", "src/*.js")'),
  path: z.string().optional().describe('Base directory (default: sandbox root)'),
});

export const globTool = Tool.define<typeof parameters, GlobMetadata>('Glob', {
  description:
    'Find files matching a glob pattern. Supports ** (any depth), * and ?. ' +
    'Returns paths relative to the sandbox root.',
  parameters,
  execute: async (args, ctx) => {
    const { pattern } = args;
    const baseDir =
      args.path !== undefined && args.path !== ''
        ? resolveInSandbox(args.path, ctx.sandboxRoot)
        : ctx.sandboxRoot;
    const metadata: GlobMetadata = { pattern, fileCount: 0 };

    const regex = globToRegExp(pattern);
    const matches = (await walkFiles(baseDir))
      .filter((relative) => regex.test(relative))
      .map((relative) => displayPath(path.join(baseDir, relative), ctx.sandboxRoot))
      .sort();

    metadata.fileCount = matches.length;
    if (matches.length === 0) {
      return {
        title: `No files matching ${pattern}`,
        metadata,
        output: `No files found matching pattern: ${pattern}`,
      };
    }

    return {
      title: `Found ${String(matches.length)} file${matches.length === 1 ? '' : 's'} matching ${pattern}`,
      metadata,
      output: matches.join('\n'),
    };
  },
});
