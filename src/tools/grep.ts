/**
 * Grep tool - regular expression search over file contents.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';

import { GREP_MAX_RESULTS } from '../config/constants.js';
import { errorMessage } from '../errors/index.js';
import { Tool } from './tool.js';
import {
  displayPath,
  globToRegExp,
  isBinaryContent,
  resolveInSandbox,
  walkFiles,
} from './workspace.js';

interface GrepMetadata extends Tool.Metadata {
  pattern: string;
  filesSearched: number;
  matchCount: number;
  truncated: boolean;
}

const parameters = z.object({
  pattern: z.string().min(1).describe('Regular expression to search for'),
  path: z.string().optional().describe('Directory to search (default: sandbox root)'),
  glob: z.string().optional().describe('Glob filter for files (default: **/*)'),
});

/**
 * Split file content into lines without a phantom trailing empty line.
 */
function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export const grepTool = Tool.define<typeof parameters, GrepMetadata>('Grep', {
  description:
    'Search file contents with a regular expression. Returns matches as path:line:content, ' +
    `at most ${String(GREP_MAX_RESULTS)} lines.`,
  parameters,
  execute: async (args, ctx) => {
    const { pattern } = args;
    const metadata: GrepMetadata = {
      pattern,
      filesSearched: 0,
      matchCount: 0,
      truncated: false,
    };

    let regex: RegExp;
    try {
      regex = new RegExp(pattern);
    } catch (error) {
      return Tool.failure(
        pattern,
        metadata,
        'VALIDATION_ERROR',
        `Invalid regex: ${errorMessage(error)}`
      );
    }

    const baseDir =
      args.path !== undefined && args.path !== ''
        ? resolveInSandbox(args.path, ctx.sandboxRoot)
        : ctx.sandboxRoot;
    const fileFilter = globToRegExp(args.glob ?? '**/*');
    const files = (await walkFiles(baseDir)).filter((relative) => fileFilter.test(relative)).sort();

    const matches: string[] = [];
    let truncated = false;
    for (const relative of files) {
      if (truncated) break;
      const absolute = path.join(baseDir, relative);

      let content: Buffer;
      try {
        content = await fs.readFile(absolute);
      } catch {
        continue;
      }
      if (isBinaryContent(content)) continue;
      metadata.filesSearched++;

      const shown = displayPath(absolute, ctx.sandboxRoot);
      for (const [index, line] of splitLines(content.toString('utf-8')).entries()) {
        if (!regex.test(line)) continue;
        if (matches.length === GREP_MAX_RESULTS) {
          truncated = true;
          break;
        }
        matches.push(`${shown}:${String(index + 1)}:${line}`);
      }
    }

    metadata.matchCount = matches.length;
    metadata.truncated = truncated;

    if (matches.length === 0) {
      return {
        title: `No matches for ${pattern}`,
        metadata,
        output: `No matches found for pattern: ${pattern}`,
      };
    }

    return {
      title: `Found ${String(matches.length)} match${matches.length === 1 ? '' : 'es'} for ${pattern}`,
      metadata,
      output: matches.join('\n'),
    };
  },
});
