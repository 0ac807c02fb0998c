/**
 * Edit tool - replace exactly one occurrence of a string in a file.
 *
 * The edit is rejected, and the file left untouched, unless old_string
 * occurs exactly once.
 */

import { z } from 'zod';

import { Tool } from './tool.js';
import { mapSystemErrorToToolError, resolveInSandbox } from './workspace.js';

interface EditMetadata extends Tool.Metadata {
  path: string;
  occurrences: number;
  replaced: boolean;
}

const parameters = z.object({
  file_path: z.string().min(1).describe('Path to the file to edit'),
  old_string: z.string().describe('Exact text to replace'),
  new_string: z.string().describe('Replacement text'),
});

/**
 * Count non-overlapping occurrences of a non-empty needle.
 */
export function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

export const editTool = Tool.define<typeof parameters, EditMetadata>('Edit', {
  description:
    'Replace old_string with new_string in a file. old_string must appear exactly once; ' +
    'include surrounding context to make it unique.',
  parameters,
  execute: async (args, ctx) => {
    const filePath = resolveInSandbox(args.file_path, ctx.sandboxRoot);
    const metadata: EditMetadata = { path: filePath, occurrences: 0, replaced: false };

    if (args.old_string === '') {
      return Tool.failure(filePath, metadata, 'VALIDATION_ERROR', 'old_string must not be empty');
    }

    let content: string;
    try {
      content = (await ctx.sandbox.readFile(ctx.sandboxId, filePath)).toString('utf-8');
    } catch (error) {
      const mapped = mapSystemErrorToToolError(error);
      const message =
        mapped.code === 'NOT_FOUND' ? `File not found: ${filePath}` : mapped.message;
      return Tool.failure(filePath, metadata, mapped.code, message);
    }

    const occurrences = countOccurrences(content, args.old_string);
    metadata.occurrences = occurrences;

    if (occurrences === 0) {
      return Tool.failure(filePath, metadata, 'NOT_FOUND', `old_string not found in ${filePath}`);
    }
    if (occurrences > 1) {
      return Tool.failure(
        filePath,
        metadata,
        'VALIDATION_ERROR',
        `old_string appears ${String(occurrences)} times in ${filePath}, not unique`
      );
    }

    // Function replacer so `$&` and friends in new_string stay literal
    const updated = content.replace(args.old_string, () => args.new_string);
    try {
      await ctx.sandbox.writeFile(ctx.sandboxId, filePath, updated);
    } catch (error) {
      const mapped = mapSystemErrorToToolError(error);
      return Tool.failure(filePath, metadata, mapped.code, mapped.message);
    }

    metadata.replaced = true;
    return {
      title: filePath,
      metadata,
      output: `Successfully replaced 1 occurrence in ${filePath}`,
    };
  },
});
