/**
 * Write tool - create or overwrite a file.
 */

import { z } from 'zod';

import { Tool } from './tool.js';
import { mapSystemErrorToToolError, resolveInSandbox } from './workspace.js';

interface WriteMetadata extends Tool.Metadata {
  path: string;
  /** UTF-8 byte length of the written content */
  bytesWritten: number;
}

const parameters = z.object({
  file_path: z.string().min(1).describe('Path to the file to write'),
  content: z.string().describe('Content to write to the file'),
});

export const writeTool = Tool.define<typeof parameters, WriteMetadata>('Write', {
  description:
    'Write content to a file, creating parent directories as needed. ' +
    'Existing files are overwritten.',
  parameters,
  execute: async (args, ctx) => {
    const filePath = resolveInSandbox(args.file_path, ctx.sandboxRoot);
    const metadata: WriteMetadata = { path: filePath, bytesWritten: 0 };

    let bytesWritten: number;
    try {
      const written = await ctx.sandbox.writeFile(ctx.sandboxId, filePath, args.content);
      bytesWritten = written.bytesWritten;
    } catch (error) {
      const mapped = mapSystemErrorToToolError(error);
      return Tool.failure(filePath, metadata, mapped.code, mapped.message);
    }

    metadata.bytesWritten = bytesWritten;
    return {
      title: filePath,
      metadata,
      output: `Successfully wrote ${String(bytesWritten)} bytes to ${filePath}`,
    };
  },
});
