/**
 * Read tool - return a file's content verbatim.
 */

import { z } from 'zod';

import { Tool } from './tool.js';
import { mapSystemErrorToToolError, resolveInSandbox } from './workspace.js';

interface ReadMetadata extends Tool.Metadata {
  path: string;
  bytes: number;
}

const parameters = z.object({
  file_path: z.string().min(1).describe('Path to the file to read'),
});

export const readTool = Tool.define<typeof parameters, ReadMetadata>('Read', {
  description: 'Read the contents of a file. Relative paths resolve against the sandbox root.',
  parameters,
  execute: async (args, ctx) => {
    const filePath = resolveInSandbox(args.file_path, ctx.sandboxRoot);
    const metadata: ReadMetadata = { path: filePath, bytes: 0 };

    try {
      const content = await ctx.sandbox.readFile(ctx.sandboxId, filePath);
      metadata.bytes = content.length;
      return { title: filePath, metadata, output: content.toString('utf-8') };
    } catch (error) {
      const mapped = mapSystemErrorToToolError(error);
      const message = mapped.code === 'NOT_FOUND' ? `File not found: ${filePath}` : mapped.message;
      return Tool.failure(filePath, metadata, mapped.code, message);
    }
  },
});
