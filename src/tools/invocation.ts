/**
 * Closed set of tool calls a fork may make.
 *
 * Model output is untrusted: every call is parsed against the
 * discriminated union before anything runs.
 */

import { z } from 'zod';

import { ToolInvocationError } from '../errors/index.js';
import { bashTool } from './bash.js';
import { editTool } from './edit.js';
import { globTool } from './glob.js';
import { grepTool } from './grep.js';
import { readTool } from './read.js';
import { writeTool } from './write.js';

export const TOOL_NAMES = ['Bash', 'Read', 'Write', 'Edit', 'Glob', 'Grep'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const ToolInvocationSchema = z.discriminatedUnion('tool', [
  z.object({ tool: z.literal('Bash'), parameters: bashTool.parameters }),
  z.object({ tool: z.literal('Read'), parameters: readTool.parameters }),
  z.object({ tool: z.literal('Write'), parameters: writeTool.parameters }),
  z.object({ tool: z.literal('Edit'), parameters: editTool.parameters }),
  z.object({ tool: z.literal('Glob'), parameters: globTool.parameters }),
  z.object({ tool: z.literal('Grep'), parameters: grepTool.parameters }),
]);

export type ToolInvocation = z.infer<typeof ToolInvocationSchema>;

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((known) => known === name);
}

/**
 * Validate a raw model tool call.
 *
 * @throws ToolInvocationError for unknown tools or malformed parameters
 */
export function parseInvocation(name: string, input: unknown): ToolInvocation {
  if (!isToolName(name)) {
    throw new ToolInvocationError(name, `Unknown tool: ${name}`);
  }

  const parsed = ToolInvocationSchema.safeParse({ tool: name, parameters: input });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => {
        const fieldPath = issue.path.filter((segment) => segment !== 'parameters').join('.');
        return fieldPath === '' ? issue.message : `${fieldPath}: ${issue.message}`;
      })
      .join('; ');
    throw new ToolInvocationError(name, `Invalid parameters for ${name}: ${details}`);
  }
  return parsed.data;
}
