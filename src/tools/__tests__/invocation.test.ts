/**
 * Tests for tool invocation parsing.
 */

import { describe, expect, it } from '@jest/globals';

import { ToolInvocationError } from '../../errors/index.js';
import { isToolName, parseInvocation, TOOL_NAMES } from '../invocation.js';

function invocationErrorOf(fn: () => unknown): ToolInvocationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ToolInvocationError) return error;
    throw error;
  }
  throw new Error('expected a ToolInvocationError');
}

describe('parseInvocation', () => {
  it('parses each known tool into its tagged variant', () => {
    expect(parseInvocation('Bash', { command: 'ls' })).toEqual({
      tool: 'Bash',
      parameters: { command: 'ls' },
    });
    expect(
      parseInvocation('Edit', { file_path: 'a.txt', old_string: 'x', new_string: 'y' })
    ).toEqual({
      tool: 'Edit',
      parameters: { file_path: 'a.txt', old_string: 'x', new_string: 'y' },
    });
    expect(parseInvocation('Grep', { pattern: 'TODO', glob: '*.ts' })).toEqual({
      tool: 'Grep',
      parameters: { pattern: 'TODO', glob: '*.ts' },
    });
  });

  it('strips unknown parameter keys', () => {
    expect(parseInvocation('Read', { file_path: 'a.txt', extra: 1 }).parameters).toEqual({
      file_path: 'a.txt',
    });
  });

  it('rejects unknown tools', () => {
    const error = invocationErrorOf(() => parseInvocation('Delete', { path: 'x' }));

    expect(error.message).toBe('Unknown tool: Delete');
    expect(error.code).toBe('TOOL_EXECUTION_ERROR');
    expect(error.toolName).toBe('Delete');
  });

  it('names the offending field for malformed parameters', () => {
    const error = invocationErrorOf(() => parseInvocation('Write', { file_path: 'a.txt' }));

    expect(error.message).toMatch(/^Invalid parameters for Write: content: /);
  });

  it('rejects non-object input', () => {
    const error = invocationErrorOf(() => parseInvocation('Read', 'a.txt'));

    expect(error.message).toMatch(/^Invalid parameters for Read: /);
  });
});

describe('isToolName', () => {
  it('accepts exactly the six tools', () => {
    expect(TOOL_NAMES).toEqual(['Bash', 'Read', 'Write', 'Edit', 'Glob', 'Grep']);
    expect(isToolName('Glob')).toBe(true);
    expect(isToolName('glob')).toBe(false);
    expect(isToolName('WebFetch')).toBe(false);
  });
});
