/**
 * Tests for the Grep tool.
 */

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import * as fs from 'node:fs';
import * as path from 'node:path';

import { createToolContext, makeTempDir, removeTempDir } from '../../../tests/fixtures/sandbox.js';
import { grepTool } from '../grep.js';

describe('grepTool', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('grep-tool-');
    fs.mkdirSync(path.join(root, 'src'));
    fs.writeFileSync(path.join(root, 'a.txt'), 'alpha\nbeta\ngamma alpha\n');
    fs.writeFileSync(path.join(root, 'src', 'b.ts'), 'const alpha = 1;\n');
    fs.writeFileSync(path.join(root, 'bin.dat'), Buffer.from([97, 108, 112, 104, 97, 0]));
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('is named Grep', () => {
    expect(grepTool.id).toBe('Grep');
  });

  it('lists matches as path:line:content and skips binary files', async () => {
    const result = await grepTool.execute({ pattern: 'alpha' }, createToolContext(root));

    expect(result.output).toBe('a.txt:1:alpha\na.txt:3:gamma alpha\nsrc/b.ts:1:const alpha = 1;');
    expect(result.metadata.filesSearched).toBe(2);
    expect(result.metadata.matchCount).toBe(3);
  });

  it('filters files with a glob', async () => {
    const result = await grepTool.execute(
      { pattern: 'alpha', glob: '**/*.ts' },
      createToolContext(root)
    );

    expect(result.output).toBe('src/b.ts:1:const alpha = 1;');
  });

  it('searches below a base path', async () => {
    const result = await grepTool.execute(
      { pattern: 'const', path: 'src' },
      createToolContext(root)
    );

    expect(result.output).toBe('src/b.ts:1:const alpha = 1;');
  });

  it('handles CRLF line endings', async () => {
    fs.writeFileSync(path.join(root, 'crlf.txt'), 'one\r\ntwo\r\n');

    const result = await grepTool.execute({ pattern: '^two$' }, createToolContext(root));

    expect(result.output).toBe('crlf.txt:2:two');
  });

  it('caps output at 100 lines', async () => {
    const lines = Array.from({ length: 150 }, (_, i) => `match ${String(i)}`);
    fs.writeFileSync(path.join(root, 'many.txt'), lines.join('\n'));

    const result = await grepTool.execute({ pattern: '^match' }, createToolContext(root));
    const outputLines = result.output.split('\n');

    expect(outputLines).toHaveLength(100);
    expect(outputLines[0]).toBe('many.txt:1:match 0');
    expect(outputLines[99]).toBe('many.txt:100:match 99');
    expect(result.metadata.matchCount).toBe(100);
    expect(result.metadata.truncated).toBe(true);
  });

  it('stops reading files once the cap is reached', async () => {
    const lines = Array.from({ length: 120 }, (_, i) => `match ${String(i)}`);
    fs.writeFileSync(path.join(root, 'a.txt'), lines.join('\n'));
    fs.writeFileSync(path.join(root, 'b.txt'), 'match late');

    const result = await grepTool.execute({ pattern: '^match' }, createToolContext(root));

    expect(result.metadata.filesSearched).toBe(1);
    expect(result.metadata.truncated).toBe(true);
    const outputLines = result.output.split('\n');
    expect(outputLines).toHaveLength(100);
    expect(outputLines[99]).toBe('a.txt:100:match 99');
  });

  it('does not mark exactly 100 matches as truncated', async () => {
    const lines = Array.from({ length: 100 }, (_, i) => `match ${String(i)}`);
    fs.writeFileSync(path.join(root, 'exact.txt'), lines.join('\n'));

    const result = await grepTool.execute({ pattern: '^match' }, createToolContext(root));

    expect(result.metadata.matchCount).toBe(100);
    expect(result.metadata.truncated).toBe(false);
  });

  it('reports no matches without an error', async () => {
    const result = await grepTool.execute({ pattern: 'zzz' }, createToolContext(root));

    expect(result.output).toBe('No matches found for pattern: zzz');
    expect(result.metadata.error).toBeUndefined();
  });

  it('rejects an invalid regular expression', async () => {
    const result = await grepTool.execute({ pattern: '(' }, createToolContext(root));

    expect(result.output).toMatch(/^ERROR: Invalid regex: /);
    expect(result.metadata.error).toBe('VALIDATION_ERROR');
  });
});
