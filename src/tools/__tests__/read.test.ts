/**
 * Tests for the Read tool.
 */

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import * as fs from 'node:fs';
import * as path from 'node:path';

import {
  createToolContext,
  FakeSandboxService,
  makeTempDir,
  removeTempDir,
} from '../../../tests/fixtures/sandbox.js';
import { readTool } from '../read.js';

describe('readTool', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('read-tool-');
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('is named Read', () => {
    expect(readTool.id).toBe('Read');
  });

  it('returns file content verbatim for a sandbox-relative path', async () => {
    fs.mkdirSync(path.join(root, 'src'));
    fs.writeFileSync(path.join(root, 'src', 'a.txt'), 'line1\nline2\n');

    const result = await readTool.execute({ file_path: 'src/a.txt' }, createToolContext(root));

    expect(result.output).toBe('line1\nline2\n');
    expect(result.title).toBe(path.join(root, 'src', 'a.txt'));
    expect(result.metadata).toEqual({ path: path.join(root, 'src', 'a.txt'), bytes: 12 });
  });

  it('accepts absolute paths', async () => {
    const target = path.join(root, 'abs.txt');
    fs.writeFileSync(target, 'absolute');

    const result = await readTool.execute({ file_path: target }, createToolContext(root));

    expect(result.output).toBe('absolute');
  });

  it('reports a missing file as NOT_FOUND', async () => {
    const result = await readTool.execute(
      { file_path: 'missing.txt' },
      createToolContext(root)
    );

    expect(result.output).toBe(`ERROR: File not found: ${path.join(root, 'missing.txt')}`);
    expect(result.metadata.error).toBe('NOT_FOUND');
    expect(result.title).toBe(`Error: ${path.join(root, 'missing.txt')}`);
  });

  it('reports a directory as a validation error', async () => {
    fs.mkdirSync(path.join(root, 'dir'));

    const result = await readTool.execute({ file_path: 'dir' }, createToolContext(root));

    expect(result.metadata.error).toBe('VALIDATION_ERROR');
    expect(result.output.startsWith('ERROR: ')).toBe(true);
  });

  it('reads through the sandbox service', async () => {
    const requests: Array<[string, string]> = [];
    class RemoteSandbox extends FakeSandboxService {
      override readFile(sandboxId: string, filePath: string): Promise<Buffer> {
        requests.push([sandboxId, filePath]);
        return Promise.resolve(Buffer.from('remote content'));
      }
    }

    const result = await readTool.execute(
      { file_path: 'src/a.txt' },
      createToolContext(root, { sandbox: new RemoteSandbox() })
    );

    expect(result.output).toBe('remote content');
    expect(requests).toEqual([['fork_0_test', path.join(root, 'src', 'a.txt')]]);
  });
});
