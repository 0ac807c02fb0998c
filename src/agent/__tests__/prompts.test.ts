/**
 * Tests for system prompt loading and placeholder substitution.
 */

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import * as fs from 'node:fs';
import * as path from 'node:path';

import { makeTempDir, removeTempDir } from '../../../tests/fixtures/sandbox.js';
import {
  FALLBACK_SYSTEM_PROMPT,
  forkPlaceholders,
  getDefaultPromptPath,
  loadSystemPromptTemplate,
  replacePlaceholders,
  stripYamlFrontMatter,
} from '../prompts.js';

describe('stripYamlFrontMatter', () => {
  it('removes a leading front matter block', () => {
    expect(stripYamlFrontMatter('---\nname: x\n---\n\nBody text')).toBe('Body text');
  });

  it('leaves content without front matter alone', () => {
    expect(stripYamlFrontMatter('Body\n---\nmore')).toBe('Body\n---\nmore');
  });

  it('leaves an unterminated block alone', () => {
    expect(stripYamlFrontMatter('---\nname: x\nBody')).toBe('---\nname: x\nBody');
  });
});

describe('replacePlaceholders', () => {
  it('replaces every occurrence', () => {
    expect(replacePlaceholders('{{A}} and {{A}} {{B}}', { A: '1', B: '2' })).toBe('1 and 1 2');
  });

  it('keeps placeholders without a value', () => {
    expect(replacePlaceholders('{{A}} {{TASK_PROMPT}}', { A: 'x', TASK_PROMPT: undefined })).toBe(
      'x {{TASK_PROMPT}}'
    );
  });
});

describe('forkPlaceholders', () => {
  it('defaults the repository and branch', () => {
    expect(forkPlaceholders({ forkId: 4, sandboxId: 'fork_4_ab', sandboxRoot: '/work' })).toEqual({
      SANDBOX_ID: 'fork_4_ab',
      FORK_ID: '4',
      REPO_URL: 'local',
      BRANCH: 'main',
      SANDBOX_ROOT: '/work',
    });
  });
});

describe('loadSystemPromptTemplate', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('prompts-');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('reads the bundled template', async () => {
    const template = await loadSystemPromptTemplate(getDefaultPromptPath());

    expect(template.startsWith('You are a coding agent')).toBe(true);
    expect(template).toContain('{{SANDBOX_ID}}');
    expect(template.endsWith('{{TASK_PROMPT}}')).toBe(true);
  });

  it('strips front matter from a custom template', async () => {
    const file = path.join(dir, 'system.md');
    fs.writeFileSync(file, '---\nname: custom\n---\nCustom {{FORK_ID}}\n');

    expect(await loadSystemPromptTemplate(file)).toBe('Custom {{FORK_ID}}');
  });

  it('falls back to the inline prompt when the file is missing', async () => {
    const warnings: string[] = [];

    const template = await loadSystemPromptTemplate(path.join(dir, 'none.md'), (message) =>
      warnings.push(message)
    );

    expect(template).toBe(FALLBACK_SYSTEM_PROMPT);
    expect(warnings).toHaveLength(1);
  });

  it('falls back to the inline prompt when the file is empty', async () => {
    const file = path.join(dir, 'empty.md');
    fs.writeFileSync(file, '   \n');

    expect(await loadSystemPromptTemplate(file)).toBe(FALLBACK_SYSTEM_PROMPT);
  });
});
