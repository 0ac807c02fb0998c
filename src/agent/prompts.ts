/**
 * System prompt loading and placeholder substitution.
 *
 * The template lives in `src/prompts/system.md` (copied to `dist/prompts`
 * by the build). Placeholders use `{{NAME}}` syntax:
 *
 * | Placeholder | Value |
 * |-------------|-------|
 * | `{{SANDBOX_ID}}` | Sandbox id of the fork |
 * | `{{FORK_ID}}` | Fork number |
 * | `{{REPO_URL}}` | Repository URL, `local` when none |
 * | `{{BRANCH}}` | Branch, `main` when none |
 * | `{{SANDBOX_ROOT}}` | Absolute sandbox root |
 * | `{{TASK_PROMPT}}` | The task, filled in when the run starts |
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { errorMessage } from '../errors/index.js';

export const DEFAULT_REPO_URL = 'local';
export const DEFAULT_BRANCH = 'main';

/**
 * Placeholder values for prompt replacement.
 */
export interface PlaceholderValues {
  SANDBOX_ID?: string;
  FORK_ID?: string;
  REPO_URL?: string;
  BRANCH?: string;
  SANDBOX_ROOT?: string;
  TASK_PROMPT?: string;
  [key: string]: string | undefined;
}

export interface ForkPromptContext {
  forkId: number;
  sandboxId: string;
  sandboxRoot: string;
  repoUrl?: string;
  branch?: string;
}

/** Used when the template file cannot be read */
export const FALLBACK_SYSTEM_PROMPT = `You are a coding agent working in an isolated sandbox.

Sandbox ID: {{SANDBOX_ID}}
Fork number: {{FORK_ID}}
Repository: {{REPO_URL}} (branch {{BRANCH}})
Sandbox root: {{SANDBOX_ROOT}}

Use the Bash, Read, Write, Edit, Glob and Grep tools to complete the task, then
reply with a short summary.

Task:
{{TASK_PROMPT}}`;

export function getDefaultPromptPath(): string {
  return join(__dirname, '..', 'prompts', 'system.md');
}

/**
 * Strip YAML front matter delimited by `---` lines at the start of the file.
 */
export function stripYamlFrontMatter(content: string): string {
  const match = /^---\r?\n[\s\S]*?\r?\n---(?:\r?\n|$)/.exec(content.trimStart());
  if (match === null) {
    return content;
  }
  return content.trimStart().slice(match[0].length).trimStart();
}

/**
 * Replace `{{NAME}}` placeholders. Undefined values leave the placeholder
 * in place.
 */
export function replacePlaceholders(content: string, values: PlaceholderValues): string {
  let result = content;
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      result = result.split(`{{${key}}}`).join(value);
    }
  }
  return result;
}

/**
 * Read the template, falling back to the inline prompt when the file is
 * missing or empty.
 */
export async function loadSystemPromptTemplate(
  promptPath: string = getDefaultPromptPath(),
  onWarning?: (message: string) => void
): Promise<string> {
  try {
    const content = stripYamlFrontMatter(await readFile(promptPath, 'utf-8')).trim();
    if (content !== '') {
      return content;
    }
    onWarning?.(`System prompt template at ${promptPath} is empty, using the inline prompt`);
  } catch (error) {
    onWarning?.(
      `System prompt template not readable at ${promptPath}: ${errorMessage(error)}. Using the inline prompt`
    );
  }
  return FALLBACK_SYSTEM_PROMPT;
}

/**
 * Fill in the fork placeholders. TASK_PROMPT is left for the run.
 */
export function forkPlaceholders(context: ForkPromptContext): PlaceholderValues {
  return {
    SANDBOX_ID: context.sandboxId,
    FORK_ID: String(context.forkId),
    REPO_URL: context.repoUrl ?? DEFAULT_REPO_URL,
    BRANCH: context.branch ?? DEFAULT_BRANCH,
    SANDBOX_ROOT: context.sandboxRoot,
  };
}
