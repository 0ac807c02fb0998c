/**
 * Pre- and post-execution hooks applied to every tool call of a fork.
 */

import * as os from 'node:os';
import pino, { type Logger } from 'pino';

import { errorMessage } from '../errors/index.js';
import { isPathWithin, relativeToRoot, resolveRealPath, resolveToolPath } from './paths.js';
import type { PolicyConfig } from './policy-config.js';
import { SecurityViolation } from './violation.js';

/** Redirect and pipe idioms that are always rejected for Bash. */
const DANGEROUS_REDIRECTS = ['> /dev/', '| dd '];

export type ToolOutcome = { ok: true; output: string } | { ok: false; error: string };

export interface SecurityPolicyOptions {
  /** Defaults to a silent logger */
  logger?: Logger;
  homeDir?: string;
}

type Parameters = Readonly<Record<string, unknown>>;

/**
 * Validates tool calls against a PolicyConfig for one sandbox root.
 *
 * File paths are checked after resolving symlinks. Apart from reading links
 * on disk, validation depends only on the config and the call; the only side
 * effect is a warning log for sandbox escape idioms.
 */
export class SecurityPolicy {
  private readonly config: PolicyConfig;
  private readonly sandboxRoot: string;
  private readonly logger: Logger;
  private readonly homeDir: string;
  private readonly blockedRoots: readonly string[];
  private readonly blockedPatterns: readonly RegExp[];

  constructor(config: PolicyConfig, sandboxRoot: string, options: SecurityPolicyOptions = {}) {
    this.config = config;
    this.homeDir = options.homeDir ?? os.homedir();
    this.sandboxRoot = resolveRealPath(resolveToolPath(sandboxRoot, process.cwd(), this.homeDir));
    this.logger = options.logger ?? pino({ level: 'silent' });
    // Both spellings, so /etc is caught on hosts where it links to /private/etc
    this.blockedRoots = config.blockedPathPrefixes.flatMap((prefix) => {
      const lexical = resolveToolPath(prefix, '/', this.homeDir);
      const real = resolveRealPath(lexical);
      return real === lexical ? [lexical] : [lexical, real];
    });
    this.blockedPatterns = config.blockedCommandPatterns.map((source) => new RegExp(source, 'i'));
  }

  /**
   * Throw SecurityViolation when the call must not run.
   */
  validateBeforeExecution(toolName: string, parameters: Parameters): void {
    switch (toolName) {
      case 'Read':
      case 'Write':
      case 'Edit':
        this.validateFileAccess(toolName, parameters);
        return;
      case 'Bash':
        this.validateBashCommand(parameters);
        return;
      case 'Glob':
      case 'Grep':
        this.validateSearchPath(toolName, parameters);
        return;
      default:
        return;
    }
  }

  /**
   * Log the outcome of a call. Never throws.
   */
  recordAfterExecution(toolName: string, parameters: Parameters, outcome: ToolOutcome): void {
    try {
      if (outcome.ok) {
        this.logger.debug({ toolName }, `Tool ${toolName} succeeded`);
      } else {
        this.logger.warn({ toolName, parameters }, `Tool ${toolName} failed: ${outcome.error}`);
      }
    } catch (error) {
      process.emitWarning(`Post-execution hook failed for ${toolName}: ${errorMessage(error)}`);
    }
  }

  /**
   * Validate, run and record one tool call. The post hook runs on every exit
   * path and the original error is re-thrown.
   */
  async guard<T extends { output: string; isError: boolean }>(
    toolName: string,
    parameters: Parameters,
    run: () => Promise<T>
  ): Promise<T> {
    this.validateBeforeExecution(toolName, parameters);

    let outcome: ToolOutcome = { ok: false, error: 'Tool call did not complete' };
    try {
      const result = await run();
      outcome = result.isError
        ? { ok: false, error: result.output }
        : { ok: true, output: result.output };
      return result;
    } catch (error) {
      outcome = { ok: false, error: errorMessage(error) };
      throw error;
    } finally {
      this.recordAfterExecution(toolName, parameters, outcome);
    }
  }

  /**
   * True when the path, or the file its symlinks lead to, is inside any
   * blocked directory.
   */
  isBlockedPath(absolutePath: string): boolean {
    const real = resolveRealPath(absolutePath);
    return this.blockedRoots.some(
      (root) => isPathWithin(absolutePath, root) || isPathWithin(real, root)
    );
  }

  /**
   * True when the path, after resolving symlinks, is under an allowed
   * sandbox-relative prefix.
   */
  isAllowedPath(absolutePath: string): boolean {
    const relative = relativeToRoot(resolveRealPath(absolutePath), this.sandboxRoot);
    if (relative === undefined) return false;

    return this.config.allowedPathPrefixes.some((prefix) => {
      const bare = prefix.endsWith('/') ? prefix.slice(0, -1) : prefix;
      return relative === bare || relative.startsWith(`${bare}/`);
    });
  }

  private validateFileAccess(toolName: string, parameters: Parameters): void {
    const filePath = parameters['file_path'];
    if (typeof filePath !== 'string' || filePath === '') {
      throw new SecurityViolation(
        toolName,
        'invalid_parameters',
        `${toolName} requires a file_path string`
      );
    }

    const resolved = resolveToolPath(filePath, this.sandboxRoot, this.homeDir);

    if (this.isBlockedPath(resolved)) {
      throw new SecurityViolation(
        toolName,
        'blocked_path',
        `Access denied: ${filePath} is in a blocked system directory`
      );
    }

    if (this.config.strictPathValidation && !this.isAllowedPath(resolved)) {
      throw new SecurityViolation(
        toolName,
        'outside_allowed',
        `Access denied: ${filePath} is outside allowed directories: ${this.config.allowedPathPrefixes.join(', ')}`
      );
    }

    if (toolName === 'Write' || toolName === 'Edit') {
      const content = toolName === 'Write' ? parameters['content'] : parameters['new_string'];
      if (typeof content === 'string') {
        const bytes = Buffer.byteLength(content, 'utf8');
        if (bytes > this.config.maxFileSizeBytes) {
          throw new SecurityViolation(
            toolName,
            'file_too_large',
            `File too large: ${String(bytes)} bytes exceeds limit of ${String(this.config.maxFileSizeBytes)} bytes`
          );
        }
      }
    }
  }

  private validateBashCommand(parameters: Parameters): void {
    const command = parameters['command'];
    if (typeof command !== 'string') {
      throw new SecurityViolation('Bash', 'invalid_parameters', 'Bash requires a command string');
    }

    for (const blocked of this.config.blockedCommandSubstrings) {
      if (command.includes(blocked)) {
        throw new SecurityViolation('Bash', 'blocked_command', `Blocked command detected: ${blocked}`);
      }
    }

    for (const pattern of this.blockedPatterns) {
      if (pattern.test(command)) {
        throw new SecurityViolation(
          'Bash',
          'blocked_pattern',
          `Command matches blocked pattern: ${pattern.source}`
        );
      }
    }

    if (DANGEROUS_REDIRECTS.some((idiom) => command.includes(idiom))) {
      throw new SecurityViolation('Bash', 'blocked_pattern', 'Dangerous redirect or pipe detected');
    }

    if (this.config.escapeIdioms.some((idiom) => command.includes(idiom))) {
      this.logger.warn({ command }, `Potential sandbox escape attempt: ${command}`);
    }
  }

  private validateSearchPath(toolName: 'Glob' | 'Grep', parameters: Parameters): void {
    const searchPath = parameters['path'];
    if (typeof searchPath !== 'string' || searchPath === '') return;

    const resolved = resolveToolPath(searchPath, this.sandboxRoot, this.homeDir);
    if (this.isBlockedPath(resolved)) {
      throw new SecurityViolation(
        toolName,
        'blocked_path',
        `${toolName} search blocked in: ${searchPath}`
      );
    }
  }
}
