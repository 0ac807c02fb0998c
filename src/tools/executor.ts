/**
 * Runs validated tool invocations for one fork under its security policy.
 */

import { BASH_TIMEOUT_MS } from '../config/constants.js';
import type { ForkLogger } from '../logging/fork-logger.js';
import type { ToolDefinition } from '../model/types.js';
import type { SandboxService } from '../sandbox/types.js';
import type { SecurityPolicy } from '../security/policy.js';
import { bashTool } from './bash.js';
import { editTool } from './edit.js';
import { globTool } from './glob.js';
import { grepTool } from './grep.js';
import { parseInvocation, type ToolInvocation } from './invocation.js';
import { readTool } from './read.js';
import { Tool } from './tool.js';
import type { ToolExecution } from './types.js';
import { writeTool } from './write.js';

export interface ToolExecutorOptions {
  forkId: number;
  sandboxId: string;
  sandboxRoot: string;
  policy: SecurityPolicy;
  sandbox: SandboxService;
  forkLogger?: ForkLogger;
  /** Capped at the hard Bash limit */
  bashTimeoutMs?: number;
  signal?: AbortSignal;
}

const ALL_TOOLS = [bashTool, readTool, writeTool, editTool, globTool, grepTool] as const;

export class ToolExecutor {
  private readonly policy: SecurityPolicy;
  private readonly forkLogger?: ForkLogger;
  private readonly context: Tool.Context;

  constructor(options: ToolExecutorOptions) {
    this.policy = options.policy;
    this.forkLogger = options.forkLogger;
    this.context = {
      forkId: options.forkId,
      sandboxId: options.sandboxId,
      sandboxRoot: options.sandboxRoot,
      sandbox: options.sandbox,
      bashTimeoutMs: Math.min(options.bashTimeoutMs ?? BASH_TIMEOUT_MS, BASH_TIMEOUT_MS),
      abort: options.signal ?? new AbortController().signal,
    };
  }

  get sandboxRoot(): string {
    return this.context.sandboxRoot;
  }

  /**
   * @throws ToolInvocationError for unknown tools or malformed parameters
   */
  parseInvocation(name: string, input: unknown): ToolInvocation {
    return parseInvocation(name, input);
  }

  /**
   * Execute one invocation. SecurityViolation propagates; expected tool
   * failures come back as output with isError set.
   */
  async execute(invocation: ToolInvocation): Promise<ToolExecution> {
    return this.policy.guard(invocation.tool, invocation.parameters, async () => {
      const result = await this.dispatch(invocation);
      const execution: ToolExecution =
        result.metadata.error !== undefined
          ? { output: result.output, isError: true, code: result.metadata.error }
          : { output: result.output, isError: false };

      this.forkLogger?.logToolCall(
        this.context.forkId,
        invocation.tool,
        invocation.parameters,
        execution.output
      );
      return execution;
    });
  }

  toolDefinitions(): ToolDefinition[] {
    return ALL_TOOLS.map((tool) => ({
      name: tool.id,
      description: tool.description,
      schema: tool.parameters,
    }));
  }

  private dispatch(invocation: ToolInvocation): Promise<Tool.Result> {
    const ctx = this.context;
    switch (invocation.tool) {
      case 'Bash':
        return bashTool.execute(invocation.parameters, ctx);
      case 'Read':
        return readTool.execute(invocation.parameters, ctx);
      case 'Write':
        return writeTool.execute(invocation.parameters, ctx);
      case 'Edit':
        return editTool.execute(invocation.parameters, ctx);
      case 'Glob':
        return globTool.execute(invocation.parameters, ctx);
      case 'Grep':
        return grepTool.execute(invocation.parameters, ctx);
      default: {
        const unreachable: never = invocation;
        return Promise.reject(
          new Error(`Unhandled tool invocation: ${JSON.stringify(unreachable)}`)
        );
      }
    }
  }
}
