/**
 * Runtime boundary for subprocess execution.
 *
 * Everything that starts a child process goes through here, so tests can
 * exercise the sandbox service without stubbing node:child_process.
 */

import { spawn as nodeSpawn, type ChildProcess } from 'node:child_process';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

/**
 * Options for spawning a subprocess.
 */
export interface SpawnOptions {
  /** Working directory */
  cwd?: string;
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;
  /** Hard timeout in milliseconds. The whole process group is killed. */
  timeoutMs?: number;
}

/**
 * Result of a subprocess execution.
 */
export interface SubprocessResult {
  /** Exit code (0 = success, -1 when killed or not started) */
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

// -----------------------------------------------------------------------------
// Subprocess Execution
// -----------------------------------------------------------------------------

/**
 * Spawn a program with arguments and wait for completion.
 *
 * @example
 * ```typescript
 * const result = await spawnProcess(['git', '--version']);
 * if (result.exitCode === 0) {
 *   console.log(result.stdout);
 * }
 * ```
 */
export async function spawnProcess(
  cmd: string[],
  options: SpawnOptions = {}
): Promise<SubprocessResult> {
  const command = cmd[0];
  if (command === undefined || command === '') {
    return { exitCode: -1, stdout: '', stderr: 'No command provided', timedOut: false };
  }
  return run(nodeSpawn(command, cmd.slice(1), spawnConfig(options, false)), options);
}

/**
 * Run a command line through the system shell and wait for completion.
 * Output is returned untrimmed.
 */
export async function spawnShell(
  commandLine: string,
  options: SpawnOptions = {}
): Promise<SubprocessResult> {
  return run(nodeSpawn(commandLine, spawnConfig(options, true)), options);
}

/**
 * Start a shell command in the background and return its pid without waiting.
 */
export function spawnBackground(commandLine: string, options: SpawnOptions = {}): number {
  const proc = nodeSpawn(commandLine, { ...spawnConfig(options, true), stdio: 'ignore' });
  proc.unref();
  return proc.pid ?? -1;
}

function spawnConfig(
  options: SpawnOptions,
  shell: boolean
): {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  shell: boolean;
  detached: boolean;
  stdio: ['ignore', 'pipe', 'pipe'];
} {
  return {
    cwd: options.cwd,
    env: options.env ? { ...process.env, ...options.env } : undefined,
    shell,
    // Own process group so a timeout can kill the shell and its children
    detached: process.platform !== 'win32',
    stdio: ['ignore', 'pipe', 'pipe'],
  };
}

function killTree(proc: ChildProcess): void {
  const pid = proc.pid;
  if (pid !== undefined && process.platform !== 'win32') {
    try {
      process.kill(-pid, 'SIGKILL');
      return;
    } catch {
      // group already gone; fall through to the direct kill
    }
  }
  proc.kill('SIGKILL');
}

function run(proc: ChildProcess, options: SpawnOptions): Promise<SubprocessResult> {
  return new Promise((resolve) => {
    let settled = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    let stdout = '';
    let stderr = '';

    const finalize = (result: SubprocessResult): void => {
      if (settled) return;
      settled = true;
      if (timeoutId) clearTimeout(timeoutId);
      resolve(result);
    };

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    if (typeof options.timeoutMs === 'number' && options.timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        killTree(proc);
        proc.stdout?.destroy();
        proc.stderr?.destroy();
        finalize({ exitCode: -1, stdout, stderr, timedOut: true });
      }, options.timeoutMs);
    }

    proc.on('error', (error) => {
      finalize({ exitCode: -1, stdout: '', stderr: error.message, timedOut: false });
    });

    proc.on('close', (code) => {
      finalize({ exitCode: code ?? -1, stdout, stderr, timedOut: false });
    });
  });
}
