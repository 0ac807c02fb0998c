#!/usr/bin/env node
/**
 * CLI entry point. Parses arguments with meow and runs the fork command.
 */

import meow from 'meow';

import { EXIT_CODES } from './cli/constants.js';
import { runForkCommand } from './cli/fork.js';
import { errorMessage } from './errors/index.js';

const cli = meow(
  `
  Usage
    $ sandbox-forks [repo_url] --prompt <text> [options]

  Options
    -p, --prompt <text>    Task given to every fork (required)
    -n, --forks <n>        Number of parallel forks (default: 1)
    --branch <name>        Branch the forks are told about (default: main)
    -m, --model <alias>    sonnet, opus or haiku (default from config)
    --max-turns <n>        Agent turn limit per fork (default from config)
    --log-dir <dir>        Directory for per-fork log files
    -w, --workdir <dir>    Sandbox root for the forks (default: current directory)
    --verbose              Debug logging
    --version              Show version

  Examples
    $ sandbox-forks --prompt "Add tests for the parser" --forks 3
    $ sandbox-forks https://example.com/repo.git -p "Fix the build" -n 5 --model haiku
`,
  {
    flags: {
      prompt: { type: 'string', alias: 'p' },
      forks: { type: 'number', alias: 'n', default: 1 },
      branch: { type: 'string', default: 'main' },
      model: { type: 'string', alias: 'm' },
      maxTurns: { type: 'number' },
      logDir: { type: 'string' },
      workdir: { type: 'string', alias: 'w' },
      verbose: { type: 'boolean', default: false },
    },
  }
);

async function main(): Promise<number> {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    controller.abort();
  });

  return runForkCommand(
    {
      repoUrl: cli.input[0],
      prompt: cli.flags.prompt,
      forks: cli.flags.forks,
      branch: cli.flags.branch,
      model: cli.flags.model,
      maxTurns: cli.flags.maxTurns,
      logDir: cli.flags.logDir,
      workdir: cli.flags.workdir,
      verbose: cli.flags.verbose,
    },
    { signal: controller.signal }
  );
}

main().then(
  (code) => {
    process.exit(code);
  },
  (error: unknown) => {
    process.stderr.write(`Fatal: ${errorMessage(error)}\n`);
    process.exit(EXIT_CODES.FAILURE);
  }
);
