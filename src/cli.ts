import type { SolveTracer } from './SolveTracer.ts';

import { existsSync } from 'node:fs';
import { parseArgs } from 'node:util';

import { readPuzzleFile } from './puzzleFile.ts';
import {
  LoggingSolveTracer,
  SilentSolveTracer
} from './SolveTracer.ts';
import { Solver } from './Solver.ts';

export interface CliIo {
  stderr(text: string): void;
  stdout(text: string): void;
}

export interface CliOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly io?: CliIo;
}

interface CliArgs {
  readonly help: boolean;
  readonly positionals: readonly string[];
  readonly verbose: boolean;
}

export const USAGE = 'Usage: npm run solve -- <puzzle-file> [--verbose]';

const DEBUG_LOG_LEVEL = 'debug';
const EXIT_FAILURE = 1;
const EXIT_SUCCESS = 0;
const LOG_LEVEL_VARIABLE = 'SUDOKU_SOLVER_LOG';

/* eslint-disable no-console -- CLI output. */
const consoleIo: CliIo = {
  stderr(text) {
    console.error(text);
  },
  stdout(text) {
    console.log(text);
  }
};
/* eslint-enable no-console -- End CLI output. */

/**
 * Solves the puzzle named on the command line and prints the grid.
 *
 * @returns The process exit code.
 */
export function runCli(args: readonly string[], options: CliOptions = {}): number {
  const io = options.io ?? consoleIo;
  const env = options.env ?? process.env;

  let parsed: CliArgs;
  try {
    parsed = parseCliArgs(args);
  } catch (error: unknown) {
    io.stderr(`Error: ${formatError(error)}`);
    io.stderr(USAGE);
    return EXIT_FAILURE;
  }

  if (parsed.help) {
    io.stdout(USAGE);
    return EXIT_SUCCESS;
  }

  const [path, ...extra] = parsed.positionals;
  if (path === undefined || extra.length > 0) {
    io.stderr(USAGE);
    return EXIT_FAILURE;
  }
  if (!existsSync(path)) {
    io.stderr(`Error: ${path} not found`);
    return EXIT_FAILURE;
  }

  const verbose = parsed.verbose || env[LOG_LEVEL_VARIABLE] === DEBUG_LOG_LEVEL;
  let tracer: SolveTracer = new SilentSolveTracer();
  if (verbose) {
    tracer = new LoggingSolveTracer((line) => {
      io.stderr(line);
    });
  }

  try {
    const puzzle = readPuzzleFile(path);
    if (verbose) {
      io.stderr(`Solving ${puzzle.title}`);
    }
    const solution = new Solver({ tracer }).solve(puzzle.board);
    io.stdout(solution.toString());
    return EXIT_SUCCESS;
  } catch (error: unknown) {
    io.stderr(`Error: ${formatError(error)}`);
    return EXIT_FAILURE;
  }
}

function parseCliArgs(args: readonly string[]): CliArgs {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    args: [...args],
    options: {
      help: { short: 'h', type: 'boolean' },
      verbose: { short: 'v', type: 'boolean' }
    }
  });
  return {
    help: values.help === true,
    positionals,
    verbose: values.verbose === true
  };
}

function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
