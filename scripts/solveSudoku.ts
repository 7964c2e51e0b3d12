/**
 * Solve a Sudoku puzzle and print the completed grid.
 *
 * Usage:
 *     npm run solve -- __tests__/fixtures/classic.txt
 *     npm run solve -- __tests__/fixtures/classic.yaml --verbose
 *
 * The file holds 81 digits (0 for an unknown cell, anything else is skipped)
 * or a YAML spec with `title` and `grid`. Set SUDOKU_SOLVER_LOG=debug or pass
 * --verbose to trace the solve on stderr.
 */

import { runCli } from '../src/cli.ts';

const FIRST_CLI_ARG_INDEX = 2;

process.exitCode = runCli(process.argv.slice(FIRST_CLI_ARG_INDEX));
