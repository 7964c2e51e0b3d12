import type { Board } from '../src/Board.ts';
import type {
  CellIndex,
  CellValue
} from '../src/grid.ts';
import type { SolveTracer } from '../src/SolveTracer.ts';
import type { SudokuError } from '../src/SudokuError.ts';

import { candidatesMask } from '../src/candidates.ts';
import { HOUSES } from '../src/grid.ts';
import { parseGrid } from '../src/parsers.ts';

export const CLASSIC_PUZZLE = [
  '530070000',
  '600195000',
  '098000060',
  '800060003',
  '400803001',
  '700020006',
  '060000280',
  '000419005',
  '000080079'
].join('');

export const CLASSIC_SOLUTION_ROWS = [
  '534678912',
  '672195348',
  '198342567',
  '859761423',
  '426853791',
  '713924856',
  '961537284',
  '287419635',
  '345286179'
];

export const CLASSIC_SOLUTION = CLASSIC_SOLUTION_ROWS.join('');

export const EMPTY_GRID = '0'.repeat(81);

export class TrackingSolveTracer implements SolveTracer {
  public readonly events: string[] = [];

  public assume(depth: number, cellIndex: CellIndex, value: CellValue): void {
    this.events.push(`assume ${String(depth)} ${String(cellIndex)}=${String(value)}`);
  }

  public assumptionRejected(depth: number, cellIndex: CellIndex, value: CellValue, error: SudokuError): void {
    this.events.push(`reject ${String(depth)} ${String(cellIndex)}=${String(value)} ${error.kind}`);
  }

  public eliminationApplied(depth: number, note: string): void {
    this.events.push(`applied ${String(depth)} ${note}`);
  }

  public eliminationFailed(depth: number, error: SudokuError): void {
    this.events.push(`elimination failed ${String(depth)} ${error.kind}`);
  }

  public eliminationFinished(depth: number, isSolved: boolean): void {
    this.events.push(`elimination finished ${String(depth)} ${String(isSolved)}`);
  }

  public eliminationStarted(depth: number): void {
    this.events.push(`elimination started ${String(depth)}`);
  }

  public searchFailed(depth: number, error: SudokuError): void {
    this.events.push(`search failed ${String(depth)} ${error.kind}`);
  }

  public searchStarted(depth: number): void {
    this.events.push(`search started ${String(depth)}`);
  }
}

/**
 * Replaces the digits at the given indices with zeros.
 */
export function blankCells(grid: string, indices: Iterable<CellIndex>): string {
  const chars = [...grid];
  for (const index of indices) {
    chars[index] = '0';
  }
  return chars.join('');
}

export function createBoard(grid: string): Board {
  return parseGrid(grid);
}

/**
 * Labels of the houses that do not hold each of 1-9 exactly once.
 */
export function findInvalidHouses(board: Board): string[] {
  const digits = board.toDigits();
  const fullHouse = candidatesMask([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  return HOUSES
    .filter((house) => {
      const values = house.cells.map((index) => digits[index] ?? 0);
      return values.includes(0) || new Set(values).size !== 9 || candidatesMask(values) !== fullHouse;
    })
    .map(String);
}

export function setCandidates(board: Board, index: CellIndex, values: readonly CellValue[]): void {
  board.setCandidates(index, candidatesMask(values));
}
