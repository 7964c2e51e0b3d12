import type { CandidateMask } from './candidates.ts';
import type {
  CellIndex,
  CellValue
} from './grid.ts';

import { ALL_CANDIDATES } from './candidates.ts';
import {
  CELL_COUNT,
  MAX_CELL_VALUE,
  MIN_CELL_VALUE,
  ROWS
} from './grid.ts';
import { SudokuError } from './SudokuError.ts';
import {
  ensureInRange,
  ensureNonNullable
} from './typeGuards.ts';

export type Cell = SolvedCell | UndeterminedCell;

export interface SolvedCell {
  readonly type: 'solved';
  readonly value: CellValue;
}

export interface UndeterminedCell {
  readonly candidates: CandidateMask;
  readonly type: 'undetermined';
}

const UNKNOWN_DIGIT = 0;
const UNKNOWN_CELL_TEXT = ' ';

/**
 * 81 cells in row-major order.
 *
 * Cells are immutable values, so {@link Board.clone} is a shallow copy and
 * branches of the search never share state.
 */
export class Board {
  public get isSolved(): boolean {
    return this.cells.every((cell) => cell.type === 'solved');
  }

  private constructor(private readonly cells: Cell[]) {
  }

  public static fromDigits(digits: readonly number[]): Board {
    if (digits.length !== CELL_COUNT) {
      throw new SudokuError('input-shape', `Invalid data: expected ${String(CELL_COUNT)} digits, found ${String(digits.length)}`);
    }
    return new Board(digits.map((digit, index) => createCell(digit, index)));
  }

  public clone(): Board {
    return new Board([...this.cells]);
  }

  public getCell(index: CellIndex): Cell {
    return ensureNonNullable(this.cells[index], `Cell index out of range: ${String(index)}`);
  }

  public setCandidates(index: CellIndex, candidates: CandidateMask): void {
    this.cells[checkIndex(index)] = { candidates, type: 'undetermined' };
  }

  public setValue(index: CellIndex, value: CellValue): void {
    this.cells[checkIndex(index)] = {
      type: 'solved',
      value: ensureInRange(value, MIN_CELL_VALUE, MAX_CELL_VALUE, `Invalid cell value: ${String(value)}`)
    };
  }

  public toDigits(): number[] {
    return this.cells.map((cell) => cell.type === 'solved' ? cell.value : UNKNOWN_DIGIT);
  }

  public toString(): string {
    return ROWS
      .map((row) => row.cells.map((index) => formatCell(this.getCell(index))).join(''))
      .join('\n');
  }
}

function checkIndex(index: CellIndex): CellIndex {
  return ensureInRange(index, 0, CELL_COUNT - 1, `Cell index out of range: ${String(index)}`);
}

function createCell(digit: number, index: CellIndex): Cell {
  if (digit === UNKNOWN_DIGIT) {
    return { candidates: ALL_CANDIDATES, type: 'undetermined' };
  }
  return {
    type: 'solved',
    value: ensureInRange(digit, MIN_CELL_VALUE, MAX_CELL_VALUE, `Invalid digit ${String(digit)} at index ${String(index)}`)
  };
}

function formatCell(cell: Cell): string {
  return cell.type === 'solved' ? String(cell.value) : UNKNOWN_CELL_TEXT;
}
