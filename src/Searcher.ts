import type { Board } from './Board.ts';
import type { CandidateMask } from './candidates.ts';
import type { CellIndex } from './grid.ts';
import type { SolveTracer } from './SolveTracer.ts';

import {
  candidateCount,
  candidateValues
} from './candidates.ts';
import { ValueChange } from './cellChanges/ValueChange.ts';
import { CELL_COUNT } from './grid.ts';
import { describeCell } from './parsers.ts';
import { SilentSolveTracer } from './SolveTracer.ts';
import { SudokuError } from './SudokuError.ts';

/**
 * Solves a board for one branch of the search, one level deeper.
 */
export type BranchSolver = (board: Board, depth: number) => Board;

export interface BranchCell {
  readonly candidates: CandidateMask;
  readonly index: CellIndex;
}

export class Searcher {
  public constructor(
    private readonly solveBranch: BranchSolver,
    private readonly tracer: SolveTracer = new SilentSolveTracer()
  ) {
  }

  public search(board: Board, depth = 0): Board {
    const target = selectBranchCell(board);
    if (!target) {
      return board;
    }

    for (const value of candidateValues(target.candidates)) {
      const branch = board.clone();
      new ValueChange(branch, target.index, value).applyToModel();
      this.tracer.assume(depth, target.index, value);
      try {
        return this.solveBranch(branch, depth + 1);
      } catch (error: unknown) {
        if (!(error instanceof SudokuError)) {
          throw error;
        }
        this.tracer.assumptionRejected(depth, target.index, value, error);
      }
    }

    throw new SudokuError('exhausted', `All assumptions contradicted at ${describeCell(target.index)}`, target.index);
  }
}

/**
 * The undetermined cell with the fewest candidates, lowest index first.
 */
export function selectBranchCell(board: Board): BranchCell | null {
  let best: BranchCell | null = null;
  let bestCount = 0;
  for (let index = 0; index < CELL_COUNT; index++) {
    const cell = board.getCell(index);
    if (cell.type !== 'undetermined') {
      continue;
    }
    const count = candidateCount(cell.candidates);
    if (!best || count < bestCount) {
      best = { candidates: cell.candidates, index };
      bestCount = count;
    }
  }
  return best;
}
