import type { Board } from './Board.ts';
import type { SolveTracer } from './SolveTracer.ts';
import type {
  Strategy,
  StrategyResult
} from './strategies/Strategy.ts';

import { SilentSolveTracer } from './SolveTracer.ts';
import { SingleCandidateStrategy } from './strategies/SingleCandidateStrategy.ts';
import { SolvedValueEliminationStrategy } from './strategies/SolvedValueEliminationStrategy.ts';

export interface EliminationResult {
  readonly board: Board;
  readonly isSolved: boolean;
}

/**
 * Naked-single propagation. Each pass strikes solved values from their peers,
 * then promotes the cells left with a single candidate. Stops when the board
 * is solved or a pass promotes nothing; contradictions throw `SudokuError`.
 */
export class Eliminator {
  private readonly promotion: Strategy = new SingleCandidateStrategy();
  private readonly solvedValueElimination: Strategy = new SolvedValueEliminationStrategy();

  public constructor(private readonly tracer: SolveTracer = new SilentSolveTracer()) {
  }

  public eliminate(board: Board, depth = 0): EliminationResult {
    for (;;) {
      this.apply(this.solvedValueElimination.tryApply(board), depth);
      if (board.isSolved) {
        this.tracer.eliminationFinished(depth, true);
        return { board, isSolved: true };
      }

      const promotion = this.promotion.tryApply(board);
      if (!promotion) {
        this.tracer.eliminationFinished(depth, false);
        return { board, isSolved: false };
      }
      this.apply(promotion, depth);
    }
  }

  private apply(result: null | StrategyResult, depth: number): void {
    if (!result) {
      return;
    }
    for (const change of result.changes) {
      change.applyToModel();
    }
    this.tracer.eliminationApplied(depth, result.note);
  }
}
