import type { Board } from './Board.ts';
import type { SolveTracer } from './SolveTracer.ts';

import { Eliminator } from './Eliminator.ts';
import { Searcher } from './Searcher.ts';
import { SilentSolveTracer } from './SolveTracer.ts';
import { SudokuError } from './SudokuError.ts';

export interface SolverOptions {
  readonly tracer?: SolveTracer;
}

/**
 * Propagation first, search when propagation stalls. The searcher calls back
 * into {@link Solver.solveAt} for every assumption, so the whole solve is a
 * tree of alternating elimination and branching.
 */
export class Solver {
  private readonly eliminator: Eliminator;
  private readonly searcher: Searcher;
  private readonly tracer: SolveTracer;

  public constructor(options: SolverOptions = {}) {
    this.tracer = options.tracer ?? new SilentSolveTracer();
    this.eliminator = new Eliminator(this.tracer);
    this.searcher = new Searcher((board, depth) => this.solveAt(board, depth), this.tracer);
  }

  /**
   * Returns the first solution found. The given board is left untouched.
   *
   * @throws SudokuError when the puzzle is contradictory or has no solution.
   */
  public solve(board: Board): Board {
    return this.solveAt(board.clone(), 0);
  }

  private solveAt(board: Board, depth: number): Board {
    this.tracer.eliminationStarted(depth);
    const elimination = this.traceFailure(() => this.eliminator.eliminate(board, depth), (error) => {
      this.tracer.eliminationFailed(depth, error);
    });
    if (elimination.isSolved) {
      return elimination.board;
    }

    this.tracer.searchStarted(depth);
    return this.traceFailure(() => this.searcher.search(elimination.board, depth), (error) => {
      this.tracer.searchFailed(depth, error);
    });
  }

  private traceFailure<T>(action: () => T, onFailure: (error: SudokuError) => void): T {
    try {
      return action();
    } catch (error: unknown) {
      if (error instanceof SudokuError) {
        onFailure(error);
      }
      throw error;
    }
  }
}

export function solve(board: Board, options?: SolverOptions): Board {
  return new Solver(options).solve(board);
}
