import type { Board } from '../Board.ts';
import type { CellChange } from '../cellChanges/CellChange.ts';

/**
 * One scan over the board. Returns `null` when the scan has nothing to change
 * and throws a `SudokuError` when it finds a contradiction.
 */
export interface Strategy {
  tryApply(board: Board): null | StrategyResult;
}

export interface StrategyResult {
  readonly changes: readonly CellChange[];
  readonly note: string;
}
