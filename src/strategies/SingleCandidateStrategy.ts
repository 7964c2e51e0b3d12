import type { Board } from '../Board.ts';
import type {
  CellIndex,
  CellValue
} from '../grid.ts';
import type {
  Strategy,
  StrategyResult
} from './Strategy.ts';

import {
  candidateCount,
  candidateValues
} from '../candidates.ts';
import { ValueChange } from '../cellChanges/ValueChange.ts';
import {
  CELL_COUNT,
  peersOf
} from '../grid.ts';
import { describeCell } from '../parsers.ts';
import { SudokuError } from '../SudokuError.ts';
import { ensureNonNullable } from '../typeGuards.ts';

/**
 * Promotes every cell left with one candidate. Promotions found earlier in the
 * same scan count as solved when later cells are checked for duplicates.
 */
export class SingleCandidateStrategy implements Strategy {
  public tryApply(board: Board): null | StrategyResult {
    const promoted = new Map<CellIndex, CellValue>();
    for (let index = 0; index < CELL_COUNT; index++) {
      const cell = board.getCell(index);
      if (cell.type === 'solved') {
        continue;
      }
      const count = candidateCount(cell.candidates);
      if (count === 0) {
        throw new SudokuError('unsolvable', `Unsolvable cell at ${describeCell(index)}`, index);
      }
      if (count !== 1) {
        continue;
      }
      const value = ensureNonNullable(candidateValues(cell.candidates)[0]);
      for (const peerIndex of peersOf(index)) {
        const peer = board.getCell(peerIndex);
        const peerValue = peer.type === 'solved' ? peer.value : promoted.get(peerIndex);
        if (peerValue === value) {
          throw new SudokuError(
            'duplicate',
            `Duplicate value ${String(value)} at ${describeCell(index)} conflicts with ${describeCell(peerIndex)}`,
            index
          );
        }
      }
      promoted.set(index, value);
    }

    if (promoted.size === 0) {
      return null;
    }
    const changes = [...promoted].map(([index, value]) => new ValueChange(board, index, value));
    return {
      changes,
      note: `Single candidate: ${changes.map(String).join(', ')}`
    };
  }
}
