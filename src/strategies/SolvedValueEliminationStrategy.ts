import type { Board } from '../Board.ts';
import type { CandidateMask } from '../candidates.ts';
import type { CellIndex } from '../grid.ts';
import type {
  Strategy,
  StrategyResult
} from './Strategy.ts';

import {
  addCandidate,
  hasCandidate,
  NO_CANDIDATES
} from '../candidates.ts';
import { CandidatesStrikethrough } from '../cellChanges/CandidatesStrikethrough.ts';
import {
  CELL_COUNT,
  peersOf
} from '../grid.ts';
import { describeCell } from '../parsers.ts';
import { SudokuError } from '../SudokuError.ts';

/**
 * Removes the value of every solved cell from the candidates of its peers.
 *
 * Two solved peers holding the same value are reported as a duplicate, so
 * contradictory givens fail here before any search starts.
 */
export class SolvedValueEliminationStrategy implements Strategy {
  public tryApply(board: Board): null | StrategyResult {
    const removals = new Map<CellIndex, CandidateMask>();
    for (let index = 0; index < CELL_COUNT; index++) {
      const cell = board.getCell(index);
      if (cell.type !== 'solved') {
        continue;
      }
      for (const peerIndex of peersOf(index)) {
        const peer = board.getCell(peerIndex);
        if (peer.type === 'solved') {
          if (peer.value === cell.value) {
            throw new SudokuError(
              'duplicate',
              `Duplicate value ${String(cell.value)} at ${describeCell(index)} conflicts with ${describeCell(peerIndex)}`,
              index
            );
          }
          continue;
        }
        if (hasCandidate(peer.candidates, cell.value)) {
          removals.set(peerIndex, addCandidate(removals.get(peerIndex) ?? NO_CANDIDATES, cell.value));
        }
      }
    }

    if (removals.size === 0) {
      return null;
    }
    const changes = [...removals].map(([peerIndex, values]) => new CandidatesStrikethrough(board, peerIndex, values));
    return {
      changes,
      note: `Solved value elimination: ${String(changes.length)} cells`
    };
  }
}
