import type { Board } from '../Board.ts';
import type { CandidateMask } from '../candidates.ts';
import type { CellIndex } from '../grid.ts';

import {
  formatCandidates,
  removeCandidates
} from '../candidates.ts';
import { getCellRef } from '../parsers.ts';
import { CellChange } from './CellChange.ts';

export class CandidatesStrikethrough extends CellChange {
  public constructor(board: Board, cellIndex: CellIndex, public readonly values: CandidateMask) {
    super(board, cellIndex);
  }

  public applyToModel(): void {
    const cell = this.board.getCell(this.cellIndex);
    if (cell.type === 'undetermined') {
      this.board.setCandidates(this.cellIndex, removeCandidates(cell.candidates, this.values));
    }
  }

  public toString(): string {
    return `${getCellRef(this.cellIndex)}:-${formatCandidates(this.values)}`;
  }
}
