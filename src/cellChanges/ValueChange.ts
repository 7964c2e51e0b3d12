import type { Board } from '../Board.ts';
import type {
  CellIndex,
  CellValue
} from '../grid.ts';

import { getCellRef } from '../parsers.ts';
import { CellChange } from './CellChange.ts';

export class ValueChange extends CellChange {
  public constructor(board: Board, cellIndex: CellIndex, public readonly value: CellValue) {
    super(board, cellIndex);
  }

  public applyToModel(): void {
    this.board.setValue(this.cellIndex, this.value);
  }

  public toString(): string {
    return `${getCellRef(this.cellIndex)}:=${String(this.value)}`;
  }
}
