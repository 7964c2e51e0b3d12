import type { Board } from '../Board.ts';
import type { CellIndex } from '../grid.ts';

export abstract class CellChange {
  protected constructor(protected readonly board: Board, public readonly cellIndex: CellIndex) {
  }

  public abstract applyToModel(): void;
  public abstract toString(): string;
}
