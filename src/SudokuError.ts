import type { CellIndex } from './grid.ts';

export type SudokuErrorKind = 'duplicate' | 'exhausted' | 'input-shape' | 'unsolvable';

/**
 * A puzzle that cannot be read or cannot be solved.
 *
 * The searcher treats every `SudokuError` raised inside a branch as "this
 * assumption is wrong"; any other error is a bug and propagates.
 */
export class SudokuError extends Error {
  public override readonly name = 'SudokuError';

  public constructor(
    public readonly kind: SudokuErrorKind,
    message: string,
    public readonly cellIndex?: CellIndex
  ) {
    super(message);
  }
}
