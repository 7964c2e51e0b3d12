import type {
  CellIndex,
  CellValue
} from './grid.ts';
import type { SudokuError } from './SudokuError.ts';

import { getCellRef } from './parsers.ts';

/**
 * Receives solve events. `depth` is 0 for the top-level solve and grows by
 * one with every assumption.
 */
export interface SolveTracer {
  assume(depth: number, cellIndex: CellIndex, value: CellValue): void;
  assumptionRejected(depth: number, cellIndex: CellIndex, value: CellValue, error: SudokuError): void;
  eliminationApplied(depth: number, note: string): void;
  eliminationFailed(depth: number, error: SudokuError): void;
  eliminationFinished(depth: number, isSolved: boolean): void;
  eliminationStarted(depth: number): void;
  searchFailed(depth: number, error: SudokuError): void;
  searchStarted(depth: number): void;
}

export class LoggingSolveTracer implements SolveTracer {
  public constructor(private readonly writeLine: (line: string) => void) {
  }

  public assume(depth: number, cellIndex: CellIndex, value: CellValue): void {
    this.log(depth, `assuming ${getCellRef(cellIndex)} = ${String(value)}`);
  }

  public assumptionRejected(depth: number, cellIndex: CellIndex, value: CellValue, error: SudokuError): void {
    this.log(depth, `could not solve with ${getCellRef(cellIndex)} = ${String(value)}: ${error.message}`);
  }

  public eliminationApplied(depth: number, note: string): void {
    this.log(depth, note);
  }

  public eliminationFailed(depth: number, error: SudokuError): void {
    this.log(depth, `elimination failed: ${error.message}`);
  }

  public eliminationFinished(depth: number, isSolved: boolean): void {
    this.log(depth, isSolved ? 'all cells solved' : 'no cell could be solved');
  }

  public eliminationStarted(depth: number): void {
    this.log(depth, 'trying elimination');
  }

  public searchFailed(depth: number, error: SudokuError): void {
    this.log(depth, `depth first search failed: ${error.message}`);
  }

  public searchStarted(depth: number): void {
    this.log(depth, 'trying depth first search');
  }

  private log(depth: number, message: string): void {
    this.writeLine(`[${String(depth)}] ${message}`);
  }
}

export class SilentSolveTracer implements SolveTracer {
  public assume(): void {
    // No-op
  }

  public assumptionRejected(): void {
    // No-op
  }

  public eliminationApplied(): void {
    // No-op
  }

  public eliminationFailed(): void {
    // No-op
  }

  public eliminationFinished(): void {
    // No-op
  }

  public eliminationStarted(): void {
    // No-op
  }

  public searchFailed(): void {
    // No-op
  }

  public searchStarted(): void {
    // No-op
  }
}
