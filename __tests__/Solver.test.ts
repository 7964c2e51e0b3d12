import {
  describe,
  expect,
  it
} from 'vitest';

import {
  solve,
  Solver
} from '../src/Solver.ts';
import { SudokuError } from '../src/SudokuError.ts';
import {
  blankCells,
  CLASSIC_PUZZLE,
  CLASSIC_SOLUTION,
  CLASSIC_SOLUTION_ROWS,
  createBoard,
  EMPTY_GRID,
  findInvalidHouses,
  TrackingSolveTracer
} from './boardTestHelper.ts';

const EXHAUSTED_AT_A1 = [
  '003456789',
  '000789456'
].join('').padEnd(81, '0');

const UNSOLVABLE_AT_A1 = [
  '012345678',
  '000000000',
  '000000000',
  '900000000'
].join('').padEnd(81, '0');

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error: unknown) {
    return error;
  }
  throw new Error('Expected an error');
}

function withoutNotes(events: readonly string[]): string[] {
  return events.filter((event) => !event.startsWith('applied '));
}

describe('Solver', () => {
  it('solves the classic puzzle', () => {
    const solution = new Solver().solve(createBoard(CLASSIC_PUZZLE));
    expect(solution.toString()).toBe(CLASSIC_SOLUTION_ROWS.join('\n'));
  });

  it('leaves the given board untouched', () => {
    const board = createBoard(CLASSIC_PUZZLE);
    new Solver().solve(board);
    expect(board.toDigits().join('')).toBe(CLASSIC_PUZZLE);
  });

  it('returns a solved grid unchanged', () => {
    const solution = solve(createBoard(CLASSIC_SOLUTION));
    expect(solution.toDigits().join('')).toBe(CLASSIC_SOLUTION);
  });

  it('returns the same grid when solving its own output', () => {
    const first = solve(createBoard(CLASSIC_PUZZLE));
    const second = solve(first);
    expect(second.toString()).toBe(first.toString());
  });

  it('fills an empty grid by searching', () => {
    const tracer = new TrackingSolveTracer();
    const solution = new Solver({ tracer }).solve(createBoard(EMPTY_GRID));
    expect(findInvalidHouses(solution)).toEqual([]);
    expect(tracer.events).toContain('assume 0 0=1');
    expect(tracer.events).toContain('search started 1');
  });

  it('keeps the givens of a puzzle with several solutions', () => {
    const blanks = Array.from({ length: 81 }, (_, index) => index).filter((index) => index % 9 < 3 || index < 27);
    const puzzle = blankCells(CLASSIC_SOLUTION, blanks);
    const solution = solve(createBoard(puzzle)).toDigits();

    expect(findInvalidHouses(createBoard(solution.join('')))).toEqual([]);
    for (let index = 0; index < 81; index++) {
      if (puzzle[index] !== '0') {
        expect(String(solution[index])).toBe(puzzle[index]);
      }
    }
  });

  it.each([
    { expected: 'conflicts with index 1 (B1)', house: 'row', index: 1 },
    { expected: 'conflicts with index 9 (A2)', house: 'column', index: 9 },
    { expected: 'conflicts with index 10 (B2)', house: 'block', index: 10 }
  ])('fails on duplicate givens in a $house', ({ expected, index }) => {
    const digits = [...EMPTY_GRID];
    digits[0] = '7';
    digits[index] = '7';
    const error = captureError(() => solve(createBoard(digits.join(''))));
    expect(error).toBeInstanceOf(SudokuError);
    expect(error).toMatchObject({ kind: 'duplicate', message: `Duplicate value 7 at index 0 (A1) ${expected}` });
  });

  it('fails on a cell left without candidates before searching', () => {
    const tracer = new TrackingSolveTracer();
    const error = captureError(() => new Solver({ tracer }).solve(createBoard(UNSOLVABLE_AT_A1)));
    expect(error).toMatchObject({ kind: 'unsolvable', message: 'Unsolvable cell at index 0 (A1)' });
    expect(withoutNotes(tracer.events)).toEqual([
      'elimination started 0',
      'elimination failed 0 unsolvable'
    ]);
  });

  it('fails when every assumption leads to a contradiction', () => {
    const tracer = new TrackingSolveTracer();
    const error = captureError(() => new Solver({ tracer }).solve(createBoard(EXHAUSTED_AT_A1)));
    expect(error).toMatchObject({
      cellIndex: 0,
      kind: 'exhausted',
      message: 'All assumptions contradicted at index 0 (A1)'
    });
    expect(withoutNotes(tracer.events)).toEqual([
      'elimination started 0',
      'elimination finished 0 false',
      'search started 0',
      'assume 0 0=1',
      'elimination started 1',
      'elimination failed 1 duplicate',
      'reject 0 0=1 duplicate',
      'assume 0 0=2',
      'elimination started 1',
      'elimination failed 1 duplicate',
      'reject 0 0=2 duplicate',
      'search failed 0 exhausted'
    ]);
  });
});
