import type { CellIndex } from './grid.ts';

import yaml from 'js-yaml';

import { Board } from './Board.ts';
import {
  columnOf,
  rowOf
} from './grid.ts';
import { SudokuError } from './SudokuError.ts';

export interface PuzzleSpec {
  readonly board: Board;
  readonly title?: string;
}

interface YamlSpec {
  grid?: unknown;
  title?: unknown;
}

const CHAR_CODE_A = 65;

export function describeCell(index: CellIndex): string {
  return `index ${String(index)} (${getCellRef(index)})`;
}

/**
 * Keeps the characters `0`-`9` and skips everything else.
 */
export function extractDigits(text: string): number[] {
  const digits: number[] = [];
  for (const ch of text) {
    if (ch >= '0' && ch <= '9') {
      digits.push(parseInt(ch, 10));
    }
  }
  return digits;
}

export function getCellRef(index: CellIndex): string {
  return String.fromCharCode(CHAR_CODE_A + columnOf(index)) + String(rowOf(index) + 1);
}

export function parseGrid(text: string): Board {
  return Board.fromDigits(extractDigits(text));
}

export function parsePuzzleYaml(content: string): PuzzleSpec {
  const spec = yaml.load(content);
  if (typeof spec !== 'object' || spec === null || Array.isArray(spec)) {
    throw new SudokuError('input-shape', 'Puzzle YAML must be a mapping');
  }

  const { grid, title } = spec as YamlSpec;
  if (grid === undefined || grid === null) {
    throw new SudokuError('input-shape', 'grid is required in puzzle YAML');
  }

  let gridText: string;
  if (typeof grid === 'string') {
    gridText = grid;
  } else if (Array.isArray(grid) && grid.every((row) => typeof row === 'string')) {
    gridText = grid.join('\n');
  } else {
    throw new SudokuError('input-shape', 'grid must be a string or a list of strings');
  }

  const board = parseGrid(gridText);
  const trimmedTitle = typeof title === 'string' ? title.trim() : '';
  return trimmedTitle ? { board, title: trimmedTitle } : { board };
}
