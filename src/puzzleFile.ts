import type { Board } from './Board.ts';

import { readFileSync } from 'node:fs';
import {
  basename,
  extname
} from 'node:path';

import {
  parseGrid,
  parsePuzzleYaml
} from './parsers.ts';

export interface PuzzleFile {
  readonly board: Board;
  readonly title: string;
}

const YAML_EXTENSIONS = ['.yaml', '.yml'];

/**
 * Reads a puzzle from a YAML spec (`.yaml`, `.yml`) or from any other file as
 * 81 digits with everything else skipped.
 */
export function readPuzzleFile(path: string): PuzzleFile {
  const content = readFileSync(path, 'utf-8');
  const extension = extname(path);
  const name = basename(path, extension);

  if (YAML_EXTENSIONS.includes(extension.toLowerCase())) {
    const spec = parsePuzzleYaml(content);
    return { board: spec.board, title: spec.title ?? name };
  }
  return { board: parseGrid(content), title: name };
}
