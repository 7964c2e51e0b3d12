export type {
  Cell,
  SolvedCell,
  UndeterminedCell
} from './Board.ts';
export type { CandidateMask } from './candidates.ts';
export type {
  CellIndex,
  CellValue,
  HouseType
} from './grid.ts';
export type { PuzzleSpec } from './parsers.ts';
export type { PuzzleFile } from './puzzleFile.ts';
export type {
  BranchCell,
  BranchSolver
} from './Searcher.ts';
export type { SolverOptions } from './Solver.ts';
export type { SolveTracer } from './SolveTracer.ts';
export type { SudokuErrorKind } from './SudokuError.ts';

export { Board } from './Board.ts';
export { Eliminator } from './Eliminator.ts';
export {
  BLOCKS,
  COLUMNS,
  House,
  HOUSES,
  peersOf,
  ROWS
} from './grid.ts';
export {
  describeCell,
  extractDigits,
  getCellRef,
  parseGrid,
  parsePuzzleYaml
} from './parsers.ts';
export { readPuzzleFile } from './puzzleFile.ts';
export {
  Searcher,
  selectBranchCell
} from './Searcher.ts';
export {
  solve,
  Solver
} from './Solver.ts';
export {
  LoggingSolveTracer,
  SilentSolveTracer
} from './SolveTracer.ts';
export { SudokuError } from './SudokuError.ts';
