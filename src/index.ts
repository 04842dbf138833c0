export {
  CandidateSet,
  type ReadonlyCandidateSet
} from './CandidateSet.ts';
export { DeductionEngine } from './DeductionEngine.ts';
export {
  BOX_SIZE,
  CELL_COUNT,
  GRID_SIZE
} from './geometry.ts';
export {
  Cell,
  Grid,
  Group,
  type GridSnapshot,
  type GroupType
} from './Grid.ts';
export {
  getCellRef,
  parseGrid
} from './parsers.ts';
export {
  loadPuzzleFile,
  parsePuzzleYaml,
  type PuzzleFile
} from './puzzleFile.ts';
export {
  describeTraceRecord,
  renderBoard,
  renderCandidates
} from './renderers.ts';
export {
  DEFAULT_SOLVE_OPTIONS,
  solve,
  type GuessPolicy,
  type SolveOptions,
  type SolveResult,
  Solver,
  type SolveStats
} from './Solver.ts';
export { BoxLineReductionStrategy } from './strategies/BoxLineReductionStrategy.ts';
export { createDefaultStrategies } from './strategies/createDefaultStrategies.ts';
export { HiddenSingleStrategy } from './strategies/HiddenSingleStrategy.ts';
export { LineBoxReductionStrategy } from './strategies/LineBoxReductionStrategy.ts';
export { NakedSingleStrategy } from './strategies/NakedSingleStrategy.ts';
export type {
  Strategy,
  StrategyResult,
  StrategyTechnique,
  TechniqueName
} from './strategies/Strategy.ts';
export { SubsetExclusionStrategy } from './strategies/SubsetExclusionStrategy.ts';
export {
  isSudokuError,
  SudokuError,
  type SudokuErrorKind
} from './SudokuError.ts';
export type {
  TraceChange,
  TraceRecord
} from './trace.ts';
