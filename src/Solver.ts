import type {
  Cell,
  Grid
} from './Grid.ts';
import type { Strategy } from './strategies/Strategy.ts';
import type { TraceRecord } from './trace.ts';

import { DeductionEngine } from './DeductionEngine.ts';
import { createDefaultStrategies } from './strategies/createDefaultStrategies.ts';
import {
  isSudokuError,
  SudokuError,
  type SudokuErrorKind
} from './SudokuError.ts';
import { SolveTrace } from './trace.ts';

export type GuessPolicy = 'fewest-candidates' | 'first-unset';

export interface SolveOptions {
  readonly guessPolicy?: GuessPolicy;
  readonly maxGuesses?: number;
  readonly strategies?: readonly Strategy[];
  readonly trace?: boolean;
}

export interface SolveResult {
  readonly grid: Grid;
  readonly stats: SolveStats;
  readonly trace: readonly TraceRecord[];
}

export interface SolveStats {
  failedBranches: number;
  guesses: number;
  maxDepth: number;
  sweeps: number;
}

interface SearchContext {
  readonly engine: DeductionEngine;
  readonly stats: SolveStats;
  readonly trace: SolveTrace;
}

export const DEFAULT_SOLVE_OPTIONS: Readonly<Required<Omit<SolveOptions, 'strategies'>>> = Object.freeze({
  guessPolicy: 'first-unset',
  maxGuesses: Infinity,
  trace: true
});

// Failures that only mean the speculative assignment was wrong.
const BRANCH_FAILURE_KINDS: readonly SudokuErrorKind[] = [
  'AlreadyAssigned',
  'Contradiction',
  'GroupConflict',
  'IllegalMove',
  'NoSolution'
];

/**
 * Propagates deductions to a fixpoint and, when they stall, guesses on a
 * cloned grid and recurses depth-first. The first solved branch wins.
 */
export class Solver {
  private readonly guessPolicy: GuessPolicy;
  private readonly maxGuesses: number;
  private readonly strategies: readonly Strategy[];
  private readonly traceEnabled: boolean;

  public constructor(options: SolveOptions = {}) {
    const resolved = { ...DEFAULT_SOLVE_OPTIONS, ...options };
    if (resolved.maxGuesses !== Infinity && (!Number.isInteger(resolved.maxGuesses) || resolved.maxGuesses < 0)) {
      throw new RangeError(`maxGuesses must be a non-negative integer, got ${String(resolved.maxGuesses)}`);
    }
    this.guessPolicy = resolved.guessPolicy;
    this.maxGuesses = resolved.maxGuesses;
    this.strategies = options.strategies ?? createDefaultStrategies();
    this.traceEnabled = resolved.trace;
  }

  /**
   * Solves a copy of `puzzle`; the argument is left untouched. Failures at
   * the top level carry the grid as it stood when they were raised.
   */
  public solve(puzzle: Grid): SolveResult {
    const trace = new SolveTrace(this.traceEnabled);
    const context: SearchContext = {
      engine: new DeductionEngine(this.strategies, trace),
      stats: { failedBranches: 0, guesses: 0, maxDepth: 0, sweeps: 0 },
      trace
    };

    const working = puzzle.clone();
    let solved: Grid;
    try {
      solved = this.search(context, working, 0);
    } catch (error) {
      if (isSudokuError(error) && !error.grid) {
        throw error.withGrid(working);
      }
      throw error;
    }
    return { grid: solved, stats: context.stats, trace: trace.records };
  }

  private search(context: SearchContext, grid: Grid, depth: number): Grid {
    context.stats.maxDepth = Math.max(context.stats.maxDepth, depth);
    context.stats.sweeps += context.engine.propagate(grid, depth);
    if (grid.isSolved) {
      return grid;
    }

    const cell = this.selectGuessCell(grid);
    if (!cell) {
      throw new SudokuError('NoSolution', 'No unset cell to guess on', { grid });
    }

    for (const value of cell.getCandidates()) {
      if (context.stats.guesses >= this.maxGuesses) {
        throw new SudokuError('GuessLimitExceeded', `Guess limit of ${String(this.maxGuesses)} reached`, { grid });
      }
      context.stats.guesses++;
      context.trace.add({ col: cell.col, row: cell.row, type: 'guess', value }, depth);

      const branch = grid.clone();
      try {
        branch.assign(cell.row, cell.col, value);
        return this.search(context, branch, depth + 1);
      } catch (error) {
        if (!isSudokuError(error, ...BRANCH_FAILURE_KINDS)) {
          throw error;
        }
        context.stats.failedBranches++;
        context.trace.add({ col: cell.col, reason: error.kind, row: cell.row, type: 'backtrack', value }, depth);
      }
    }

    throw new SudokuError('NoSolution', `No candidate for ${cell.ref} leads to a solution`, {
      col: cell.col,
      grid,
      row: cell.row
    });
  }

  private selectGuessCell(grid: Grid): Cell | undefined {
    const unset = grid.unsetCells();
    if (this.guessPolicy === 'first-unset') {
      return unset[0];
    }
    let best: Cell | undefined;
    for (const cell of unset) {
      if (!best || cell.candidateCount < best.candidateCount) {
        best = cell;
      }
    }
    return best;
  }
}

export function solve(puzzle: Grid, options?: SolveOptions): SolveResult {
  return new Solver(options).solve(puzzle);
}
