import {
  describe,
  expect,
  it
} from 'vitest';

import type {
  Strategy,
  StrategyResult
} from '../src/strategies/Strategy.ts';

import { CandidatesStrikethrough } from '../src/cellChanges/CandidatesStrikethrough.ts';
import { DeductionEngine } from '../src/DeductionEngine.ts';
import { Grid } from '../src/Grid.ts';
import { SolveTrace } from '../src/trace.ts';
import {
  catchSudokuError,
  gridFromPlacements,
  loadPuzzle,
  loadSolution,
  valuesOf
} from './gridTestHelper.ts';

class StrikeStrategy implements Strategy {
  public readonly technique = 'strike';

  public constructor(private readonly row: number, private readonly col: number, private readonly values: readonly number[]) {
  }

  public tryApply(grid: Grid): null | StrategyResult {
    return {
      changes: [new CandidatesStrikethrough(grid.cell(this.row, this.col), this.values)],
      note: 'Strike'
    };
  }
}

function nakedSingleRow(): Grid {
  return gridFromPlacements([5, 3, 4, 6, 7, 8, 9, 1].map((value, col) => [0, col, value] as const));
}

describe('DeductionEngine', () => {
  it('counts the changes of one sweep', () => {
    const grid = nakedSingleRow();
    expect(new DeductionEngine().sweep(grid)).toBe(1);
    expect(grid.cell(0, 8).value).toBe(2);
  });

  it('records a deduction at the given depth', () => {
    const trace = new SolveTrace();
    new DeductionEngine(undefined, trace).sweep(nakedSingleRow(), 2);
    expect(trace.records).toEqual([
      {
        changes: [{ col: 8, row: 0, type: 'assign', value: 2 }],
        depth: 2,
        note: 'Naked single: R1C9=2',
        technique: 'naked-single',
        type: 'deduction'
      }
    ]);
  });

  it('does not record a result that changed nothing', () => {
    const trace = new SolveTrace();
    const grid = gridFromPlacements([[0, 1, 5]]);
    const strategy = new StrikeStrategy(0, 0, [5]);
    expect(new DeductionEngine([strategy], trace).applyStrategy(grid, strategy)).toBe(0);
    expect(trace.records).toEqual([]);
  });

  it('raises a contradiction when a cell loses every candidate', () => {
    const strategy = new StrikeStrategy(0, 0, [1, 2, 3, 4, 5, 6, 7, 8, 9]);
    const error = catchSudokuError(() => new DeductionEngine([strategy]).sweep(Grid.empty()));
    expect(error.kind).toBe('Contradiction');
    expect(error.message).toBe('No candidates left at R1C1');
    expect([error.row, error.col]).toEqual([0, 0]);
  });

  it('propagates to a fixpoint', () => {
    const grid = loadPuzzle('easy.txt');
    expect(new DeductionEngine().propagate(grid)).toBe(5);
    expect(grid.isSolved).toBe(true);
    expect(valuesOf(grid)).toEqual(loadSolution('easy'));
  });

  it('stops when a sweep changes nothing', () => {
    expect(new DeductionEngine().propagate(Grid.empty())).toBe(1);
  });

  it('runs no sweep on a solved grid', () => {
    const grid = Grid.fromClues(loadSolution('easy'));
    expect(new DeductionEngine().propagate(grid)).toBe(0);
  });
});
