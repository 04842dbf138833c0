import type { Grid } from './Grid.ts';
import type { Strategy } from './strategies/Strategy.ts';
import type { SolveTrace } from './trace.ts';

import { createDefaultStrategies } from './strategies/createDefaultStrategies.ts';
import { SudokuError } from './SudokuError.ts';

/**
 * Runs the deduction battery against a grid. Every technique is monotonic, so
 * order only decides which technique is credited with a change.
 */
export class DeductionEngine {
  public constructor(
    public readonly strategies: readonly Strategy[] = createDefaultStrategies(),
    private readonly trace?: SolveTrace
  ) {
  }

  /**
   * Runs one technique and applies what it finds. Returns the number of
   * assignments plus eliminations made.
   */
  public applyStrategy(grid: Grid, strategy: Strategy, depth = 0): number {
    const result = strategy.tryApply(grid);
    if (!result) {
      return 0;
    }

    let changeCount = 0;
    for (const change of result.changes) {
      changeCount += change.applyToModel(grid);
    }

    const emptyCell = grid.findContradiction();
    if (emptyCell) {
      throw new SudokuError('Contradiction', `No candidates left at ${emptyCell.ref}`, { col: emptyCell.col, row: emptyCell.row });
    }

    if (changeCount > 0) {
      this.trace?.add({
        changes: result.changes.map((change) => change.toTraceChange()),
        note: result.note,
        technique: strategy.technique,
        type: 'deduction'
      }, depth);
    }
    return changeCount;
  }

  /**
   * Repeats sweeps until one makes no change or the grid is solved. Returns
   * the number of sweeps run.
   */
  public propagate(grid: Grid, depth = 0): number {
    let sweeps = 0;
    let changed = true;
    while (changed && !grid.isSolved) {
      changed = this.sweep(grid, depth) > 0;
      sweeps++;
    }
    return sweeps;
  }

  /**
   * Runs every technique once, in order. Returns the total change count.
   */
  public sweep(grid: Grid, depth = 0): number {
    let changeCount = 0;
    for (const strategy of this.strategies) {
      changeCount += this.applyStrategy(grid, strategy, depth);
    }
    return changeCount;
  }
}
