import type {
  Cell,
  Grid
} from '../Grid.ts';
import type { TraceChange } from '../trace.ts';

export abstract class CellChange {
  protected constructor(public readonly cell: Cell) {
  }

  /**
   * Applies the change and returns how many facts it added to the grid.
   */
  public abstract applyToModel(grid: Grid): number;
  public abstract toTraceChange(): TraceChange;
}
