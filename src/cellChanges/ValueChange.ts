import type {
  Cell,
  Grid
} from '../Grid.ts';
import type { TraceChange } from '../trace.ts';

import { CellChange } from './CellChange.ts';

export class ValueChange extends CellChange {
  public constructor(cell: Cell, public readonly value: number) {
    super(cell);
  }

  public applyToModel(grid: Grid): number {
    grid.assign(this.cell.row, this.cell.col, this.value);
    return 1;
  }

  public toTraceChange(): TraceChange {
    return { col: this.cell.col, row: this.cell.row, type: 'assign', value: this.value };
  }
}
