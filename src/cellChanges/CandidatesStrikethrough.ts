import type { Cell } from '../Grid.ts';
import type { TraceChange } from '../trace.ts';

import { CellChange } from './CellChange.ts';

export class CandidatesStrikethrough extends CellChange {
  public constructor(cell: Cell, public readonly values: readonly number[]) {
    super(cell);
  }

  public applyToModel(): number {
    let removed = 0;
    for (const v of this.values) {
      if (this.cell.eliminate(v)) {
        removed++;
      }
    }
    return removed;
  }

  public toTraceChange(): TraceChange {
    return { col: this.cell.col, row: this.cell.row, type: 'eliminate', values: this.values };
  }
}
