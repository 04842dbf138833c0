import type { Grid } from '../Grid.ts';
import type {
  Strategy,
  StrategyResult,
  TechniqueName
} from './Strategy.ts';

import { ValueChange } from '../cellChanges/ValueChange.ts';
import { ensureNonNullable } from '../typeGuards.ts';

export class NakedSingleStrategy implements Strategy {
  public readonly technique: TechniqueName = 'naked-single';

  public tryApply(grid: Grid): null | StrategyResult {
    const changes: ValueChange[] = [];
    for (const cell of grid.cells) {
      if (cell.isSolved) {
        continue;
      }
      const cands = cell.getCandidates();
      if (cands.length === 1) {
        changes.push(new ValueChange(cell, ensureNonNullable(cands[0])));
      }
    }
    if (changes.length === 0) {
      return null;
    }
    const entries = changes.map((c) => `${c.cell.ref}=${String(c.value)}`).join(', ');
    return {
      changes,
      note: `Naked single: ${entries}`
    };
  }
}
