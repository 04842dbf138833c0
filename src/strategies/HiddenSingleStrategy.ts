import type {
  Cell,
  Grid,
  Group
} from '../Grid.ts';
import type {
  Strategy,
  StrategyResult,
  TechniqueName
} from './Strategy.ts';

import { ValueChange } from '../cellChanges/ValueChange.ts';

interface HiddenSingleFound {
  readonly cell: Cell;
  readonly group: Group;
  readonly value: number;
}

export class HiddenSingleStrategy implements Strategy {
  public readonly technique: TechniqueName = 'hidden-single';

  public tryApply(grid: Grid): null | StrategyResult {
    const results: HiddenSingleFound[] = [];
    const seen = new Set<Cell>();

    for (const group of grid.groups) {
      this.scanGroup(group, results, seen);
    }

    if (results.length === 0) {
      return null;
    }

    const noteEntries = results.map(
      (r) => `${r.cell.ref}=${String(r.value)} (${r.group.toString()})`
    );
    return {
      changes: results.map((r) => new ValueChange(r.cell, r.value)),
      note: `Hidden single: ${noteEntries.join(', ')}`
    };
  }

  private scanGroup(group: Group, results: HiddenSingleFound[], seen: Set<Cell>): void {
    for (const value of group.remainingCandidates().values()) {
      const cells = group.cellsWithCandidate(value);
      const [foundCell] = cells;
      if (cells.length === 1 && foundCell && !seen.has(foundCell)) {
        results.push({ cell: foundCell, group, value });
        seen.add(foundCell);
      }
    }
  }
}
