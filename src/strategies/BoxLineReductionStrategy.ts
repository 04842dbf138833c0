import type {
  Grid,
  Group
} from '../Grid.ts';
import type {
  Strategy,
  StrategyResult,
  TechniqueName
} from './Strategy.ts';

import {
  addElimination,
  buildStrikethroughChanges,
  type EliminationMap
} from './eliminations.ts';

/**
 * When every cell of a box that can hold a value lies in one row (or one
 * column), the value cannot appear elsewhere in that row (or column).
 */
export class BoxLineReductionStrategy implements Strategy {
  public readonly technique: TechniqueName = 'box-line-reduction';

  public tryApply(grid: Grid): null | StrategyResult {
    const eliminations: EliminationMap = new Map();
    const findings: string[] = [];

    for (const box of grid.boxes) {
      for (const value of box.remainingCandidates().values()) {
        const cells = box.cellsWithCandidate(value);
        const rows = new Set(cells.map((cell) => cell.row));
        const cols = new Set(cells.map((cell) => cell.col));
        const [row] = rows;
        const [col] = cols;
        if (rows.size === 1 && row !== undefined) {
          this.eliminateOutsideBox(box, grid.row(row), value, eliminations, findings);
        }
        if (cols.size === 1 && col !== undefined) {
          this.eliminateOutsideBox(box, grid.col(col), value, eliminations, findings);
        }
      }
    }

    if (eliminations.size === 0) {
      return null;
    }

    return {
      changes: buildStrikethroughChanges(eliminations),
      note: `Box/line reduction: ${findings.join(', ')}`
    };
  }

  private eliminateOutsideBox(
    box: Group,
    line: Group,
    value: number,
    eliminations: EliminationMap,
    findings: string[]
  ): void {
    const targets = line.cells.filter((cell) => !box.contains(cell) && cell.hasCandidate(value));
    if (targets.length === 0) {
      return;
    }
    for (const cell of targets) {
      addElimination(eliminations, cell, value);
    }
    findings.push(`${String(value)} in ${box.toString()} confined to ${line.toString()}`);
  }
}
