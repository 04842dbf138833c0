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
 * When every cell of a row (or column) that can hold a value lies in one box,
 * the value cannot appear in the rest of that box.
 */
export class LineBoxReductionStrategy implements Strategy {
  public readonly technique: TechniqueName = 'line-box-reduction';

  public tryApply(grid: Grid): null | StrategyResult {
    const eliminations: EliminationMap = new Map();
    const findings: string[] = [];

    for (const line of [...grid.rows, ...grid.columns]) {
      for (const value of line.remainingCandidates().values()) {
        const boxes = new Set(line.cellsWithCandidate(value).map((cell) => cell.box));
        const [boxIndex] = boxes;
        if (boxes.size !== 1 || boxIndex === undefined) {
          continue;
        }
        const box = grid.boxes[boxIndex];
        if (box) {
          this.eliminateOutsideLine(line, box, value, eliminations, findings);
        }
      }
    }

    if (eliminations.size === 0) {
      return null;
    }

    return {
      changes: buildStrikethroughChanges(eliminations),
      note: `Line/box reduction: ${findings.join(', ')}`
    };
  }

  private eliminateOutsideLine(
    line: Group,
    box: Group,
    value: number,
    eliminations: EliminationMap,
    findings: string[]
  ): void {
    const targets = box.cells.filter((cell) => !line.contains(cell) && cell.hasCandidate(value));
    if (targets.length === 0) {
      return;
    }
    for (const cell of targets) {
      addElimination(eliminations, cell, value);
    }
    findings.push(`${String(value)} in ${line.toString()} confined to ${box.toString()}`);
  }
}
