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

import { CandidateSet } from '../CandidateSet.ts';
import {
  generateSubsetMasks,
  selectByMask
} from '../combinatorics.ts';
import {
  addElimination,
  buildStrikethroughChanges,
  type EliminationMap
} from './eliminations.ts';

const MIN_SUBSET_SIZE = 2;

/**
 * Naked pairs, triples and larger sets: when k unset cells of a group share
 * exactly k candidates between them, those candidates are removed from the
 * group's other unset cells. Only proper subsets of the unset cells count.
 */
export class SubsetExclusionStrategy implements Strategy {
  public readonly technique: TechniqueName = 'subset-exclusion';

  public tryApply(grid: Grid): null | StrategyResult {
    const eliminations: EliminationMap = new Map();
    const findings: string[] = [];

    for (const group of grid.groups) {
      this.scanGroup(group, eliminations, findings);
    }

    if (eliminations.size === 0) {
      return null;
    }

    return {
      changes: buildStrikethroughChanges(eliminations),
      note: `Subset exclusion: ${findings.join(', ')}`
    };
  }

  private scanGroup(group: Group, eliminations: EliminationMap, findings: string[]): void {
    const unset = group.unsetCells();
    for (const mask of generateSubsetMasks(unset.length, MIN_SUBSET_SIZE, unset.length - 1)) {
      const subset = selectByMask(unset, mask);
      let union = CandidateSet.empty();
      for (const cell of subset) {
        union = union.union(cell.candidates);
      }
      if (union.size !== subset.length) {
        continue;
      }

      const values = union.values();
      let hasEliminations = false;
      for (const cell of unset) {
        if (subset.includes(cell)) {
          continue;
        }
        for (const value of values) {
          if (cell.hasCandidate(value)) {
            addElimination(eliminations, cell, value);
            hasEliminations = true;
          }
        }
      }

      if (hasEliminations) {
        findings.push(`${describeSubset(subset)} holds ${union.toString()} in ${group.toString()}`);
      }
    }
  }
}

function describeSubset(subset: readonly Cell[]): string {
  return `(${subset.map((cell) => cell.ref).join(' ')})`;
}
