import type { CellChange } from '../cellChanges/CellChange.ts';
import type { Grid } from '../Grid.ts';

export type TechniqueName =
  | 'box-line-reduction'
  | 'hidden-single'
  | 'line-box-reduction'
  | 'naked-single'
  | 'subset-exclusion';

/**
 * Technique names of the built-in strategies. Custom strategies may use any
 * other name.
 */
export type StrategyTechnique = TechniqueName | (string & Record<never, never>);

/**
 * One deduction technique. `tryApply` only reads the grid; the caller applies
 * the returned changes.
 */
export interface Strategy {
  readonly technique: StrategyTechnique;
  tryApply(grid: Grid): null | StrategyResult;
}

export interface StrategyResult {
  readonly changes: readonly CellChange[];
  readonly note: string;
}
