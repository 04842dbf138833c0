import { CandidatesStrikethrough } from '../cellChanges/CandidatesStrikethrough.ts';
import { Cell } from '../Grid.ts';

export type EliminationMap = Map<Cell, Set<number>>;

export function addElimination(eliminations: EliminationMap, cell: Cell, value: number): void {
  let existing = eliminations.get(cell);
  if (!existing) {
    existing = new Set<number>();
    eliminations.set(cell, existing);
  }
  existing.add(value);
}

export function buildStrikethroughChanges(eliminations: EliminationMap): CandidatesStrikethrough[] {
  return [...eliminations.entries()]
    .map(([cell, values]) => new CandidatesStrikethrough(cell, [...values].sort((a, b) => a - b)))
    .sort((a, b) => Cell.compare(a.cell, b.cell));
}
