import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import type {
  SudokuError,
  SudokuErrorKind
} from '../src/SudokuError.ts';

import { Grid } from '../src/Grid.ts';
import { parseGrid } from '../src/parsers.ts';
import { loadPuzzleFile } from '../src/puzzleFile.ts';
import { isSudokuError } from '../src/SudokuError.ts';

export type Placement = readonly [row: number, col: number, value: number];

export function catchSudokuError(action: () => unknown): SudokuError {
  try {
    action();
  } catch (error) {
    if (isSudokuError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a SudokuError');
}

export function errorKindOf(action: () => unknown): SudokuErrorKind {
  return catchSudokuError(action).kind;
}

export function gridFromPlacements(placements: readonly Placement[]): Grid {
  const clues = Array.from({ length: 9 }, () => Array.from({ length: 9 }, () => 0));
  for (const [row, col, value] of placements) {
    const clueRow = clues[row];
    if (clueRow) {
      clueRow[col] = value;
    }
  }
  return Grid.fromClues(clues);
}

export function loadPuzzle(name: string): Grid {
  return Grid.fromClues(loadPuzzleFile(repoPath(`puzzles/${name}`)).clues);
}

export function loadSolution(name: string): number[][] {
  return parseGrid(readFileSync(repoPath(`__tests__/fixtures/${name}.solution.txt`), 'utf-8'));
}

export function repoPath(relative: string): string {
  return fileURLToPath(new URL(`../${relative}`, import.meta.url));
}

export function valuesOf(grid: Grid): number[][] {
  return grid.rows.map((row) => row.cells.map((cell) => cell.value));
}
