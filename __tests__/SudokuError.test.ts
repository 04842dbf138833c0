import {
  describe,
  expect,
  it
} from 'vitest';

import { Grid } from '../src/Grid.ts';
import {
  isSudokuError,
  SudokuError
} from '../src/SudokuError.ts';

describe('SudokuError', () => {
  it('carries its kind and coordinates', () => {
    const error = new SudokuError('GroupConflict', 'Row 1 already contains 5', { col: 1, row: 0, value: 5 });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SudokuError');
    expect(error.kind).toBe('GroupConflict');
    expect([error.row, error.col, error.value]).toEqual([0, 1, 5]);
    expect(error.grid).toBeUndefined();
  });

  it('attaches a grid without losing details', () => {
    const grid = Grid.empty();
    const original = new SudokuError('Contradiction', 'No candidates left at R1C1', { col: 0, row: 0 });
    const withGrid = original.withGrid(grid);
    expect(withGrid.kind).toBe('Contradiction');
    expect(withGrid.message).toBe('No candidates left at R1C1');
    expect(withGrid.grid).toBe(grid);
    expect(withGrid.cause).toBe(original);
    expect([withGrid.row, withGrid.col, withGrid.value]).toEqual([0, 0, undefined]);
  });
});

describe('isSudokuError', () => {
  it('matches any kind when none is given', () => {
    expect(isSudokuError(new SudokuError('NoSolution', 'none'))).toBe(true);
    expect(isSudokuError(new Error('plain'))).toBe(false);
    expect(isSudokuError('NoSolution')).toBe(false);
  });

  it('filters by kind', () => {
    const error = new SudokuError('OutOfRange', 'Candidate value 0 out of range');
    expect(isSudokuError(error, 'Contradiction', 'NoSolution')).toBe(false);
    expect(isSudokuError(error, 'OutOfRange')).toBe(true);
  });
});
