import type { Grid } from './Grid.ts';

export type SudokuErrorKind =
  | 'AlreadyAssigned'
  | 'Contradiction'
  | 'GroupConflict'
  | 'GuessLimitExceeded'
  | 'IllegalMove'
  | 'NoSolution'
  | 'OutOfBounds'
  | 'OutOfRange';

export interface SudokuErrorDetails {
  readonly cause?: unknown;
  readonly col?: number;
  readonly grid?: Grid;
  readonly row?: number;
  readonly value?: number;
}

/**
 * Every failure raised by the solving engine. The `kind` discriminates the
 * failure; `grid`, when present, is the board the failure was raised against.
 */
export class SudokuError extends Error {
  public readonly col: number | undefined;
  public readonly grid: Grid | undefined;
  public readonly row: number | undefined;
  public readonly value: number | undefined;

  public constructor(public readonly kind: SudokuErrorKind, message: string, details: SudokuErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'SudokuError';
    this.col = details.col;
    this.grid = details.grid;
    this.row = details.row;
    this.value = details.value;
  }

  public withGrid(grid: Grid): SudokuError {
    return new SudokuError(this.kind, this.message, {
      cause: this,
      grid,
      ...this.col !== undefined && { col: this.col },
      ...this.row !== undefined && { row: this.row },
      ...this.value !== undefined && { value: this.value }
    });
  }
}

export function isSudokuError(value: unknown, ...kinds: readonly SudokuErrorKind[]): value is SudokuError {
  if (!(value instanceof SudokuError)) {
    return false;
  }
  return kinds.length === 0 || kinds.includes(value.kind);
}
