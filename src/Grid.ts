import type { ReadonlyCandidateSet } from './CandidateSet.ts';

import { CandidateSet } from './CandidateSet.ts';
import {
  BOX_SIZE,
  GRID_SIZE
} from './geometry.ts';
import { getCellRef } from './parsers.ts';
import {
  isSudokuError,
  SudokuError
} from './SudokuError.ts';
import {
  ensureNonNullable,
  isDigit
} from './typeGuards.ts';

export type GroupType = 'box' | 'column' | 'row';

/**
 * Plain-data copy of a grid for presentation. `values[r][c]` is 0 for a blank
 * cell; `candidates[r][c]` is empty for an assigned one.
 */
export interface GridSnapshot {
  readonly candidates: readonly (readonly (readonly number[])[])[];
  readonly values: readonly (readonly number[])[];
}

const UNSET = 0;

export class Cell {
  public readonly box: number;
  public readonly ref: string;
  public get candidateCount(): number {
    return this._candidates.size;
  }

  public get candidates(): ReadonlyCandidateSet {
    return this._candidates;
  }

  public get isSolved(): boolean {
    return this._value !== UNSET;
  }

  public get value(): number {
    return this._value;
  }

  private readonly _candidates: CandidateSet;
  private _value: number;

  public constructor(
    public readonly row: number,
    public readonly col: number,
    value = UNSET,
    candidates: CandidateSet = CandidateSet.full()
  ) {
    this.box = Math.floor(row / BOX_SIZE) * BOX_SIZE + Math.floor(col / BOX_SIZE);
    this.ref = getCellRef(row, col);
    this._value = value;
    this._candidates = value === UNSET ? candidates : CandidateSet.empty();
  }

  public static compare(a: Cell, b: Cell): number {
    return a.row - b.row || a.col - b.col;
  }

  public clone(): Cell {
    return new Cell(this.row, this.col, this._value, this._candidates.clone());
  }

  /**
   * Removes `value` from the candidates. Returns whether it was present.
   */
  public eliminate(value: number): boolean {
    return this._candidates.remove(value);
  }

  public getCandidates(): number[] {
    return this._candidates.values();
  }

  public hasCandidate(value: number): boolean {
    return this._candidates.contains(value);
  }

  /**
   * Records the final value. Only `Grid.assign` calls this; it owns the
   * validation and the peer eliminations.
   */
  public place(value: number): void {
    this._value = value;
    this._candidates.clear();
  }

  public toString(): string {
    return this.ref;
  }
}

export class Group {
  public readonly label: string;

  public constructor(public readonly type: GroupType, public readonly index: number, public readonly cells: readonly Cell[]) {
    this.label = String(index + 1);
  }

  public cellsWithCandidate(value: number): Cell[] {
    return this.cells.filter((cell) => cell.hasCandidate(value));
  }

  public contains(cell: Cell): boolean {
    return this.cells.includes(cell);
  }

  public containsValue(value: number): boolean {
    return this.cells.some((cell) => cell.value === value);
  }

  /**
   * Union of the candidates of every cell in the group.
   */
  public remainingCandidates(): CandidateSet {
    let union = CandidateSet.empty();
    for (const cell of this.cells) {
      union = union.union(cell.candidates);
    }
    return union;
  }

  public toString(): string {
    return `${GROUP_TITLES[this.type]} ${this.label}`;
  }

  public unsetCells(): Cell[] {
    return this.cells.filter((cell) => !cell.isSolved);
  }
}

/**
 * The 9x9 board. Cells are owned here; rows, columns and boxes are views over
 * the same cell objects. `assign` is the only operation that places values.
 */
export class Grid {
  public readonly boxes: readonly Group[];
  public readonly cells: readonly Cell[];
  public readonly columns: readonly Group[];
  public readonly groups: readonly Group[];
  public readonly rows: readonly Group[];
  public get isSolved(): boolean {
    return this.cells.every((cell) => cell.isSolved);
  }

  private constructor(cells: readonly Cell[]) {
    this.cells = cells;

    const rows: Group[] = [];
    const columns: Group[] = [];
    const boxes: Group[] = [];
    for (let i = 0; i < GRID_SIZE; i++) {
      rows.push(new Group('row', i, cells.filter((cell) => cell.row === i)));
      columns.push(new Group('column', i, cells.filter((cell) => cell.col === i)));
      boxes.push(new Group('box', i, cells.filter((cell) => cell.box === i)));
    }
    this.rows = rows;
    this.columns = columns;
    this.boxes = boxes;
    this.groups = [...rows, ...columns, ...boxes];
  }

  public static empty(): Grid {
    const cells: Cell[] = [];
    for (let row = 0; row < GRID_SIZE; row++) {
      for (let col = 0; col < GRID_SIZE; col++) {
        cells.push(new Cell(row, col));
      }
    }
    return new Grid(cells);
  }

  /**
   * Builds a grid by assigning every non-zero clue in row-major order. A
   * failing clue is rethrown with the partially-built grid attached.
   */
  public static fromClues(clues: readonly (readonly number[])[]): Grid {
    if (clues.length !== GRID_SIZE || clues.some((row) => row.length !== GRID_SIZE)) {
      throw new SudokuError('OutOfBounds', `Clues must be a ${String(GRID_SIZE)}x${String(GRID_SIZE)} array`);
    }

    const grid = Grid.empty();
    for (let row = 0; row < GRID_SIZE; row++) {
      const clueRow = ensureNonNullable(clues[row]);
      for (let col = 0; col < GRID_SIZE; col++) {
        const value = ensureNonNullable(clueRow[col]);
        if (value === UNSET) {
          continue;
        }
        try {
          grid.assign(row, col, value);
        } catch (error) {
          if (isSudokuError(error)) {
            throw error.withGrid(grid);
          }
          throw error;
        }
      }
    }
    return grid;
  }

  public assign(row: number, col: number, value: number): void {
    if (!isIndex(row) || !isIndex(col)) {
      throw new SudokuError('OutOfBounds', `Cell ${String(row + 1)},${String(col + 1)} out of bounds`, { col, row, value });
    }
    if (!isDigit(value)) {
      throw new SudokuError('OutOfBounds', `Value ${String(value)} out of bounds`, { col, row, value });
    }

    const cell = this.cell(row, col);
    if (cell.isSolved) {
      throw new SudokuError('AlreadyAssigned', `Cell ${cell.ref} already contains ${String(cell.value)}`, { col, row, value });
    }

    for (const group of this.groupsOf(cell)) {
      if (!group.remainingCandidates().contains(value)) {
        const reason = group.containsValue(value) ? 'already contains' : 'has no place left for';
        throw new SudokuError('GroupConflict', `${group.toString()} ${reason} ${String(value)}`, { col, row, value });
      }
    }

    if (!cell.hasCandidate(value)) {
      throw new SudokuError('IllegalMove', `Cell ${cell.ref} is not a valid spot for ${String(value)}`, { col, row, value });
    }

    cell.place(value);
    for (const group of this.groupsOf(cell)) {
      for (const peer of group.cells) {
        peer.eliminate(value);
      }
    }

    const emptyCell = this.findContradiction();
    if (emptyCell) {
      throw new SudokuError('Contradiction', `No candidates left at ${emptyCell.ref}`, { col: emptyCell.col, row: emptyCell.row });
    }
  }

  public box(boxRow: number, boxCol: number): Group {
    if (!isBoxIndex(boxRow) || !isBoxIndex(boxCol)) {
      throw new SudokuError('OutOfBounds', `Box ${String(boxRow + 1)},${String(boxCol + 1)} out of bounds`);
    }
    return this.getGroup(this.boxes, boxRow * BOX_SIZE + boxCol);
  }

  public cell(row: number, col: number): Cell {
    if (!isIndex(row) || !isIndex(col)) {
      throw new SudokuError('OutOfBounds', `Cell ${String(row + 1)},${String(col + 1)} out of bounds`, { col, row });
    }
    return ensureNonNullable(this.cells[row * GRID_SIZE + col]);
  }

  public clone(): Grid {
    return new Grid(this.cells.map((cell) => cell.clone()));
  }

  public col(index: number): Group {
    return this.getGroup(this.columns, index);
  }

  /**
   * First unset cell with no candidates left, if any.
   */
  public findContradiction(): Cell | undefined {
    return this.cells.find((cell) => !cell.isSolved && cell.candidates.isEmpty);
  }

  public groupsOf(cell: Cell): readonly Group[] {
    return [
      this.getGroup(this.rows, cell.row),
      this.getGroup(this.columns, cell.col),
      this.getGroup(this.boxes, cell.box)
    ];
  }

  public row(index: number): Group {
    return this.getGroup(this.rows, index);
  }

  public snapshot(): GridSnapshot {
    return {
      candidates: this.rows.map((row) => row.cells.map((cell) => cell.getCandidates())),
      values: this.rows.map((row) => row.cells.map((cell) => cell.value))
    };
  }

  public unsetCells(): Cell[] {
    return this.cells.filter((cell) => !cell.isSolved);
  }

  private getGroup(groups: readonly Group[], index: number): Group {
    if (!isIndex(index)) {
      throw new SudokuError('OutOfBounds', `Group index ${String(index + 1)} out of bounds`);
    }
    return ensureNonNullable(groups[index]);
  }
}

const GROUP_TITLES: Record<GroupType, string> = {
  box: 'Box',
  column: 'Column',
  row: 'Row'
};

function isBoxIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < BOX_SIZE;
}

function isIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < GRID_SIZE;
}
