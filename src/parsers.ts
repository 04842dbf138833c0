import {
  CELL_COUNT,
  GRID_SIZE
} from './geometry.ts';

const BLANK_CHARS = new Set(['.', '0', '_']);
const NON_POSITIONAL_CHARS = /[^0-9 ]/g;
const PLACEHOLDER_CHARS = /[._]/;

export function getCellRef(row: number, col: number): string {
  return `R${String(row + 1)}C${String(col + 1)}`;
}

/**
 * Reads puzzle text into a 9x9 array of clues (0 = blank). Digits 1-9 are
 * clues, `0`, `.` and `_` are blanks, and everything else is a separator.
 *
 * Text that does not hold 81 such cells and uses neither `.` nor `_` is read
 * by column position instead. Each line keeps only digits and spaces, a space
 * is a blank, a short line is padded with blanks, and a line left empty is
 * skipped. Only the first nine rows are read.
 */
export function parseGrid(text: string): number[][] {
  const cells: number[] = [];
  for (const ch of text) {
    if (BLANK_CHARS.has(ch)) {
      cells.push(0);
    } else if (/^[1-9]$/.test(ch)) {
      cells.push(parseInt(ch, 10));
    }
  }

  if (cells.length === CELL_COUNT) {
    return Array.from({ length: GRID_SIZE }, (_, row) => cells.slice(row * GRID_SIZE, (row + 1) * GRID_SIZE));
  }

  if (!PLACEHOLDER_CHARS.test(text)) {
    const rows = parsePositionalRows(text);
    if (rows.length === GRID_SIZE) {
      return rows;
    }
  }

  throw new Error(`Expected ${String(CELL_COUNT)} cells, found ${String(cells.length)}`);
}

function parsePositionalRows(text: string): number[][] {
  const rows: number[][] = [];
  for (const rawLine of text.split('\n')) {
    const line = rawLine.replace(NON_POSITIONAL_CHARS, '');
    if (line.length === 0) {
      continue;
    }
    rows.push(Array.from({ length: GRID_SIZE }, (_, col) => {
      const ch = line.charAt(col);
      return ch === '' || ch === ' ' ? 0 : parseInt(ch, 10);
    }));
    if (rows.length === GRID_SIZE) {
      break;
    }
  }
  return rows;
}
