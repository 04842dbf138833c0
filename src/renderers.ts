import type { GridSnapshot } from './Grid.ts';
import type { TraceRecord } from './trace.ts';

import {
  BOX_SIZE,
  GRID_SIZE
} from './geometry.ts';
import { getCellRef } from './parsers.ts';
import { ensureNonNullable } from './typeGuards.ts';

const BLANK = '.';
const BOARD_BAND_SEPARATOR = '-----+-----+-----';
const CANDIDATE_BAND_SEPARATOR = '-----------+-----------+-----------';
const CANDIDATE_ROW_SEPARATOR = '           |           |           ';
const INDENT = '  ';

/**
 * The board as 9 lines of digits (blanks as `.`) with box separators. The
 * output parses back with `parseGrid`.
 */
export function renderBoard(snapshot: GridSnapshot): string {
  const lines: string[] = [];
  for (let row = 0; row < GRID_SIZE; row++) {
    if (isBoxStart(row)) {
      lines.push(BOARD_BAND_SEPARATOR);
    }
    const values = ensureNonNullable(snapshot.values[row]);
    let line = '';
    for (let col = 0; col < GRID_SIZE; col++) {
      const value = ensureNonNullable(values[col]);
      line += columnSeparator(col) + (value > 0 ? String(value) : BLANK);
    }
    lines.push(line);
  }
  return lines.join('\n');
}

/**
 * Each cell as a 3x3 block of its candidates; assigned cells show their value
 * in the centre of the block.
 */
export function renderCandidates(snapshot: GridSnapshot): string {
  const lines: string[] = [];
  for (let row = 0; row < GRID_SIZE; row++) {
    if (isBoxStart(row)) {
      lines.push(CANDIDATE_BAND_SEPARATOR);
    } else if (row > 0) {
      lines.push(CANDIDATE_ROW_SEPARATOR);
    }
    const values = ensureNonNullable(snapshot.values[row]);
    const candidates = ensureNonNullable(snapshot.candidates[row]);
    for (let blockLine = 0; blockLine < BOX_SIZE; blockLine++) {
      let line = '';
      for (let col = 0; col < GRID_SIZE; col++) {
        const value = ensureNonNullable(values[col]);
        const cellCandidates = ensureNonNullable(candidates[col]);
        line += columnSeparator(col) + renderBlockLine(value, cellCandidates, blockLine);
      }
      lines.push(line);
    }
  }
  return lines.join('\n');
}

export function describeTraceRecord(record: TraceRecord): string {
  const indent = INDENT.repeat(record.depth);
  switch (record.type) {
    case 'backtrack':
      return `${indent}Backtrack ${getCellRef(record.row, record.col)}=${String(record.value)} (${record.reason})`;
    case 'deduction':
      return `${indent}${record.note}`;
    case 'guess':
      return `${indent}Guess ${getCellRef(record.row, record.col)}=${String(record.value)}`;
    default: {
      const exhaustive: never = record;
      throw new Error(`Unknown trace record: ${String(exhaustive)}`);
    }
  }
}

function columnSeparator(col: number): string {
  if (col === 0) {
    return '';
  }
  return col % BOX_SIZE === 0 ? '|' : ' ';
}

function isBoxStart(row: number): boolean {
  return row > 0 && row % BOX_SIZE === 0;
}

function renderBlockLine(value: number, candidates: readonly number[], blockLine: number): string {
  if (value > 0) {
    return blockLine === 1 ? ` ${String(value)} ` : '   ';
  }
  let text = '';
  for (let offset = 1; offset <= BOX_SIZE; offset++) {
    const candidate = blockLine * BOX_SIZE + offset;
    text += candidates.includes(candidate) ? String(candidate) : ' ';
  }
  return text;
}
