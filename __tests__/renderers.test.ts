import { readFileSync } from 'node:fs';
import {
  describe,
  expect,
  it
} from 'vitest';

import { parseGrid } from '../src/parsers.ts';
import {
  describeTraceRecord,
  renderBoard,
  renderCandidates
} from '../src/renderers.ts';
import {
  gridFromPlacements,
  loadPuzzle,
  repoPath
} from './gridTestHelper.ts';

describe('renderBoard', () => {
  it('draws values with box separators', () => {
    const expected = readFileSync(repoPath('puzzles/easy.txt'), 'utf-8').trimEnd();
    expect(renderBoard(loadPuzzle('easy.txt').snapshot())).toBe(expected);
  });

  it('parses back to the same clues', () => {
    const grid = loadPuzzle('hard.yaml');
    expect(parseGrid(renderBoard(grid.snapshot()))).toEqual(grid.snapshot().values);
  });
});

describe('renderCandidates', () => {
  it('draws a 3x3 block per cell', () => {
    const lines = renderCandidates(gridFromPlacements([[0, 0, 5], [0, 8, 1]]).snapshot()).split('\n');
    expect(lines).toHaveLength(35);
    expect(lines.slice(0, 8)).toEqual([
      '     23  23| 23  23  23| 23  23    ',
      ' 5  4 6 4 6|4 6 4 6 4 6|4 6 4 6  1 ',
      '    789 789|789 789 789|789 789    ',
      '           |           |           ',
      '123 123 123|123 123 123| 23  23  23',
      '4 6 4 6 4 6|456 456 456|456 456 456',
      '789 789 789|789 789 789|789 789 789',
      '           |           |           '
    ]);
    expect(lines[11]).toBe('-----------+-----------+-----------');
  });
});

describe('describeTraceRecord', () => {
  it('indents by search depth', () => {
    expect(describeTraceRecord({ col: 0, depth: 0, row: 0, type: 'guess', value: 2 })).toBe('Guess R1C1=2');
    expect(describeTraceRecord({ col: 1, depth: 1, reason: 'Contradiction', row: 0, type: 'backtrack', value: 3 }))
      .toBe('  Backtrack R1C2=3 (Contradiction)');
    expect(describeTraceRecord({
      changes: [{ col: 8, row: 0, type: 'assign', value: 2 }],
      depth: 2,
      note: 'Naked single: R1C9=2',
      technique: 'naked-single',
      type: 'deduction'
    })).toBe('    Naked single: R1C9=2');
  });
});
