import yaml from 'js-yaml';
import { readFileSync } from 'node:fs';
import {
  basename,
  extname
} from 'node:path';

import { parseGrid } from './parsers.ts';
import { isRecord } from './typeGuards.ts';

export interface PuzzleFile {
  readonly clues: number[][];
  readonly title: string;
}

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

export function loadPuzzleFile(path: string): PuzzleFile {
  const content = readFileSync(path, 'utf-8');
  const extension = extname(path).toLowerCase();
  const name = basename(path, extname(path));
  if (YAML_EXTENSIONS.has(extension)) {
    return parsePuzzleYaml(content, name);
  }
  return { clues: parseGrid(content), title: name };
}

/**
 * Reads a YAML puzzle: a mapping with an optional `title` and a `grid` given
 * either as one block string or as a list of row strings.
 */
export function parsePuzzleYaml(content: string, name: string): PuzzleFile {
  const spec = yaml.load(content);
  if (!isRecord(spec)) {
    throw new Error('YAML puzzle must be a mapping');
  }

  const titleRaw = spec['title'];
  if (titleRaw !== undefined && typeof titleRaw !== 'string') {
    throw new Error('title must be a string');
  }
  let title = (titleRaw ?? '').trim();
  if (!title) {
    title = name;
  }

  return { clues: parseGrid(readGridText(spec['grid'])), title };
}

function readGridText(grid: unknown): string {
  if (typeof grid === 'string') {
    return grid;
  }
  if (Array.isArray(grid) && grid.length > 0) {
    return grid.map((row: unknown, idx) => {
      if (typeof row !== 'string') {
        throw new Error(`grid[${String(idx)}] must be a string; quote rows made only of digits`);
      }
      return row;
    }).join('\n');
  }
  throw new Error('grid must be a string or a non-empty list of rows');
}
