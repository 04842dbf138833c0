/**
 * Solve a 9x9 Sudoku from a puzzle file and print the result.
 *
 * Usage:
 *     npm run solve -- puzzles/example.yaml [--policy fewest-candidates] [--max-guesses 500] [--trace] [--candidates]
 *
 * Puzzle files are either plain grid text (digits, with `.`, `0` or `_` for
 * blanks) or YAML with `title` and `grid` keys.
 */

/* eslint-disable no-console -- CLI script output. */

import { existsSync } from 'node:fs';
import { parseArgs } from 'node:util';

import {
  describeTraceRecord,
  Grid,
  type GuessPolicy,
  isSudokuError,
  loadPuzzleFile,
  renderBoard,
  renderCandidates,
  Solver
} from '../src/index.ts';

const GUESS_POLICIES: readonly GuessPolicy[] = ['first-unset', 'fewest-candidates'];

interface CliOptions {
  readonly guessPolicy: GuessPolicy;
  readonly maxGuesses: number;
  readonly path: string;
  readonly showCandidates: boolean;
  readonly showTrace: boolean;
}

function main(): void {
  const options = readCliOptions();
  if (!existsSync(options.path)) {
    console.error(`Error: ${options.path} not found`);
    process.exit(1);
  }

  const puzzle = loadPuzzleFile(options.path);
  console.log(puzzle.title);
  console.log();

  let grid: Grid;
  try {
    grid = Grid.fromClues(puzzle.clues);
  } catch (error) {
    reportFailure(error, options.showCandidates);
    process.exit(1);
  }

  console.log('Initialized board');
  console.log(renderBoard(grid.snapshot()));
  console.log();

  const solver = new Solver({ guessPolicy: options.guessPolicy, maxGuesses: options.maxGuesses, trace: options.showTrace });
  try {
    const result = solver.solve(grid);
    if (options.showTrace) {
      for (const record of result.trace) {
        console.log(describeTraceRecord(record));
      }
      console.log();
    }
    console.log('Solved');
    console.log(renderBoard(result.grid.snapshot()));
    console.log();
    const { failedBranches, guesses, maxDepth, sweeps } = result.stats;
    console.log(`Sweeps: ${String(sweeps)}, guesses: ${String(guesses)}, failed branches: ${String(failedBranches)}, max depth: ${String(maxDepth)}`);
  } catch (error) {
    reportFailure(error, options.showCandidates || isSudokuError(error, 'NoSolution'));
    process.exit(1);
  }
}

function parseGuessPolicy(value: string | undefined): GuessPolicy {
  const policy = GUESS_POLICIES.find((p) => p === (value ?? 'first-unset'));
  if (!policy) {
    throw new Error(`--policy must be one of: ${GUESS_POLICIES.join(', ')}`);
  }
  return policy;
}

function parseMaxGuesses(value: string | undefined): number {
  if (value === undefined) {
    return Infinity;
  }
  if (!/^\d+$/.test(value)) {
    throw new Error('--max-guesses expects a non-negative integer');
  }
  return parseInt(value, 10);
}

function readCliOptions(): CliOptions {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    options: {
      'candidates': { default: false, type: 'boolean' },
      'max-guesses': { type: 'string' },
      'policy': { type: 'string' },
      'trace': { default: false, type: 'boolean' }
    }
  });

  const [path] = positionals;
  if (path === undefined) {
    console.error('Usage: npm run solve -- <puzzle-file> [--policy first-unset|fewest-candidates] [--max-guesses N] [--trace] [--candidates]');
    process.exit(1);
  }

  return {
    guessPolicy: parseGuessPolicy(values.policy),
    maxGuesses: parseMaxGuesses(values['max-guesses']),
    path,
    showCandidates: values.candidates,
    showTrace: values.trace
  };
}

function reportFailure(error: unknown, showCandidates: boolean): void {
  if (!isSudokuError(error)) {
    throw error;
  }
  console.error(`Error (${error.kind}): ${error.message}`);
  if (error.grid) {
    const snapshot = error.grid.snapshot();
    console.error(renderBoard(snapshot));
    if (showCandidates) {
      console.error();
      console.error(renderCandidates(snapshot));
    }
  }
}

main();

/* eslint-enable no-console -- End CLI script output. */
