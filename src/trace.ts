import type { StrategyTechnique } from './strategies/Strategy.ts';
import type { SudokuErrorKind } from './SudokuError.ts';

export type TraceChange = AssignChange | EliminateChange;

export type TraceRecord = BacktrackRecord | DeductionRecord | GuessRecord;

export interface AssignChange {
  readonly col: number;
  readonly row: number;
  readonly type: 'assign';
  readonly value: number;
}

export interface BacktrackRecord {
  readonly col: number;
  readonly depth: number;
  readonly reason: SudokuErrorKind;
  readonly row: number;
  readonly type: 'backtrack';
  readonly value: number;
}

export interface DeductionRecord {
  readonly changes: readonly TraceChange[];
  readonly depth: number;
  readonly note: string;
  readonly technique: StrategyTechnique;
  readonly type: 'deduction';
}

export interface EliminateChange {
  readonly col: number;
  readonly row: number;
  readonly type: 'eliminate';
  readonly values: readonly number[];
}

export interface GuessRecord {
  readonly col: number;
  readonly depth: number;
  readonly row: number;
  readonly type: 'guess';
  readonly value: number;
}

type WithoutDepth<T> = T extends TraceRecord ? Omit<T, 'depth'> : never;

/**
 * Collects the records of one solve. Each record is stamped with the search
 * depth current at the time it is added.
 */
export class SolveTrace {
  public get records(): readonly TraceRecord[] {
    return this._records;
  }

  private readonly _records: TraceRecord[] = [];

  public constructor(private readonly enabled = true) {
  }

  public add(record: WithoutDepth<TraceRecord>, depth: number): void {
    if (!this.enabled) {
      return;
    }
    this._records.push({ ...record, depth });
  }
}
