/* eslint-disable no-bitwise -- Candidate sets are stored as 9-bit masks. */

import { countBits } from './combinatorics.ts';
import { SudokuError } from './SudokuError.ts';
import {
  isDigit,
  MAX_DIGIT,
  MIN_DIGIT
} from './typeGuards.ts';

const EMPTY_MASK = 0;
const FULL_MASK = 0b111111111;

export interface ReadonlyCandidateSet {
  readonly isEmpty: boolean;
  readonly mask: number;
  readonly size: number;
  contains(value: number): boolean;
  union(other: ReadonlyCandidateSet): CandidateSet;
  values(): number[];
}

/**
 * A set over the digits 1-9, one bit per digit.
 */
export class CandidateSet implements ReadonlyCandidateSet {
  public get isEmpty(): boolean {
    return this._mask === EMPTY_MASK;
  }

  public get mask(): number {
    return this._mask;
  }

  public get size(): number {
    return countBits(this._mask);
  }

  private _mask: number;

  private constructor(mask: number) {
    this._mask = mask;
  }

  public static empty(): CandidateSet {
    return new CandidateSet(EMPTY_MASK);
  }

  public static full(): CandidateSet {
    return new CandidateSet(FULL_MASK);
  }

  public static of(...values: number[]): CandidateSet {
    const set = CandidateSet.empty();
    for (const value of values) {
      set.insert(value);
    }
    return set;
  }

  public clear(): void {
    this._mask = EMPTY_MASK;
  }

  public clone(): CandidateSet {
    return new CandidateSet(this._mask);
  }

  public contains(value: number): boolean {
    return (this._mask & bit(value)) !== EMPTY_MASK;
  }

  public insert(value: number): boolean {
    const valueBit = bit(value);
    if ((this._mask & valueBit) !== EMPTY_MASK) {
      return false;
    }
    this._mask |= valueBit;
    return true;
  }

  public remove(value: number): boolean {
    const valueBit = bit(value);
    if ((this._mask & valueBit) === EMPTY_MASK) {
      return false;
    }
    this._mask &= ~valueBit;
    return true;
  }

  public toString(): string {
    return `{${this.values().join(',')}}`;
  }

  public union(other: ReadonlyCandidateSet): CandidateSet {
    return new CandidateSet(this._mask | other.mask);
  }

  public values(): number[] {
    const result: number[] = [];
    for (let value = MIN_DIGIT; value <= MAX_DIGIT; value++) {
      if (this.contains(value)) {
        result.push(value);
      }
    }
    return result;
  }
}

function bit(value: number): number {
  if (!isDigit(value)) {
    throw new SudokuError('OutOfRange', `Candidate value ${String(value)} out of range`, { value });
  }
  return 1 << (value - MIN_DIGIT);
}

/* eslint-enable no-bitwise -- End candidate mask block. */
