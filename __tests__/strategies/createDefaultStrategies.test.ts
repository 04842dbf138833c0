import {
  describe,
  expect,
  expectTypeOf,
  it
} from 'vitest';

import type {
  Strategy,
  StrategyTechnique,
  TechniqueName
} from '../../src/strategies/Strategy.ts';

import { createDefaultStrategies } from '../../src/strategies/createDefaultStrategies.ts';
import { NakedSingleStrategy } from '../../src/strategies/NakedSingleStrategy.ts';

describe('createDefaultStrategies', () => {
  it('returns the techniques in sweep order', () => {
    expect(createDefaultStrategies().map((strategy) => strategy.technique)).toEqual([
      'naked-single',
      'hidden-single',
      'box-line-reduction',
      'line-box-reduction',
      'subset-exclusion'
    ]);
  });

  it('types built-in technique names and accepts custom ones', () => {
    expectTypeOf(new NakedSingleStrategy().technique).toEqualTypeOf<TechniqueName>();
    expectTypeOf<Strategy['technique']>().toEqualTypeOf<StrategyTechnique>();
    const custom: Strategy = { technique: 'x-wing', tryApply: () => null };
    expect(custom.technique).toBe('x-wing');
  });
});
