import type { Strategy } from './Strategy.ts';

import { BoxLineReductionStrategy } from './BoxLineReductionStrategy.ts';
import { HiddenSingleStrategy } from './HiddenSingleStrategy.ts';
import { LineBoxReductionStrategy } from './LineBoxReductionStrategy.ts';
import { NakedSingleStrategy } from './NakedSingleStrategy.ts';
import { SubsetExclusionStrategy } from './SubsetExclusionStrategy.ts';

/**
 * The deduction battery in sweep order.
 */
export function createDefaultStrategies(): Strategy[] {
  return [
    new NakedSingleStrategy(),
    new HiddenSingleStrategy(),
    new BoxLineReductionStrategy(),
    new LineBoxReductionStrategy(),
    new SubsetExclusionStrategy()
  ];
}
