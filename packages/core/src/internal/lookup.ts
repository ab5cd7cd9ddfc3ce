import type { Interval, IntervalsState } from './types';
import { inBetweenInclusive } from './order';

/**
 * Every interval containing `value`, in current item order.
 * Does not sort.
 */
export function findContaining(state: IntervalsState, value: number): Interval[] {
  return state.items.filter(item => inBetweenInclusive(value, item.low, item.high));
}
