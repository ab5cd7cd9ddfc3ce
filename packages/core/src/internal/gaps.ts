import type { Interval, IntervalsState } from './types';
import { ensureSorted } from './order';

/**
 * Walk the sorted items and collect the uncovered ranges of the domain.
 *
 * The cursor is reassigned to `high + 1` after every interval rather than
 * kept at a running maximum, so an interval nested inside a wider one moves
 * the cursor back: `[0,10]` followed by `[2,3]` reports a gap from 4.
 */
export function computeGaps(state: IntervalsState): Interval[] {
  ensureSorted(state);
  const gaps: Interval[] = [];
  let lastHigh = state.minLow;
  for (const item of state.items) {
    if (item.low > lastHigh) {
      gaps.push({ low: lastHigh, high: item.low - 1 });
    }
    lastHigh = item.high + 1;
  }
  if (lastHigh < state.maxHigh) {
    gaps.push({ low: lastHigh, high: state.maxHigh });
  }
  return gaps;
}
