/**
 * Overlap detection against a running coverage envelope
 */

import type { Interval, IntervalsState } from './types';
import { ensureSorted, inBetweenInclusive } from './order';

/**
 * Compare each interval (after the first) with the envelope
 * [min low seen, max high seen] of every interval before it, and emit the
 * intersection whenever the two touch. Results are not merged.
 *
 * With three or more intervals this can report a region that no two
 * individual intervals share, when an earlier interval widened the envelope
 * across it.
 */
export function computeOverlaps(state: IntervalsState): Interval[] {
  ensureSorted(state);
  const overlaps: Interval[] = [];
  let envLow = Infinity;
  let envHigh = -Infinity;

  state.items.forEach((item, i) => {
    if (i > 0) {
      const lowInBetween =
        inBetweenInclusive(envLow, item.low, item.high) ||
        inBetweenInclusive(item.low, envLow, envHigh);
      const highInBetween =
        inBetweenInclusive(envHigh, item.low, item.high) ||
        inBetweenInclusive(item.high, envLow, envHigh);
      if (lowInBetween || highInBetween) {
        overlaps.push({
          low: Math.max(item.low, envLow),
          high: Math.min(item.high, envHigh),
        });
      }
    }
    envLow = Math.min(envLow, item.low);
    envHigh = Math.max(envHigh, item.high);
  });

  return overlaps;
}

export function isAnOverlap(value: number, overlaps: readonly Interval[]): boolean {
  return overlaps.some(o => inBetweenInclusive(value, o.low, o.high));
}
