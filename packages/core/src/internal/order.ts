/**
 * Ordering helpers - comparator by low bound and lazy sort
 */

import Debug from 'debug';
import type { Interval, IntervalsState } from './types';

const debug = Debug('interval-set:core');

/**
 * Order two intervals by their low bound only.
 * Intervals sharing a low bound compare equal.
 */
export function compareByLow(a: Interval, b: Interval): number {
  return a.low < b.low ? -1 : a.low > b.low ? 1 : 0;
}

export function inBetweenInclusive(value: number, low: number, high: number): boolean {
  return value >= low && value <= high;
}

/**
 * Sort items in place when the state is dirty. Always leaves the state clean.
 */
export function ensureSorted(state: IntervalsState): void {
  if (!state.sorted) {
    state.items.sort(compareByLow);
    debug('sorted %d intervals', state.items.length);
  }
  state.sorted = true;
}
