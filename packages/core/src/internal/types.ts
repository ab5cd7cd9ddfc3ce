/**
 * Core type definitions
 */

// Closed range [low, high], both bounds inclusive
export interface Interval {
  low: number;
  high: number;
}

// Mutable state behind a collection. `sorted` is cleared by every append
// and restored by the next sort-dependent query.
export interface IntervalsState {
  items: Interval[];
  readonly minLow: number;
  readonly maxHigh: number;
  sorted: boolean;
}
