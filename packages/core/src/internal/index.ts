/**
 * Internal modules barrel export
 */

// Constants
export {
  DEFAULT_MIN_LOW,
  DEFAULT_MAX_HIGH,
  EMPTY_SYMBOL,
  FULL_SYMBOL,
  OVERLAP_SYMBOL,
  SEPARATOR,
  BLOCK_SIZE,
} from './constants';

// Ordering
export { compareByLow, inBetweenInclusive, ensureSorted } from './order';

// Derived views
export { computeGaps } from './gaps';
export { computeOverlaps, isAnOverlap } from './overlap';
export { findContaining } from './lookup';

// Rendering
export { renderIntervals, formatInterval, formatIntervalList } from './render';

// Types
export type { Interval, IntervalsState } from './types';
