/**
 * interval-set – closed integer intervals over a bounded domain
 *
 * - createIntervals(lo, hi)   → empty collection over [lo, hi]
 * - createIntervalsDefault()  → empty collection over [0, MAX_SAFE_INTEGER]
 * - add / sort                → append, lazy in-place ordering by low bound
 * - gaps / overlapped         → derived views, recomputed on every call
 * - findIntervalsForValue     → point membership in current order
 * - print                     → fixed-format text diagram
 *
 * Collections are not safe to share between concurrent writers; callers
 * serialize access themselves.
 */

import {
  DEFAULT_MIN_LOW,
  DEFAULT_MAX_HIGH,
  ensureSorted,
  computeGaps,
  computeOverlaps,
  findContaining,
  renderIntervals,
  type Interval,
  type IntervalsState,
} from './internal';

export class Intervals implements Iterable<Interval> {
  private readonly state: IntervalsState;

  constructor(minLow: number = DEFAULT_MIN_LOW, maxHigh: number = DEFAULT_MAX_HIGH) {
    this.state = { items: [], minLow, maxHigh, sorted: false };
  }

  get minLow(): number {
    return this.state.minLow;
  }

  get maxHigh(): number {
    return this.state.maxHigh;
  }

  get size(): number {
    return this.state.items.length;
  }

  get isSorted(): boolean {
    return this.state.sorted;
  }

  /**
   * Items in their current order: insertion order until a sort-dependent
   * query runs, ascending by low afterwards.
   */
  get items(): readonly Interval[] {
    return this.state.items;
  }

  [Symbol.iterator](): Iterator<Interval> {
    return this.state.items[Symbol.iterator]();
  }

  /**
   * Append an interval. Bounds are not checked: `low > high` and
   * out-of-domain intervals are accepted as given.
   */
  add(interval: Interval): void {
    this.state.items.push(interval);
    this.state.sorted = false;
  }

  sort(): void {
    ensureSorted(this.state);
  }

  gaps(): Interval[] {
    return computeGaps(this.state);
  }

  overlapped(): Interval[] {
    return computeOverlaps(this.state);
  }

  findIntervalsForValue(value: number): Interval[] {
    return findContaining(this.state, value);
  }

  print(): string {
    return renderIntervals(this.state);
  }
}

export function createIntervals(minLow: number, maxHigh: number): Intervals {
  return new Intervals(minLow, maxHigh);
}

export function createIntervalsDefault(): Intervals {
  return new Intervals(DEFAULT_MIN_LOW, DEFAULT_MAX_HIGH);
}

export {
  DEFAULT_MIN_LOW,
  DEFAULT_MAX_HIGH,
  EMPTY_SYMBOL,
  FULL_SYMBOL,
  OVERLAP_SYMBOL,
  SEPARATOR,
  BLOCK_SIZE,
  compareByLow,
  formatInterval,
  formatIntervalList,
} from './internal';

export type { Interval } from './internal';
