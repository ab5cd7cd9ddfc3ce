/**
 * Benchmark: derived views over a large collection
 */

import { bench, describe } from 'vitest';
import { createIntervals } from '../packages/core/src/index';

// ===== Setup =====
const COUNT = 10000;
const DOMAIN = 100000;

function createShuffled() {
  const intervals = createIntervals(0, DOMAIN);
  for (let i = 0; i < COUNT; i++) {
    const low = (i * 7919) % DOMAIN;
    intervals.add({ low, high: low + (i % 25) });
  }
  return intervals;
}

describe('10000 intervals - first query after inserts', () => {
  bench('gaps()', () => {
    createShuffled().gaps();
  });

  bench('overlapped()', () => {
    createShuffled().overlapped();
  });
});

describe('10000 intervals - already sorted', () => {
  const sorted = createShuffled();
  sorted.sort();

  bench('gaps()', () => {
    sorted.gaps();
  });

  bench('overlapped()', () => {
    sorted.overlapped();
  });

  bench('findIntervalsForValue()', () => {
    sorted.findIntervalsForValue(DOMAIN / 2);
  });
});

describe('Render 1000 intervals over a 10000-unit domain', () => {
  const intervals = createIntervals(0, 10000);
  for (let i = 0; i < 1000; i++) {
    intervals.add({ low: i * 10, high: i * 10 + (i % 12) });
  }

  bench('print()', () => {
    intervals.print();
  });
});
