/**
 * Tests for reading interval records into a collection
 */

import { fileURLToPath } from 'node:url';

import { describe, it, expect } from 'vitest';

import {
  LoaderError,
  ValidationError,
  fromRecords,
  getLoaderConfig,
  loadIntervals,
  parseIntervalLine,
  parseIntervals,
  readIntervalsFile,
  resolveBounds,
} from './index';

const fixture = fileURLToPath(new URL('../fixtures/data.txt', import.meta.url));

describe('parseIntervalLine', () => {
  it('should parse a record', () => {
    expect(parseIntervalLine('5,10')).toEqual({ low: 5, high: 10 });
    expect(parseIntervalLine(' -3 , +4 ')).toEqual({ low: -3, high: 4 });
  });

  it('should accept a single-unit interval', () => {
    expect(parseIntervalLine('7,7')).toEqual({ low: 7, high: 7 });
  });

  it('should reject lines that are not two integers', () => {
    expect(() => parseIntervalLine('5')).toThrow(ValidationError);
    expect(() => parseIntervalLine('5,x')).toThrow(/cannot parse "5,x" as low,high/);
    expect(() => parseIntervalLine('1.5,2')).toThrow(ValidationError);
  });

  it('should reject low greater than high', () => {
    expect(() => parseIntervalLine('12,3')).toThrow(/"high"/);
  });

  it('should reject bounds beyond the safe integer range', () => {
    expect(() => parseIntervalLine('1,99999999999999999999')).toThrow(ValidationError);
  });
});

describe('parseIntervals', () => {
  it('should keep good records and report bad ones', () => {
    const { intervals, rejected } = parseIntervals('1,2\nbad\n\n4,3\r\n6,9\n');

    expect(intervals).toEqual([
      { low: 1, high: 2 },
      { low: 6, high: 9 },
    ]);
    expect(rejected.map(r => [r.lineNumber, r.line])).toEqual([
      [2, 'bad'],
      [4, '4,3'],
    ]);
  });

  it('should return nothing for empty input', () => {
    expect(parseIntervals('')).toEqual({ intervals: [], rejected: [] });
  });
});

describe('readIntervalsFile', () => {
  it('should read records from a file', async () => {
    const { intervals, rejected } = await readIntervalsFile(fixture);

    expect(intervals).toEqual([
      { low: 5, high: 10 },
      { low: 8, high: 15 },
      { low: 30, high: 35 },
      { low: 18, high: 19 },
    ]);
    expect(rejected.map(r => r.lineNumber)).toEqual([5, 6]);
  });

  it('should wrap read failures in LoaderError', async () => {
    const missing = fileURLToPath(new URL('../fixtures/missing.txt', import.meta.url));
    const attempt = readIntervalsFile(missing);

    await expect(attempt).rejects.toBeInstanceOf(LoaderError);
    await expect(attempt).rejects.toThrow(/could not read/);
  });
});

describe('loadIntervals', () => {
  it('should build a collection over the default domain', async () => {
    const intervals = await loadIntervals(fixture);

    expect(intervals.minLow).toBe(0);
    expect(intervals.maxHigh).toBe(40);
    expect(intervals.size).toBe(4);
    expect(intervals.gaps()).toEqual([
      { low: 0, high: 4 },
      { low: 16, high: 17 },
      { low: 20, high: 29 },
      { low: 36, high: 40 },
    ]);
    expect(intervals.overlapped()).toEqual([{ low: 8, high: 10 }]);
  });

  it('should use the given domain', async () => {
    const intervals = await loadIntervals(fixture, { minLow: 5, maxHigh: 35 });

    expect(intervals.gaps()).toEqual([
      { low: 16, high: 17 },
      { low: 20, high: 29 },
    ]);
  });

  it('should reject an inverted domain before reading', async () => {
    await expect(loadIntervals(fixture, { minLow: 50 })).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('fromRecords', () => {
  it('should add valid records and skip invalid ones', () => {
    const intervals = fromRecords([
      { low: 1, high: 2 },
      { low: 5, high: 1 },
      null,
      { low: 3 },
      { low: '3', high: 4 },
    ]);

    expect(intervals.items).toEqual([
      { low: 1, high: 2 },
      { low: 3, high: 4 },
    ]);
  });
});

describe('configuration', () => {
  it('should fall back to the default bounds', () => {
    expect(resolveBounds()).toEqual({ minLow: 0, maxHigh: 40 });
    expect(getLoaderConfig({})).toEqual({ minLow: 0, maxHigh: 40 });
    expect(getLoaderConfig({ INTERVALS_MIN_LOW: '' })).toEqual({ minLow: 0, maxHigh: 40 });
  });

  it('should read bounds from the environment', () => {
    expect(getLoaderConfig({ INTERVALS_MIN_LOW: '-10', INTERVALS_MAX_HIGH: '100' })).toEqual({
      minLow: -10,
      maxHigh: 100,
    });
  });

  it('should reject bounds that are not integers', () => {
    expect(() => getLoaderConfig({ INTERVALS_MAX_HIGH: 'abc' })).toThrow(ValidationError);
    expect(() => resolveBounds({ maxHigh: 2.5 })).toThrow(ValidationError);
  });

  it('should reject minLow above maxHigh', () => {
    expect(() => resolveBounds({ minLow: 50 })).toThrow(/"maxHigh"/);
  });
});
