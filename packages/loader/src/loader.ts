import { readFile } from 'node:fs/promises';

import Debug from 'debug';
import { createIntervals, type Intervals } from 'interval-set';

import { resolveBounds, type LoaderOptions } from './config';
import { LoaderError, ValidationError } from './errors';
import { parseIntervals, type ParseResult } from './parse';
import { validate, intervalRecordSchema } from './validate';

const debug = Debug('interval-set:loader');

export const readIntervalsFile = async (path: string): Promise<ParseResult> => {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new LoaderError(`could not read ${path}`, { cause: error });
  }
  const result = parseIntervals(text);
  debug(
    'read %d intervals from %s, discarded %d',
    result.intervals.length,
    path,
    result.rejected.length
  );
  return result;
};

export const loadIntervals = async (
  path: string,
  options: LoaderOptions = {}
): Promise<Intervals> => {
  const { minLow, maxHigh } = resolveBounds(options);
  const { intervals } = await readIntervalsFile(path);
  const collection = createIntervals(minLow, maxHigh);
  for (const interval of intervals) {
    collection.add(interval);
  }
  return collection;
};

/**
 * Build a collection from already-decoded records, discarding (and
 * logging) any that fail validation.
 */
export const fromRecords = (
  records: Iterable<unknown>,
  options: LoaderOptions = {}
): Intervals => {
  const { minLow, maxHigh } = resolveBounds(options);
  const collection = createIntervals(minLow, maxHigh);
  for (const record of records) {
    try {
      collection.add(validate(intervalRecordSchema, record));
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      debug('invalid interval discarded %o: %s', record, error.message);
    }
  }
  return collection;
};
