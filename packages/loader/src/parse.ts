import Debug from 'debug';
import type { Interval } from 'interval-set';

import { ValidationError } from './errors';
import { validate, intervalRecordSchema } from './validate';

const debug = Debug('interval-set:loader');

const recordPattern = /^\s*([+-]?\d+)\s*,\s*([+-]?\d+)\s*$/;

export interface RejectedRecord {
  line: string;
  lineNumber: number;
  reason: string;
}

export interface ParseResult {
  intervals: Interval[];
  rejected: RejectedRecord[];
}

/**
 * Parse one `low,high` record. Throws `ValidationError` when the line is
 * malformed, a bound is not a safe integer, or low exceeds high.
 */
export const parseIntervalLine = (line: string): Interval => {
  const match = recordPattern.exec(line);
  if (match === null) {
    throw new ValidationError(`cannot parse "${line}" as low,high`);
  }
  return validate(intervalRecordSchema, {
    low: Number(match[1]),
    high: Number(match[2]),
  });
};

/**
 * Parse every non-blank line of `text`. Bad records are logged and
 * collected in `rejected`; they never abort the parse.
 */
export const parseIntervals = (text: string): ParseResult => {
  const intervals: Interval[] = [];
  const rejected: RejectedRecord[] = [];

  text.split(/\r?\n/).forEach((line, i) => {
    if (line.trim() === '') {
      return;
    }
    try {
      intervals.push(parseIntervalLine(line));
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      debug('discarding bad data point %o (line %d): %s', line, i + 1, error.message);
      rejected.push({ line, lineNumber: i + 1, reason: error.message });
    }
  });

  return { intervals, rejected };
};
