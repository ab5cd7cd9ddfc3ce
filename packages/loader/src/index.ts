/**
 * interval-set-loader – reads `low,high` records into an interval collection
 */

export { ValidationError, LoaderError } from './errors';
export { DEFAULT_BOUNDS, resolveBounds, getLoaderConfig, type LoaderOptions } from './config';
export { validate, type IntervalRecord, type DomainBounds } from './validate';
export {
  parseIntervalLine,
  parseIntervals,
  type ParseResult,
  type RejectedRecord,
} from './parse';
export { readIntervalsFile, loadIntervals, fromRecords } from './loader';
