/**
 * Load `low,high` records from a file and print the diagram
 *
 * Domain bounds come from INTERVALS_MIN_LOW / INTERVALS_MAX_HIGH; set
 * DEBUG=interval-set:* to see discarded records.
 */

import { fileURLToPath } from 'node:url';

import { getLoaderConfig, loadIntervals } from '../packages/loader/src/index';

const path = process.argv[2] ?? fileURLToPath(new URL('./data.txt', import.meta.url));

loadIntervals(path, getLoaderConfig())
  .then(intervals => {
    console.log(intervals.print());
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
