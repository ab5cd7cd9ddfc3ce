import { validate, domainBoundsSchema, type DomainBounds } from './validate';

// Bounds of the axis used when the caller gives none
export const DEFAULT_BOUNDS: Readonly<DomainBounds> = { minLow: 0, maxHigh: 40 };

export interface LoaderOptions {
  minLow?: number;
  maxHigh?: number;
}

export const resolveBounds = (options: LoaderOptions = {}): DomainBounds =>
  validate(domainBoundsSchema, {
    minLow: options.minLow ?? DEFAULT_BOUNDS.minLow,
    maxHigh: options.maxHigh ?? DEFAULT_BOUNDS.maxHigh,
  });

const fromEnv = (value: string | undefined, fallback: number): string | number =>
  value === undefined || value.trim() === '' ? fallback : value;

/**
 * Domain bounds from `INTERVALS_MIN_LOW` / `INTERVALS_MAX_HIGH`.
 * Unset or blank variables fall back to the defaults.
 */
export const getLoaderConfig = (env: NodeJS.ProcessEnv = process.env): DomainBounds =>
  validate(domainBoundsSchema, {
    minLow: fromEnv(env.INTERVALS_MIN_LOW, DEFAULT_BOUNDS.minLow),
    maxHigh: fromEnv(env.INTERVALS_MAX_HIGH, DEFAULT_BOUNDS.maxHigh),
  });
