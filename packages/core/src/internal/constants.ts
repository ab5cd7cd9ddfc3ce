/**
 * Core constants for interval collections
 */

// Default domain: [0, largest exact integer]
export const DEFAULT_MIN_LOW = 0;
export const DEFAULT_MAX_HIGH = Number.MAX_SAFE_INTEGER;

// Graph symbols
export const EMPTY_SYMBOL = '◌';
export const FULL_SYMBOL = '◎';
export const OVERLAP_SYMBOL = '●';
export const SEPARATOR = '║';
export const LEFT_FRAME = '╠';
export const RIGHT_FRAME = '╣';

// A separator is drawn every BLOCK_SIZE domain units
export const BLOCK_SIZE = 10;

export const BANNER = '==================================';
