/**
 * Text rendering of a collection against its domain axis
 */

import {
  BANNER,
  BLOCK_SIZE,
  EMPTY_SYMBOL,
  FULL_SYMBOL,
  LEFT_FRAME,
  OVERLAP_SYMBOL,
  RIGHT_FRAME,
  SEPARATOR,
} from './constants';
import { computeGaps } from './gaps';
import { ensureSorted } from './order';
import { computeOverlaps, isAnOverlap } from './overlap';
import type { Interval, IntervalsState } from './types';

export function formatInterval(interval: Interval): string {
  return `[${interval.low},${interval.high}]`;
}

export function formatIntervalList(intervals: readonly Interval[]): string {
  return intervals.map(formatInterval).join(', ');
}

interface Graph {
  text: string;
  separators: number;
}

// One symbol per domain unit from minLow, a separator at every block boundary.
// Units past the last interval are padded up to (not including) maxHigh.
function drawGraph(state: IntervalsState, overlaps: readonly Interval[]): Graph {
  let text = '';
  let separators = 0;
  let index = state.minLow;

  const advance = (): void => {
    index++;
    if (index % BLOCK_SIZE === 0) {
      text += SEPARATOR;
      separators++;
    }
  };

  for (const item of state.items) {
    while (index < item.low) {
      text += EMPTY_SYMBOL;
      advance();
    }
    while (index <= item.high) {
      text += isAnOverlap(index, overlaps) ? OVERLAP_SYMBOL : FULL_SYMBOL;
      advance();
    }
  }

  if (index < state.maxHigh) {
    text += EMPTY_SYMBOL.repeat(state.maxHigh - index);
  }

  return { text, separators };
}

function drawAxis(state: IntervalsState, separators: number): string {
  const width = Math.max(0, state.maxHigh + separators - 2 - state.minLow);
  return ` ${state.minLow}${' '.repeat(width)}${state.maxHigh}`;
}

export function renderIntervals(state: IntervalsState): string {
  ensureSorted(state);
  const overlaps = computeOverlaps(state);
  const gaps = computeGaps(state);
  const graph = drawGraph(state, overlaps);

  const header = [
    '',
    BANNER,
    ` SUMMARY (minLow=${state.minLow}, maxHigh=${state.maxHigh})`,
    BANNER,
  ].join('\n');
  const legend = `\n • Legend: ${EMPTY_SYMBOL} (empty), ${FULL_SYMBOL} (full), ${OVERLAP_SYMBOL} (overlap)`;
  const summary = [
    `\n • Intervals: ${formatIntervalList(state.items)}`,
    `\n • Gaps: ${formatIntervalList(gaps)}`,
    `\n • Overlapped: ${formatIntervalList(overlaps)}`,
  ].join('');
  const picture = `\n\n${drawAxis(state, graph.separators)}\n${LEFT_FRAME}${graph.text}${RIGHT_FRAME}`;

  return `\n${header}${legend}${summary}${picture}\n`;
}
