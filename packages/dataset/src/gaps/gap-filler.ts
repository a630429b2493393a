/**
 * Gap Filler
 *
 * Forward-fills missing slots: a filled candle repeats the prices of the
 * candle before it with zero volume. Slots before any real candle get zero
 * prices, which the validator flags as `non-positive-price`, unless a
 * `previous` candle (the last row of the year before) seeds the fill.
 */

import { formatTimestamp, type CandleRow } from '@candle-archive/shared';
import { readCandleRows, writeCandleFile } from '../csv/store.js';

export interface FillOptions {
  /** Candle preceding `rows`; it seeds the prices and is not returned */
  previous?: CandleRow | null;
  /** First slot to fill (default: the slot after `previous`, else the first row) */
  start?: number;
  /** Last slot to fill, inclusive (default: last row) */
  end?: number;
}

export interface FillResult {
  rows: CandleRow[];
  filled: number;
}

function syntheticRow(unix: number, previous: CandleRow | null): CandleRow {
  return {
    timestamp: formatTimestamp(unix),
    open: previous?.open ?? 0,
    close: previous?.close ?? 0,
    volume: 0,
    unix_timestamp: unix,
    high: previous?.high ?? 0,
    low: previous?.low ?? 0,
  };
}

/**
 * Fill every empty `step` slot in [start, end]
 *
 * Rows outside the window, or off the step grid, pass through untouched.
 */
export function fillGaps(rows: readonly CandleRow[], step: number = 60, options: FillOptions = {}): FillResult {
  const sorted = [...rows].sort((a, b) => a.unix_timestamp - b.unix_timestamp);
  const seed = options.previous ?? null;
  const start = options.start ?? (seed ? seed.unix_timestamp + step : sorted[0]?.unix_timestamp);
  const end = options.end ?? sorted[sorted.length - 1]?.unix_timestamp;

  if (start === undefined || end === undefined) {
    return { rows: sorted, filled: 0 };
  }

  const result: CandleRow[] = [];
  let previous: CandleRow | null = seed;
  let filled = 0;
  let idx = 0;

  for (let expected = start; expected <= end; expected += step) {
    while (idx < sorted.length && sorted[idx]!.unix_timestamp < expected) {
      previous = sorted[idx]!;
      result.push(previous);
      idx++;
    }

    const candidate = sorted[idx];
    if (candidate && candidate.unix_timestamp === expected) {
      previous = candidate;
      result.push(candidate);
      idx++;
    } else {
      result.push(syntheticRow(expected, previous));
      filled++;
    }
  }

  result.push(...sorted.slice(idx));

  return { rows: result, filled };
}

/**
 * Forward-fill a file in place; the original is kept as a backup when
 * anything was filled
 */
export function fillFile(filePath: string, step: number, options: FillOptions = {}): FillResult {
  const result = fillGaps(readCandleRows(filePath), step, options);
  if (result.filled > 0) {
    writeCandleFile(filePath, result.rows, { backup: true });
  }
  return result;
}
