/**
 * Helpers shared by the dataset tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { formatTimestamp, type CandleRow } from '@candle-archive/shared';

/** 2024-01-01 00:00:00 UTC (a Monday) */
export const JAN_1_2024 = 1704067200;

/**
 * Helper: one candle with open=price, close=price+1, high=price+2, low=price-1
 */
export function candle(unix: number, price: number = 100, volume: number = 1): CandleRow {
  return {
    timestamp: formatTimestamp(unix),
    open: price,
    close: price + 1,
    volume,
    unix_timestamp: unix,
    high: price + 2,
    low: price - 1,
  };
}

/**
 * Helper: `count` consecutive candles `step` seconds apart, price rising by 1 each
 */
export function series(start: number, count: number, step: number = 60, basePrice: number = 100): CandleRow[] {
  return Array.from({ length: count }, (_, i) => candle(start + i * step, basePrice + i));
}

export function makeTempDir(prefix: string = 'candle-archive-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
