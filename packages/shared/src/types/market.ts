/**
 * Market data types for the candle archive
 */

/**
 * Assets stored in the archive (lower-case directory names)
 */
export type Asset = 'btc' | 'eth';

export const ASSETS: readonly Asset[] = ['btc', 'eth'];

/**
 * Represents one row of a candle CSV file
 *
 * Field names follow the CSV header so rows can be written back verbatim.
 */
export interface CandleRow {
  /** Candle start time as `YYYY-MM-DD HH:mm:ss` (UTC) */
  timestamp: string;
  /** Opening price */
  open: number;
  /** Closing price */
  close: number;
  /** Traded quantity in the base asset */
  volume: number;
  /** Candle start time (Unix timestamp in seconds) */
  unix_timestamp: number;
  /** Highest price */
  high: number;
  /** Lowest price */
  low: number;
}

/**
 * Column order of every candle file
 */
export const CANDLE_COLUMNS = [
  'timestamp',
  'open',
  'close',
  'volume',
  'unix_timestamp',
  'high',
  'low',
] as const;

export type CandleColumn = (typeof CANDLE_COLUMNS)[number];

export function isAsset(value: string): value is Asset {
  return (ASSETS as readonly string[]).includes(value);
}
