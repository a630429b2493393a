/**
 * Timeframes stored in the archive
 *
 * The names double as directory names under `<data>/<asset>/`.
 */

// ============================================================================
// TYPES
// ============================================================================

export type Timeframe = '1min' | '5min' | '30min' | 'hourly' | 'daily' | 'weekly';

/**
 * How files of a timeframe are split: one file per UTC year, or a single `full.csv`
 */
export type PartitionKind = 'year' | 'full';

export interface TimeframeInfo {
  /** Bucket length in seconds */
  seconds: number;
  partition: PartitionKind;
  /** Human-readable name */
  label: string;
}

export const TIMEFRAMES: Record<Timeframe, TimeframeInfo> = {
  '1min': { seconds: 60, partition: 'year', label: '1 Minute' },
  '5min': { seconds: 300, partition: 'year', label: '5 Minutes' },
  '30min': { seconds: 1800, partition: 'full', label: '30 Minutes' },
  hourly: { seconds: 3600, partition: 'full', label: '1 Hour' },
  daily: { seconds: 86400, partition: 'full', label: 'Daily' },
  weekly: { seconds: 604800, partition: 'full', label: 'Weekly' },
};

/**
 * Timeframes ordered from finest to coarsest
 */
export const TIMEFRAME_ORDER: readonly Timeframe[] = [
  '1min',
  '5min',
  '30min',
  'hourly',
  'daily',
  'weekly',
];

/**
 * Timeframes built from 1-minute data
 */
export const AGGREGATED_TIMEFRAMES: readonly Timeframe[] = TIMEFRAME_ORDER.slice(1);

/** 1970-01-05 00:00 UTC, the first Monday after the epoch */
const FIRST_MONDAY = 4 * 86400;

/** Monday 00:00 to the week's closing Sunday 00:00 */
const WEEKLY_LABEL_OFFSET = 6 * 86400;

// ============================================================================
// HELPERS
// ============================================================================

export function isTimeframe(value: string): value is Timeframe {
  return (TIMEFRAME_ORDER as readonly string[]).includes(value);
}

export function timeframeSeconds(tf: Timeframe): number {
  return TIMEFRAMES[tf].seconds;
}

/**
 * Start of the bucket containing `unix`
 *
 * Weekly buckets start Monday 00:00 UTC; all others are multiples of their length.
 */
export function bucketStart(unix: number, tf: Timeframe): number {
  const seconds = TIMEFRAMES[tf].seconds;
  if (tf === 'weekly') {
    return Math.floor((unix - FIRST_MONDAY) / seconds) * seconds + FIRST_MONDAY;
  }
  return Math.floor(unix / seconds) * seconds;
}

/**
 * Timestamp a bucket's candle is stored under
 *
 * A weekly candle covers Monday to Sunday and is stamped with its closing
 * Sunday 00:00 UTC. Other candles are stamped with their bucket start.
 */
export function bucketLabel(unix: number, tf: Timeframe): number {
  const start = bucketStart(unix, tf);
  return tf === 'weekly' ? start + WEEKLY_LABEL_OFFSET : start;
}

export function isAligned(unix: number, tf: Timeframe): boolean {
  return bucketLabel(unix, tf) === unix;
}

/**
 * UTC calendar year of a Unix timestamp in seconds
 */
export function utcYear(unix: number): number {
  return new Date(unix * 1000).getUTCFullYear();
}
