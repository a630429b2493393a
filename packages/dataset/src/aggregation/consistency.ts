/**
 * Aggregation consistency check
 *
 * Recomputes every aggregated candle from its 1-minute constituents and
 * compares field by field.
 */

import {
  formatTimestamp,
  timeframeSeconds,
  type Asset,
  type CandleRow,
  type Timeframe,
} from '@candle-archive/shared';
import { readCandleRows } from '../csv/store.js';
import { filePath, listDatasetFiles } from '../layout.js';
import { aggregateBucket, groupByBucket, loadMinuteRows } from './aggregator.js';

export type ConsistencyIssueKind = 'missing-bucket' | 'extra-bucket' | 'field-mismatch';

export interface ConsistencyIssue {
  kind: ConsistencyIssueKind;
  /** Bucket label (Unix seconds) */
  bucket: number;
  timestamp: string;
  field?: 'open' | 'close' | 'high' | 'low' | 'volume';
  expected?: number;
  actual?: number;
}

export interface ConsistencyOptions {
  /** Relative tolerance for prices (default: 1e-9) */
  priceTolerance?: number;
  /** Relative tolerance for volume sums (default: 1e-6) */
  volumeTolerance?: number;
  /**
   * Ignore the first and last bucket of the minute window, which the
   * supplied minute rows may only partly cover (default: false)
   */
  skipEdgeBuckets?: boolean;
}

export interface ConsistencyReport {
  timeframe: Timeframe;
  bucketsChecked: number;
  issues: ConsistencyIssue[];
  ok: boolean;
}

const PRICE_FIELDS = ['open', 'close', 'high', 'low'] as const;

export function nearlyEqual(expected: number, actual: number, tolerance: number): boolean {
  const scale = Math.max(Math.abs(expected), Math.abs(actual), 1);
  return Math.abs(expected - actual) <= tolerance * scale;
}

/**
 * Check aggregated rows against the 1-minute rows covering the same period
 *
 * Only aggregated rows whose bucket lies within the minute window are checked,
 * so a yearly slice of minutes can be compared against a `full.csv`.
 */
export function checkConsistency(
  minuteRows: readonly CandleRow[],
  aggregatedRows: readonly CandleRow[],
  timeframe: Timeframe,
  options: ConsistencyOptions = {}
): ConsistencyReport {
  const priceTolerance = options.priceTolerance ?? 1e-9;
  const volumeTolerance = options.volumeTolerance ?? 1e-6;
  const issues: ConsistencyIssue[] = [];

  const expected = groupByBucket(minuteRows, timeframe);
  // groupByBucket inserts buckets in ascending order
  const labels = [...expected.keys()];
  const firstBucket = labels[0];
  const lastBucket = labels[labels.length - 1];
  if (firstBucket === undefined || lastBucket === undefined) {
    return { timeframe, bucketsChecked: 0, issues, ok: true };
  }

  const windowEnd = lastBucket + timeframeSeconds(timeframe);

  const skipped = new Set<number>();
  if (options.skipEdgeBuckets) {
    skipped.add(firstBucket);
    skipped.add(lastBucket);
  }

  const actualByBucket = new Map<number, CandleRow>();
  for (const row of aggregatedRows) {
    if (row.unix_timestamp >= firstBucket && row.unix_timestamp < windowEnd) {
      actualByBucket.set(row.unix_timestamp, row);
    }
  }

  let bucketsChecked = 0;

  for (const [label, group] of expected) {
    if (skipped.has(label)) continue;
    bucketsChecked++;

    const actual = actualByBucket.get(label);
    if (!actual) {
      issues.push({ kind: 'missing-bucket', bucket: label, timestamp: formatTimestamp(label) });
      continue;
    }

    const recomputed = aggregateBucket(group, label);
    for (const field of PRICE_FIELDS) {
      if (!nearlyEqual(recomputed[field], actual[field], priceTolerance)) {
        issues.push({
          kind: 'field-mismatch',
          bucket: label,
          timestamp: actual.timestamp,
          field,
          expected: recomputed[field],
          actual: actual[field],
        });
      }
    }
    if (!nearlyEqual(recomputed.volume, actual.volume, volumeTolerance)) {
      issues.push({
        kind: 'field-mismatch',
        bucket: label,
        timestamp: actual.timestamp,
        field: 'volume',
        expected: recomputed.volume,
        actual: actual.volume,
      });
    }
  }

  for (const [label, row] of actualByBucket) {
    if (!expected.has(label) && !skipped.has(label)) {
      issues.push({ kind: 'extra-bucket', bucket: label, timestamp: row.timestamp });
    }
  }

  issues.sort((a, b) => a.bucket - b.bucket);

  return { timeframe, bucketsChecked, issues, ok: issues.length === 0 };
}

/**
 * Check the stored files of an aggregated timeframe against the 1-minute files
 *
 * @param year - Restrict the check to one year of minutes
 */
export function checkAssetConsistency(
  root: string,
  asset: Asset,
  timeframe: Timeframe,
  year?: number,
  options: ConsistencyOptions = {}
): ConsistencyReport {
  if (timeframe === '1min') {
    throw new Error('1min is the source timeframe; pick an aggregated timeframe');
  }

  const minutes =
    year === undefined ? loadMinuteRows(root, asset) : readCandleRows(filePath(root, asset, '1min', year));

  const files = listDatasetFiles(root, { asset, timeframe });
  if (files.length === 0) {
    throw new Error(`No ${timeframe} files found for ${asset} under ${root}`);
  }
  const aggregated = files.flatMap((file) => readCandleRows(file.path));

  // Weeks straddle New Year, so a single year of minutes covers its edge weeks only partly
  const skipEdgeBuckets = options.skipEdgeBuckets ?? (year !== undefined && timeframe === 'weekly');

  return checkConsistency(minutes, aggregated, timeframe, { ...options, skipEdgeBuckets });
}
