/**
 * Candle Aggregator
 *
 * Builds higher-timeframe candles from 1-minute rows: open of the first
 * minute, close of the last, extremes of high/low and the summed volume.
 * Buckets with no source rows produce no candle.
 *
 * @example
 * ```typescript
 * const hourly = aggregate(minuteRows, 'hourly');
 * ```
 */

import * as fs from 'fs';
import {
  AGGREGATED_TIMEFRAMES,
  bucketLabel,
  createSilentLogger,
  formatTimestamp,
  type Asset,
  type CandleRow,
  type Logger,
  type Timeframe,
} from '@candle-archive/shared';
import { readCandleRows, writeCandleFile } from '../csv/store.js';
import { filePath, listDatasetFiles, partitionFor, type Partition } from '../layout.js';

/**
 * Group rows by the bucket of `timeframe` they fall in
 *
 * @returns Map of bucket label → rows sorted by time
 */
export function groupByBucket(rows: readonly CandleRow[], timeframe: Timeframe): Map<number, CandleRow[]> {
  const sorted = [...rows].sort((a, b) => a.unix_timestamp - b.unix_timestamp);
  const groups = new Map<number, CandleRow[]>();

  for (const row of sorted) {
    const label = bucketLabel(row.unix_timestamp, timeframe);
    const group = groups.get(label);
    if (group) {
      group.push(row);
    } else {
      groups.set(label, [row]);
    }
  }

  return groups;
}

/**
 * Aggregate multiple candles into one stamped with `label`
 */
export function aggregateBucket(rows: readonly CandleRow[], label: number): CandleRow {
  const first = rows[0];
  const last = rows[rows.length - 1];
  if (!first || !last) {
    throw new Error('Cannot aggregate empty candle array');
  }

  let high = first.high;
  let low = first.low;
  let volume = 0;
  for (const row of rows) {
    if (row.high > high) high = row.high;
    if (row.low < low) low = row.low;
    volume += row.volume;
  }

  return {
    timestamp: formatTimestamp(label),
    open: first.open,
    close: last.close,
    volume,
    unix_timestamp: label,
    high,
    low,
  };
}

/**
 * Aggregate rows (any order) to a coarser timeframe, sorted by time
 */
export function aggregate(rows: readonly CandleRow[], timeframe: Timeframe): CandleRow[] {
  const result: CandleRow[] = [];
  for (const [label, group] of groupByBucket(rows, timeframe)) {
    result.push(aggregateBucket(group, label));
  }
  return result;
}

/**
 * Split rows into the files of a timeframe
 */
export function partitionRows(rows: readonly CandleRow[], timeframe: Timeframe): Map<Partition, CandleRow[]> {
  const partitions = new Map<Partition, CandleRow[]>();
  for (const row of rows) {
    const key = partitionFor(timeframe, row.unix_timestamp);
    const list = partitions.get(key);
    if (list) {
      list.push(row);
    } else {
      partitions.set(key, [row]);
    }
  }
  return partitions;
}

export interface AggregateFilesResult {
  timeframe: Timeframe;
  candles: number;
  files: string[];
}

/**
 * Load all 1-minute files of an asset
 */
export function loadMinuteRows(root: string, asset: Asset): CandleRow[] {
  const files = listDatasetFiles(root, { asset, timeframe: '1min' });
  if (files.length === 0) {
    throw new Error(`No 1min files found for ${asset} under ${root}`);
  }
  return files.flatMap((file) => readCandleRows(file.path));
}

/**
 * Rebuild aggregated timeframes of an asset from its 1-minute files
 *
 * Existing files are replaced (the previous version kept as `.backup`).
 */
export function aggregateFiles(
  root: string,
  asset: Asset,
  timeframes: readonly Timeframe[] = AGGREGATED_TIMEFRAMES,
  logger: Logger = createSilentLogger()
): AggregateFilesResult[] {
  if (timeframes.includes('1min')) {
    throw new Error('1min is the source timeframe and cannot be aggregated');
  }

  const minutes = loadMinuteRows(root, asset);
  logger.info(`Loaded ${minutes.length} 1min candles`, { asset });

  const results: AggregateFilesResult[] = [];

  for (const timeframe of timeframes) {
    const candles = aggregate(minutes, timeframe);
    const written: string[] = [];

    for (const [partition, rows] of partitionRows(candles, timeframe)) {
      const target = filePath(root, asset, timeframe, partition);
      writeCandleFile(target, rows, { backup: fs.existsSync(target) });
      written.push(target);
    }

    logger.info(`Wrote ${candles.length} ${timeframe} candles`, { asset, files: written.length });
    results.push({ timeframe, candles: candles.length, files: written });
  }

  return results;
}
