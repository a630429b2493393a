/**
 * Repair operations on candle rows and files
 *
 * - dedupe: first row per unix_timestamp wins, order preserved
 * - merge: combine two series, sort, dedupe (rows of the first series win)
 * - split: cut a `full.csv` into yearly partitions
 * - combine: join yearly partitions into one file
 * - fix zeros: rows whose four prices are all 0 take the previous valid prices
 */

import * as fs from 'fs';
import * as path from 'path';
import { TIMEFRAMES, utcYear, type Asset, type CandleRow, type Timeframe } from '@candle-archive/shared';
import { readCandleRows, writeCandleFile } from '../csv/store.js';
import { filePath, listDatasetFiles, type DatasetFile } from '../layout.js';

export interface DedupeResult {
  rows: CandleRow[];
  removed: number;
}

export function dedupeRows(rows: readonly CandleRow[]): DedupeResult {
  const seen = new Set<number>();
  const unique: CandleRow[] = [];

  for (const row of rows) {
    if (!seen.has(row.unix_timestamp)) {
      seen.add(row.unix_timestamp);
      unique.push(row);
    }
  }

  return { rows: unique, removed: rows.length - unique.length };
}

export interface MergeResult extends DedupeResult {
  /** Rows taken from the second series */
  added: number;
}

export function mergeRows(primary: readonly CandleRow[], extra: readonly CandleRow[]): MergeResult {
  // Array.prototype.sort is stable, so rows of `primary` stay ahead of equal timestamps in `extra`
  const combined = [...primary, ...extra].sort((a, b) => a.unix_timestamp - b.unix_timestamp);
  const { rows, removed } = dedupeRows(combined);
  return { rows, removed, added: rows.length - dedupeRows(primary).rows.length };
}

export function splitByYear(rows: readonly CandleRow[]): Map<number, CandleRow[]> {
  const years = new Map<number, CandleRow[]>();
  for (const row of rows) {
    const year = utcYear(row.unix_timestamp);
    const list = years.get(year);
    if (list) {
      list.push(row);
    } else {
      years.set(year, [row]);
    }
  }
  return years;
}

export interface FixZerosResult {
  rows: CandleRow[];
  /** Zero rows given the previous valid prices */
  fixed: number;
  /** Zero rows with no valid row before them */
  dropped: number;
}

export function isZeroPriceRow(row: CandleRow): boolean {
  return row.open === 0 && row.close === 0 && row.high === 0 && row.low === 0;
}

/**
 * Replace all-zero prices with those of the last valid row, at volume 0
 *
 * @param previous - Valid row preceding `rows` (the last row of the year before)
 */
export function fixZeroPriceRows(rows: readonly CandleRow[], previous: CandleRow | null = null): FixZerosResult {
  const result: CandleRow[] = [];
  let lastValid = previous && !isZeroPriceRow(previous) ? previous : null;
  let fixed = 0;
  let dropped = 0;

  for (const row of rows) {
    if (!isZeroPriceRow(row)) {
      lastValid = row;
      result.push(row);
    } else if (lastValid) {
      result.push({
        ...row,
        open: lastValid.open,
        close: lastValid.close,
        high: lastValid.high,
        low: lastValid.low,
        volume: 0,
      });
      fixed++;
    } else {
      dropped++;
    }
  }

  return { rows: result, fixed, dropped };
}

// ============================================================================
// FILE OPERATIONS
// ============================================================================

/**
 * Remove duplicate timestamps from a file in place
 *
 * The original is kept as `<file>.backup` when anything was removed; an
 * already clean file is left untouched.
 */
export function dedupeFile(filePath: string): DedupeResult {
  const result = dedupeRows(readCandleRows(filePath));
  if (result.removed > 0) {
    writeCandleFile(filePath, result.rows, { backup: true });
  }
  return result;
}

/**
 * Merge `extraPath` into `originalPath`, writing `outputPath`
 *
 * A missing extra file merges nothing.
 */
export function mergeFiles(originalPath: string, extraPath: string, outputPath: string): MergeResult {
  const original = readCandleRows(originalPath);
  const extra = fs.existsSync(extraPath) ? readCandleRows(extraPath) : [];
  const result = mergeRows(original, extra);
  writeCandleFile(outputPath, result.rows, { backup: path.resolve(outputPath) === path.resolve(originalPath) });
  return result;
}

/**
 * Split `<dir>/full.csv` into `<dir>/<year>.csv` files
 *
 * @returns the files written
 */
export function splitFullFile(fullPath: string): string[] {
  const dir = path.dirname(fullPath);
  const written: string[] = [];

  for (const [year, rows] of splitByYear(readCandleRows(fullPath))) {
    const target = path.join(dir, `${year}.csv`);
    writeCandleFile(target, rows, { backup: fs.existsSync(target) });
    written.push(target);
  }

  return written;
}

/**
 * Last row of the yearly file before `file`, or null for `full.csv`
 * files and the first year
 */
export function previousPartitionRow(file: DatasetFile): CandleRow | null {
  if (file.partition === 'full') {
    return null;
  }
  const previousPath = path.join(path.dirname(file.path), `${file.partition - 1}.csv`);
  if (!fs.existsSync(previousPath)) {
    return null;
  }
  const rows = readCandleRows(previousPath);
  return rows[rows.length - 1] ?? null;
}

/**
 * Fix zero-price rows of a file in place, keeping a backup when anything changed
 */
export function fixZeroPricesFile(filePath: string, previous: CandleRow | null = null): FixZerosResult {
  const result = fixZeroPriceRows(readCandleRows(filePath), previous);
  if (result.fixed > 0 || result.dropped > 0) {
    writeCandleFile(filePath, result.rows, { backup: true });
  }
  return result;
}

export interface CombineResult {
  output: string;
  /** Yearly files read, oldest first */
  files: string[];
  rows: number;
  removed: number;
}

/**
 * Join the yearly files of a timeframe into one file
 *
 * @param output - Defaults to `full.csv` beside the yearly files
 */
export function combineYearlyFiles(
  root: string,
  asset: Asset,
  timeframe: Timeframe,
  output: string = filePath(root, asset, timeframe, 'full')
): CombineResult {
  if (TIMEFRAMES[timeframe].partition !== 'year') {
    throw new Error(`${timeframe} is already stored as a single full.csv`);
  }

  const files = listDatasetFiles(root, { asset, timeframe });
  if (files.length === 0) {
    throw new Error(`No yearly ${timeframe} files found for ${asset} under ${root}`);
  }

  const { rows, removed } = dedupeRows(files.flatMap((file) => readCandleRows(file.path)));
  writeCandleFile(output, rows, { backup: fs.existsSync(output) });

  return { output, files: files.map((file) => file.path), rows: rows.length, removed };
}
