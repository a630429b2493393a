/**
 * Dataset Layout
 *
 * Files live at `<root>/<asset>/<timeframe>/<year|full>.csv`. Yearly
 * partitions are used for 1min and 5min; coarser timeframes keep one
 * `full.csv`.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  ASSETS,
  TIMEFRAME_ORDER,
  TIMEFRAMES,
  isAsset,
  isTimeframe,
  utcYear,
  type Asset,
  type Timeframe,
} from '@candle-archive/shared';

/**
 * A calendar year, or `'full'` for unpartitioned timeframes
 */
export type Partition = number | 'full';

export interface DatasetFile {
  asset: Asset;
  timeframe: Timeframe;
  partition: Partition;
  path: string;
}

export interface DatasetFilter {
  asset?: Asset;
  timeframe?: Timeframe;
}

const YEAR_FILE = /^(\d{4})\.csv$/;

/**
 * Build the path of a dataset file
 */
export function filePath(root: string, asset: Asset, timeframe: Timeframe, partition: Partition): string {
  return path.join(root, asset, timeframe, `${partition}.csv`);
}

/**
 * Partition a row with this timestamp belongs to
 */
export function partitionFor(timeframe: Timeframe, unix: number): Partition {
  return TIMEFRAMES[timeframe].partition === 'year' ? utcYear(unix) : 'full';
}

/**
 * Recognise a dataset file path relative to `root`
 *
 * @returns null for paths outside the convention
 */
export function parseFilePath(root: string, filePathToParse: string): DatasetFile | null {
  const relative = path.relative(path.resolve(root), path.resolve(filePathToParse));
  const parts = relative.split(path.sep);
  if (parts.length !== 3) {
    return null;
  }

  const [asset = '', timeframe = '', name = ''] = parts;
  if (!isAsset(asset) || !isTimeframe(timeframe)) {
    return null;
  }

  const expected = TIMEFRAMES[timeframe].partition;
  let partition: Partition;
  const yearMatch = YEAR_FILE.exec(name);

  if (expected === 'year' && yearMatch) {
    partition = Number(yearMatch[1]);
  } else if (expected === 'full' && name === 'full.csv') {
    partition = 'full';
  } else {
    return null;
  }

  return { asset, timeframe, partition, path: path.resolve(filePathToParse) };
}

/**
 * List every dataset file under `root`, sorted by asset, timeframe and year
 */
export function listDatasetFiles(root: string, filter: DatasetFilter = {}): DatasetFile[] {
  const files: DatasetFile[] = [];
  const assets = filter.asset ? [filter.asset] : ASSETS;
  const timeframes = filter.timeframe ? [filter.timeframe] : TIMEFRAME_ORDER;

  for (const asset of assets) {
    for (const timeframe of timeframes) {
      const dir = path.join(root, asset, timeframe);
      if (!fs.existsSync(dir)) continue;

      const found = fs
        .readdirSync(dir)
        .map((name) => parseFilePath(root, path.join(dir, name)))
        .filter((file): file is DatasetFile => file !== null);

      found.sort((a, b) => comparePartitions(a.partition, b.partition));
      files.push(...found);
    }
  }

  return files;
}

function comparePartitions(a: Partition, b: Partition): number {
  if (a === b) return 0;
  if (a === 'full') return 1;
  if (b === 'full') return -1;
  return a - b;
}
