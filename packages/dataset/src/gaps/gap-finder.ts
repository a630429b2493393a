/**
 * Gap Finder
 *
 * Finds the timestamps missing from a candle series and groups them into
 * ranges that a backfill can fetch in one go.
 */

import * as fs from 'fs';
import {
  MissingRangesReportSchema,
  formatUtcDatetime,
  type MissingRangesReport,
} from '@candle-archive/shared';
import { readCandleRows } from '../csv/store.js';

export interface TimestampRange {
  /** First missing timestamp */
  start: number;
  /** Last missing timestamp (inclusive) */
  end: number;
  count: number;
}

/**
 * Every timestamp between the first and last that has no entry
 *
 * Input need not be sorted; duplicates are ignored.
 */
export function findMissingTimestamps(timestamps: readonly number[], step: number = 60): number[] {
  const sorted = [...new Set(timestamps)].sort((a, b) => a - b);
  const missing: number[] = [];

  let expected = sorted[0];
  if (expected === undefined) {
    return missing;
  }

  for (const ts of sorted) {
    while (expected < ts) {
      missing.push(expected);
      expected += step;
    }
    expected = ts + step;
  }

  return missing;
}

/**
 * Group sorted missing timestamps into runs of consecutive slots
 */
export function groupMissingRanges(missing: readonly number[], step: number = 60): TimestampRange[] {
  const ranges: TimestampRange[] = [];
  let current: TimestampRange | null = null;

  for (const ts of missing) {
    if (current && ts === current.end + step) {
      current.end = ts;
      current.count++;
    } else {
      current = { start: ts, end: ts, count: 1 };
      ranges.push(current);
    }
  }

  return ranges;
}

/**
 * Build the JSON report written next to a candle file
 */
export function describeRanges(
  filename: string,
  ranges: readonly TimestampRange[],
  step: number = 60
): MissingRangesReport {
  return {
    filename,
    total_missing_timestamps: ranges.reduce((sum, r) => sum + r.count, 0),
    total_ranges: ranges.length,
    ranges: ranges.map((r) => ({
      start_timestamp: r.start,
      end_timestamp: r.end,
      start_datetime: formatUtcDatetime(r.start),
      end_datetime: formatUtcDatetime(r.end),
      duration_minutes: Math.round((r.count * step) / 60),
    })),
  };
}

/**
 * Path of the ranges report for a candle file
 */
export function rangesReportPath(csvPath: string): string {
  return csvPath.replace(/\.csv$/, '') + '_missing_ranges.json';
}

/**
 * Find gaps in a candle file
 */
export function findFileGaps(csvPath: string, step: number = 60): MissingRangesReport {
  const rows = readCandleRows(csvPath);
  const missing = findMissingTimestamps(
    rows.map((r) => r.unix_timestamp),
    step
  );
  return describeRanges(csvPath, groupMissingRanges(missing, step), step);
}

export function writeRangesReport(report: MissingRangesReport, outputPath: string): void {
  fs.writeFileSync(outputPath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
}

/**
 * Load and validate a ranges report
 */
export function readRangesReport(reportPath: string): MissingRangesReport {
  if (!fs.existsSync(reportPath)) {
    throw new Error(`Ranges file not found: ${reportPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(reportPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Ranges file ${reportPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = MissingRangesReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Ranges file ${reportPath} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return parsed.data;
}
