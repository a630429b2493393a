/**
 * Candle File Validator
 *
 * Integrity checks for a single file:
 * - header matches the documented column order, at least one row
 * - low <= min(open, close), high >= max(open, close), volume >= 0
 * - unix_timestamp strictly increasing (no duplicates, no reordering)
 * - timestamp text agrees with unix_timestamp
 * - timestamps aligned to the timeframe and inside the file's year
 * - gaps between consecutive rows
 */

import {
  isAligned,
  parseTimestamp,
  timeframeSeconds,
  utcYear,
  type CandleRow,
  type Timeframe,
} from '@candle-archive/shared';
import { CSV_HEADER, type ParsedCandleCsv } from '../csv/codec.js';
import { readCandleFile } from '../csv/store.js';
import type { Partition } from '../layout.js';
import type {
  IssueCode,
  IssueSeverity,
  ValidationIssue,
  ValidationOptions,
  ValidationReport,
} from './types.js';

export const DEFAULT_MAX_ISSUES_PER_FILE = 100;

export interface FileContext {
  file: string;
  /** Enables alignment and gap checks */
  timeframe?: Timeframe;
  /** Enables the partition check for yearly files */
  partition?: Partition;
}

/**
 * Collects issues up to a cap while still counting every error and warning
 */
export class IssueCollector {
  readonly issues: ValidationIssue[] = [];
  truncated = false;
  errorCount = 0;
  warningCount = 0;

  constructor(
    private readonly file: string,
    private readonly maxIssues: number = DEFAULT_MAX_ISSUES_PER_FILE
  ) {}

  add(code: IssueCode, severity: IssueSeverity, message: string, line?: number): void {
    if (severity === 'error') {
      this.errorCount++;
    } else {
      this.warningCount++;
    }
    if (this.issues.length >= this.maxIssues) {
      this.truncated = true;
      return;
    }
    this.issues.push({ code, severity, file: this.file, line, message });
  }

  get hasErrors(): boolean {
    return this.errorCount > 0;
  }
}

/**
 * Check every row-level invariant, appending to `collector`
 *
 * @param lines - Line number of each row, for issue locations
 */
export function checkRows(
  rows: readonly CandleRow[],
  lines: readonly number[],
  ctx: FileContext,
  collector: IssueCollector,
  options: ValidationOptions = {}
): void {
  const step = ctx.timeframe ? timeframeSeconds(ctx.timeframe) : null;
  const seen = new Set<number>();
  let latest: CandleRow | null = null;

  for (let i = 0; i < rows.length; i++) {
    const row = rows[i]!;
    const line = lines[i];
    const u = row.unix_timestamp;

    const parsed = parseTimestamp(row.timestamp);
    if (parsed === null) {
      collector.add('timestamp-mismatch', 'error', `Unparseable timestamp "${row.timestamp}"`, line);
    } else if (parsed !== u) {
      collector.add(
        'timestamp-mismatch',
        'error',
        `timestamp ${row.timestamp} does not match unix_timestamp ${u}`,
        line
      );
    }

    if (row.open <= 0 || row.close <= 0 || row.high <= 0 || row.low <= 0) {
      collector.add('non-positive-price', 'error', `Non-positive price at ${row.timestamp}`, line);
    }

    if (row.low > Math.min(row.open, row.close) || row.high < Math.max(row.open, row.close) || row.low > row.high) {
      collector.add(
        'ohlc-range',
        'error',
        `Invalid OHLC at ${row.timestamp}: open=${row.open} high=${row.high} low=${row.low} close=${row.close}`,
        line
      );
    }

    if (row.volume < 0) {
      collector.add('negative-volume', 'error', `Negative volume ${row.volume} at ${row.timestamp}`, line);
    }

    if (ctx.timeframe && !isAligned(u, ctx.timeframe)) {
      collector.add('misaligned', 'error', `${row.timestamp} is not aligned to ${ctx.timeframe}`, line);
    }

    if (typeof ctx.partition === 'number' && utcYear(u) !== ctx.partition) {
      collector.add('wrong-partition', 'error', `${row.timestamp} does not belong to ${ctx.partition}`, line);
    }

    if (seen.has(u)) {
      collector.add('duplicate-timestamp', 'error', `Duplicate timestamp ${u} (${row.timestamp})`, line);
    } else if (latest && u < latest.unix_timestamp) {
      collector.add(
        'out-of-order',
        'error',
        `${row.timestamp} comes after ${latest.timestamp}`,
        line
      );
    } else if (latest && step !== null && u - latest.unix_timestamp > step) {
      const missing = (u - latest.unix_timestamp) / step - 1;
      collector.add(
        'gap',
        options.requireContinuous ? 'error' : 'warning',
        `Gap of ${formatMissing(missing)} between ${latest.timestamp} and ${row.timestamp}`,
        line
      );
    }

    seen.add(u);
    if (!latest || u > latest.unix_timestamp) {
      latest = row;
    }
  }
}

function formatMissing(missing: number): string {
  const count = Number.isInteger(missing) ? String(missing) : missing.toFixed(2);
  return `${count} candle${missing === 1 ? '' : 's'}`;
}

/**
 * Validate an already parsed file
 */
export function validateParsed(
  parsed: ParsedCandleCsv,
  ctx: FileContext,
  options: ValidationOptions = {}
): ValidationReport {
  const collector = new IssueCollector(ctx.file, options.maxIssuesPerFile ?? DEFAULT_MAX_ISSUES_PER_FILE);

  if (parsed.header.length === 0) {
    collector.add('empty-file', 'error', 'File is empty');
  } else if (!parsed.headerValid) {
    collector.add('bad-header', 'error', `Expected header "${CSV_HEADER}", found "${parsed.header.join(',')}"`, 1);
  }

  for (const error of parsed.errors) {
    collector.add('malformed-row', 'error', error.message, error.line);
  }

  if (parsed.header.length > 0 && parsed.rows.length === 0 && parsed.errors.length === 0) {
    collector.add('empty-file', 'error', 'File has a header but no rows');
  }

  checkRows(parsed.rows, parsed.lines, ctx, collector, options);

  return {
    file: ctx.file,
    rowCount: parsed.rows.length,
    first: parsed.rows[0] ?? null,
    last: parsed.rows[parsed.rows.length - 1] ?? null,
    issues: collector.issues,
    truncated: collector.truncated,
    errorCount: collector.errorCount,
    warningCount: collector.warningCount,
    ok: !collector.hasErrors,
  };
}

/**
 * Read and validate one file
 */
export function validateFile(
  filePath: string,
  ctx: Omit<FileContext, 'file'> = {},
  options: ValidationOptions = {}
): ValidationReport {
  return validateParsed(readCandleFile(filePath), { ...ctx, file: filePath }, options);
}
