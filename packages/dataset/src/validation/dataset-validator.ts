/**
 * Dataset Validator
 *
 * Runs the file validator over every file of the archive and adds the checks
 * that span files: yearly partitions of the same asset/timeframe must follow
 * each other without overlap, and without a gap beyond the year-boundary
 * tolerance.
 */

import { createSilentLogger, timeframeSeconds, type Logger } from '@candle-archive/shared';
import { listDatasetFiles, type DatasetFile, type DatasetFilter } from '../layout.js';
import type { ValidationIssue, ValidationOptions, ValidationReport } from './types.js';
import { validateFile } from './validator.js';

export const DEFAULT_YEAR_BOUNDARY_TOLERANCE_MINUTES = 5;

export interface DatasetValidationReport {
  root: string;
  files: ValidationReport[];
  /** Issues between consecutive yearly files */
  boundaryIssues: ValidationIssue[];
  totalRows: number;
  errorCount: number;
  warningCount: number;
  ok: boolean;
}

/**
 * Compare the end of one yearly file with the start of the next
 */
export function checkBoundary(
  previous: { file: DatasetFile; report: ValidationReport },
  next: { file: DatasetFile; report: ValidationReport },
  options: ValidationOptions = {}
): ValidationIssue | null {
  const last = previous.report.last;
  const first = next.report.first;
  if (!last || !first) {
    return null;
  }

  if (first.unix_timestamp <= last.unix_timestamp) {
    return {
      code: 'out-of-order',
      severity: 'error',
      file: next.file.path,
      message: `${next.file.partition} starts at ${first.timestamp}, not after ${previous.file.partition} ends (${last.timestamp})`,
    };
  }

  const step = timeframeSeconds(next.file.timeframe);
  const missing = (first.unix_timestamp - last.unix_timestamp) / step - 1;
  if (missing <= 0) {
    return null;
  }

  const tolerance = options.yearBoundaryToleranceMinutes ?? DEFAULT_YEAR_BOUNDARY_TOLERANCE_MINUTES;
  const missingMinutes = (missing * step) / 60;
  const severity = options.requireContinuous && missingMinutes > tolerance ? 'error' : 'warning';

  return {
    code: 'gap',
    severity,
    file: next.file.path,
    message: `Gap of ${missingMinutes} minutes between ${previous.file.partition} (${last.timestamp}) and ${next.file.partition} (${first.timestamp})`,
  };
}

/**
 * Validate every file under `root` (optionally one asset and/or timeframe)
 */
export function validateDataset(
  root: string,
  filter: DatasetFilter = {},
  options: ValidationOptions = {},
  logger: Logger = createSilentLogger()
): DatasetValidationReport {
  const files = listDatasetFiles(root, filter);
  const reports: ValidationReport[] = [];
  const boundaryIssues: ValidationIssue[] = [];

  let previous: { file: DatasetFile; report: ValidationReport } | null = null;

  for (const file of files) {
    logger.debug('Validating file', { file: file.path });

    const report = validateFile(
      file.path,
      { timeframe: file.timeframe, partition: file.partition },
      options
    );
    reports.push(report);

    const level = report.ok ? 'info' : 'warn';
    logger[level](`${file.asset}/${file.timeframe}/${file.partition}: ${report.rowCount} rows`, {
      issues: report.issues.length,
      ok: report.ok,
    });

    const current = { file, report };
    if (
      previous &&
      typeof file.partition === 'number' &&
      previous.file.asset === file.asset &&
      previous.file.timeframe === file.timeframe
    ) {
      const issue = checkBoundary(previous, current, options);
      if (issue) {
        boundaryIssues.push(issue);
      }
    }
    previous = current;
  }

  const boundaryErrors = boundaryIssues.filter((i) => i.severity === 'error').length;
  const boundaryWarnings = boundaryIssues.length - boundaryErrors;

  return {
    root,
    files: reports,
    boundaryIssues,
    totalRows: reports.reduce((sum, r) => sum + r.rowCount, 0),
    errorCount: reports.reduce((sum, r) => sum + r.errorCount, boundaryErrors),
    warningCount: reports.reduce((sum, r) => sum + r.warningCount, boundaryWarnings),
    ok: reports.every((r) => r.ok) && boundaryErrors === 0,
  };
}
