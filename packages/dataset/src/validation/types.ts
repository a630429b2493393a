import type { CandleRow } from '@candle-archive/shared';

export type IssueSeverity = 'error' | 'warning';

export type IssueCode =
  | 'empty-file'
  | 'bad-header'
  | 'malformed-row'
  | 'ohlc-range'
  | 'negative-volume'
  | 'non-positive-price'
  | 'duplicate-timestamp'
  | 'out-of-order'
  | 'timestamp-mismatch'
  | 'misaligned'
  | 'wrong-partition'
  | 'gap';

export interface ValidationIssue {
  code: IssueCode;
  severity: IssueSeverity;
  /** File the issue was found in */
  file: string;
  /** 1-based line number, when the issue belongs to one row */
  line?: number;
  message: string;
}

export interface ValidationReport {
  file: string;
  rowCount: number;
  first: CandleRow | null;
  last: CandleRow | null;
  issues: ValidationIssue[];
  /** More issues were found than `maxIssuesPerFile` */
  truncated: boolean;
  /** Errors found, including those past the cap */
  errorCount: number;
  warningCount: number;
  /** No issue of severity error */
  ok: boolean;
}

export interface ValidationOptions {
  /** Report gaps as errors instead of warnings (default: false) */
  requireContinuous?: boolean;
  /** Cap on issues kept per file (default: 100) */
  maxIssuesPerFile?: number;
  /** Largest gap at a year boundary reported only as a warning (default: 5) */
  yearBoundaryToleranceMinutes?: number;
}
