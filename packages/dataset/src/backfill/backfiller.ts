/**
 * Backfiller
 *
 * Fetches the candles listed in a missing-ranges report from a CandleSource.
 *
 * Features:
 * - Ranges split into chunks the exchange serves in one request
 * - Bounded number of requests in flight
 * - Retry with exponential backoff per chunk
 * - Candles failing the row schema are dropped
 * - Minutes the source has no candle for are forward-filled with zero volume
 * - A failed chunk never aborts the others; its range is reported as failed
 */

import {
  CandleRowSchema,
  createSilentLogger,
  type Asset,
  type CandleRow,
  type CandleSource,
  type Logger,
  type MissingRangesReport,
} from '@candle-archive/shared';
import { readCandleRows, writeCandleFile } from '../csv/store.js';
import { fillGaps } from '../gaps/gap-filler.js';
import { mergeRows } from '../repair/repair.js';

const MINUTE = 60;

export interface BackfillOptions {
  /** Requests in flight (default: 10) */
  concurrency?: number;
  /** Retries per chunk after the first attempt (default: 5) */
  maxRetries?: number;
  /** Delay before the first retry; doubles each attempt (default: 2000) */
  retryDelayMs?: number;
  /** Minutes per request (default: 1000, the Binance limit) */
  chunkMinutes?: number;
  /** Used between retries */
  sleep?: (ms: number) => Promise<void>;
}

export interface RangeOutcome {
  start: number;
  end: number;
  /** Rows produced for this range, real and filled */
  candles: number;
  /** Rows synthesized because the source had no candle */
  filled: number;
  ok: boolean;
  errors: string[];
}

export interface BackfillResult {
  rows: CandleRow[];
  ranges: RangeOutcome[];
  succeeded: number;
  failed: number;
}

interface Chunk {
  rangeIndex: number;
  start: number;
  end: number;
  rows: CandleRow[] | null;
  error?: string;
}

const DEFAULTS = {
  concurrency: 10,
  maxRetries: 5,
  retryDelayMs: 2000,
  chunkMinutes: 1000,
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Split [start, end] (inclusive, minute grid) into chunks of at most `chunkMinutes`
 */
export function chunkRange(start: number, end: number, chunkMinutes: number): Array<{ start: number; end: number }> {
  const chunks: Array<{ start: number; end: number }> = [];
  const span = chunkMinutes * MINUTE;

  for (let current = start; current <= end; current += span) {
    chunks.push({ start: current, end: Math.min(current + span - MINUTE, end) });
  }

  return chunks;
}

export class Backfiller {
  private options: Required<BackfillOptions>;

  constructor(
    private source: CandleSource,
    private logger: Logger = createSilentLogger(),
    options: BackfillOptions = {}
  ) {
    this.options = {
      ...DEFAULTS,
      sleep: defaultSleep,
      ...options,
    };
  }

  /**
   * Fetch every range of `report`
   *
   * @param existing - Rows already in the file; the row just before a range
   *                   seeds the forward-fill of its first minutes
   */
  async backfill(asset: Asset, report: MissingRangesReport, existing: readonly CandleRow[] = []): Promise<BackfillResult> {
    const chunks: Chunk[] = report.ranges.flatMap((range, rangeIndex) =>
      chunkRange(range.start_timestamp, range.end_timestamp, this.options.chunkMinutes).map((c) => ({
        rangeIndex,
        start: c.start,
        end: c.end,
        rows: null,
      }))
    );

    this.logger.info(`Backfilling ${report.total_missing_timestamps} candles`, {
      asset,
      source: this.source.name,
      ranges: report.ranges.length,
      chunks: chunks.length,
      concurrency: this.options.concurrency,
    });

    await this.runPool(chunks, (chunk) => this.fetchChunk(asset, chunk));

    const byUnix = new Map(existing.map((row) => [row.unix_timestamp, row]));
    const outcomes: RangeOutcome[] = [];
    const rows: CandleRow[] = [];

    report.ranges.forEach((range, rangeIndex) => {
      const outcome: RangeOutcome = {
        start: range.start_timestamp,
        end: range.end_timestamp,
        candles: 0,
        filled: 0,
        ok: true,
        errors: [],
      };
      let previous = byUnix.get(range.start_timestamp - MINUTE) ?? null;

      for (const chunk of chunks.filter((c) => c.rangeIndex === rangeIndex)) {
        if (!chunk.rows) {
          outcome.ok = false;
          outcome.errors.push(chunk.error ?? 'unknown error');
          continue;
        }

        const { rows: completed } = fillGaps(chunk.rows, MINUTE, { previous, start: chunk.start, end: chunk.end });
        const inChunk = completed.filter((r) => r.unix_timestamp >= chunk.start && r.unix_timestamp <= chunk.end);

        outcome.candles += inChunk.length;
        outcome.filled += inChunk.length - chunk.rows.length;
        rows.push(...inChunk);
        previous = inChunk[inChunk.length - 1] ?? previous;
      }

      outcomes.push(outcome);
    });

    const merged = mergeRows([], rows).rows;
    const succeeded = outcomes.filter((o) => o.ok).length;

    this.logger.info(`Backfill finished: ${succeeded}/${outcomes.length} ranges`, {
      asset,
      candles: merged.length,
    });

    return { rows: merged, ranges: outcomes, succeeded, failed: outcomes.length - succeeded };
  }

  /**
   * Fetch one chunk, retrying with exponential backoff
   */
  private async fetchChunk(asset: Asset, chunk: Chunk): Promise<void> {
    const { maxRetries, retryDelayMs, sleep } = this.options;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const fetched = await this.source.fetchMinuteCandles(asset, chunk.start, chunk.end);
        const inWindow = fetched.filter((r) => r.unix_timestamp >= chunk.start && r.unix_timestamp <= chunk.end);
        const rows = inWindow.filter((r) => CandleRowSchema.safeParse(r).success);
        if (rows.length < inWindow.length) {
          this.logger.warn(`Dropped ${inWindow.length - rows.length} invalid candles`, { asset, start: chunk.start });
        }
        if (rows.length === 0) {
          chunk.error = `no candles returned for ${chunk.start}-${chunk.end}`;
          this.logger.warn('Source returned no candles', { asset, start: chunk.start, end: chunk.end });
          return;
        }
        chunk.rows = rows;
        return;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        chunk.error = message;

        if (attempt === maxRetries) {
          this.logger.error('Chunk failed, max retries reached', { asset, start: chunk.start, error: message });
          return;
        }

        const delay = retryDelayMs * 2 ** attempt;
        this.logger.warn(`Request failed, retrying in ${delay}ms (attempt ${attempt + 1}/${maxRetries})`, {
          asset,
          start: chunk.start,
          error: message,
        });
        await sleep(delay);
      }
    }
  }

  /**
   * Run `task` over `items` with at most `concurrency` in flight
   */
  private async runPool<T>(items: T[], task: (item: T) => Promise<void>): Promise<void> {
    let next = 0;
    const workers = Array.from({ length: Math.min(this.options.concurrency, items.length) }, async () => {
      while (next < items.length) {
        const item = items[next++]!;
        await task(item);
      }
    });
    await Promise.all(workers);
  }
}

/**
 * Path of the side file backfilled rows are written to
 */
export function missingDataPath(csvPath: string): string {
  return csvPath.replace(/\.csv$/, '') + '_missing_data.csv';
}

/**
 * Store backfilled rows: merged into the target file (with backup), or as a side file
 *
 * @returns the file written
 */
export function saveBackfill(targetPath: string, rows: readonly CandleRow[], merge: boolean): string {
  if (!merge) {
    const output = missingDataPath(targetPath);
    writeCandleFile(output, rows);
    return output;
  }

  const merged = mergeRows(readCandleRows(targetPath), rows);
  writeCandleFile(targetPath, merged.rows, { backup: true });
  return targetPath;
}
