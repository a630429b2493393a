import type { Asset, CandleRow } from './market.js';

/**
 * Anything that can supply 1-minute candles for a time window
 */
export interface CandleSource {
  /** Short name used in logs */
  readonly name: string;
  /**
   * Fetch 1-minute candles with `unix_timestamp` in [startUnix, endUnix]
   *
   * Minutes without trading may be missing from the result.
   */
  fetchMinuteCandles(asset: Asset, startUnix: number, endUnix: number): Promise<CandleRow[]>;
}
