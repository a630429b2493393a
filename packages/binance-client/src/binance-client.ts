/**
 * Binance API Client
 *
 * Provides access to historical spot klines (public data, no API key needed).
 * Used to backfill minutes missing from the archive.
 */

import { MainClient, type Kline, type KlineInterval } from 'binance';
import { formatTimestamp, type CandleRow } from '@candle-archive/shared';

/** Binance caps one klines request at 1000 candles */
export const MAX_KLINES_PER_REQUEST = 1000;

export interface BinanceConfig {
  apiKey?: string;
  apiSecret?: string;
  /** Pre-built REST client, mostly for tests */
  restClient?: KlineRestClient;
}

/**
 * The part of the `binance` REST client this package needs
 */
export type KlineRestClient = Pick<MainClient, 'getKlines'>;

export interface Bar {
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export class BinanceClient {
  private spot: KlineRestClient;

  constructor(config: BinanceConfig = {}) {
    this.spot =
      config.restClient ??
      new MainClient({
        api_key: config.apiKey,
        api_secret: config.apiSecret,
        beautifyResponses: true,
      });
  }

  /**
   * Get historical klines/candles for SPOT
   */
  async getSpotKlines(
    symbol: string, // e.g., 'BTCUSDT', 'ETHUSDT'
    interval: KlineInterval,
    options: {
      startTime?: Date;
      endTime?: Date;
      limit?: number; // max 1000
    } = {}
  ): Promise<Bar[]> {
    const klines = await this.spot.getKlines({
      symbol: symbol.toUpperCase(),
      interval,
      startTime: options.startTime?.getTime(),
      endTime: options.endTime?.getTime(),
      limit: options.limit || 500,
    });

    return this.parseKlines(klines);
  }

  /**
   * Fetch every 1-minute candle with open time in [startUnix, endUnix]
   *
   * Pages through the API in requests of 1000 candles. Minutes the exchange
   * has no candle for are simply absent from the result.
   */
  async fetchMinuteCandles(symbol: string, startUnix: number, endUnix: number): Promise<CandleRow[]> {
    const rows: CandleRow[] = [];
    let cursor = startUnix;

    while (cursor <= endUnix) {
      const bars = await this.getSpotKlines(symbol, '1m', {
        startTime: new Date(cursor * 1000),
        endTime: new Date(endUnix * 1000),
        limit: MAX_KLINES_PER_REQUEST,
      });

      if (bars.length === 0) {
        break;
      }

      for (const bar of bars) {
        rows.push(barToRow(bar));
      }

      const last = bars[bars.length - 1];
      if (!last || bars.length < MAX_KLINES_PER_REQUEST) {
        break;
      }
      const lastOpen = Math.floor(last.timestamp.getTime() / 1000);
      if (lastOpen < cursor) {
        break;
      }
      cursor = lastOpen + 60;
    }

    return rows.filter((row) => row.unix_timestamp >= startUnix && row.unix_timestamp <= endUnix);
  }

  // ============ HELPERS ============

  private parseKlines(klines: Kline[]): Bar[] {
    return klines.map((k) => ({
      timestamp: new Date(Number(k[0])),
      open: parseFloat(String(k[1])),
      high: parseFloat(String(k[2])),
      low: parseFloat(String(k[3])),
      close: parseFloat(String(k[4])),
      volume: parseFloat(String(k[5])),
    }));
  }
}

/**
 * Convert a Binance bar (ms open time) into an archive row (seconds)
 */
export function barToRow(bar: Bar): CandleRow {
  const unix = Math.floor(bar.timestamp.getTime() / 1000);
  return {
    timestamp: formatTimestamp(unix),
    open: bar.open,
    close: bar.close,
    volume: bar.volume,
    unix_timestamp: unix,
    high: bar.high,
    low: bar.low,
  };
}
