import type { Asset, CandleRow, CandleSource } from '@candle-archive/shared';
import { BinanceClient } from './binance-client.js';

/**
 * CandleSource backed by Binance spot klines
 */
export class BinanceCandleSource implements CandleSource {
  readonly name = 'binance';

  constructor(
    private readonly client: BinanceClient,
    private readonly symbols: Record<Asset, string>
  ) {}

  async fetchMinuteCandles(asset: Asset, startUnix: number, endUnix: number): Promise<CandleRow[]> {
    return this.client.fetchMinuteCandles(this.symbols[asset], startUnix, endUnix);
  }
}
