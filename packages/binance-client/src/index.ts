export { BinanceClient, barToRow, MAX_KLINES_PER_REQUEST } from './binance-client.js';
export type { BinanceConfig, Bar, KlineRestClient } from './binance-client.js';
export { BinanceCandleSource } from './binance-candle-source.js';
