/**
 * Shared types for candle-archive
 */

export * from './market.js';
export * from './timeframe.js';
export * from './source.js';
