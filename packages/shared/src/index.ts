/**
 * @candle-archive/shared - Shared types, schemas, and utilities
 *
 * This package contains code shared between the dataset toolkit, the Binance client and the CLI.
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './logger.js';
export * from './config.js';
export * from './utils/load-env.js';
export * from './utils/time.js';
