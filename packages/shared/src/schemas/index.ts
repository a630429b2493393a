export * from './candle.schema.js';
export * from './missing-ranges.schema.js';
export * from './config.schema.js';
