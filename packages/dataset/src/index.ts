/**
 * @candle-archive/dataset - Read, check and repair the candle archive
 */

export * from './layout.js';
export * from './csv/codec.js';
export * from './csv/store.js';
export * from './validation/types.js';
export * from './validation/validator.js';
export * from './validation/dataset-validator.js';
export * from './aggregation/aggregator.js';
export * from './aggregation/consistency.js';
export * from './gaps/gap-finder.js';
export * from './gaps/gap-filler.js';
export * from './repair/repair.js';
export * from './backfill/backfiller.js';
