/**
 * Toolkit configuration from environment
 */

import * as path from 'path';
import { DatasetEnvSchema } from './schemas/config.schema.js';
import type { LogLevel } from './logger.js';
import { isAsset, type Asset } from './types/market.js';

export interface DatasetConfig {
  /** Absolute path of the `data/` root */
  dataDir: string;
  logLevel: LogLevel;
  logDir?: string;
  logToFile: boolean;
  /** Binance spot symbol per asset */
  binanceSymbols: Record<Asset, string>;
  backfill: {
    concurrency: number;
    maxRetries: number;
    retryDelayMs: number;
  };
}

/**
 * Parse `btc=BTCUSDT,eth=ETHUSDT`
 */
function parseSymbolMap(raw: string): Record<Asset, string> {
  const symbols: Record<Asset, string> = { btc: 'BTCUSDT', eth: 'ETHUSDT' };

  for (const pair of raw.split(',')) {
    const [asset = '', symbol = ''] = pair.split('=');
    const key = asset.trim().toLowerCase();
    if (!isAsset(key)) {
      throw new Error(`Unknown asset "${asset}" in BINANCE_SYMBOLS`);
    }
    symbols[key] = symbol.trim().toUpperCase();
  }

  return symbols;
}

/**
 * Load configuration from environment
 *
 * Relative paths resolve against `cwd`.
 */
export function loadDatasetConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): DatasetConfig {
  const parsed = DatasetEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;

  return {
    dataDir: path.resolve(cwd, vars.CANDLE_DATA_DIR),
    logLevel: vars.LOG_LEVEL,
    logDir: vars.LOG_DIR ? path.resolve(cwd, vars.LOG_DIR) : undefined,
    logToFile: vars.LOG_TO_FILE,
    binanceSymbols: parseSymbolMap(vars.BINANCE_SYMBOLS),
    backfill: {
      concurrency: vars.BACKFILL_CONCURRENCY,
      maxRetries: vars.BACKFILL_MAX_RETRIES,
      retryDelayMs: vars.BACKFILL_RETRY_DELAY_MS,
    },
  };
}
