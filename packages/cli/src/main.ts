#!/usr/bin/env node
/**
 * candle-archive CLI entry point
 *
 * Usage:
 *   npm run cli -- validate btc 1min
 *   npm run cli -- gaps data/btc/1min/2021.csv
 *   npm run cli -- backfill data/btc/1min/2021_missing_ranges.json --merge
 */

import { BinanceCandleSource, BinanceClient } from '@candle-archive/binance-client';
import { createLogger, loadDatasetConfig, loadEnvFromRoot } from '@candle-archive/shared';
import { runCli } from './commands.js';

async function main(): Promise<void> {
  loadEnvFromRoot();
  const config = loadDatasetConfig();
  const logger = createLogger({
    service: 'candle-archive',
    level: config.logLevel,
    file: config.logToFile,
    logDir: config.logDir,
  });

  try {
    process.exitCode = await runCli(process.argv.slice(2), {
      config,
      logger,
      out: (line) => console.log(line),
      createSource: () => new BinanceCandleSource(new BinanceClient(), config.binanceSymbols),
      cwd: process.cwd(),
    });
  } finally {
    await logger.close();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Fatal error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
