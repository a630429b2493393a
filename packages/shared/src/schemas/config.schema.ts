import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment variables read by the toolkit, with defaults
 */
export const DatasetEnvSchema = z.object({
  CANDLE_DATA_DIR: z.string().min(1).default('./data'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_DIR: z.string().min(1).optional(),
  LOG_TO_FILE: booleanFlag.default('false'),
  BINANCE_SYMBOLS: z
    .string()
    .regex(/^(\w+=\w+)(,\w+=\w+)*$/, 'expected asset=SYMBOL pairs separated by commas')
    .default('btc=BTCUSDT,eth=ETHUSDT'),
  BACKFILL_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(10),
  BACKFILL_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(5),
  BACKFILL_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),
});

export type DatasetEnv = z.infer<typeof DatasetEnvSchema>;
