import { z } from 'zod';

/**
 * Zod schema for a candle CSV row
 */
export const CandleRowSchema = z
  .object({
    timestamp: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/),
    open: z.number().finite(),
    close: z.number().finite(),
    volume: z.number().finite().nonnegative(),
    unix_timestamp: z.number().int().nonnegative(),
    high: z.number().finite(),
    low: z.number().finite(),
  })
  .refine((row) => row.low <= Math.min(row.open, row.close), {
    message: 'low must not exceed open or close',
    path: ['low'],
  })
  .refine((row) => row.high >= Math.max(row.open, row.close), {
    message: 'high must not be below open or close',
    path: ['high'],
  });

/**
 * Type inferred from schema
 */
export type CandleRowSchemaType = z.infer<typeof CandleRowSchema>;
