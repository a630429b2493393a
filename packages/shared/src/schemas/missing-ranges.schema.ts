import { z } from 'zod';

/**
 * One run of consecutive missing timestamps
 */
export const MissingRangeSchema = z.object({
  start_timestamp: z.number().int(),
  end_timestamp: z.number().int(),
  start_datetime: z.string(),
  end_datetime: z.string(),
  duration_minutes: z.number().int().positive(),
});

/**
 * JSON written next to a candle file by the gap finder, read back by the backfiller
 */
export const MissingRangesReportSchema = z.object({
  filename: z.string().min(1),
  total_missing_timestamps: z.number().int().nonnegative(),
  total_ranges: z.number().int().nonnegative(),
  ranges: z.array(MissingRangeSchema),
});

export type MissingRange = z.infer<typeof MissingRangeSchema>;
export type MissingRangesReport = z.infer<typeof MissingRangesReportSchema>;
