import { z } from 'zod';
import { IntervalSchema, SymbolSchema } from './interval.schema';

/**
 * Raw OHLCV point as returned by a source adapter, before validation.
 * Numbers only need to be finite here; the validator enforces OHLC rules.
 */
export const RawPointSchema = z.object({
  /** Unix timestamp in milliseconds (UTC) */
  timestamp: z.number().int(),
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().finite(),
});
export type RawPoint = z.infer<typeof RawPointSchema>;

/**
 * Accepted, persisted data point
 */
export const DataPointSchema = z.object({
  symbol: SymbolSchema,
  interval: IntervalSchema,
  /** Unix timestamp in milliseconds, aligned to the interval */
  timestamp: z.number().int().nonnegative(),
  open: z.number().nonnegative(),
  high: z.number().nonnegative(),
  low: z.number().nonnegative(),
  close: z.number().nonnegative(),
  volume: z.number().nonnegative(),
  /** First adapter whose value was accepted */
  sourceId: z.string().min(1),
  /** Distinct adapters that confirmed this point (includes sourceId) */
  sources: z.array(z.string().min(1)).min(1),
  /** Confidence in the stored values (0-1) */
  qualityScore: z.number().min(0).max(1),
  validated: z.boolean(),
  /** Optimistic concurrency counter, owned by the store */
  revision: z.number().int().nonnegative(),
});
export type DataPoint = z.infer<typeof DataPointSchema>;

/**
 * Price fields compared by the validator
 */
export const OHLCV_FIELDS = ['open', 'high', 'low', 'close', 'volume'] as const;
export type OhlcvField = (typeof OHLCV_FIELDS)[number];
