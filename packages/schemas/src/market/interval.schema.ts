import { z } from 'zod';

/**
 * Interval enum - canonical sampling cadences for a series
 *
 * Adapters map these to provider formats and declare the ones they
 * cannot serve through `supports()`.
 */
export const IntervalSchema = z.enum([
  '1m',   // 1 minute
  '3m',   // 3 minutes
  '5m',   // 5 minutes
  '15m',  // 15 minutes
  '30m',  // 30 minutes
  '1h',   // 1 hour
  '2h',   // 2 hours
  '4h',   // 4 hours
  '6h',   // 6 hours
  '12h',  // 12 hours
  '1d',   // 1 day
]);
export type Interval = z.infer<typeof IntervalSchema>;

/**
 * Interval length in milliseconds
 */
export const INTERVAL_MS: Record<Interval, number> = {
  '1m': 60_000,
  '3m': 3 * 60_000,
  '5m': 5 * 60_000,
  '15m': 15 * 60_000,
  '30m': 30 * 60_000,
  '1h': 60 * 60_000,
  '2h': 2 * 60 * 60_000,
  '4h': 4 * 60 * 60_000,
  '6h': 6 * 60 * 60_000,
  '12h': 12 * 60 * 60_000,
  '1d': 24 * 60 * 60_000,
};

/**
 * Instrument identifier (e.g., 'BTCUSDT')
 */
export const SymbolSchema = z.string().min(1).max(32);

/**
 * A series is one (symbol, interval) pair
 */
export const SeriesSchema = z.object({
  symbol: SymbolSchema,
  interval: IntervalSchema,
});
export type Series = z.infer<typeof SeriesSchema>;
