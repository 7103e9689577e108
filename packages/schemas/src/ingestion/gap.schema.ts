import { z } from 'zod';
import { IntervalSchema, SymbolSchema } from '../market/interval.schema';

export const GapStatusSchema = z.enum(['pending', 'in_progress', 'resolved', 'failed']);
export type GapStatus = z.infer<typeof GapStatusSchema>;

/**
 * A contiguous run of missing expected timestamps, half-open [start, end)
 */
export const GapSchema = z.object({
  id: z.string().min(1),
  symbol: SymbolSchema,
  interval: IntervalSchema,
  /** First missing timestamp (inclusive) */
  start: z.number().int().nonnegative(),
  /** One interval past the last missing timestamp (exclusive) */
  end: z.number().int().nonnegative(),
  status: GapStatusSchema,
  attemptCount: z.number().int().nonnegative(),
  lastAttemptAt: z.number().int().nullable(),
  lastError: z.string().nullable(),
  detectedAt: z.number().int(),
  updatedAt: z.number().int(),
}).refine((gap) => gap.end > gap.start, {
  message: 'Gap end must be after start',
  path: ['end'],
});
export type Gap = z.infer<typeof GapSchema>;

/**
 * Missing range before it is persisted as a gap
 */
export interface TimeRange {
  start: number;
  end: number;
}

/**
 * Completeness report for one series
 */
export interface CompletenessReport {
  symbol: string;
  interval: string;
  rangeStart: number;
  rangeEnd: number;
  expectedPoints: number;
  presentPoints: number;
  missingPoints: number;
  /** presentPoints / expectedPoints, 1 when nothing is expected */
  completeness: number;
  missingRanges: TimeRange[];
}
