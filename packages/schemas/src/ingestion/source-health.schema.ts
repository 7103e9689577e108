import { z } from 'zod';

export const HealthStateSchema = z.enum(['healthy', 'degraded', 'suspended']);
export type HealthState = z.infer<typeof HealthStateSchema>;

export const BreakerStateSchema = z.enum(['closed', 'open', 'half_open']);
export type BreakerState = z.infer<typeof BreakerStateSchema>;

/**
 * Per-adapter health snapshot
 */
export const SourceHealthSchema = z.object({
  adapterId: z.string().min(1),
  state: HealthStateSchema,
  requestCount: z.number().int().nonnegative(),
  successCount: z.number().int().nonnegative(),
  errorCount: z.number().int().nonnegative(),
  consecutiveFailures: z.number().int().nonnegative(),
  /** Decayed average latency (ms) */
  averageLatencyMs: z.number().nonnegative(),
  /** Decayed success rate (0-1) */
  successRate: z.number().min(0).max(1),
  lastSuccessAt: z.number().int().nullable(),
  lastErrorAt: z.number().int().nullable(),
  suspendedUntil: z.number().int().nullable(),
});
export type SourceHealth = z.infer<typeof SourceHealthSchema>;
