import { z } from 'zod';

export const AlertTypeSchema = z.enum(['sources_unavailable', 'gap_failed', 'task_abandoned']);
export type AlertType = z.infer<typeof AlertTypeSchema>;

/**
 * Systemic condition surfaced to operators
 */
export const IngestionAlertSchema = z.object({
  type: AlertTypeSchema,
  severity: z.enum(['warning', 'critical']),
  message: z.string(),
  symbol: z.string().optional(),
  interval: z.string().optional(),
  details: z.record(z.unknown()).default({}),
  timestamp: z.number().int(),
});
export type IngestionAlert = z.infer<typeof IngestionAlertSchema>;
