import { z } from 'zod';
import { IntervalSchema, SymbolSchema } from '../market/interval.schema';

export const TaskPrioritySchema = z.enum(['live', 'backfill']);
export type TaskPriority = z.infer<typeof TaskPrioritySchema>;

export const TaskOriginSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('live') }),
  z.object({ kind: z.literal('gap'), gapId: z.string().min(1) }),
]);
export type TaskOrigin = z.infer<typeof TaskOriginSchema>;

/**
 * Unit of scheduled work. Ephemeral: never persisted.
 */
export const FetchTaskSchema = z.object({
  id: z.string().min(1),
  symbol: SymbolSchema,
  interval: IntervalSchema,
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  priority: TaskPrioritySchema,
  origin: TaskOriginSchema,
  /** Attempts already made (0 before the first run) */
  attempt: z.number().int().nonnegative(),
  /** Earliest dispatch time (ms); 0 for immediately */
  notBefore: z.number().int().nonnegative(),
});
export type FetchTask = z.infer<typeof FetchTaskSchema>;
