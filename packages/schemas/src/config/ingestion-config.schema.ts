import { z } from 'zod';
import { IntervalSchema, SymbolSchema } from '../market/interval.schema';

/**
 * Timestamp given as ms since epoch or ISO-8601 string, normalized to ms
 */
const TimestampInputSchema = z
  .union([z.number().int().nonnegative(), z.string().datetime({ offset: true })])
  .transform((value) => (typeof value === 'number' ? value : Date.parse(value)));

export const ProviderSchema = z.enum(['binance', 'coinbase']);
export type Provider = z.infer<typeof ProviderSchema>;

export const AdapterCredentialsSchema = z.object({
  apiKey: z.string().min(1),
  apiSecret: z.string().min(1).optional(),
});
export type AdapterCredentials = z.infer<typeof AdapterCredentialsSchema>;

/**
 * One configured source. Several adapters may share a provider
 * (e.g., Binance and Binance.US differ only by baseUrl).
 */
export const AdapterConfigSchema = z.object({
  id: z.string().min(1).regex(/^[a-z0-9_-]+$/i, 'Adapter id must be alphanumeric, dash or underscore'),
  provider: ProviderSchema,
  baseUrl: z.string().url().optional(),
  /** Requests allowed per rate-limit window */
  quotaPerMinute: z.number().int().positive(),
  /** Tie-breaker when health and latency are equal (lower wins) */
  priority: z.number().int().nonnegative().default(0),
  /** Engine symbol -> provider product id */
  symbolMap: z.record(z.string()).default({}),
  credentials: AdapterCredentialsSchema.optional(),
  enabled: z.boolean().default(true),
});
export type AdapterConfig = z.infer<typeof AdapterConfigSchema>;

export const RetryConfigSchema = z.object({
  baseDelayMs: z.number().int().positive().default(1_000),
  maxDelayMs: z.number().int().positive().default(300_000),
  maxAttempts: z.number().int().positive().default(5),
  /** Uniform jitter fraction applied as (1 + U[-jitter, +jitter]) */
  jitter: z.number().min(0).max(1).default(0.1),
});
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const CircuitBreakerConfigSchema = z.object({
  failureThreshold: z.number().int().positive().default(5),
  cooldownMs: z.number().int().positive().default(60_000),
  maxCooldownMs: z.number().int().positive().default(600_000),
});
export type CircuitBreakerConfig = z.infer<typeof CircuitBreakerConfigSchema>;

export const HealthConfigSchema = z.object({
  /** Half-life of the decayed success rate and latency */
  halfLifeMs: z.number().int().positive().default(900_000),
  healthySuccessRate: z.number().min(0).max(1).default(0.95),
  degradedAfterFailures: z.number().int().positive().default(3),
  suspendAfterFailures: z.number().int().positive().default(5),
  suspensionMs: z.number().int().positive().default(120_000),
});
export type HealthConfig = z.infer<typeof HealthConfigSchema>;

export const RateLimitConfigSchema = z.object({
  windowMs: z.number().int().positive().default(60_000),
  /** Longest a request waits for a token before failing RateLimited */
  maxWaitMs: z.number().int().positive().default(120_000),
});
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;

export const ConflictPolicySchema = z.enum(['reject', 'keep_existing']);
export type ConflictPolicy = z.infer<typeof ConflictPolicySchema>;

export const ValidationConfigSchema = z.object({
  /** Relative per-field tolerance for cross-source agreement (0.0001 = 0.01%) */
  tolerance: z.number().min(0).default(0.0001),
  /** Quality of a point seen by one source; 1.0 gives a flat score with no confirmation headroom */
  singleSourceQuality: z.number().min(0).max(1).default(0.8),
  /** Fraction of the remaining distance to 1.0 added by each confirming source */
  confirmationBoost: z.number().min(0).max(1).default(0.5),
  conflictPolicy: ConflictPolicySchema.default('reject'),
  /** Quality deducted from a new point per anomaly (zero volume, extreme move) */
  anomalyPenalty: z.number().min(0).max(1).default(0.1),
  /** Close-to-close change, as a fraction, above which a move is an anomaly */
  maxPriceChange: z.number().positive().default(1),
});
export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;

export const GapConfigSchema = z.object({
  scanIntervalMs: z.number().int().positive().default(900_000),
  maxAttempts: z.number().int().positive().default(5),
  /** Minimum time between recovery passes over the same gap */
  retryCooldownMs: z.number().int().nonnegative().default(600_000),
  /** Points per store query while scanning */
  scanPageSize: z.number().int().positive().default(5_000),
});
export type GapConfig = z.infer<typeof GapConfigSchema>;

export const BackfillConfigSchema = z.object({
  maxChunkPoints: z.number().int().positive().default(500),
  maxConcurrentGaps: z.number().int().positive().default(3),
});
export type BackfillConfig = z.infer<typeof BackfillConfigSchema>;

export const SchedulerConfigSchema = z.object({
  concurrency: z.number().int().positive().default(10),
  livePeriodMs: z.number().int().positive().default(3_600_000),
  /** Closed intervals re-fetched by each live task */
  liveLookbackPoints: z.number().int().positive().default(1),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  shutdownGraceMs: z.number().int().nonnegative().default(30_000),
});
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;

/**
 * Complete engine configuration. Every tunable has a default.
 */
export const IngestionConfigSchema = z.object({
  symbols: z.array(SymbolSchema).min(1),
  intervals: z.array(IntervalSchema).min(1),
  /** Earliest timestamp the series must cover */
  collectionStart: TimestampInputSchema,
  adapters: z.array(AdapterConfigSchema).min(1),
  retry: RetryConfigSchema.default({}),
  circuitBreaker: CircuitBreakerConfigSchema.default({}),
  health: HealthConfigSchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  validation: ValidationConfigSchema.default({}),
  gaps: GapConfigSchema.default({}),
  backfill: BackfillConfigSchema.default({}),
  scheduler: SchedulerConfigSchema.default({}),
}).superRefine((config, ctx) => {
  const ids = new Set<string>();
  for (const [index, adapter] of config.adapters.entries()) {
    if (ids.has(adapter.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate adapter id '${adapter.id}'`,
        path: ['adapters', index, 'id'],
      });
    }
    ids.add(adapter.id);
  }
  if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'retry.maxDelayMs must be >= retry.baseDelayMs',
      path: ['retry', 'maxDelayMs'],
    });
  }
});
export type IngestionConfig = z.infer<typeof IngestionConfigSchema>;
export type IngestionConfigInput = z.input<typeof IngestionConfigSchema>;
