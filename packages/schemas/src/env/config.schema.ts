import { z } from 'zod';

const portSchema = (fallback: string) =>
  z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().positive()).default(fallback);

/**
 * Environment configuration schema for the collector process.
 * Database settings are only required when the Postgres store is selected.
 */
export const EnvConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // PostgreSQL Database
  DATABASE_HOST: z.string().default('localhost'),
  DATABASE_PORT: portSchema('5432'),
  DATABASE_USERNAME: z.string().min(1).optional(),
  DATABASE_PASSWORD: z.string().min(1).optional(),
  DATABASE_NAME: z.string().min(1).default('gapless'),
  DATABASE_SSL: z.enum(['disable', 'require']).default('disable'),

  // Redis (alerts are logged only when unset)
  REDIS_HOST: z.string().min(1).optional(),
  REDIS_PORT: portSchema('6379'),
  REDIS_PASSWORD: z.string().min(1).optional(),
  REDIS_TLS: z.enum(['true', 'false']).default('false').transform((val) => val === 'true'),
});

/**
 * Validated environment configuration type
 */
export type EnvConfig = z.infer<typeof EnvConfigSchema>;

/**
 * Constants that do not warrant a setting
 */
export const HARDCODED_CONFIG = {
  database: {
    poolSize: 10,
    connectionTimeoutMs: 10_000,
  },
  redis: {
    maxRetriesPerRequest: 3,
    maxRetries: 10,
    retryDelayMs: 500,
    commandTimeoutMs: 5_000,
    healthTtlSeconds: 300,
  },
} as const;
