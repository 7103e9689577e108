import { EnvConfigSchema, type EnvConfig } from '@gapless/schemas';
import { logger } from '../logger/logger';
import { ConfigurationError } from '../errors/ingestion-error';

/**
 * Parse environment variables against the collector schema
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function parseEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvConfigSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment variables: ${problems.join('; ')}`);
  }
  return result.data;
}

/**
 * Validate environment variables on application startup.
 *
 * @returns Validated environment configuration
 * @throws Exits process if validation fails
 */
export function validateEnv(): EnvConfig {
  try {
    const config = parseEnv();
    logger.info({ nodeEnv: config.NODE_ENV }, 'Environment variables validated');
    return config;
  } catch (error) {
    logger.error({ err: error instanceof Error ? error.message : String(error) }, 'Invalid environment variables');
    logger.error('Please ensure all required environment variables are set. See README for details.');
    process.exit(1);
  }
}

/**
 * Get an environment variable, treating empty strings as unset
 */
export function getEnvVar(key: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}
