import { drizzle } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import { HARDCODED_CONFIG, type EnvConfig } from '@gapless/schemas';
import { ConfigurationError, createLogger } from '@gapless/utils';
import * as schema from './schema';

const logger = createLogger('database');

/**
 * Connection options derived from the environment
 *
 * @throws ConfigurationError when credentials are missing
 */
export function connectionOptions(config: EnvConfig) {
  if (!config.DATABASE_USERNAME || !config.DATABASE_PASSWORD) {
    throw new ConfigurationError('DATABASE_USERNAME and DATABASE_PASSWORD are required for the postgres store');
  }
  return {
    host: config.DATABASE_HOST,
    port: config.DATABASE_PORT,
    database: config.DATABASE_NAME,
    username: config.DATABASE_USERNAME,
    password: config.DATABASE_PASSWORD,
    ssl: config.DATABASE_SSL === 'require' ? ('require' as const) : false,
    max: HARDCODED_CONFIG.database.poolSize,
    connect_timeout: HARDCODED_CONFIG.database.connectionTimeoutMs / 1000,
  };
}

/**
 * Create a database client instance
 *
 * @param config - Validated environment configuration
 * @returns Drizzle ORM instance
 */
export function createDbClient(config: EnvConfig) {
  const options = connectionOptions(config);
  logger.info({ host: options.host, database: options.database }, 'Connecting to PostgreSQL database...');

  const queryClient = postgres({
    ...options,
    onnotice: () => {}, // Suppress notices in logs
  });

  return drizzle(queryClient, { schema });
}

/**
 * Helper type for database instance
 */
export type Database = ReturnType<typeof createDbClient>;

/**
 * Test database connection with a simple query
 * Throws an error if connection fails
 */
export async function testDatabaseConnection(db: Database): Promise<void> {
  try {
    await db.execute(sql`SELECT 1`);
    logger.info('Database connection test passed');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, 'Database connection test FAILED');
    throw new Error(`Database connection failed: ${message}`, { cause: error });
  }
}

/**
 * Close the connection pool, waiting up to `timeoutSeconds` for queries in flight
 */
export async function closeDbClient(db: Database, timeoutSeconds = 5): Promise<void> {
  await db.$client.end({ timeout: timeoutSeconds });
  logger.info('Database connection closed');
}
