import Redis from 'ioredis';
import { HARDCODED_CONFIG, type EnvConfig } from '@gapless/schemas';
import { ConfigurationError, createLogger } from '@gapless/utils';

const logger = createLogger('redis');

/**
 * Reconnect delay for the given attempt, or null to give up
 */
export function retryDelay(times: number): number | null {
  if (times > HARDCODED_CONFIG.redis.maxRetries) {
    return null;
  }
  return Math.min(times * HARDCODED_CONFIG.redis.retryDelayMs, 5000);
}

/**
 * Create a Redis client instance
 *
 * @param config - Validated environment configuration
 * @throws ConfigurationError when REDIS_HOST is not set
 */
export function createRedisClient(config: EnvConfig): Redis {
  const host = config.REDIS_HOST;
  if (!host) {
    throw new ConfigurationError('REDIS_HOST is required for Redis publishing');
  }
  const port = config.REDIS_PORT;

  logger.info(`Redis target: redis://:<redacted>@${host}:${port}${config.REDIS_TLS ? ' (TLS)' : ''}`);

  const redis = new Redis({
    host,
    port,
    password: config.REDIS_PASSWORD,
    tls: config.REDIS_TLS ? { servername: host } : undefined,
    maxRetriesPerRequest: HARDCODED_CONFIG.redis.maxRetriesPerRequest,
    retryStrategy: (times) => {
      const delay = retryDelay(times);
      if (delay === null) {
        logger.error('Redis max retries reached');
      } else {
        logger.warn(`Redis retry attempt ${times}, waiting ${delay}ms`);
      }
      return delay;
    },
    commandTimeout: HARDCODED_CONFIG.redis.commandTimeoutMs,
  });

  redis.on('connect', () => {
    logger.info('Redis client connected');
  });

  redis.on('ready', () => {
    logger.info('Redis client ready');
  });

  redis.on('error', (error) => {
    logger.error({ err: error }, 'Redis client error');
  });

  redis.on('close', () => {
    logger.warn('Redis connection closed');
  });

  return redis;
}

/**
 * Test Redis connection with PING command
 * Throws an error if connection fails
 */
export async function testRedisConnection(redis: Redis): Promise<void> {
  try {
    const result = await redis.ping();
    if (result !== 'PONG') {
      throw new Error(`Unexpected PING response: ${result}`);
    }
    logger.info('Redis connection test passed');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, 'Redis connection test FAILED');
    throw new Error(`Redis connection failed: ${message}`, { cause: error });
  }
}
