// dotenv must load before anything reads process.env
import 'dotenv/config';

import type { Redis } from 'ioredis';
import type { AlertSink, EnvConfig, IngestionConfig, PersistenceStore } from '@gapless/schemas';
import {
  ConfigurationError,
  createLogger,
  flushAllLogs,
  formatTimestamp,
  toErrorMessage,
  validateEnv,
} from '@gapless/utils';
import { IngestionCoordinator, LoggingAlertSink, MemoryStore } from '@gapless/ingestion-core';
import {
  PostgresStore,
  closeDbClient,
  createDbClient,
  testDatabaseConnection,
  type Database,
} from '@gapless/database';
import { RedisAlertSink, createRedisClient, testRedisConnection } from '@gapless/cache';
import { USAGE, parseCliArgs, type CliArgs } from './cli/args';
import { loadIngestionConfig } from './config/load-config';
import { createAdapters } from './adapters/adapter-factory';

const logger = createLogger('collector');

interface Resources {
  store: PersistenceStore;
  alerts: AlertSink;
  db: Database | null;
  redis: Redis | null;
}

async function openResources(args: CliArgs, env: EnvConfig): Promise<Resources> {
  let store: PersistenceStore;
  let db: Database | null = null;
  if (args.store === 'memory') {
    store = new MemoryStore();
    logger.warn({ event: 'store_memory' }, 'Using in-memory store, nothing will be persisted');
  } else {
    db = createDbClient(env);
    await testDatabaseConnection(db);
    store = new PostgresStore(db);
  }

  let alerts: AlertSink;
  let redis: Redis | null = null;
  if (env.REDIS_HOST) {
    redis = createRedisClient(env);
    await testRedisConnection(redis);
    alerts = new RedisAlertSink(redis);
  } else {
    alerts = new LoggingAlertSink();
    logger.info({ event: 'alerts_logged' }, 'REDIS_HOST not set, alerts go to the log only');
  }

  return { store, alerts, db, redis };
}

async function logCompleteness(coordinator: IngestionCoordinator, config: IngestionConfig): Promise<void> {
  for (const symbol of config.symbols) {
    for (const interval of config.intervals) {
      const report = await coordinator.completeness(symbol, interval);
      logger.info(
        {
          event: 'completeness',
          symbol,
          interval,
          from: formatTimestamp(report.rangeStart),
          to: formatTimestamp(report.rangeEnd),
          expected: report.expectedPoints,
          present: report.presentPoints,
          missing: report.missingPoints,
          completeness: Number(report.completeness.toFixed(4)),
        },
        `${symbol} ${interval}: ${(report.completeness * 100).toFixed(2)}% complete`
      );
    }
  }
}

async function start(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const env = validateEnv();
  const config = await loadIngestionConfig(args.config, process.env, {
    symbols: args.symbols,
    intervals: args.intervals,
  });

  const resources = await openResources(args, env);
  const coordinator = new IngestionCoordinator({
    config,
    adapters: createAdapters(config),
    store: resources.store,
    alerts: resources.alerts,
  });

  let stopping = false;
  let durationTimer: NodeJS.Timeout | undefined;

  const shutdown = async (reason: string) => {
    if (stopping) return;
    stopping = true;
    clearTimeout(durationTimer);
    logger.info({ event: 'shutdown', reason }, 'Shutting down collector');

    try {
      await coordinator.stop();
      await logCompleteness(coordinator, config);
    } finally {
      if (resources.redis) await resources.redis.quit();
      if (resources.db) await closeDbClient(resources.db);
      await flushAllLogs();
    }
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch(fail);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await coordinator.start();
  logger.info(
    {
      event: 'collector_started',
      symbols: config.symbols,
      intervals: config.intervals,
      adapters: config.adapters.filter((adapter) => adapter.enabled).map((adapter) => adapter.id),
      store: args.store,
    },
    'Collector started'
  );

  if (args.duration !== undefined) {
    durationTimer = setTimeout(() => {
      shutdown('duration_elapsed').catch(fail);
    }, args.duration * 60_000);
  }
}

function fail(error: unknown): void {
  if (error instanceof ConfigurationError) {
    logger.error({ event: 'configuration_error', error: error.message }, error.message);
    logger.error(USAGE);
  } else {
    logger.fatal({ event: 'collector_failed', error: toErrorMessage(error) }, 'Collector failed');
  }
  flushAllLogs()
    .catch(() => undefined)
    .finally(() => process.exit(1));
}

start().catch(fail);
