import { HARDCODED_CONFIG, type AlertSink, type IngestionAlert, type SourceHealth } from '@gapless/schemas';
import { createLogger } from '@gapless/utils';
import { alertsChannel, healthKey } from '../keys';

const logger = createLogger('redis:alerts');

/**
 * The Redis commands the sink uses; an ioredis client satisfies it
 */
export interface AlertPublisher {
  publish(channel: string, message: string): Promise<number>;
  set(key: string, value: string, expiryMode: 'EX', seconds: number): Promise<unknown>;
}

/**
 * Publishes alerts to a Redis channel and keeps each adapter's latest
 * health snapshot under its own expiring key.
 */
export class RedisAlertSink implements AlertSink {
  private redis: AlertPublisher;
  private ttlSeconds: number;

  constructor(redis: AlertPublisher, ttlSeconds: number = HARDCODED_CONFIG.redis.healthTtlSeconds) {
    this.redis = redis;
    this.ttlSeconds = ttlSeconds;
  }

  async publish(alert: IngestionAlert): Promise<void> {
    const receivers = await this.redis.publish(alertsChannel(), JSON.stringify(alert));
    logger.debug({ event: 'alert_published', type: alert.type, receivers }, `Published ${alert.type} alert`);
  }

  async publishHealth(snapshots: SourceHealth[]): Promise<void> {
    await Promise.all(
      snapshots.map((snapshot) =>
        this.redis.set(healthKey(snapshot.adapterId), JSON.stringify(snapshot), 'EX', this.ttlSeconds)
      )
    );
  }
}
