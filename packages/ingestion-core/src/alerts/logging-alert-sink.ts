import type { AlertSink, IngestionAlert, SourceHealth } from '@gapless/schemas';
import { createLogger, type Logger } from '@gapless/utils';

/**
 * AlertSink that only writes to the log. Default when no Redis is configured.
 */
export class LoggingAlertSink implements AlertSink {
  private logger: Logger;

  constructor(logger: Logger = createLogger('ingestion:alerts')) {
    this.logger = logger;
  }

  async publish(alert: IngestionAlert): Promise<void> {
    const { message, ...fields } = alert;
    const data = { event: 'alert', ...fields };
    if (alert.severity === 'critical') {
      this.logger.error(data, message);
    } else {
      this.logger.warn(data, message);
    }
  }

  async publishHealth(snapshots: SourceHealth[]): Promise<void> {
    for (const snapshot of snapshots) {
      this.logger.info({ event: 'source_health', ...snapshot }, `${snapshot.adapterId} ${snapshot.state}`);
    }
  }
}
