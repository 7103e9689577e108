import { randomUUID } from 'crypto';
import type {
  AlertSink,
  FetchTask,
  IngestionAlert,
  IngestionConfig,
  Interval,
  PersistenceStore,
  RawPoint,
  Series,
  SourceAdapter,
  SourceHealth,
  CompletenessReport,
  Gap,
} from '@gapless/schemas';
import {
  ConfigurationError,
  KeyedMutex,
  UnavailableError,
  countSteps,
  createLogger,
  formatTimestamp,
  intervalToMs,
  lastClosedBoundary,
  toErrorMessage,
} from '@gapless/utils';
import { HealthTracker } from '../health/health-tracker';
import { CircuitBreaker, type CircuitBreakerSnapshot } from '../breaker/circuit-breaker';
import { RateLimiter } from '../rate-limit/rate-limiter';
import { RetryPolicy } from '../retry/retry-policy';
import { SourceSelector } from '../selection/source-selector';
import { DataValidator, type ConflictReport, type ValidationMode } from '../validation/data-validator';
import { GapDetector } from '../gaps/gap-detector';
import { RecoveryOrchestrator } from '../recovery/recovery-orchestrator';
import { WorkerPool, type TaskOutcome, type WorkerPoolStats } from '../scheduler/worker-pool';
import { LoggingAlertSink } from '../alerts/logging-alert-sink';

const logger = createLogger('ingestion');

/** Optimistic write rounds before a series write gives up */
const MAX_WRITE_ROUNDS = 3;

/** All gap state changes go through one lock */
const GAP_LOCK = 'gaps';

export interface IngestionCoordinatorOptions {
  config: IngestionConfig;
  adapters: SourceAdapter[];
  store: PersistenceStore;
  alerts?: AlertSink;
  now?: () => number;
  random?: () => number;
  idFactory?: () => string;
}

export interface IngestResult {
  inserted: number;
  confirmed: number;
  unchanged: number;
  conflicts: ConflictReport[];
}

export interface IngestionStatus {
  running: boolean;
  series: Series[];
  queue: WorkerPoolStats;
  activeGaps: number;
  health: SourceHealth[];
  breakers: Record<string, CircuitBreakerSnapshot>;
}

/**
 * Top-level ingestion loop.
 *
 * Schedules live fetches for every configured series, keeps the gap set
 * current, feeds backfill tasks from the recovery orchestrator, and routes
 * every fetched batch through the validator into the store. No failure of
 * a single task stops it; only `stop()` does.
 */
export class IngestionCoordinator {
  readonly health: HealthTracker;
  readonly breakers: Map<string, CircuitBreaker> = new Map();
  readonly rateLimiter: RateLimiter;
  readonly retryPolicy: RetryPolicy;
  readonly selector: SourceSelector;
  readonly validator: DataValidator;
  readonly detector: GapDetector;
  readonly recovery: RecoveryOrchestrator;

  private config: IngestionConfig;
  private store: PersistenceStore;
  private alerts: AlertSink;
  private now: () => number;
  private idFactory: () => string;
  private series: Series[];
  private pool: WorkerPool;
  private writeLocks = new KeyedMutex();
  private gapLocks = new KeyedMutex();
  private timers: Array<ReturnType<typeof setInterval>> = [];
  private scanInFlight: Promise<void> | null = null;
  private running = false;
  private stopped = false;

  constructor(options: IngestionCoordinatorOptions) {
    const { config } = options;
    this.config = config;
    this.store = options.store;
    this.alerts = options.alerts ?? new LoggingAlertSink();
    this.now = options.now ?? (() => Date.now());
    this.idFactory = options.idFactory ?? randomUUID;

    const adapters = config.adapters
      .filter((adapterConfig) => adapterConfig.enabled)
      .map((adapterConfig) => {
        const adapter = options.adapters.find((candidate) => candidate.id === adapterConfig.id);
        if (!adapter) {
          throw new ConfigurationError(`No adapter instance for configured adapter '${adapterConfig.id}'`);
        }
        return adapter;
      });
    if (adapters.length === 0) {
      throw new ConfigurationError('At least one enabled adapter is required');
    }

    this.series = config.symbols.flatMap((symbol) =>
      config.intervals.map((interval) => ({ symbol, interval }))
    );

    this.health = new HealthTracker(config.health, this.now);
    this.rateLimiter = new RateLimiter(config.rateLimit, this.now);
    this.retryPolicy = new RetryPolicy(config.retry, options.random);
    this.validator = new DataValidator(config.validation);

    const priorities: Record<string, number> = {};
    for (const adapterConfig of config.adapters) {
      priorities[adapterConfig.id] = adapterConfig.priority;
      if (!adapterConfig.enabled) continue;
      this.health.register(adapterConfig.id);
      this.rateLimiter.register(adapterConfig.id, adapterConfig.quotaPerMinute);
      const breaker = new CircuitBreaker(adapterConfig.id, config.circuitBreaker, this.now);
      breaker.on('state-change', (adapterId, from, to) => {
        const log = to === 'open' ? logger.warn : logger.info;
        log({ event: 'breaker_state', adapterId, from, to }, `Circuit ${adapterId} ${from} -> ${to}`);
      });
      this.breakers.set(adapterConfig.id, breaker);
    }

    this.selector = new SourceSelector({
      adapters,
      priorities,
      health: this.health,
      breakers: this.breakers,
      rateLimiter: this.rateLimiter,
      requestTimeoutMs: config.scheduler.requestTimeoutMs,
      now: this.now,
    });

    this.detector = new GapDetector({
      store: this.store,
      collectionStart: config.collectionStart,
      config: config.gaps,
      now: this.now,
      idFactory: this.idFactory,
    });

    this.recovery = new RecoveryOrchestrator({
      store: this.store,
      detector: this.detector,
      adapters,
      config: config.backfill,
      maxAttempts: config.gaps.maxAttempts,
      retryCooldownMs: config.gaps.retryCooldownMs,
      now: this.now,
      idFactory: this.idFactory,
    });

    this.pool = new WorkerPool({
      concurrency: config.scheduler.concurrency,
      retryPolicy: this.retryPolicy,
      execute: (task, signal) => this.execute(task, signal),
      onSettled: (task, outcome) => this.onSettled(task, outcome),
      now: this.now,
    });

    this.health.on('state-change', (adapterId, from, to) => {
      const log = to === 'healthy' ? logger.info : logger.warn;
      log({ event: 'source_state', adapterId, from, to }, `Source ${adapterId} ${from} -> ${to}`);
      this.publishHealth();
    });

    this.selector.on('sources-unavailable', (symbol, interval, failures) => {
      this.raise({
        type: 'sources_unavailable',
        severity: 'critical',
        message: `No source available for ${symbol} ${interval}`,
        symbol,
        interval,
        details: {
          adapters: failures.map((failure) => ({ adapterId: failure.adapterId, error: failure.error.message })),
        },
        timestamp: this.now(),
      });
    });

    for (const { symbol, interval } of this.series) {
      if (this.selector.capable(symbol, interval).length === 0) {
        logger.warn({ event: 'series_unsupported', symbol, interval }, `No adapter supports ${symbol} ${interval}`);
      }
    }
  }

  /**
   * Begin scheduling. Returns once the first live round is queued and the
   * first gap scan has run.
   */
  async start(): Promise<void> {
    if (this.running) return;
    if (this.stopped) {
      throw new ConfigurationError('A stopped coordinator cannot be restarted');
    }
    this.running = true;

    logger.info(
      {
        event: 'coordinator_start',
        series: this.series.length,
        adapters: [...this.breakers.keys()],
        collectionStart: formatTimestamp(this.config.collectionStart),
      },
      'Ingestion coordinator starting'
    );

    await this.gapLocks.runExclusive(GAP_LOCK, () => this.recovery.recoverStale(this.series));
    this.enqueueLive();
    await this.requestScan();

    this.timers.push(
      setInterval(() => this.enqueueLive(), this.config.scheduler.livePeriodMs),
      setInterval(() => {
        this.requestScan().catch((error: unknown) => {
          logger.error({ event: 'gap_scan_failed', error: toErrorMessage(error) }, 'Scheduled gap scan failed');
        });
      }, this.config.gaps.scanIntervalMs)
    );
  }

  /**
   * Stop timers, let in-flight tasks finish within the grace period, then
   * abort the rest. Interrupted gaps return to pending.
   */
  async stop(graceMs: number = this.config.scheduler.shutdownGraceMs): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.stopped = true;
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];

    if (this.scanInFlight) await this.scanInFlight;
    await this.pool.stop(graceMs);
    this.rateLimiter.close(new UnavailableError('Coordinator stopped'));

    await this.gapLocks.runExclusive(GAP_LOCK, async () => {
      this.recovery.abandonActive();
      await this.recovery.recoverStale(this.series);
    });

    logger.info({ event: 'coordinator_stop' }, 'Ingestion coordinator stopped');
  }

  /**
   * Queue one live task per series for the most recently closed window
   */
  enqueueLive(): number {
    if (!this.running) return 0;
    const now = this.now();
    let queued = 0;

    for (const { symbol, interval } of this.series) {
      const end = lastClosedBoundary(now, interval);
      const start = end - intervalToMs(interval) * this.config.scheduler.liveLookbackPoints;
      const accepted = this.pool.submit({
        id: this.idFactory(),
        symbol,
        interval,
        start,
        end,
        priority: 'live',
        origin: { kind: 'live' },
        attempt: 0,
        notBefore: 0,
      });
      if (accepted) queued++;
    }

    logger.debug({ event: 'live_round', queued }, 'Queued live tasks');
    return queued;
  }

  /**
   * Run a gap scan now, or join the one already running
   */
  requestScan(): Promise<void> {
    if (!this.scanInFlight) {
      this.scanInFlight = this.scanGaps().finally(() => {
        this.scanInFlight = null;
      });
    }
    return this.scanInFlight;
  }

  /**
   * Validate and persist a batch under the series write lock.
   *
   * Conflicting concurrent writes are retried from a fresh read.
   */
  async ingest(
    symbol: string,
    interval: Interval,
    sourceId: string,
    points: RawPoint[],
    mode: ValidationMode = 'ingest',
    signal?: AbortSignal
  ): Promise<IngestResult> {
    const result: IngestResult = { inserted: 0, confirmed: 0, unchanged: 0, conflicts: [] };
    if (points.length === 0) return result;

    const timestamps = points.map((point) => point.timestamp);
    const from = Math.min(...timestamps);
    const to = Math.max(...timestamps) + 1;

    return this.writeLocks.runExclusive(`${symbol}:${interval}`, async () => {
      for (let round = 1; round <= MAX_WRITE_ROUNDS; round++) {
        const existing = await this.store.queryRange(symbol, interval, from, to);
        const outcome = this.validator.validate({ symbol, interval, sourceId, points }, existing, mode);
        if (signal?.aborted) throw signal.reason;

        let conflicted = false;
        for (const write of outcome.writes) {
          const stored = await this.store.upsert(write.point, write.expectedRevision);
          if (stored.status === 'conflict') {
            conflicted = true;
            break;
          }
          if (write.kind === 'insert') result.inserted++;
          else result.confirmed++;
        }

        if (!conflicted) {
          result.unchanged = outcome.unchanged;
          result.conflicts = outcome.conflicts;
          if (outcome.conflicts.length > 0) {
            logger.warn(
              { event: 'values_conflict', symbol, interval, sourceId, conflicts: outcome.conflicts.length },
              'Kept stored values where sources disagree'
            );
          }
          if (outcome.anomalies.length > 0) {
            logger.warn(
              {
                event: 'points_suspicious',
                symbol,
                interval,
                sourceId,
                anomalies: outcome.anomalies.map((a) => `${a.rule} at ${formatTimestamp(a.timestamp)}: ${a.detail}`),
              },
              'Stored points with lowered quality'
            );
          }
          return result;
        }

        logger.debug({ event: 'write_conflict', symbol, interval, round }, 'Concurrent write detected, re-validating');
      }

      throw new UnavailableError(`Write conflicts persisted for ${symbol} ${interval}`);
    });
  }

  /**
   * Resolves once no task is queued or running and no gap scan is in flight
   */
  async idle(): Promise<void> {
    for (;;) {
      if (this.scanInFlight) {
        await this.scanInFlight;
        continue;
      }
      await this.pool.idle();
      if (!this.scanInFlight) return;
    }
  }

  status(): IngestionStatus {
    const breakers: Record<string, CircuitBreakerSnapshot> = {};
    for (const [id, breaker] of this.breakers) {
      breakers[id] = breaker.snapshot();
    }
    return {
      running: this.running,
      series: this.series,
      queue: this.pool.stats(),
      activeGaps: this.recovery.activeCount,
      health: this.health.snapshots(),
      breakers,
    };
  }

  completeness(symbol: string, interval: Interval): Promise<CompletenessReport> {
    return this.detector.completeness(symbol, interval);
  }

  async listGaps(symbol: string, interval: Interval): Promise<Gap[]> {
    return this.store.listGaps(symbol, interval);
  }

  /**
   * Give a failed gap a fresh attempt budget
   */
  async requeueGap(gapId: string): Promise<Gap | null> {
    const gap = await this.gapLocks.runExclusive(GAP_LOCK, () => this.recovery.requeue(gapId));
    await this.claimRecovery();
    return gap;
  }

  async requeueFailedGaps(): Promise<number> {
    const count = await this.gapLocks.runExclusive(GAP_LOCK, () => this.recovery.requeueFailed(this.series));
    await this.claimRecovery();
    return count;
  }

  /**
   * Clear an adapter's breaker and health history (operator override)
   */
  resetAdapter(adapterId: string): void {
    this.breakers.get(adapterId)?.reset();
    this.health.reset(adapterId);
    logger.info({ event: 'adapter_reset', adapterId }, `Reset breaker and health for ${adapterId}`);
  }

  private async scanGaps(): Promise<void> {
    for (const { symbol, interval } of this.series) {
      try {
        await this.gapLocks.runExclusive(GAP_LOCK, () => this.detector.detect(symbol, interval));
      } catch (error) {
        logger.error(
          { event: 'gap_scan_failed', symbol, interval, error: toErrorMessage(error) },
          `Gap scan failed for ${symbol} ${interval}`
        );
      }
    }
    try {
      await this.claimRecovery();
    } catch (error) {
      logger.error({ event: 'gap_claim_failed', error: toErrorMessage(error) }, 'Failed to claim gaps for recovery');
    }
    this.publishHealth();
  }

  private async claimRecovery(): Promise<void> {
    if (!this.running) return;
    const tasks = await this.gapLocks.runExclusive(GAP_LOCK, () => this.recovery.claim(this.series));
    for (const task of tasks) {
      this.pool.submit(task);
    }
  }

  private async execute(task: FetchTask, signal: AbortSignal): Promise<void> {
    const fetched = await this.selector.fetch(task, signal);
    if (signal.aborted) throw signal.reason;

    const result = await this.ingest(task.symbol, task.interval, fetched.adapterId, fetched.points, 'ingest', signal);
    const expected = countSteps(task.start, task.end, task.interval);

    logger.debug(
      {
        event: 'task_complete',
        taskId: task.id,
        symbol: task.symbol,
        interval: task.interval,
        priority: task.priority,
        adapterId: fetched.adapterId,
        expected,
        received: fetched.points.length,
        inserted: result.inserted,
        confirmed: result.confirmed,
      },
      'Task complete'
    );

    if (task.origin.kind === 'live' && fetched.points.length < expected) {
      logger.info(
        {
          event: 'live_partial',
          symbol: task.symbol,
          interval: task.interval,
          adapterId: fetched.adapterId,
          expected,
          received: fetched.points.length,
        },
        'Live fetch returned a partial window, scanning for gaps'
      );
      this.requestScan().catch((error: unknown) => {
        logger.error({ event: 'gap_scan_failed', error: toErrorMessage(error) }, 'On-demand gap scan failed');
      });
    }
  }

  private async onSettled(task: FetchTask, outcome: TaskOutcome): Promise<void> {
    if (task.origin.kind === 'gap') {
      if (outcome.status === 'cancelled') return;
      const { gapId } = task.origin;
      const settled = await this.gapLocks.runExclusive(GAP_LOCK, () =>
        this.recovery.settleChunk(
          gapId,
          outcome.status === 'succeeded' ? { ok: true } : { ok: false, error: outcome.error }
        )
      );
      if (!settled) return;

      if (settled.status === 'failed') {
        this.raise({
          type: 'gap_failed',
          severity: 'warning',
          message: `Gap ${settled.symbol} ${settled.interval} failed after ${settled.attemptCount} attempts`,
          symbol: settled.symbol,
          interval: settled.interval,
          details: {
            gapId: settled.id,
            start: settled.start,
            end: settled.end,
            lastError: settled.lastError,
          },
          timestamp: this.now(),
        });
      }
      await this.claimRecovery();
      return;
    }

    if (outcome.status === 'abandoned') {
      this.raise({
        type: 'task_abandoned',
        severity: 'warning',
        message: `Live fetch abandoned for ${task.symbol} ${task.interval}: ${outcome.error.message}`,
        symbol: task.symbol,
        interval: task.interval,
        details: { start: task.start, end: task.end, reason: outcome.reason },
        timestamp: this.now(),
      });
    }
  }

  private raise(alert: IngestionAlert): void {
    this.alerts.publish(alert).catch((error: unknown) => {
      logger.error({ event: 'alert_publish_failed', type: alert.type, error: toErrorMessage(error) }, 'Failed to publish alert');
    });
  }

  private publishHealth(): void {
    this.alerts.publishHealth(this.health.snapshots()).catch((error: unknown) => {
      logger.error({ event: 'health_publish_failed', error: toErrorMessage(error) }, 'Failed to publish health');
    });
  }
}
