import { EventEmitter } from 'events';
import type { Interval, RawPoint, SourceAdapter, TaskPriority } from '@gapless/schemas';
import {
  CircuitOpenError,
  SourcesExhaustedError,
  TimeoutError,
  UnavailableError,
  createLogger,
  isIngestionError,
  toError,
  toErrorMessage,
  type AdapterFailure,
} from '@gapless/utils';
import type { HealthTracker } from '../health/health-tracker';
import type { CircuitBreaker } from '../breaker/circuit-breaker';
import type { RateLimiter } from '../rate-limit/rate-limiter';

const logger = createLogger('ingestion:selector');

export interface FetchRequest {
  symbol: string;
  interval: Interval;
  start: number;
  end: number;
  priority: TaskPriority;
}

export interface FetchResult {
  adapterId: string;
  /** Clipped to [start, end), in adapter order */
  points: RawPoint[];
  latencyMs: number;
}

export interface RankedAdapter {
  adapter: SourceAdapter;
  breakerState: 'closed' | 'half_open';
  healthState: 'healthy' | 'degraded';
  averageLatencyMs: number;
  priority: number;
}

export type SourceSelectorEvents = {
  'sources-unavailable': [symbol: string, interval: Interval, failures: AdapterFailure[]];
};

export interface SourceSelectorOptions {
  adapters: SourceAdapter[];
  /** Configured tie-break priority per adapter id (lower first) */
  priorities?: Record<string, number>;
  health: HealthTracker;
  breakers: Map<string, CircuitBreaker>;
  rateLimiter: RateLimiter;
  requestTimeoutMs: number;
  now?: () => number;
}

const BREAKER_RANK = { closed: 0, half_open: 1 } as const;
const HEALTH_RANK = { healthy: 0, degraded: 1 } as const;

/**
 * Picks the adapter for each fetch and fails over down the ranking.
 *
 * Ranking: breaker state, then health state, then decayed latency, then
 * configured priority. Open breakers, busy half-open breakers and
 * suspended adapters are skipped.
 */
export class SourceSelector extends EventEmitter<SourceSelectorEvents> {
  private adapters: SourceAdapter[];
  private priorities: Record<string, number>;
  private health: HealthTracker;
  private breakers: Map<string, CircuitBreaker>;
  private rateLimiter: RateLimiter;
  private requestTimeoutMs: number;
  private now: () => number;

  constructor(options: SourceSelectorOptions) {
    super();
    this.adapters = options.adapters;
    this.priorities = options.priorities ?? {};
    this.health = options.health;
    this.breakers = options.breakers;
    this.rateLimiter = options.rateLimiter;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.now = options.now ?? (() => Date.now());
  }

  capable(symbol: string, interval: Interval): SourceAdapter[] {
    return this.adapters.filter((adapter) => adapter.supports(symbol, interval));
  }

  /**
   * Eligible adapters in attempt order, plus the reasons others were skipped
   */
  rank(symbol: string, interval: Interval): { ranked: RankedAdapter[]; skipped: AdapterFailure[] } {
    const ranked: RankedAdapter[] = [];
    const skipped: AdapterFailure[] = [];

    for (const adapter of this.capable(symbol, interval)) {
      const breaker = this.breaker(adapter.id);
      const healthState = this.health.state(adapter.id);

      if (healthState === 'suspended') {
        const until = this.health.snapshot(adapter.id).suspendedUntil;
        skipped.push({
          adapterId: adapter.id,
          error: new UnavailableError(`${adapter.id} suspended until ${until}`, { adapterId: adapter.id }),
        });
        continue;
      }
      const breakerState = breaker.state;
      if (breakerState === 'open' || !breaker.canAttempt()) {
        skipped.push({
          adapterId: adapter.id,
          error: new CircuitOpenError(adapter.id, breaker.snapshot().retryAt ?? this.now()),
        });
        continue;
      }

      ranked.push({
        adapter,
        breakerState,
        healthState,
        averageLatencyMs: this.health.snapshot(adapter.id).averageLatencyMs,
        priority: this.priorities[adapter.id] ?? 0,
      });
    }

    ranked.sort(
      (a, b) =>
        BREAKER_RANK[a.breakerState] - BREAKER_RANK[b.breakerState] ||
        HEALTH_RANK[a.healthState] - HEALTH_RANK[b.healthState] ||
        a.averageLatencyMs - b.averageLatencyMs ||
        a.priority - b.priority
    );

    return { ranked, skipped };
  }

  /**
   * Fetch from the best adapter, failing over on error.
   *
   * @throws SourcesExhaustedError when every capable adapter failed or was skipped
   */
  async fetch(request: FetchRequest, signal?: AbortSignal): Promise<FetchResult> {
    const { symbol, interval, start, end, priority } = request;
    if (this.capable(symbol, interval).length === 0) {
      throw new SourcesExhaustedError([], `No adapter supports ${symbol} ${interval}`);
    }

    const { ranked, skipped } = this.rank(symbol, interval);
    const failures: AdapterFailure[] = [...skipped];

    if (ranked.length === 0) {
      logger.error(
        { event: 'sources_unavailable', symbol, interval, skipped: skipped.map((f) => f.adapterId) },
        'Every capable adapter is suspended or open'
      );
      this.emit('sources-unavailable', symbol, interval, failures);
      throw new SourcesExhaustedError(failures);
    }

    for (const { adapter } of ranked) {
      try {
        await this.rateLimiter.acquire(adapter.id, priority, signal);
      } catch (error) {
        if (signal?.aborted) throw error;
        // local quota rejection: not the adapter's fault
        failures.push({ adapterId: adapter.id, error: toError(error) });
        continue;
      }

      const breaker = this.breaker(adapter.id);
      if (!breaker.canAttempt()) {
        failures.push({
          adapterId: adapter.id,
          error: new CircuitOpenError(adapter.id, breaker.snapshot().retryAt ?? this.now()),
        });
        continue;
      }

      const startedAt = this.now();
      try {
        const points = await breaker.execute(
          () => this.fetchWithDeadline(adapter, request, signal),
          signal
        );
        const latencyMs = this.now() - startedAt;
        this.health.record(adapter.id, 'success', latencyMs);
        logger.debug(
          { event: 'fetch_success', adapterId: adapter.id, symbol, interval, start, end, points: points.length, latencyMs },
          'Fetched points'
        );
        return { adapterId: adapter.id, points: clip(points, start, end), latencyMs };
      } catch (error) {
        if (signal?.aborted) throw error;
        if (error instanceof CircuitOpenError) {
          failures.push({ adapterId: adapter.id, error });
          continue;
        }
        this.health.record(adapter.id, 'failure', this.now() - startedAt);
        logger.warn(
          {
            event: 'fetch_failed',
            adapterId: adapter.id,
            symbol,
            interval,
            start,
            end,
            kind: isIngestionError(error) ? error.kind : 'unknown',
            error: toErrorMessage(error),
          },
          'Adapter fetch failed, trying next source'
        );
        failures.push({ adapterId: adapter.id, error: toError(error) });
      }
    }

    throw new SourcesExhaustedError(failures);
  }

  private breaker(adapterId: string): CircuitBreaker {
    const breaker = this.breakers.get(adapterId);
    if (!breaker) {
      throw new Error(`No circuit breaker registered for adapter ${adapterId}`);
    }
    return breaker;
  }

  /**
   * Run the adapter call with the per-request deadline. Adapters that ignore
   * the signal are still abandoned when the deadline passes.
   */
  private fetchWithDeadline(
    adapter: SourceAdapter,
    request: FetchRequest,
    signal?: AbortSignal
  ): Promise<RawPoint[]> {
    const deadline = AbortSignal.timeout(this.requestTimeoutMs);
    const combined = signal ? AbortSignal.any([signal, deadline]) : deadline;

    return new Promise<RawPoint[]>((resolve, reject) => {
      const onAbort = () => {
        reject(
          signal?.aborted
            ? signal.reason
            : new TimeoutError(`${adapter.id} did not answer within ${this.requestTimeoutMs}ms`, {
                adapterId: adapter.id,
              })
        );
      };
      if (combined.aborted) {
        onAbort();
        return;
      }
      combined.addEventListener('abort', onAbort, { once: true });

      adapter
        .fetch(request.symbol, request.interval, request.start, request.end, combined)
        .then(resolve, (error: unknown) => {
          if (deadline.aborted && !signal?.aborted && !isIngestionError(error)) {
            onAbort();
          } else {
            reject(error);
          }
        })
        .finally(() => combined.removeEventListener('abort', onAbort));
    });
  }
}

/**
 * Drop points outside [start, end). Order is left as the adapter returned
 * it so the validator can reject unsorted batches.
 */
export function clip(points: RawPoint[], start: number, end: number): RawPoint[] {
  return points.filter((point) => point.timestamp >= start && point.timestamp < end);
}
