import type { RateLimitConfig, TaskPriority } from '@gapless/schemas';
import { RateLimitedError, createLogger } from '@gapless/utils';

const logger = createLogger('ingestion:rate-limiter');

interface Waiter {
  priority: TaskPriority;
  resolve: () => void;
  reject: (error: unknown) => void;
  cleanup: () => void;
}

interface Bucket {
  quota: number;
  /** Grant timestamps inside the current window, oldest first */
  grants: number[];
  live: Waiter[];
  backfill: Waiter[];
  lastBackfillGrantAt: number | null;
  timer: ReturnType<typeof setTimeout> | null;
}

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  windowMs: 60_000,
  maxWaitMs: 120_000,
};

/**
 * Sliding-window request quota per adapter.
 *
 * Live waiters are served first, except that backfill gets the next free
 * token when it has had none in the last window, so backfill always
 * progresses. A request still waiting after `maxWaitMs` fails with
 * RateLimited; such rejections are local and never reach the adapter.
 */
export class RateLimiter {
  private buckets: Map<string, Bucket> = new Map();
  private config: RateLimitConfig;
  private now: () => number;

  constructor(config: Partial<RateLimitConfig> = {}, now: () => number = () => Date.now()) {
    this.config = { ...DEFAULT_RATE_LIMIT_CONFIG, ...config };
    this.now = now;
  }

  register(adapterId: string, quota: number): void {
    this.buckets.set(adapterId, {
      quota,
      grants: [],
      live: [],
      backfill: [],
      lastBackfillGrantAt: null,
      timer: null,
    });
  }

  /**
   * Wait for a request token
   */
  acquire(adapterId: string, priority: TaskPriority, signal?: AbortSignal): Promise<void> {
    const bucket = this.bucket(adapterId);
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    this.prune(bucket);
    if (bucket.live.length === 0 && bucket.backfill.length === 0 && bucket.grants.length < bucket.quota) {
      this.grant(bucket, priority);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const queue = priority === 'live' ? bucket.live : bucket.backfill;

      const remove = () => {
        const index = queue.indexOf(waiter);
        if (index >= 0) queue.splice(index, 1);
        waiter.cleanup();
      };

      const timeout = setTimeout(() => {
        remove();
        const retryAfterMs = this.msUntilFree(bucket);
        logger.warn(
          { event: 'rate_limit_wait_exceeded', adapterId, priority, waitedMs: this.config.maxWaitMs },
          'Gave up waiting for a rate limit token'
        );
        reject(
          new RateLimitedError(`Rate limit wait exceeded for ${adapterId}`, { adapterId, retryAfterMs })
        );
      }, this.config.maxWaitMs);

      const onAbort = () => {
        remove();
        reject(signal?.reason);
      };

      const waiter: Waiter = {
        priority,
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timeout);
          signal?.removeEventListener('abort', onAbort);
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      queue.push(waiter);
      logger.debug(
        { event: 'rate_limit_queued', adapterId, priority, queued: bucket.live.length + bucket.backfill.length },
        'Waiting for rate limit token'
      );
      this.drain(bucket);
    });
  }

  /**
   * Tokens free right now
   */
  available(adapterId: string): number {
    const bucket = this.bucket(adapterId);
    this.prune(bucket);
    return Math.max(0, bucket.quota - bucket.grants.length);
  }

  pending(adapterId: string): number {
    const bucket = this.bucket(adapterId);
    return bucket.live.length + bucket.backfill.length;
  }

  /**
   * Reject every waiter and stop timers
   */
  close(reason: unknown = new Error('Rate limiter closed')): void {
    for (const bucket of this.buckets.values()) {
      if (bucket.timer) clearTimeout(bucket.timer);
      bucket.timer = null;
      for (const waiter of [...bucket.live, ...bucket.backfill]) {
        waiter.cleanup();
        waiter.reject(reason);
      }
      bucket.live = [];
      bucket.backfill = [];
    }
  }

  private bucket(adapterId: string): Bucket {
    const bucket = this.buckets.get(adapterId);
    if (!bucket) {
      throw new Error(`No rate limit registered for adapter ${adapterId}`);
    }
    return bucket;
  }

  private prune(bucket: Bucket): void {
    const cutoff = this.now() - this.config.windowMs;
    while (bucket.grants.length > 0 && bucket.grants[0] <= cutoff) {
      bucket.grants.shift();
    }
  }

  private grant(bucket: Bucket, priority: TaskPriority): void {
    const at = this.now();
    bucket.grants.push(at);
    if (priority === 'backfill') {
      bucket.lastBackfillGrantAt = at;
    }
  }

  private nextWaiter(bucket: Bucket): Waiter | undefined {
    const backfillStarved =
      bucket.lastBackfillGrantAt === null ||
      this.now() - bucket.lastBackfillGrantAt >= this.config.windowMs;
    if (bucket.backfill.length > 0 && (backfillStarved || bucket.live.length === 0)) {
      return bucket.backfill.shift();
    }
    return bucket.live.shift();
  }

  private drain(bucket: Bucket): void {
    this.prune(bucket);
    while (bucket.grants.length < bucket.quota) {
      const waiter = this.nextWaiter(bucket);
      if (!waiter) break;
      waiter.cleanup();
      this.grant(bucket, waiter.priority);
      waiter.resolve();
    }

    if (bucket.live.length + bucket.backfill.length > 0 && !bucket.timer) {
      bucket.timer = setTimeout(() => {
        bucket.timer = null;
        this.drain(bucket);
      }, this.msUntilFree(bucket));
    }
  }

  private msUntilFree(bucket: Bucket): number {
    if (bucket.grants.length < bucket.quota) return 0;
    return Math.max(1, bucket.grants[0] + this.config.windowMs - this.now());
  }
}
