import { randomUUID } from 'crypto';
import type {
  BackfillConfig,
  FetchTask,
  Gap,
  Interval,
  PersistenceStore,
  Series,
  SourceAdapter,
  TimeRange,
} from '@gapless/schemas';
import { countSteps, createLogger, formatTimestamp, intervalToMs } from '@gapless/utils';
import type { GapDetector } from '../gaps/gap-detector';
import { splitRange } from '../gaps/ranges';

const logger = createLogger('ingestion:recovery');

export type ChunkOutcome = { ok: true } | { ok: false; error: Error };

interface ActiveGap {
  gap: Gap;
  remaining: number;
  errors: string[];
}

export interface RecoveryOrchestratorOptions {
  store: PersistenceStore;
  detector: GapDetector;
  adapters: SourceAdapter[];
  config?: Partial<BackfillConfig>;
  /** Recovery passes before a gap is marked failed */
  maxAttempts: number;
  /** Minimum time between passes over the same gap */
  retryCooldownMs?: number;
  now?: () => number;
  idFactory?: () => string;
}

export const DEFAULT_BACKFILL_CONFIG: BackfillConfig = {
  maxChunkPoints: 500,
  maxConcurrentGaps: 3,
};

/**
 * Turns pending gaps into backfill tasks and settles them.
 *
 * Each claim is one recovery pass: the gap goes in_progress with its
 * attempt count raised, and is split into chunks no larger than the
 * smallest response limit of the adapters that can serve it. When every
 * chunk has settled the store is checked again: nothing missing resolves
 * the gap, otherwise it returns to pending or, at the attempt ceiling,
 * becomes failed.
 */
export class RecoveryOrchestrator {
  private store: PersistenceStore;
  private detector: GapDetector;
  private adapters: SourceAdapter[];
  private config: BackfillConfig;
  private maxAttempts: number;
  private retryCooldownMs: number;
  private now: () => number;
  private idFactory: () => string;
  private active: Map<string, ActiveGap> = new Map();

  constructor(options: RecoveryOrchestratorOptions) {
    this.store = options.store;
    this.detector = options.detector;
    this.adapters = options.adapters;
    this.config = { ...DEFAULT_BACKFILL_CONFIG, ...options.config };
    this.maxAttempts = options.maxAttempts;
    this.retryCooldownMs = options.retryCooldownMs ?? 0;
    this.now = options.now ?? (() => Date.now());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  get activeCount(): number {
    return this.active.size;
  }

  /**
   * Largest chunk, in points, any capable adapter can return in one request
   */
  chunkLimit(symbol: string, interval: Interval): number {
    const limits = this.adapters
      .filter((adapter) => adapter.supports(symbol, interval))
      .map((adapter) => adapter.maxPointsPerRequest);
    return Math.min(this.config.maxChunkPoints, ...limits);
  }

  planChunks(gap: Gap): TimeRange[] {
    return splitRange(gap, intervalToMs(gap.interval), this.chunkLimit(gap.symbol, gap.interval));
  }

  /**
   * Claim pending gaps, oldest first, up to the concurrency limit. Gaps
   * attempted within the retry cooldown wait for a later claim.
   */
  async claim(series: Series[]): Promise<FetchTask[]> {
    const slots = this.config.maxConcurrentGaps - this.active.size;
    if (slots <= 0) return [];

    const now = this.now();
    const pending: Gap[] = [];
    for (const { symbol, interval } of series) {
      const gaps = await this.store.listGaps(symbol, interval, 'pending');
      pending.push(
        ...gaps.filter((gap) => gap.lastAttemptAt === null || now - gap.lastAttemptAt >= this.retryCooldownMs)
      );
    }
    pending.sort((a, b) => a.start - b.start || a.detectedAt - b.detectedAt);

    const tasks: FetchTask[] = [];
    for (const gap of pending.slice(0, slots)) {
      const at = this.now();
      const claimed: Gap = {
        ...gap,
        status: 'in_progress',
        attemptCount: gap.attemptCount + 1,
        lastAttemptAt: at,
        updatedAt: at,
      };
      await this.store.saveGap(claimed);

      const chunks = this.planChunks(claimed);
      this.active.set(claimed.id, { gap: claimed, remaining: chunks.length, errors: [] });

      for (const chunk of chunks) {
        tasks.push({
          id: this.idFactory(),
          symbol: claimed.symbol,
          interval: claimed.interval,
          start: chunk.start,
          end: chunk.end,
          priority: 'backfill',
          origin: { kind: 'gap', gapId: claimed.id },
          attempt: 0,
          notBefore: 0,
        });
      }

      logger.info(
        {
          event: 'gap_claimed',
          gapId: claimed.id,
          symbol: claimed.symbol,
          interval: claimed.interval,
          start: formatTimestamp(claimed.start),
          end: formatTimestamp(claimed.end),
          points: countSteps(claimed.start, claimed.end, claimed.interval),
          chunks: chunks.length,
          attempt: claimed.attemptCount,
        },
        `Backfilling gap ${claimed.symbol} ${claimed.interval} (attempt ${claimed.attemptCount})`
      );
    }

    return tasks;
  }

  /**
   * Record a finished chunk. Returns the gap in its final state once every
   * chunk of the pass has settled, otherwise null.
   */
  async settleChunk(gapId: string, outcome: ChunkOutcome): Promise<Gap | null> {
    const entry = this.active.get(gapId);
    if (!entry) {
      logger.warn({ event: 'chunk_unknown_gap', gapId }, 'Settled chunk for a gap that is not active');
      return null;
    }

    entry.remaining--;
    if (!outcome.ok) entry.errors.push(outcome.error.message);
    if (entry.remaining > 0) return null;

    this.active.delete(gapId);
    const { gap } = entry;
    const missing = await this.detector.findMissingRanges(gap.symbol, gap.interval, gap.start, gap.end);
    const at = this.now();

    let settled: Gap;
    if (missing.length === 0) {
      settled = { ...gap, status: 'resolved', lastError: null, updatedAt: at };
    } else {
      const missingPoints = missing.reduce((sum, r) => sum + countSteps(r.start, r.end, gap.interval), 0);
      const lastError = entry.errors[entry.errors.length - 1] ?? `${missingPoints} points still missing`;
      settled = {
        ...gap,
        status: gap.attemptCount >= this.maxAttempts ? 'failed' : 'pending',
        lastError,
        updatedAt: at,
      };
    }
    await this.store.saveGap(settled);

    const logData = {
      event: 'gap_settled',
      gapId,
      symbol: gap.symbol,
      interval: gap.interval,
      status: settled.status,
      attempt: gap.attemptCount,
      lastError: settled.lastError,
    };
    if (settled.status === 'failed') {
      logger.error(logData, `Gap ${gap.symbol} ${gap.interval} failed after ${gap.attemptCount} attempts`);
    } else {
      logger.info(logData, `Gap ${gap.symbol} ${gap.interval} ${settled.status}`);
    }

    return settled;
  }

  /**
   * Put a failed gap back in the queue with a fresh attempt budget
   */
  async requeue(gapId: string): Promise<Gap | null> {
    const gap = await this.store.getGap(gapId);
    if (!gap) return null;
    if (gap.status !== 'failed') return gap;

    const requeued: Gap = { ...gap, status: 'pending', attemptCount: 0, lastError: null, updatedAt: this.now() };
    await this.store.saveGap(requeued);
    logger.info({ event: 'gap_requeued', gapId, symbol: gap.symbol, interval: gap.interval }, 'Requeued failed gap');
    return requeued;
  }

  async requeueFailed(series: Series[]): Promise<number> {
    let count = 0;
    for (const { symbol, interval } of series) {
      for (const gap of await this.store.listGaps(symbol, interval, 'failed')) {
        await this.requeue(gap.id);
        count++;
      }
    }
    return count;
  }

  /**
   * Return in_progress gaps left by an earlier run to pending
   */
  async recoverStale(series: Series[]): Promise<number> {
    let count = 0;
    for (const { symbol, interval } of series) {
      for (const gap of await this.store.listGaps(symbol, interval, 'in_progress')) {
        if (this.active.has(gap.id)) continue;
        await this.store.saveGap({ ...gap, status: 'pending', updatedAt: this.now() });
        count++;
      }
    }
    if (count > 0) {
      logger.warn({ event: 'stale_gaps_recovered', count }, `Returned ${count} interrupted gaps to pending`);
    }
    return count;
  }

  /**
   * Forget in-flight passes (after shutdown cancelled their chunks)
   */
  abandonActive(): void {
    this.active.clear();
  }
}
