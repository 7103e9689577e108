import { randomUUID } from 'crypto';
import type {
  CompletenessReport,
  Gap,
  GapConfig,
  Interval,
  PersistenceStore,
  TimeRange,
} from '@gapless/schemas';
import { alignUp, countSteps, createLogger, formatTimestamp, intervalToMs, lastClosedBoundary } from '@gapless/utils';
import { findMissingInTimestamps, overlaps, subtractRanges } from './ranges';

const logger = createLogger('ingestion:gaps');

export interface GapReconciliation {
  /** Gaps to persist (new or changed) */
  changed: Gap[];
  created: number;
  updated: number;
  resolved: number;
}

export interface GapDetectorOptions {
  store: PersistenceStore;
  collectionStart: number;
  config?: Partial<GapConfig>;
  now?: () => number;
  idFactory?: () => string;
}

export const DEFAULT_GAP_CONFIG: GapConfig = {
  scanIntervalMs: 900_000,
  maxAttempts: 5,
  retryCooldownMs: 600_000,
  scanPageSize: 5_000,
};

/**
 * Reconcile freshly detected missing ranges with stored gaps.
 *
 * - ranges inside in_progress or failed gaps are left to those gaps
 * - a missing range overlapping several pending gaps is shared among them,
 *   each keeping the part from its own start up to the next gap's start
 * - a pending gap keeps the first piece it is given; further pieces (after
 *   a partial recovery split it) become new pending gaps carrying its
 *   attempt count
 * - a pending gap left with no piece while another gap takes over its
 *   range hands its attempt count on, so merging never resets the ceiling
 * - pending gaps with nothing missing, and failed gaps fully covered,
 *   become resolved
 * - remaining ranges become new pending gaps
 *
 * Running it again with the same inputs yields no changes.
 */
export function reconcileGaps(
  missing: TimeRange[],
  stored: Gap[],
  template: Pick<Gap, 'symbol' | 'interval'>,
  now: number,
  idFactory: () => string
): GapReconciliation {
  const result: GapReconciliation = { changed: [], created: 0, updated: 0, resolved: 0 };

  const blocking = stored.filter((gap) => gap.status === 'in_progress' || gap.status === 'failed');
  const pending = stored
    .filter((gap) => gap.status === 'pending')
    .sort((a, b) => a.start - b.start);

  for (const gap of blocking) {
    if (gap.status === 'failed' && !missing.some((range) => overlaps(range, gap))) {
      result.changed.push({ ...gap, status: 'resolved', updatedAt: now });
      result.resolved++;
    }
  }

  const open = subtractRanges(missing, blocking);
  const owned = new Map<string, TimeRange[]>();
  const inheritedAttempts = new Map<string, number>();

  for (const range of open) {
    const owners = pending.filter((gap) => overlaps(gap, range));
    if (owners.length === 0) {
      result.changed.push(newGap(template, range, 0, now, idFactory));
      result.created++;
      continue;
    }

    owners.forEach((owner, index) => {
      const start = index === 0 ? range.start : Math.max(range.start, owner.start);
      const next = owners[index + 1];
      const end = next ? Math.min(range.end, Math.max(start, next.start)) : range.end;
      if (end > start) {
        const ranges = owned.get(owner.id) ?? [];
        ranges.push({ start, end });
        owned.set(owner.id, ranges);
      } else if (next) {
        inheritedAttempts.set(
          next.id,
          Math.max(inheritedAttempts.get(next.id) ?? 0, inheritedAttempts.get(owner.id) ?? 0, owner.attemptCount)
        );
      }
    });
  }

  for (const gap of pending) {
    const ranges = owned.get(gap.id);
    if (!ranges) {
      result.changed.push({ ...gap, status: 'resolved', updatedAt: now });
      result.resolved++;
      continue;
    }

    const [first, ...rest] = ranges;
    const attemptCount = Math.max(gap.attemptCount, inheritedAttempts.get(gap.id) ?? 0);
    if (first.start !== gap.start || first.end !== gap.end || attemptCount !== gap.attemptCount) {
      result.changed.push({ ...gap, start: first.start, end: first.end, attemptCount, updatedAt: now });
      result.updated++;
    }
    for (const range of rest) {
      result.changed.push(newGap(template, range, attemptCount, now, idFactory));
      result.created++;
    }
  }

  return result;
}

function newGap(
  template: Pick<Gap, 'symbol' | 'interval'>,
  range: TimeRange,
  attemptCount: number,
  now: number,
  idFactory: () => string
): Gap {
  return {
    id: idFactory(),
    symbol: template.symbol,
    interval: template.interval,
    start: range.start,
    end: range.end,
    status: 'pending',
    attemptCount,
    lastAttemptAt: null,
    lastError: null,
    detectedAt: now,
    updatedAt: now,
  };
}

/**
 * Finds missing expected timestamps between the collection start and the
 * last closed interval, and keeps the stored gap set in step with them.
 */
export class GapDetector {
  private store: PersistenceStore;
  private collectionStart: number;
  private config: GapConfig;
  private now: () => number;
  private idFactory: () => string;

  constructor(options: GapDetectorOptions) {
    this.store = options.store;
    this.collectionStart = options.collectionStart;
    this.config = { ...DEFAULT_GAP_CONFIG, ...options.config };
    this.now = options.now ?? (() => Date.now());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Expected range for a series: [first aligned step >= collection start, last closed boundary)
   */
  expectedRange(interval: Interval): TimeRange {
    return {
      start: alignUp(this.collectionStart, interval),
      end: lastClosedBoundary(this.now(), interval),
    };
  }

  /**
   * Missing ranges within [start, end), paging through the store
   */
  async findMissingRanges(symbol: string, interval: Interval, start: number, end: number): Promise<TimeRange[]> {
    const stepMs = intervalToMs(interval);
    const pageMs = stepMs * this.config.scanPageSize;
    const ranges: TimeRange[] = [];
    const from = alignUp(start, interval);

    for (let pageStart = from; pageStart < end; pageStart += pageMs) {
      const pageEnd = Math.min(pageStart + pageMs, end);
      const points = await this.store.queryRange(symbol, interval, pageStart, pageEnd);
      const present = points.map((point) => point.timestamp);
      for (const range of findMissingInTimestamps(present, pageStart, pageEnd, stepMs)) {
        const last = ranges[ranges.length - 1];
        if (last && last.end === range.start) {
          last.end = range.end;
        } else {
          ranges.push(range);
        }
      }
    }

    return ranges;
  }

  /**
   * Scan a series and persist the reconciled gap set
   */
  async detect(symbol: string, interval: Interval): Promise<GapReconciliation> {
    const expected = this.expectedRange(interval);
    const missing = await this.findMissingRanges(symbol, interval, expected.start, expected.end);
    const stored = await this.store.listGaps(symbol, interval);
    const active = stored.filter((gap) => gap.status !== 'resolved');

    const result = reconcileGaps(missing, active, { symbol, interval }, this.now(), this.idFactory);
    for (const gap of result.changed) {
      await this.store.saveGap(gap);
    }

    if (result.changed.length > 0) {
      logger.info(
        {
          event: 'gap_scan',
          symbol,
          interval,
          missingRanges: missing.length,
          created: result.created,
          updated: result.updated,
          resolved: result.resolved,
          oldestMissing: missing.length > 0 ? formatTimestamp(missing[0].start) : null,
        },
        `Gap scan ${symbol} ${interval}: ${result.created} new, ${result.resolved} resolved`
      );
    } else {
      logger.debug({ event: 'gap_scan', symbol, interval, missingRanges: missing.length }, 'Gap scan found no changes');
    }

    return result;
  }

  /**
   * Completeness of a series over its expected range
   */
  async completeness(symbol: string, interval: Interval): Promise<CompletenessReport> {
    const { start, end } = this.expectedRange(interval);
    const missingRanges = await this.findMissingRanges(symbol, interval, start, end);
    const expectedPoints = countSteps(start, end, interval);
    const missingPoints = missingRanges.reduce(
      (sum, range) => sum + countSteps(range.start, range.end, interval),
      0
    );
    const presentPoints = expectedPoints - missingPoints;

    return {
      symbol,
      interval,
      rangeStart: start,
      rangeEnd: end,
      expectedPoints,
      presentPoints,
      missingPoints,
      completeness: expectedPoints > 0 ? presentPoints / expectedPoints : 1,
      missingRanges,
    };
  }
}
