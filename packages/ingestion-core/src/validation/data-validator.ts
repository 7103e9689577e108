import {
  OHLCV_FIELDS,
  type DataPoint,
  type Interval,
  type OhlcvField,
  type RawPoint,
  type ValidationConfig,
} from '@gapless/schemas';
import { ValidationFailedError, intervalToMs, isAligned, type Violation } from '@gapless/utils';

export type ValidationMode = 'ingest' | 'reconcile';

export interface ValidationBatch {
  symbol: string;
  interval: Interval;
  sourceId: string;
  points: RawPoint[];
}

export interface PlannedWrite {
  kind: 'insert' | 'confirm';
  point: DataPoint;
  /** null for inserts, the stored revision for confirmations */
  expectedRevision: number | null;
}

export interface ConflictReport {
  timestamp: number;
  existingSources: string[];
  sourceId: string;
  fields: string[];
}

export interface ValidationOutcome {
  writes: PlannedWrite[];
  unchanged: number;
  conflicts: ConflictReport[];
  /** Suspicious but accepted points; each lowers the inserted point's quality */
  anomalies: Violation[];
}

export const DEFAULT_VALIDATION_CONFIG: ValidationConfig = {
  tolerance: 0.0001,
  singleSourceQuality: 0.8,
  confirmationBoost: 0.5,
  conflictPolicy: 'reject',
  anomalyPenalty: 0.1,
  maxPriceChange: 1,
};

/**
 * Check one raw point against the OHLCV invariants
 */
export function checkPoint(point: RawPoint, interval: Interval): Violation[] {
  const violations: Violation[] = [];
  const { timestamp, open, high, low, close } = point;
  const add = (rule: string, detail: string) => violations.push({ timestamp, rule, detail });

  if (!Number.isInteger(timestamp) || !isAligned(timestamp, interval)) {
    add('alignment', `timestamp not aligned to ${interval}`);
  }
  for (const field of OHLCV_FIELDS) {
    const value = point[field];
    if (!Number.isFinite(value)) {
      add('finite', `${field} is not a finite number`);
    } else if (value < 0) {
      add('negative', `${field} ${value} < 0`);
    }
  }
  if (violations.length > 0) return violations;

  if (high < Math.max(open, close, low)) {
    add('ohlc', `high ${high} below max(open, close, low)`);
  }
  if (low > Math.min(open, close, high)) {
    add('ohlc', `low ${low} above min(open, close, high)`);
  }
  return violations;
}

/**
 * Warning-level findings for a structurally valid point: zero volume, or a
 * close more than `maxPriceChange` away from the previous close
 */
export function findAnomalies(point: RawPoint, previous: RawPoint | undefined, maxPriceChange: number): Violation[] {
  const anomalies: Violation[] = [];
  if (point.volume === 0) {
    anomalies.push({ timestamp: point.timestamp, rule: 'zero_volume', detail: 'volume is 0' });
  }
  if (previous && previous.close > 0) {
    const change = Math.abs(point.close - previous.close) / previous.close;
    if (change > maxPriceChange) {
      anomalies.push({
        timestamp: point.timestamp,
        rule: 'price_move',
        detail: `close moved ${(change * 100).toFixed(1)}% from ${previous.close}`,
      });
    }
  }
  return anomalies;
}

/**
 * Fields whose relative difference exceeds the tolerance
 */
export function differingFields(
  a: Pick<RawPoint, OhlcvField>,
  b: Pick<RawPoint, OhlcvField>,
  tolerance: number
): string[] {
  return OHLCV_FIELDS.filter((field) => {
    const x = a[field];
    const y = b[field];
    const scale = Math.max(Math.abs(x), Math.abs(y));
    return scale > 0 && Math.abs(x - y) > tolerance * scale;
  });
}

/**
 * Gatekeeper between fetched batches and the store.
 *
 * A batch fails as a whole on any structural violation, or, under the
 * `reject` conflict policy, when a point disagrees with an already
 * validated point beyond tolerance. Agreement from another source adds
 * that source and raises quality; quality never drops. Zero volume and
 * extreme moves are accepted at a lower starting quality.
 */
export class DataValidator {
  private config: ValidationConfig;

  constructor(config: Partial<ValidationConfig> = {}) {
    this.config = { ...DEFAULT_VALIDATION_CONFIG, ...config };
  }

  /**
   * @param existing - stored points covering the batch's timestamps
   * @param mode - 'reconcile' keeps stored values on disagreement regardless of policy
   * @throws ValidationFailedError
   */
  validate(batch: ValidationBatch, existing: DataPoint[], mode: ValidationMode = 'ingest'): ValidationOutcome {
    const { symbol, interval, sourceId, points } = batch;
    const violations: Violation[] = [];

    let previous: number | null = null;
    for (const point of points) {
      if (previous !== null && point.timestamp <= previous) {
        violations.push({
          timestamp: point.timestamp,
          rule: 'order',
          detail: `timestamp not after previous ${previous}`,
        });
      }
      previous = point.timestamp;
      violations.push(...checkPoint(point, interval));
    }
    if (violations.length > 0) {
      throw new ValidationFailedError(violations, { adapterId: sourceId });
    }

    const stored = new Map(existing.map((point) => [point.timestamp, point]));
    const outcome: ValidationOutcome = { writes: [], unchanged: 0, conflicts: [], anomalies: [] };
    const conflicts: Violation[] = [];
    const step = intervalToMs(interval);

    for (const [index, point] of points.entries()) {
      const current = stored.get(point.timestamp);

      if (!current || !current.validated) {
        const previous = index > 0 ? points[index - 1] : stored.get(point.timestamp - step);
        const anomalies = findAnomalies(point, previous, this.config.maxPriceChange);
        outcome.anomalies.push(...anomalies);
        outcome.writes.push({
          kind: 'insert',
          expectedRevision: current ? current.revision : null,
          point: {
            symbol,
            interval,
            ...pick(point),
            sourceId,
            sources: [sourceId],
            qualityScore: Math.max(0, this.config.singleSourceQuality - anomalies.length * this.config.anomalyPenalty),
            validated: true,
            revision: current ? current.revision : 0,
          },
        });
        continue;
      }

      const fields = differingFields(current, point, this.config.tolerance);
      if (fields.length > 0) {
        outcome.conflicts.push({
          timestamp: point.timestamp,
          existingSources: current.sources,
          sourceId,
          fields,
        });
        if (mode === 'ingest' && this.config.conflictPolicy === 'reject') {
          conflicts.push({
            timestamp: point.timestamp,
            rule: 'conflict',
            detail: `${fields.join(', ')} differ from ${current.sources.join('+')} beyond tolerance`,
          });
        }
        continue;
      }

      if (current.sources.includes(sourceId)) {
        outcome.unchanged++;
        continue;
      }

      const boosted = current.qualityScore + (1 - current.qualityScore) * this.config.confirmationBoost;
      outcome.writes.push({
        kind: 'confirm',
        expectedRevision: current.revision,
        point: {
          ...current,
          sources: [...current.sources, sourceId],
          qualityScore: Math.min(1, Math.max(current.qualityScore, boosted)),
        },
      });
    }

    if (conflicts.length > 0) {
      throw new ValidationFailedError(conflicts, { adapterId: sourceId });
    }
    return outcome;
  }
}

function pick(point: RawPoint): RawPoint {
  const { timestamp, open, high, low, close, volume } = point;
  return { timestamp, open, high, low, close, volume };
}
