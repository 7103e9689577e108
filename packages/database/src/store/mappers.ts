import { DataPointSchema, GapSchema, type DataPoint, type Gap } from '@gapless/schemas';
import type { DataGapRow, DataPointRow, NewDataGapRow, NewDataPointRow } from '../schema';

/**
 * Column values for a point; revision is set by the store
 */
export function toPointRow(point: DataPoint): Omit<NewDataPointRow, 'revision'> {
  return {
    symbol: point.symbol,
    interval: point.interval,
    timestamp: point.timestamp,
    open: String(point.open),
    high: String(point.high),
    low: String(point.low),
    close: String(point.close),
    volume: String(point.volume),
    sourceId: point.sourceId,
    sources: point.sources,
    qualityScore: point.qualityScore,
    validated: point.validated,
  };
}

/**
 * @throws ZodError when the row holds values the engine cannot represent
 */
export function fromPointRow(row: DataPointRow): DataPoint {
  return DataPointSchema.parse({
    symbol: row.symbol,
    interval: row.interval,
    timestamp: row.timestamp,
    open: Number(row.open),
    high: Number(row.high),
    low: Number(row.low),
    close: Number(row.close),
    volume: Number(row.volume),
    sourceId: row.sourceId,
    sources: row.sources,
    qualityScore: row.qualityScore,
    validated: row.validated,
    revision: row.revision,
  });
}

export function toGapRow(gap: Gap): NewDataGapRow {
  return { id: gap.id, ...gapColumns(gap) };
}

/**
 * Every gap column except the primary key
 */
export function gapColumns(gap: Gap): Omit<NewDataGapRow, 'id'> {
  return {
    symbol: gap.symbol,
    interval: gap.interval,
    rangeStart: gap.start,
    rangeEnd: gap.end,
    status: gap.status,
    attemptCount: gap.attemptCount,
    lastAttemptAt: gap.lastAttemptAt,
    lastError: gap.lastError,
    detectedAt: gap.detectedAt,
    updatedAt: gap.updatedAt,
  };
}

export function fromGapRow(row: DataGapRow): Gap {
  return GapSchema.parse({
    id: row.id,
    symbol: row.symbol,
    interval: row.interval,
    start: row.rangeStart,
    end: row.rangeEnd,
    status: row.status,
    attemptCount: row.attemptCount,
    lastAttemptAt: row.lastAttemptAt,
    lastError: row.lastError,
    detectedAt: row.detectedAt,
    updatedAt: row.updatedAt,
  });
}
