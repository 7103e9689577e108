import type { Interval } from '../market/interval.schema';
import type { DataPoint } from '../market/data-point.schema';
import type { Gap, GapStatus } from '../ingestion/gap.schema';
import type { IngestionAlert } from '../ingestion/alert.schema';
import type { SourceHealth } from '../ingestion/source-health.schema';

export type UpsertResult =
  | { status: 'stored'; revision: number }
  | { status: 'conflict' };

/**
 * Storage contract for data points and gaps.
 *
 * `upsert` is an optimistic write: `expectedRevision` null means the point
 * must not exist yet; a number means the stored revision must match.
 */
export interface PersistenceStore {
  upsert(point: DataPoint, expectedRevision: number | null): Promise<UpsertResult>;
  /** Points with start <= timestamp < end, ascending */
  queryRange(symbol: string, interval: Interval, start: number, end: number): Promise<DataPoint[]>;
  listGaps(symbol: string, interval: Interval, status?: GapStatus): Promise<Gap[]>;
  getGap(id: string): Promise<Gap | null>;
  saveGap(gap: Gap): Promise<void>;
}

/**
 * Destination for systemic alerts and periodic health snapshots
 */
export interface AlertSink {
  publish(alert: IngestionAlert): Promise<void>;
  publishHealth(snapshots: SourceHealth[]): Promise<void>;
}
