import { and, asc, eq, gte, lt } from 'drizzle-orm';
import type { DataPoint, Gap, GapStatus, Interval, PersistenceStore, UpsertResult } from '@gapless/schemas';
import { createLogger } from '@gapless/utils';
import type { Database } from '../client';
import { dataGaps, dataPoints } from '../schema';
import { fromGapRow, fromPointRow, gapColumns, toGapRow, toPointRow } from './mappers';

const logger = createLogger('database:store');

/**
 * PersistenceStore on PostgreSQL.
 *
 * Inserts rely on the (symbol, interval, timestamp) unique constraint and
 * updates on the revision column, so concurrent writers surface as
 * `conflict` instead of overwriting each other.
 */
export class PostgresStore implements PersistenceStore {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async upsert(point: DataPoint, expectedRevision: number | null): Promise<UpsertResult> {
    const row = toPointRow(point);

    if (expectedRevision === null) {
      const inserted = await this.db
        .insert(dataPoints)
        .values({ ...row, revision: 1 })
        .onConflictDoNothing({ target: [dataPoints.symbol, dataPoints.interval, dataPoints.timestamp] })
        .returning({ revision: dataPoints.revision });
      const [stored] = inserted;
      return stored ? { status: 'stored', revision: stored.revision } : { status: 'conflict' };
    }

    const updated = await this.db
      .update(dataPoints)
      .set({ ...row, revision: expectedRevision + 1, updatedAt: new Date() })
      .where(
        and(
          eq(dataPoints.symbol, point.symbol),
          eq(dataPoints.interval, point.interval),
          eq(dataPoints.timestamp, point.timestamp),
          eq(dataPoints.revision, expectedRevision)
        )
      )
      .returning({ revision: dataPoints.revision });
    const [stored] = updated;
    if (!stored) {
      logger.debug(
        { event: 'revision_conflict', symbol: point.symbol, interval: point.interval, timestamp: point.timestamp },
        'Point changed since it was read'
      );
      return { status: 'conflict' };
    }
    return { status: 'stored', revision: stored.revision };
  }

  async queryRange(symbol: string, interval: Interval, start: number, end: number): Promise<DataPoint[]> {
    const rows = await this.db
      .select()
      .from(dataPoints)
      .where(
        and(
          eq(dataPoints.symbol, symbol),
          eq(dataPoints.interval, interval),
          gte(dataPoints.timestamp, start),
          lt(dataPoints.timestamp, end)
        )
      )
      .orderBy(asc(dataPoints.timestamp));
    return rows.map(fromPointRow);
  }

  async listGaps(symbol: string, interval: Interval, status?: GapStatus): Promise<Gap[]> {
    const rows = await this.db
      .select()
      .from(dataGaps)
      .where(
        and(
          eq(dataGaps.symbol, symbol),
          eq(dataGaps.interval, interval),
          status ? eq(dataGaps.status, status) : undefined
        )
      )
      .orderBy(asc(dataGaps.rangeStart));
    return rows.map(fromGapRow);
  }

  async getGap(id: string): Promise<Gap | null> {
    const [row] = await this.db.select().from(dataGaps).where(eq(dataGaps.id, id)).limit(1);
    return row ? fromGapRow(row) : null;
  }

  async saveGap(gap: Gap): Promise<void> {
    await this.db
      .insert(dataGaps)
      .values(toGapRow(gap))
      .onConflictDoUpdate({ target: dataGaps.id, set: gapColumns(gap) });
  }
}
