import type {
  DataPoint,
  Gap,
  GapStatus,
  Interval,
  PersistenceStore,
  UpsertResult,
} from '@gapless/schemas';

function seriesKey(symbol: string, interval: Interval): string {
  return `${symbol}:${interval}`;
}

function copyPoint(point: DataPoint): DataPoint {
  return { ...point, sources: [...point.sources] };
}

/**
 * In-process PersistenceStore with the same revision semantics as the
 * Postgres store. Used by tests and by the collector's `--store memory`.
 */
export class MemoryStore implements PersistenceStore {
  private points: Map<string, Map<number, DataPoint>> = new Map();
  private gaps: Map<string, Gap> = new Map();

  async upsert(point: DataPoint, expectedRevision: number | null): Promise<UpsertResult> {
    const key = seriesKey(point.symbol, point.interval);
    let series = this.points.get(key);
    if (!series) {
      series = new Map();
      this.points.set(key, series);
    }

    const current = series.get(point.timestamp);
    const currentRevision = current ? current.revision : null;
    if (currentRevision !== expectedRevision) {
      return { status: 'conflict' };
    }

    const revision = (currentRevision ?? 0) + 1;
    series.set(point.timestamp, { ...copyPoint(point), revision });
    return { status: 'stored', revision };
  }

  async queryRange(symbol: string, interval: Interval, start: number, end: number): Promise<DataPoint[]> {
    const series = this.points.get(seriesKey(symbol, interval));
    if (!series) return [];
    return [...series.values()]
      .filter((point) => point.timestamp >= start && point.timestamp < end)
      .sort((a, b) => a.timestamp - b.timestamp)
      .map(copyPoint);
  }

  async listGaps(symbol: string, interval: Interval, status?: GapStatus): Promise<Gap[]> {
    return [...this.gaps.values()]
      .filter(
        (gap) =>
          gap.symbol === symbol &&
          gap.interval === interval &&
          (status === undefined || gap.status === status)
      )
      .sort((a, b) => a.start - b.start)
      .map((gap) => ({ ...gap }));
  }

  async getGap(id: string): Promise<Gap | null> {
    const gap = this.gaps.get(id);
    return gap ? { ...gap } : null;
  }

  async saveGap(gap: Gap): Promise<void> {
    this.gaps.set(gap.id, { ...gap });
  }

  /**
   * Number of stored points across all series
   */
  size(): number {
    let total = 0;
    for (const series of this.points.values()) total += series.size;
    return total;
  }
}
