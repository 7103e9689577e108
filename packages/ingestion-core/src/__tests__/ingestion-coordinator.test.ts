import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  IngestionConfigSchema,
  type AlertSink,
  type DataPoint,
  type IngestionAlert,
  type IngestionConfigInput,
  type SourceHealth,
  type UpsertResult,
} from '@gapless/schemas';
import { AuthError, ConfigurationError, TimeoutError, UnavailableError, ValidationFailedError } from '@gapless/utils';
import { IngestionCoordinator } from '../coordinator/ingestion-coordinator';
import { MemoryStore } from '../store/memory-store';
import { BASE_TS, FakeAdapter, HOUR, makePoint, makePoints, sequentialIds, serveRange } from './helpers';

class RecordingAlertSink implements AlertSink {
  alerts: IngestionAlert[] = [];
  health: SourceHealth[][] = [];

  async publish(alert: IngestionAlert): Promise<void> {
    this.alerts.push(alert);
  }

  async publishHealth(snapshots: SourceHealth[]): Promise<void> {
    this.health.push(snapshots);
  }
}

/** Reports a concurrent writer for the first `conflicts` upserts */
class ContendedStore extends MemoryStore {
  constructor(private conflicts: number) {
    super();
  }

  async upsert(point: DataPoint, expectedRevision: number | null): Promise<UpsertResult> {
    if (this.conflicts > 0) {
      this.conflicts--;
      return { status: 'conflict' };
    }
    return super.upsert(point, expectedRevision);
  }
}

function buildConfig(overrides: Partial<IngestionConfigInput> = {}) {
  return IngestionConfigSchema.parse({
    symbols: ['BTCUSDT'],
    intervals: ['1h'],
    collectionStart: BASE_TS,
    adapters: [
      { id: 'a', provider: 'binance', quotaPerMinute: 1200 },
      { id: 'b', provider: 'coinbase', quotaPerMinute: 600, priority: 1 },
    ],
    ...overrides,
  });
}

describe('IngestionCoordinator', () => {
  let store: MemoryStore;
  let alerts: RecordingAlertSink;
  let coordinator: IngestionCoordinator | null;

  beforeEach(() => {
    vi.useFakeTimers();
    store = new MemoryStore();
    alerts = new RecordingAlertSink();
    coordinator = null;
  });

  afterEach(async () => {
    if (coordinator) {
      await coordinator.idle();
      await coordinator.stop(0);
    }
    vi.useRealTimers();
  });

  describe('construction', () => {
    it('should reject a configured adapter without an instance', () => {
      expect(() => new IngestionCoordinator({ config: buildConfig(), adapters: [new FakeAdapter('a')], store })).toThrow(
        new ConfigurationError("No adapter instance for configured adapter 'b'")
      );
    });

    it('should require at least one enabled adapter', () => {
      const config = buildConfig({ adapters: [{ id: 'a', provider: 'binance', quotaPerMinute: 10, enabled: false }] });
      expect(() => new IngestionCoordinator({ config, adapters: [], store })).toThrow(ConfigurationError);
    });

    it('should report an idle status before starting', () => {
      const idle = new IngestionCoordinator({
        config: buildConfig(),
        adapters: [new FakeAdapter('a'), new FakeAdapter('b')],
        store,
      });

      const status = idle.status();

      expect(status.running).toBe(false);
      expect(status.series).toEqual([{ symbol: 'BTCUSDT', interval: '1h' }]);
      expect(status.queue).toEqual({ queuedLive: 0, queuedBackfill: 0, running: 0, accepting: true });
      expect(status.activeGaps).toBe(0);
      expect(status.health.map((h) => [h.adapterId, h.state])).toEqual([
        ['a', 'healthy'],
        ['b', 'healthy'],
      ]);
      expect(status.breakers.a.state).toBe('closed');
    });
  });

  describe('ingest', () => {
    let ingesting: IngestionCoordinator;

    beforeEach(() => {
      ingesting = new IngestionCoordinator({
        config: buildConfig(),
        adapters: [new FakeAdapter('a'), new FakeAdapter('b')],
        store,
        alerts,
      });
      coordinator = ingesting;
    });

    it('should merge agreeing values from two sources into one point', async () => {
      const point = { ...makePoint(BASE_TS), high: 110, low: 99, close: 100 };
      const first = await ingesting.ingest('BTCUSDT', '1h', 'a', [point]);
      const second = await ingesting.ingest('BTCUSDT', '1h', 'b', [{ ...point, close: 100.005 }]);

      expect(first).toMatchObject({ inserted: 1, confirmed: 0 });
      expect(second).toMatchObject({ inserted: 0, confirmed: 1 });
      const stored = await store.queryRange('BTCUSDT', '1h', BASE_TS, BASE_TS + HOUR);
      expect(stored).toHaveLength(1);
      expect(stored[0].sources).toEqual(['a', 'b']);
      expect(stored[0].close).toBe(100);
      expect(stored[0].qualityScore).toBeCloseTo(0.9, 10);
      expect(stored[0].revision).toBe(2);
    });

    it('should reject a second source that disagrees beyond tolerance', async () => {
      const point = { ...makePoint(BASE_TS), high: 110, low: 99, close: 100 };
      await ingesting.ingest('BTCUSDT', '1h', 'a', [point]);

      await expect(
        ingesting.ingest('BTCUSDT', '1h', 'b', [{ ...point, close: 100.02 }])
      ).rejects.toBeInstanceOf(ValidationFailedError);

      const stored = await store.queryRange('BTCUSDT', '1h', BASE_TS, BASE_TS + HOUR);
      expect(stored[0]).toMatchObject({ close: 100, sources: ['a'], revision: 1 });
    });

    it('should leave the store unchanged when a batch is ingested twice', async () => {
      const points = makePoints(BASE_TS, BASE_TS + 5 * HOUR);
      await ingesting.ingest('BTCUSDT', '1h', 'a', points);
      const before = await store.queryRange('BTCUSDT', '1h', BASE_TS, BASE_TS + 5 * HOUR);

      const again = await ingesting.ingest('BTCUSDT', '1h', 'a', points);

      expect(again).toEqual({ inserted: 0, confirmed: 0, unchanged: 5, conflicts: [] });
      expect(await store.queryRange('BTCUSDT', '1h', BASE_TS, BASE_TS + 5 * HOUR)).toEqual(before);
    });
  });

  describe('write conflicts', () => {
    it('should re-validate after a concurrent write', async () => {
      const contended = new ContendedStore(1);
      const local = new IngestionCoordinator({
        config: buildConfig(),
        adapters: [new FakeAdapter('a'), new FakeAdapter('b')],
        store: contended,
      });

      const result = await local.ingest('BTCUSDT', '1h', 'a', [makePoint(BASE_TS)]);

      expect(result.inserted).toBe(1);
      expect(contended.size()).toBe(1);
    });

    it('should give up after repeated conflicts', async () => {
      const local = new IngestionCoordinator({
        config: buildConfig(),
        adapters: [new FakeAdapter('a'), new FakeAdapter('b')],
        store: new ContendedStore(10),
      });

      await expect(local.ingest('BTCUSDT', '1h', 'a', [makePoint(BASE_TS)])).rejects.toThrow(
        new UnavailableError('Write conflicts persisted for BTCUSDT 1h')
      );
    });
  });

  describe('live collection', () => {
    it('should record exactly the missing tail of a partial live window as one gap when its recovery times out', async () => {
      vi.setSystemTime(BASE_TS + 30 * 60 * 1000);
      const tail = BASE_TS + 100 * HOUR;
      const served = serveRange({ start: BASE_TS, end: tail });
      const adapter = new FakeAdapter('a', (call) => {
        if (call.start >= tail) throw new TimeoutError('request timed out');
        return served(call);
      });
      const running = new IngestionCoordinator({
        config: buildConfig({
          adapters: [{ id: 'a', provider: 'binance', quotaPerMinute: 1200 }],
          retry: { maxAttempts: 1 },
          scheduler: { livePeriodMs: 120 * HOUR, liveLookbackPoints: 120 },
          gaps: { scanIntervalMs: 240 * HOUR },
        }),
        adapters: [adapter],
        store,
        alerts,
        idFactory: sequentialIds(),
      });
      coordinator = running;

      await running.start();
      await vi.advanceTimersByTimeAsync(120 * HOUR);
      await running.idle();

      expect(adapter.calls).toContainEqual({ symbol: 'BTCUSDT', interval: '1h', start: BASE_TS, end: BASE_TS + 120 * HOUR });
      expect(adapter.calls).toContainEqual({ symbol: 'BTCUSDT', interval: '1h', start: tail, end: BASE_TS + 120 * HOUR });

      const stored = await store.queryRange('BTCUSDT', '1h', BASE_TS, BASE_TS + 120 * HOUR);
      expect(stored).toHaveLength(100);
      expect(new Set(stored.map((point) => point.timestamp)).size).toBe(100);
      expect(store.size()).toBe(100);

      const gaps = await store.listGaps('BTCUSDT', '1h');
      expect(gaps).toHaveLength(1);
      expect(gaps[0]).toMatchObject({
        start: tail,
        end: BASE_TS + 120 * HOUR,
        status: 'pending',
        attemptCount: 1,
        lastError: 'All sources failed: a=request timed out',
      });

      const report = await running.completeness('BTCUSDT', '1h');
      expect(report).toMatchObject({ expectedPoints: 120, presentPoints: 100, missingPoints: 20 });
    });

    it('should note the points still missing when a recovery pass returns nothing', async () => {
      vi.setSystemTime(BASE_TS + 30 * 60 * 1000);
      const running = new IngestionCoordinator({
        config: buildConfig({
          adapters: [{ id: 'a', provider: 'binance', quotaPerMinute: 1200 }],
          scheduler: { livePeriodMs: 120 * HOUR, liveLookbackPoints: 120 },
          gaps: { scanIntervalMs: 240 * HOUR },
        }),
        adapters: [new FakeAdapter('a', serveRange({ start: BASE_TS, end: BASE_TS + 100 * HOUR }))],
        store,
        alerts,
        idFactory: sequentialIds(),
      });
      coordinator = running;

      await running.start();
      await vi.advanceTimersByTimeAsync(120 * HOUR);
      await running.idle();

      const gaps = await store.listGaps('BTCUSDT', '1h');
      expect(gaps).toHaveLength(1);
      expect(gaps[0]).toMatchObject({ status: 'pending', attemptCount: 1, lastError: '20 points still missing' });
    });

    it('should alert when a gap exhausts its recovery attempts', async () => {
      vi.setSystemTime(BASE_TS + 3 * HOUR + 30 * 60 * 1000);
      const adapter = new FakeAdapter('a', () => {
        throw new AuthError('bad key');
      });
      const running = new IngestionCoordinator({
        config: buildConfig({
          adapters: [{ id: 'a', provider: 'binance', quotaPerMinute: 1200 }],
          scheduler: { livePeriodMs: 240 * HOUR },
          gaps: { scanIntervalMs: 240 * HOUR, maxAttempts: 1 },
        }),
        adapters: [adapter],
        store,
        alerts,
      });
      coordinator = running;

      await running.start();
      await running.idle();

      const failed = alerts.alerts.filter((alert) => alert.type === 'gap_failed');
      expect(failed).toHaveLength(1);
      expect(failed[0]).toMatchObject({
        severity: 'warning',
        message: 'Gap BTCUSDT 1h failed after 1 attempts',
        details: { start: BASE_TS, end: BASE_TS + 3 * HOUR, lastError: 'All sources failed: a=bad key' },
      });

      const abandoned = alerts.alerts.filter((alert) => alert.type === 'task_abandoned');
      expect(abandoned.map((alert) => alert.message)).toEqual([
        'Live fetch abandoned for BTCUSDT 1h: All sources failed: a=bad key',
      ]);

      const [gap] = await store.listGaps('BTCUSDT', '1h');
      expect(gap.status).toBe('failed');
      expect(await running.requeueFailedGaps()).toBe(1);
    });

    it('should refuse to restart once stopped', async () => {
      vi.setSystemTime(BASE_TS + 30 * 60 * 1000);
      const once = new IngestionCoordinator({
        config: buildConfig({ adapters: [{ id: 'a', provider: 'binance', quotaPerMinute: 1200 }] }),
        adapters: [new FakeAdapter('a')],
        store,
        alerts,
      });

      await once.start();
      await once.idle();
      await once.stop(0);

      expect(once.status().running).toBe(false);
      await expect(once.start()).rejects.toBeInstanceOf(ConfigurationError);
    });
  });
});
