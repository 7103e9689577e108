import { describe, it, expect, beforeEach } from 'vitest';
import type { Gap } from '@gapless/schemas';
import { GapDetector } from '../gaps/gap-detector';
import { RecoveryOrchestrator } from '../recovery/recovery-orchestrator';
import { MemoryStore } from '../store/memory-store';
import { BASE_TS, FakeAdapter, HOUR, makeClock, makeDataPoint, makePoint, sequentialIds } from './helpers';

const SERIES = [{ symbol: 'BTCUSDT', interval: '1h' as const }];
const COOLDOWN = 10 * 60 * 1000;

function pendingGap(id: string, startHour: number, endHour: number, overrides: Partial<Gap> = {}): Gap {
  return {
    id,
    symbol: 'BTCUSDT',
    interval: '1h',
    start: BASE_TS + startHour * HOUR,
    end: BASE_TS + endHour * HOUR,
    status: 'pending',
    attemptCount: 0,
    lastAttemptAt: null,
    lastError: null,
    detectedAt: BASE_TS,
    updatedAt: BASE_TS,
    ...overrides,
  };
}

describe('RecoveryOrchestrator', () => {
  let store: MemoryStore;
  let clock: ReturnType<typeof makeClock>;
  let recovery: RecoveryOrchestrator;

  beforeEach(() => {
    store = new MemoryStore();
    clock = makeClock(BASE_TS + 24 * HOUR);
    const detector = new GapDetector({ store, collectionStart: BASE_TS, now: clock.now });
    recovery = new RecoveryOrchestrator({
      store,
      detector,
      adapters: [
        new FakeAdapter('a', () => [], { maxPointsPerRequest: 3 }),
        new FakeAdapter('b', () => [], { maxPointsPerRequest: 1000, supports: () => false }),
      ],
      config: { maxChunkPoints: 500, maxConcurrentGaps: 2 },
      maxAttempts: 5,
      retryCooldownMs: COOLDOWN,
      now: clock.now,
      idFactory: sequentialIds('task'),
    });
  });

  it('should size chunks by the smallest limit among capable adapters', () => {
    expect(recovery.chunkLimit('BTCUSDT', '1h')).toBe(3);
    expect(recovery.planChunks(pendingGap('g', 0, 8))).toEqual([
      { start: BASE_TS, end: BASE_TS + 3 * HOUR },
      { start: BASE_TS + 3 * HOUR, end: BASE_TS + 6 * HOUR },
      { start: BASE_TS + 6 * HOUR, end: BASE_TS + 8 * HOUR },
    ]);
  });

  it('should claim a pending gap as backfill tasks and mark it in progress', async () => {
    await store.saveGap(pendingGap('g', 0, 8));

    const tasks = await recovery.claim(SERIES);

    expect(tasks).toHaveLength(3);
    expect(tasks[0]).toEqual({
      id: 'task-1',
      symbol: 'BTCUSDT',
      interval: '1h',
      start: BASE_TS,
      end: BASE_TS + 3 * HOUR,
      priority: 'backfill',
      origin: { kind: 'gap', gapId: 'g' },
      attempt: 0,
      notBefore: 0,
    });
    expect(await store.getGap('g')).toMatchObject({
      status: 'in_progress',
      attemptCount: 1,
      lastAttemptAt: clock.now(),
    });
    expect(recovery.activeCount).toBe(1);
  });

  it('should resolve the gap once every chunk settled and the data is stored', async () => {
    await store.saveGap(pendingGap('g', 0, 8));
    await recovery.claim(SERIES);
    for (let hour = 0; hour < 8; hour++) {
      await store.upsert(makeDataPoint(makePoint(BASE_TS + hour * HOUR)), null);
    }

    expect(await recovery.settleChunk('g', { ok: true })).toBeNull();
    expect(await recovery.settleChunk('g', { ok: true })).toBeNull();
    const settled = await recovery.settleChunk('g', { ok: true });

    expect(settled).toMatchObject({ id: 'g', status: 'resolved', lastError: null });
    expect(recovery.activeCount).toBe(0);
  });

  it('should return a partially recovered gap to pending with the missing count', async () => {
    await store.saveGap(pendingGap('g', 0, 3));
    await recovery.claim(SERIES);
    await store.upsert(makeDataPoint(makePoint(BASE_TS)), null);

    const settled = await recovery.settleChunk('g', { ok: true });

    expect(settled).toMatchObject({ status: 'pending', attemptCount: 1, lastError: '2 points still missing' });
  });

  it('should hold a gap back for the retry cooldown', async () => {
    await store.saveGap(pendingGap('g', 0, 3));
    await recovery.claim(SERIES);
    await recovery.settleChunk('g', { ok: false, error: new Error('upstream down') });

    expect(await recovery.claim(SERIES)).toEqual([]);

    clock.advance(COOLDOWN);
    expect(await recovery.claim(SERIES)).toHaveLength(1);
  });

  it('should mark a gap failed after the maximum number of passes', async () => {
    await store.saveGap(pendingGap('g', 0, 3));

    let settled: Gap | null = null;
    for (let pass = 1; pass <= 5; pass++) {
      const tasks = await recovery.claim(SERIES);
      expect(tasks).toHaveLength(1);
      settled = await recovery.settleChunk('g', { ok: false, error: new Error(`pass ${pass} failed`) });
      clock.advance(COOLDOWN);
    }

    expect(settled).toMatchObject({ status: 'failed', attemptCount: 5, lastError: 'pass 5 failed' });
    expect(await recovery.claim(SERIES)).toEqual([]);
  });

  it('should claim the oldest gaps up to the concurrency limit', async () => {
    await store.saveGap(pendingGap('late', 10, 11));
    await store.saveGap(pendingGap('early', 0, 1));
    await store.saveGap(pendingGap('middle', 5, 6));

    const tasks = await recovery.claim(SERIES);

    expect(tasks.map((task) => task.origin)).toEqual([
      { kind: 'gap', gapId: 'early' },
      { kind: 'gap', gapId: 'middle' },
    ]);
    expect(await recovery.claim(SERIES)).toEqual([]);
  });

  it('should requeue failed gaps with a fresh attempt budget', async () => {
    await store.saveGap(pendingGap('g', 0, 3, { status: 'failed', attemptCount: 5, lastError: 'gone' }));

    expect(await recovery.requeueFailed(SERIES)).toBe(1);
    expect(await store.getGap('g')).toMatchObject({ status: 'pending', attemptCount: 0, lastError: null });
    expect(await recovery.requeue('missing')).toBeNull();
  });

  it('should return interrupted in-progress gaps to pending', async () => {
    await store.saveGap(pendingGap('g', 0, 3, { status: 'in_progress', attemptCount: 2 }));

    expect(await recovery.recoverStale(SERIES)).toBe(1);
    expect(await store.getGap('g')).toMatchObject({ status: 'pending', attemptCount: 2 });
  });

  it('should ignore chunks for gaps it is not tracking', async () => {
    expect(await recovery.settleChunk('unknown', { ok: true })).toBeNull();
  });
});
