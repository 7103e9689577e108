import { describe, it, expect } from 'vitest';
import { HealthTracker } from '../health/health-tracker';

function makeClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('HealthTracker', () => {
  it('should report an unknown adapter as healthy', () => {
    const tracker = new HealthTracker();
    expect(tracker.state('binance')).toBe('healthy');
  });

  it('should count requests and average latency', () => {
    const clock = makeClock();
    const tracker = new HealthTracker({}, clock.now);

    tracker.record('binance', 'success', 100);
    tracker.record('binance', 'success', 300);

    const snapshot = tracker.snapshot('binance');
    expect(snapshot.requestCount).toBe(2);
    expect(snapshot.successCount).toBe(2);
    expect(snapshot.averageLatencyMs).toBe(200);
    expect(snapshot.successRate).toBe(1);
    expect(snapshot.lastSuccessAt).toBe(1_000_000);
  });

  it('should degrade after three consecutive failures', () => {
    const tracker = new HealthTracker({ healthySuccessRate: 0.5 }, makeClock().now);
    for (let i = 0; i < 10; i++) tracker.record('a', 'success', 50);

    tracker.record('a', 'failure', 50);
    tracker.record('a', 'failure', 50);
    expect(tracker.state('a')).toBe('healthy');

    tracker.record('a', 'failure', 50);
    expect(tracker.state('a')).toBe('degraded');
  });

  it('should degrade when the success rate drops below the healthy threshold', () => {
    const tracker = new HealthTracker({}, makeClock().now);
    for (let i = 0; i < 20; i++) tracker.record('a', 'success', 50);
    tracker.record('a', 'failure', 50);
    tracker.record('a', 'success', 50);
    tracker.record('a', 'failure', 50);

    // 21 of 23
    expect(tracker.snapshot('a').consecutiveFailures).toBe(1);
    expect(tracker.state('a')).toBe('degraded');
  });

  it('should suspend after five consecutive failures for the cooldown', () => {
    const clock = makeClock();
    const tracker = new HealthTracker({}, clock.now);
    const changes: string[] = [];
    tracker.on('state-change', (id, from, to) => changes.push(`${id}:${from}->${to}`));

    for (let i = 0; i < 5; i++) tracker.record('a', 'failure', 30_000);

    expect(tracker.state('a')).toBe('suspended');
    expect(tracker.snapshot('a').suspendedUntil).toBe(1_000_000 + 120_000);
    expect(changes).toEqual(['a:healthy->degraded', 'a:degraded->suspended']);

    clock.advance(119_999);
    expect(tracker.state('a')).toBe('suspended');
    clock.advance(1);
    expect(tracker.state('a')).toBe('degraded');
  });

  it('should re-suspend on a failure after the cooldown and clear on success', () => {
    const clock = makeClock();
    const tracker = new HealthTracker({}, clock.now);
    for (let i = 0; i < 5; i++) tracker.record('a', 'failure', 10);
    clock.advance(120_000);

    tracker.record('a', 'failure', 10);
    expect(tracker.state('a')).toBe('suspended');

    clock.advance(120_000);
    tracker.record('a', 'success', 10);
    expect(tracker.snapshot('a').consecutiveFailures).toBe(0);
    expect(tracker.snapshot('a').suspendedUntil).toBeNull();
    expect(tracker.state('a')).toBe('degraded');
  });

  it('should let old failures decay with the half-life', () => {
    const clock = makeClock();
    const tracker = new HealthTracker({ halfLifeMs: 1_000 }, clock.now);
    tracker.record('a', 'failure', 10);
    tracker.record('a', 'success', 10);
    expect(tracker.snapshot('a').successRate).toBe(0.5);

    clock.advance(1_000);
    tracker.record('a', 'success', 10);
    // failure 0.5, success 0.5 + 1
    expect(tracker.snapshot('a').successRate).toBe(0.75);
  });
});
