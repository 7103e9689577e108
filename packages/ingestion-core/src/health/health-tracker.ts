import { EventEmitter } from 'events';
import type { HealthConfig, HealthState, SourceHealth } from '@gapless/schemas';

export type RequestOutcome = 'success' | 'failure';

export type HealthTrackerEvents = {
  'state-change': [adapterId: string, from: HealthState, to: HealthState];
};

interface AdapterHealth {
  requestCount: number;
  successCount: number;
  errorCount: number;
  consecutiveFailures: number;
  /** Decayed counts, refreshed on every record */
  successWeight: number;
  failureWeight: number;
  latencySum: number;
  latencyWeight: number;
  decayedAt: number;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  suspendedUntil: number | null;
}

export const DEFAULT_HEALTH_CONFIG: HealthConfig = {
  halfLifeMs: 900_000,
  healthySuccessRate: 0.95,
  degradedAfterFailures: 3,
  suspendAfterFailures: 5,
  suspensionMs: 120_000,
};

/**
 * Rolling per-adapter health.
 *
 * Success rate and latency decay exponentially with `halfLifeMs`, so an
 * adapter that failed an hour ago and has succeeded since reads healthy.
 * `suspendAfterFailures` consecutive failures suspend the adapter for
 * `suspensionMs`; every further failure restarts the suspension.
 */
export class HealthTracker extends EventEmitter<HealthTrackerEvents> {
  private adapters: Map<string, AdapterHealth> = new Map();
  private config: HealthConfig;
  private now: () => number;

  constructor(config: Partial<HealthConfig> = {}, now: () => number = () => Date.now()) {
    super();
    this.config = { ...DEFAULT_HEALTH_CONFIG, ...config };
    this.now = now;
  }

  register(adapterId: string): void {
    this.get(adapterId);
  }

  private get(adapterId: string): AdapterHealth {
    let health = this.adapters.get(adapterId);
    if (!health) {
      health = {
        requestCount: 0,
        successCount: 0,
        errorCount: 0,
        consecutiveFailures: 0,
        successWeight: 0,
        failureWeight: 0,
        latencySum: 0,
        latencyWeight: 0,
        decayedAt: this.now(),
        lastSuccessAt: null,
        lastErrorAt: null,
        suspendedUntil: null,
      };
      this.adapters.set(adapterId, health);
    }
    return health;
  }

  record(adapterId: string, outcome: RequestOutcome, latencyMs: number): void {
    const at = this.now();
    const before = this.state(adapterId);
    const health = this.get(adapterId);
    this.decay(health, at);

    health.requestCount++;
    health.latencySum += Math.max(0, latencyMs);
    health.latencyWeight += 1;

    if (outcome === 'success') {
      health.successCount++;
      health.successWeight += 1;
      health.consecutiveFailures = 0;
      health.lastSuccessAt = at;
      health.suspendedUntil = null;
    } else {
      health.errorCount++;
      health.failureWeight += 1;
      health.consecutiveFailures++;
      health.lastErrorAt = at;
      if (health.consecutiveFailures >= this.config.suspendAfterFailures) {
        health.suspendedUntil = at + this.config.suspensionMs;
      }
    }

    const after = this.state(adapterId);
    if (after !== before) {
      this.emit('state-change', adapterId, before, after);
    }
  }

  state(adapterId: string): HealthState {
    const health = this.adapters.get(adapterId);
    if (!health) return 'healthy';
    const at = this.now();

    if (health.suspendedUntil !== null && at < health.suspendedUntil) {
      return 'suspended';
    }
    if (
      this.successRate(health, at) >= this.config.healthySuccessRate &&
      health.consecutiveFailures < this.config.degradedAfterFailures
    ) {
      return 'healthy';
    }
    return 'degraded';
  }

  snapshot(adapterId: string): SourceHealth {
    const health = this.get(adapterId);
    const at = this.now();
    return {
      adapterId,
      state: this.state(adapterId),
      requestCount: health.requestCount,
      successCount: health.successCount,
      errorCount: health.errorCount,
      consecutiveFailures: health.consecutiveFailures,
      averageLatencyMs: this.averageLatency(health),
      successRate: this.successRate(health, at),
      lastSuccessAt: health.lastSuccessAt,
      lastErrorAt: health.lastErrorAt,
      suspendedUntil:
        health.suspendedUntil !== null && health.suspendedUntil > at ? health.suspendedUntil : null,
    };
  }

  snapshots(): SourceHealth[] {
    return [...this.adapters.keys()].map((id) => this.snapshot(id));
  }

  /**
   * Clear an adapter's history (operator override)
   */
  reset(adapterId: string): void {
    this.adapters.delete(adapterId);
    this.register(adapterId);
  }

  private decayFactor(health: AdapterHealth, at: number): number {
    const elapsed = Math.max(0, at - health.decayedAt);
    return Math.pow(0.5, elapsed / this.config.halfLifeMs);
  }

  private decay(health: AdapterHealth, at: number): void {
    const factor = this.decayFactor(health, at);
    health.successWeight *= factor;
    health.failureWeight *= factor;
    health.latencySum *= factor;
    health.latencyWeight *= factor;
    health.decayedAt = at;
  }

  private successRate(health: AdapterHealth, at: number): number {
    const factor = this.decayFactor(health, at);
    const success = health.successWeight * factor;
    const total = success + health.failureWeight * factor;
    return total > 0 ? success / total : 1;
  }

  // decay scales sum and weight alike, so the ratio needs no refresh
  private averageLatency(health: AdapterHealth): number {
    return health.latencyWeight > 0 ? health.latencySum / health.latencyWeight : 0;
  }
}
