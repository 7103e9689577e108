import { EventEmitter } from 'events';
import type { BreakerState, CircuitBreakerConfig } from '@gapless/schemas';
import { CircuitOpenError } from '@gapless/utils';

export type CircuitBreakerEvents = {
  'state-change': [adapterId: string, from: BreakerState, to: BreakerState];
};

export interface CircuitBreakerSnapshot {
  state: BreakerState;
  consecutiveFailures: number;
  cooldownMs: number;
  openedAt: number | null;
  /** When an open breaker admits its trial call */
  retryAt: number | null;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  cooldownMs: 60_000,
  maxCooldownMs: 600_000,
};

/**
 * Per-adapter circuit breaker
 *
 * closed --(failureThreshold consecutive failures)--> open
 * open --(cooldown elapsed)--> half_open (checked lazily)
 * half_open --(trial call succeeds)--> closed, cooldown reset
 * half_open --(trial call fails)--> open, cooldown doubled up to maxCooldownMs
 *
 * Half-open admits exactly one trial call at a time.
 */
export class CircuitBreaker extends EventEmitter<CircuitBreakerEvents> {
  readonly adapterId: string;
  private config: CircuitBreakerConfig;
  private now: () => number;
  private current: BreakerState = 'closed';
  private consecutiveFailures = 0;
  private cooldownMs: number;
  private openedAt: number | null = null;
  private trialInFlight = false;

  constructor(
    adapterId: string,
    config: Partial<CircuitBreakerConfig> = {},
    now: () => number = () => Date.now()
  ) {
    super();
    this.adapterId = adapterId;
    this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
    this.cooldownMs = this.config.cooldownMs;
    this.now = now;
  }

  get state(): BreakerState {
    if (
      this.current === 'open' &&
      this.openedAt !== null &&
      this.now() - this.openedAt >= this.cooldownMs
    ) {
      this.transition('half_open');
    }
    return this.current;
  }

  /**
   * Whether a call would currently reach the adapter
   */
  canAttempt(): boolean {
    const state = this.state;
    return state === 'closed' || (state === 'half_open' && !this.trialInFlight);
  }

  /**
   * Run `fn` through the breaker. Failures that happen after `signal` was
   * aborted are the caller's cancellation and are not counted.
   */
  async execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const state = this.state;
    if (state === 'open' || (state === 'half_open' && this.trialInFlight)) {
      throw new CircuitOpenError(this.adapterId, this.retryAt() ?? this.now());
    }

    const isTrial = state === 'half_open';
    if (isTrial) this.trialInFlight = true;

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      if (!signal?.aborted) {
        this.onFailure();
      }
      throw error;
    } finally {
      if (isTrial) this.trialInFlight = false;
    }
  }

  onSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.current !== 'closed') {
      this.cooldownMs = this.config.cooldownMs;
      this.openedAt = null;
      this.transition('closed');
    }
  }

  onFailure(): void {
    this.consecutiveFailures++;
    if (this.current === 'half_open') {
      this.cooldownMs = Math.min(this.cooldownMs * 2, this.config.maxCooldownMs);
      this.open();
    } else if (this.current === 'closed' && this.consecutiveFailures >= this.config.failureThreshold) {
      this.open();
    }
  }

  /**
   * Force the breaker closed (operator override)
   */
  reset(): void {
    this.consecutiveFailures = 0;
    this.cooldownMs = this.config.cooldownMs;
    this.openedAt = null;
    this.trialInFlight = false;
    this.transition('closed');
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      cooldownMs: this.cooldownMs,
      openedAt: this.openedAt,
      retryAt: this.retryAt(),
    };
  }

  private retryAt(): number | null {
    return this.current === 'open' && this.openedAt !== null ? this.openedAt + this.cooldownMs : null;
  }

  private open(): void {
    this.openedAt = this.now();
    this.transition('open');
  }

  private transition(to: BreakerState): void {
    const from = this.current;
    if (from === to) return;
    this.current = to;
    this.emit('state-change', this.adapterId, from, to);
  }
}
