import type { RetryConfig } from '@gapless/schemas';
import {
  RateLimitedError,
  SourcesExhaustedError,
  isIngestionError,
  type IngestionError,
} from '@gapless/utils';

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'abandon'; reason: 'fatal' | 'attempts_exhausted' };

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  baseDelayMs: 1_000,
  maxDelayMs: 300_000,
  maxAttempts: 5,
  jitter: 0.1,
};

/**
 * Classifies failures and computes exponential backoff with jitter.
 *
 * Attempts are 1-based: after the first failed attempt `decide(1, error)`
 * returns a retry after roughly `baseDelayMs`.
 */
export class RetryPolicy {
  private config: RetryConfig;
  private random: () => number;

  constructor(config: Partial<RetryConfig> = {}, random: () => number = Math.random) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.random = random;
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  isRetryable(error: unknown): boolean {
    // anything outside the taxonomy is treated as Unavailable
    if (!isIngestionError(error)) return true;
    return isRetryableKind(error);
  }

  /**
   * Backoff before jitter for the retry following `failedAttempts` failures
   */
  nominalDelay(failedAttempts: number): number {
    const exponent = Math.max(0, failedAttempts - 1);
    return Math.min(this.config.maxDelayMs, this.config.baseDelayMs * Math.pow(2, exponent));
  }

  delay(failedAttempts: number, error?: unknown): number {
    const spread = (this.random() * 2 - 1) * this.config.jitter;
    const jittered = Math.round(this.nominalDelay(failedAttempts) * (1 + spread));
    const hint = retryAfterHint(error);
    return hint !== undefined ? Math.max(jittered, hint) : jittered;
  }

  decide(failedAttempts: number, error: unknown): RetryDecision {
    if (!this.isRetryable(error)) {
      return { action: 'abandon', reason: 'fatal' };
    }
    if (failedAttempts >= this.config.maxAttempts) {
      return { action: 'abandon', reason: 'attempts_exhausted' };
    }
    return { action: 'retry', delayMs: this.delay(failedAttempts, error) };
  }
}

function isRetryableKind(error: IngestionError): boolean {
  switch (error.kind) {
    case 'timeout':
    case 'rate_limited':
    case 'unavailable':
    case 'circuit_open':
      return true;
    case 'sources_exhausted':
      // retryable when any source failed transiently; none capable is fatal
      return (
        error instanceof SourcesExhaustedError &&
        error.failures.some(({ error: cause }) => !isIngestionError(cause) || isRetryableKind(cause))
      );
    case 'auth':
    case 'malformed_response':
    case 'validation_failed':
    case 'configuration':
      return false;
  }
}

function retryAfterHint(error: unknown): number | undefined {
  return error instanceof RateLimitedError ? error.retryAfterMs : undefined;
}
