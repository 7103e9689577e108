/**
 * Error taxonomy shared by adapters and the ingestion engine.
 *
 * Every error the engine reasons about carries a `kind`; the retry policy
 * classifies on it, never on message text.
 */
export type IngestionErrorKind =
  | 'timeout'
  | 'rate_limited'
  | 'auth'
  | 'malformed_response'
  | 'unavailable'
  | 'circuit_open'
  | 'validation_failed'
  | 'sources_exhausted'
  | 'configuration';

export interface IngestionErrorOptions {
  adapterId?: string;
  cause?: unknown;
}

export class IngestionError extends Error {
  readonly kind: IngestionErrorKind;
  readonly adapterId: string | undefined;

  constructor(kind: IngestionErrorKind, message: string, options: IngestionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.adapterId = options.adapterId;
  }
}

export class TimeoutError extends IngestionError {
  constructor(message: string, options?: IngestionErrorOptions) {
    super('timeout', message, options);
  }
}

export class RateLimitedError extends IngestionError {
  /** Provider-suggested wait, when it sent one */
  readonly retryAfterMs: number | undefined;

  constructor(message: string, options: IngestionErrorOptions & { retryAfterMs?: number } = {}) {
    super('rate_limited', message, options);
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class AuthError extends IngestionError {
  constructor(message: string, options?: IngestionErrorOptions) {
    super('auth', message, options);
  }
}

export class MalformedResponseError extends IngestionError {
  constructor(message: string, options?: IngestionErrorOptions) {
    super('malformed_response', message, options);
  }
}

export class UnavailableError extends IngestionError {
  constructor(message: string, options?: IngestionErrorOptions) {
    super('unavailable', message, options);
  }
}

export class CircuitOpenError extends IngestionError {
  /** When the breaker will admit a trial call */
  readonly retryAt: number;

  constructor(adapterId: string, retryAt: number) {
    super('circuit_open', `Circuit open for ${adapterId}`, { adapterId });
    this.retryAt = retryAt;
  }
}

export interface Violation {
  timestamp: number;
  rule: string;
  detail: string;
}

export class ValidationFailedError extends IngestionError {
  readonly violations: Violation[];

  constructor(violations: Violation[], options?: IngestionErrorOptions) {
    const first = violations[0];
    const summary = first ? `${first.rule} at ${first.timestamp}: ${first.detail}` : 'invalid batch';
    const more = violations.length > 1 ? ` (+${violations.length - 1} more)` : '';
    super('validation_failed', `Validation failed: ${summary}${more}`, options);
    this.violations = violations;
  }
}

export interface AdapterFailure {
  adapterId: string;
  error: Error;
}

export class SourcesExhaustedError extends IngestionError {
  readonly failures: AdapterFailure[];

  constructor(failures: AdapterFailure[], message?: string) {
    super(
      'sources_exhausted',
      message ??
        `All sources failed: ${failures.map((f) => `${f.adapterId}=${toErrorMessage(f.error)}`).join(', ') || 'no capable adapter'}`
    );
    this.failures = failures;
  }
}

export class ConfigurationError extends IngestionError {
  constructor(message: string, options?: IngestionErrorOptions) {
    super('configuration', message, options);
  }
}

export function isIngestionError(error: unknown): error is IngestionError {
  return error instanceof IngestionError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
