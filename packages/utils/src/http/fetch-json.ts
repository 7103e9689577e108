import type { z } from 'zod';
import {
  AuthError,
  MalformedResponseError,
  RateLimitedError,
  TimeoutError,
  UnavailableError,
  toErrorMessage,
} from '../errors/ingestion-error';

export interface FetchJsonOptions<T> {
  adapterId: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  headers?: Record<string, string>;
  /** Caller cancellation (shutdown) */
  signal?: AbortSignal;
  /** Per-request deadline */
  timeoutMs?: number;
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) to milliseconds
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * Map a non-2xx HTTP status to the ingestion error taxonomy
 */
export function errorForStatus(
  status: number,
  body: string,
  adapterId: string,
  retryAfter: string | null = null
): Error {
  const message = `${adapterId} HTTP ${status}: ${body.slice(0, 200)}`;
  if (status === 429 || status === 418) {
    return new RateLimitedError(message, { adapterId, retryAfterMs: parseRetryAfter(retryAfter) });
  }
  if (status === 401 || status === 403) {
    return new AuthError(message, { adapterId });
  }
  if (status === 408 || status === 504) {
    return new TimeoutError(message, { adapterId });
  }
  if (status >= 500) {
    return new UnavailableError(message, { adapterId });
  }
  return new MalformedResponseError(message, { adapterId });
}

/**
 * GET a JSON resource and validate it against a schema.
 *
 * Network failures become Unavailable, the deadline becomes Timeout, and a
 * body that is not JSON or does not match the schema becomes MalformedResponse.
 * Cancellation through `signal` rethrows the abort reason untouched.
 */
export async function fetchJson<T>(url: string, options: FetchJsonOptions<T>): Promise<T> {
  const { adapterId, schema, headers = {}, signal, timeoutMs } = options;
  const signals: AbortSignal[] = [];
  if (signal) signals.push(signal);
  const timeoutSignal = timeoutMs !== undefined ? AbortSignal.timeout(timeoutMs) : undefined;
  if (timeoutSignal) signals.push(timeoutSignal);

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'application/json', ...headers },
      signal: signals.length > 0 ? AbortSignal.any(signals) : undefined,
    });
  } catch (error) {
    if (signal?.aborted) {
      throw signal.reason;
    }
    if (timeoutSignal?.aborted) {
      throw new TimeoutError(`${adapterId} request timed out after ${timeoutMs}ms`, { adapterId, cause: error });
    }
    throw new UnavailableError(`${adapterId} request failed: ${toErrorMessage(error)}`, { adapterId, cause: error });
  }

  const text = await response.text();
  if (!response.ok) {
    throw errorForStatus(response.status, text, adapterId, response.headers.get('retry-after'));
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError(`${adapterId} returned non-JSON body`, { adapterId, cause: error });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedResponseError(
      `${adapterId} response failed schema: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`,
      { adapterId, cause: parsed.error }
    );
  }
  return parsed.data;
}
