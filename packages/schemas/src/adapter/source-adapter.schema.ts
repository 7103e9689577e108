import type { Interval } from '../market/interval.schema';
import type { RawPoint } from '../market/data-point.schema';

/**
 * Normalized contract every market data provider is wrapped in.
 *
 * `fetch` returns points sorted ascending and within [start, end); fewer
 * points than requested is a valid partial result. Failures are thrown as
 * typed ingestion errors (Timeout, RateLimited, Auth, MalformedResponse,
 * Unavailable).
 */
export interface SourceAdapter {
  readonly id: string;
  /** Largest number of points one request can return */
  readonly maxPointsPerRequest: number;
  supports(symbol: string, interval: Interval): boolean;
  fetch(
    symbol: string,
    interval: Interval,
    start: number,
    end: number,
    signal?: AbortSignal
  ): Promise<RawPoint[]>;
}
