import { z } from 'zod';
import type { Interval, RawPoint } from '@gapless/schemas';
import { createLogger, fetchJson } from '@gapless/utils';

const logger = createLogger('binance-client');

export const BINANCE_DEFAULT_BASE_URL = 'https://api.binance.com';

/** Upper bound of the `limit` parameter on /api/v3/klines */
export const BINANCE_MAX_KLINES = 1000;

/**
 * Every engine interval exists on Binance under the same name
 */
export const BINANCE_INTERVALS: readonly Interval[] = [
  '1m', '3m', '5m', '15m', '30m', '1h', '2h', '4h', '6h', '12h', '1d',
];

const DecimalString = z.string().transform((value, ctx) => {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a decimal: '${value}'` });
    return z.NEVER;
  }
  return parsed;
});

/**
 * One kline row: [openTime, open, high, low, close, volume, closeTime, ...]
 */
export const KlineRowSchema = z
  .tuple([z.number().int(), DecimalString, DecimalString, DecimalString, DecimalString, DecimalString])
  .rest(z.unknown());

export const KlinesResponseSchema = z.array(KlineRowSchema);

export interface BinanceRestClientOptions {
  /** Identifies the client in errors and logs */
  adapterId?: string;
  baseUrl?: string;
  /** Sent as X-MBX-APIKEY; klines are public, the key only lifts IP limits */
  apiKey?: string;
  timeoutMs?: number;
}

export interface KlinesRequest {
  symbol: string;
  interval: Interval;
  /** Inclusive open time, ms */
  startTime: number;
  /** Inclusive open time, ms */
  endTime: number;
  limit?: number;
}

/**
 * Binance REST API client
 *
 * Supports both Binance.com and Binance.US (identical API, different base URL).
 *
 * Reference: https://developers.binance.com/docs/binance-spot-api-docs/rest-api
 */
export class BinanceRestClient {
  private readonly adapterId: string;
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number | undefined;

  constructor(options: BinanceRestClientOptions = {}) {
    this.adapterId = options.adapterId ?? 'binance';
    this.baseUrl = (options.baseUrl ?? BINANCE_DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Fetch klines whose open time lies in [startTime, endTime]
   */
  async getKlines(request: KlinesRequest, signal?: AbortSignal): Promise<RawPoint[]> {
    const { symbol, interval, startTime, endTime } = request;
    const limit = Math.min(request.limit ?? BINANCE_MAX_KLINES, BINANCE_MAX_KLINES);
    const params = new URLSearchParams({
      symbol,
      interval,
      startTime: startTime.toString(),
      endTime: endTime.toString(),
      limit: limit.toString(),
    });

    const headers: Record<string, string> = {};
    if (this.apiKey) {
      headers['X-MBX-APIKEY'] = this.apiKey;
    }

    logger.debug({ adapterId: this.adapterId, symbol, interval, startTime, endTime, limit }, 'Requesting Binance klines');

    const rows = await fetchJson(`${this.baseUrl}/api/v3/klines?${params.toString()}`, {
      adapterId: this.adapterId,
      schema: KlinesResponseSchema,
      headers,
      signal,
      timeoutMs: this.timeoutMs,
    });

    return rows.map(([timestamp, open, high, low, close, volume]) => ({
      timestamp,
      open,
      high,
      low,
      close,
      volume,
    }));
  }
}
