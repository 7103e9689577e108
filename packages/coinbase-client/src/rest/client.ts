import { z } from 'zod';
import type { Interval, RawPoint } from '@gapless/schemas';
import { createLogger, fetchJson } from '@gapless/utils';
import { CoinbaseAuth } from './auth';

const logger = createLogger('coinbase-client');

export const COINBASE_DEFAULT_BASE_URL = 'https://api.coinbase.com';

/** Most candles one request may cover */
export const COINBASE_MAX_CANDLES = 350;

export type CoinbaseGranularity =
  | 'ONE_MINUTE'
  | 'FIVE_MINUTE'
  | 'FIFTEEN_MINUTE'
  | 'THIRTY_MINUTE'
  | 'ONE_HOUR'
  | 'TWO_HOUR'
  | 'SIX_HOUR'
  | 'ONE_DAY';

/**
 * Engine intervals Coinbase serves; 3m, 4h and 12h have no granularity
 */
export const COINBASE_GRANULARITIES: Partial<Record<Interval, CoinbaseGranularity>> = {
  '1m': 'ONE_MINUTE',
  '5m': 'FIVE_MINUTE',
  '15m': 'FIFTEEN_MINUTE',
  '30m': 'THIRTY_MINUTE',
  '1h': 'ONE_HOUR',
  '2h': 'TWO_HOUR',
  '6h': 'SIX_HOUR',
  '1d': 'ONE_DAY',
};

const DecimalString = z.string().transform((value, ctx) => {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a decimal: '${value}'` });
    return z.NEVER;
  }
  return parsed;
});

export const CoinbaseCandleSchema = z.object({
  /** Unix seconds */
  start: z.string().regex(/^\d+$/).transform(Number),
  low: DecimalString,
  high: DecimalString,
  open: DecimalString,
  close: DecimalString,
  volume: DecimalString,
});

export const CandlesResponseSchema = z.object({
  candles: z.array(CoinbaseCandleSchema),
});

export interface CoinbaseRestClientOptions {
  adapterId?: string;
  baseUrl?: string;
  /** API key name and EC private key; without them the public market endpoints are used */
  credentials?: { apiKeyName: string; privateKeyPem: string };
  timeoutMs?: number;
}

export interface CandlesRequest {
  productId: string;
  granularity: CoinbaseGranularity;
  /** Unix seconds, inclusive */
  start: number;
  /** Unix seconds, inclusive */
  end: number;
  limit?: number;
}

/**
 * Coinbase Advanced Trade API REST client
 *
 * Reference: https://docs.cdp.coinbase.com/advanced-trade/docs/rest-api-overview
 */
export class CoinbaseRestClient {
  private readonly adapterId: string;
  private readonly baseUrl: string;
  private readonly auth: CoinbaseAuth | null;
  private readonly timeoutMs: number | undefined;

  constructor(options: CoinbaseRestClientOptions = {}) {
    this.adapterId = options.adapterId ?? 'coinbase';
    this.baseUrl = (options.baseUrl ?? COINBASE_DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.auth = options.credentials
      ? new CoinbaseAuth(options.credentials.apiKeyName, options.credentials.privateKeyPem)
      : null;
    this.timeoutMs = options.timeoutMs;
  }

  get authenticated(): boolean {
    return this.auth !== null;
  }

  /**
   * Fetch candles for a product, oldest first
   */
  async getCandles(request: CandlesRequest, signal?: AbortSignal): Promise<RawPoint[]> {
    const { productId, granularity, start, end } = request;
    const limit = Math.min(request.limit ?? COINBASE_MAX_CANDLES, COINBASE_MAX_CANDLES);
    const params = new URLSearchParams({
      start: start.toString(),
      end: end.toString(),
      granularity,
      limit: limit.toString(),
    });

    const path = this.auth
      ? `/api/v3/brokerage/products/${encodeURIComponent(productId)}/candles`
      : `/api/v3/brokerage/market/products/${encodeURIComponent(productId)}/candles`;

    const headers: Record<string, string> = {};
    if (this.auth) {
      headers.Authorization = `Bearer ${this.auth.generateRestToken('GET', path, new URL(this.baseUrl).host)}`;
    }

    logger.debug({ adapterId: this.adapterId, productId, granularity, start, end, limit }, 'Requesting Coinbase candles');

    const response = await fetchJson(`${this.baseUrl}${path}?${params.toString()}`, {
      adapterId: this.adapterId,
      schema: CandlesResponseSchema,
      headers,
      signal,
      timeoutMs: this.timeoutMs,
    });

    // Coinbase returns newest first
    return response.candles
      .map((candle) => ({
        timestamp: candle.start * 1000,
        open: candle.open,
        high: candle.high,
        low: candle.low,
        close: candle.close,
        volume: candle.volume,
      }))
      .sort((a, b) => a.timestamp - b.timestamp);
  }
}
