import type { AdapterConfig, Interval, RawPoint, SourceAdapter } from '@gapless/schemas';
import { countSteps } from '@gapless/utils';
import { BINANCE_INTERVALS, BINANCE_MAX_KLINES, BinanceRestClient } from '../rest/client';

export interface BinanceAdapterOptions {
  /** Per-request deadline passed to the REST client */
  timeoutMs?: number;
  client?: BinanceRestClient;
}

/**
 * Binance (or Binance.US) as a source of OHLCV points.
 *
 * Engine symbols map to Binance symbols through `symbolMap`; unmapped
 * symbols are used with separators removed (BTC-USDT -> BTCUSDT).
 */
export class BinanceSourceAdapter implements SourceAdapter {
  readonly id: string;
  readonly maxPointsPerRequest = BINANCE_MAX_KLINES;
  private readonly client: BinanceRestClient;
  private readonly symbolMap: Record<string, string>;

  constructor(config: AdapterConfig, options: BinanceAdapterOptions = {}) {
    this.id = config.id;
    this.symbolMap = config.symbolMap;
    this.client =
      options.client ??
      new BinanceRestClient({
        adapterId: config.id,
        baseUrl: config.baseUrl,
        apiKey: config.credentials?.apiKey,
        timeoutMs: options.timeoutMs,
      });
  }

  productId(symbol: string): string {
    return this.symbolMap[symbol] ?? symbol.replace(/[^A-Za-z0-9]/g, '').toUpperCase();
  }

  supports(_symbol: string, interval: Interval): boolean {
    return BINANCE_INTERVALS.includes(interval);
  }

  async fetch(symbol: string, interval: Interval, start: number, end: number, signal?: AbortSignal): Promise<RawPoint[]> {
    const expected = countSteps(start, end, interval);
    if (expected === 0) return [];

    const points = await this.client.getKlines(
      {
        symbol: this.productId(symbol),
        interval,
        startTime: start,
        // Binance treats endTime as inclusive
        endTime: end - 1,
        limit: Math.min(expected, this.maxPointsPerRequest),
      },
      signal
    );
    return points.filter((point) => point.timestamp >= start && point.timestamp < end);
  }
}
