import type { AdapterConfig, Interval, RawPoint, SourceAdapter } from '@gapless/schemas';
import { countSteps } from '@gapless/utils';
import { COINBASE_GRANULARITIES, COINBASE_MAX_CANDLES, CoinbaseRestClient } from '../rest/client';

const QUOTE_CURRENCIES = ['USDC', 'USDT', 'USD', 'EUR', 'GBP', 'BTC', 'ETH'];

export interface CoinbaseAdapterOptions {
  timeoutMs?: number;
  client?: CoinbaseRestClient;
}

/**
 * Derive a Coinbase product id from an engine symbol (BTCUSD -> BTC-USD)
 */
export function toProductId(symbol: string): string {
  const upper = symbol.toUpperCase();
  if (upper.includes('-')) return upper;
  for (const quote of QUOTE_CURRENCIES) {
    if (upper.endsWith(quote) && upper.length > quote.length) {
      return `${upper.slice(0, -quote.length)}-${quote}`;
    }
  }
  return upper;
}

/**
 * Coinbase Advanced Trade as a source of OHLCV points.
 *
 * With credentials (key name + EC private key) requests go to the
 * authenticated products endpoint; otherwise to the public market one.
 */
export class CoinbaseSourceAdapter implements SourceAdapter {
  readonly id: string;
  readonly maxPointsPerRequest = COINBASE_MAX_CANDLES;
  private readonly client: CoinbaseRestClient;
  private readonly symbolMap: Record<string, string>;

  constructor(config: AdapterConfig, options: CoinbaseAdapterOptions = {}) {
    this.id = config.id;
    this.symbolMap = config.symbolMap;
    const { credentials } = config;
    this.client =
      options.client ??
      new CoinbaseRestClient({
        adapterId: config.id,
        baseUrl: config.baseUrl,
        credentials:
          credentials?.apiSecret !== undefined
            ? { apiKeyName: credentials.apiKey, privateKeyPem: credentials.apiSecret }
            : undefined,
        timeoutMs: options.timeoutMs,
      });
  }

  productId(symbol: string): string {
    return this.symbolMap[symbol] ?? toProductId(symbol);
  }

  supports(_symbol: string, interval: Interval): boolean {
    return COINBASE_GRANULARITIES[interval] !== undefined;
  }

  async fetch(symbol: string, interval: Interval, start: number, end: number, signal?: AbortSignal): Promise<RawPoint[]> {
    const granularity = COINBASE_GRANULARITIES[interval];
    const expected = countSteps(start, end, interval);
    if (!granularity || expected === 0) return [];

    const points = await this.client.getCandles(
      {
        productId: this.productId(symbol),
        granularity,
        start: Math.floor(start / 1000),
        // the last open time inside [start, end)
        end: Math.floor((end - 1) / 1000),
        limit: Math.min(expected, this.maxPointsPerRequest),
      },
      signal
    );
    return points.filter((point) => point.timestamp >= start && point.timestamp < end);
  }
}
