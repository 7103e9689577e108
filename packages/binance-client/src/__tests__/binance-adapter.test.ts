import { afterEach, describe, it, expect, vi } from 'vitest';
import { AdapterConfigSchema } from '@gapless/schemas';
import { MalformedResponseError, RateLimitedError } from '@gapless/utils';
import { BinanceSourceAdapter } from '../adapter/binance-adapter';

// Mon Jan 01 2024 00:00:00 UTC
const BASE_TS = 1704067200000;
const HOUR = 3_600_000;

function kline(openTime: number, close: string): unknown[] {
  return [openTime, '100.5', '101.25', '99.5', close, '12.5', openTime + HOUR - 1, '1250.0', 42, '6.0', '600.0', '0'];
}

function stubFetch(body: unknown, init: ResponseInit = { status: 200 }) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify(body), init));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

const usConfig = AdapterConfigSchema.parse({
  id: 'binance-us',
  provider: 'binance',
  baseUrl: 'https://api.binance.us/',
  quotaPerMinute: 1200,
  symbolMap: { 'BTC-USD': 'BTCUSD' },
  credentials: { apiKey: 'test-key' },
});

describe('BinanceSourceAdapter', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should request klines for the half-open range with an inclusive endTime', async () => {
    const fetchMock = stubFetch([kline(BASE_TS, '100.75'), kline(BASE_TS + HOUR, '101')]);
    const adapter = new BinanceSourceAdapter(usConfig);

    const points = await adapter.fetch('BTC-USD', '1h', BASE_TS, BASE_TS + 3 * HOUR);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(
      'https://api.binance.us/api/v3/klines?symbol=BTCUSD&interval=1h&startTime=1704067200000&endTime=1704077999999&limit=3'
    );
    expect(init?.headers).toEqual({ Accept: 'application/json', 'X-MBX-APIKEY': 'test-key' });
    expect(points).toEqual([
      { timestamp: BASE_TS, open: 100.5, high: 101.25, low: 99.5, close: 100.75, volume: 12.5 },
      { timestamp: BASE_TS + HOUR, open: 100.5, high: 101.25, low: 99.5, close: 101, volume: 12.5 },
    ]);
  });

  it('should derive the Binance symbol when it is not mapped', async () => {
    const fetchMock = stubFetch([]);
    const adapter = new BinanceSourceAdapter(
      AdapterConfigSchema.parse({ id: 'binance', provider: 'binance', quotaPerMinute: 1200 })
    );

    await adapter.fetch('eth-usdt', '1d', BASE_TS, BASE_TS + 24 * HOUR);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toContain('https://api.binance.com/api/v3/klines?symbol=ETHUSDT&interval=1d');
    expect(init?.headers).toEqual({ Accept: 'application/json' });
  });

  it('should drop rows outside the requested range', async () => {
    stubFetch([kline(BASE_TS - HOUR, '1'), kline(BASE_TS, '100.75')]);
    const adapter = new BinanceSourceAdapter(usConfig);

    const points = await adapter.fetch('BTC-USD', '1h', BASE_TS, BASE_TS + HOUR);

    expect(points.map((p) => p.timestamp)).toEqual([BASE_TS]);
  });

  it('should not call the API for an empty range', async () => {
    const fetchMock = stubFetch([]);
    const adapter = new BinanceSourceAdapter(usConfig);

    expect(await adapter.fetch('BTC-USD', '1h', BASE_TS, BASE_TS)).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should reject rows with non-numeric prices as malformed', async () => {
    stubFetch([kline(BASE_TS, 'abc')]);
    const adapter = new BinanceSourceAdapter(usConfig);

    await expect(adapter.fetch('BTC-USD', '1h', BASE_TS, BASE_TS + HOUR)).rejects.toBeInstanceOf(
      MalformedResponseError
    );
  });

  it('should surface IP bans as rate limiting', async () => {
    stubFetch({ code: -1003, msg: 'Way too many requests' }, { status: 418, headers: { 'Retry-After': '120' } });
    const adapter = new BinanceSourceAdapter(usConfig);

    const error = await adapter.fetch('BTC-USD', '1h', BASE_TS, BASE_TS + HOUR).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError && error.retryAfterMs).toBe(120_000);
  });

  it('should support every engine interval', () => {
    const adapter = new BinanceSourceAdapter(usConfig);
    expect(adapter.supports('BTC-USD', '3m')).toBe(true);
    expect(adapter.supports('BTC-USD', '12h')).toBe(true);
    expect(adapter.maxPointsPerRequest).toBe(1000);
  });
});
