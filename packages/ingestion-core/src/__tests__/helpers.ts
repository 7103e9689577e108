import type { DataPoint, FetchTask, Interval, RawPoint, SourceAdapter } from '@gapless/schemas';

// Mon Jan 01 2024 00:00:00 UTC
export const BASE_TS = 1704067200000;
export const HOUR = 60 * 60 * 1000;

export interface FetchCall {
  symbol: string;
  interval: Interval;
  start: number;
  end: number;
}

export type FetchHandler = (call: FetchCall, signal?: AbortSignal) => Promise<RawPoint[]> | RawPoint[];

/**
 * Scriptable SourceAdapter
 */
export class FakeAdapter implements SourceAdapter {
  readonly calls: FetchCall[] = [];
  readonly maxPointsPerRequest: number;
  private handler: FetchHandler;
  private supported: (symbol: string, interval: Interval) => boolean;

  constructor(
    readonly id: string,
    handler: FetchHandler = () => [],
    options: { maxPointsPerRequest?: number; supports?: (symbol: string, interval: Interval) => boolean } = {}
  ) {
    this.handler = handler;
    this.maxPointsPerRequest = options.maxPointsPerRequest ?? 1000;
    this.supported = options.supports ?? (() => true);
  }

  respond(handler: FetchHandler): void {
    this.handler = handler;
  }

  supports(symbol: string, interval: Interval): boolean {
    return this.supported(symbol, interval);
  }

  async fetch(symbol: string, interval: Interval, start: number, end: number, signal?: AbortSignal): Promise<RawPoint[]> {
    const call = { symbol, interval, start, end };
    this.calls.push(call);
    return this.handler(call, signal);
  }
}

/**
 * Deterministic valid point for a timestamp
 */
export function makePoint(timestamp: number, scale = 1): RawPoint {
  const open = 100 + ((timestamp / HOUR) % 50);
  return {
    timestamp,
    open: open * scale,
    high: (open + 2) * scale,
    low: (open - 1) * scale,
    close: (open + 1) * scale,
    volume: 10,
  };
}

/**
 * Points for every step in [start, end)
 */
export function makePoints(start: number, end: number, stepMs: number = HOUR, scale = 1): RawPoint[] {
  const points: RawPoint[] = [];
  for (let ts = start; ts < end; ts += stepMs) {
    points.push(makePoint(ts, scale));
  }
  return points;
}

/**
 * Handler serving valid points for the requested range, limited to `available`
 */
export function serveRange(available: { start: number; end: number }, scale = 1): FetchHandler {
  return ({ start, end }) =>
    makePoints(Math.max(start, available.start), Math.min(end, available.end), HOUR, scale);
}

export function makeDataPoint(raw: RawPoint, overrides: Partial<DataPoint> = {}): DataPoint {
  return {
    symbol: 'BTCUSDT',
    interval: '1h',
    ...raw,
    sourceId: 'a',
    sources: ['a'],
    qualityScore: 0.8,
    validated: true,
    revision: 1,
    ...overrides,
  };
}

export function makeClock(start: number = BASE_TS) {
  let current = start;
  return {
    now: () => current,
    set: (value: number) => {
      current = value;
    },
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export function sequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export function makeTask(id: string, overrides: Partial<FetchTask> = {}): FetchTask {
  return {
    id,
    symbol: 'BTCUSDT',
    interval: '1h',
    start: BASE_TS,
    end: BASE_TS + HOUR,
    priority: 'live',
    origin: { kind: 'live' },
    attempt: 0,
    notBefore: 0,
    ...overrides,
  };
}
