import { INTERVAL_MS, type Interval } from '@gapless/schemas';

/**
 * Convert an interval to milliseconds
 */
export function intervalToMs(interval: Interval): number {
  return INTERVAL_MS[interval];
}

/**
 * Floor a timestamp to its interval boundary
 *
 * @example alignDown(1_700_000_123_456, '1m') // 1_700_000_100_000
 */
export function alignDown(timestamp: number, interval: Interval): number {
  const ms = intervalToMs(interval);
  return Math.floor(timestamp / ms) * ms;
}

/**
 * Ceil a timestamp to its interval boundary
 */
export function alignUp(timestamp: number, interval: Interval): number {
  const ms = intervalToMs(interval);
  return Math.ceil(timestamp / ms) * ms;
}

export function isAligned(timestamp: number, interval: Interval): boolean {
  return timestamp % intervalToMs(interval) === 0;
}

/**
 * Number of aligned timestamps in [start, end)
 */
export function countSteps(start: number, end: number, interval: Interval): number {
  if (end <= start) return 0;
  const ms = intervalToMs(interval);
  return Math.floor((alignUp(end, interval) - alignUp(start, interval)) / ms);
}

/**
 * Start of the newest interval that has fully closed at `now`.
 * Ranges that end here contain only closed intervals.
 */
export function lastClosedBoundary(now: number, interval: Interval): number {
  return alignDown(now, interval);
}

/**
 * Format a timestamp for log output
 */
export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString();
}
