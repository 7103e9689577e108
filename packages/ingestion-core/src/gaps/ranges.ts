import type { TimeRange } from '@gapless/schemas';

/**
 * Missing aligned steps in [start, end), merged into contiguous ranges.
 * `present` must be sorted ascending.
 */
export function findMissingInTimestamps(
  present: number[],
  start: number,
  end: number,
  stepMs: number
): TimeRange[] {
  const ranges: TimeRange[] = [];
  let cursor = start;
  let index = 0;

  while (cursor < end) {
    while (index < present.length && present[index] < cursor) index++;
    if (index < present.length && present[index] === cursor) {
      cursor += stepMs;
      continue;
    }
    const next = index < present.length ? Math.min(present[index], end) : end;
    // align the run end to the step grid
    const runEnd = cursor + Math.ceil((next - cursor) / stepMs) * stepMs;
    appendRange(ranges, { start: cursor, end: Math.min(runEnd, end) });
    cursor = runEnd;
  }

  return ranges;
}

/**
 * Append, merging with the previous range when they touch
 */
export function appendRange(ranges: TimeRange[], range: TimeRange): void {
  const last = ranges[ranges.length - 1];
  if (last && last.end >= range.start) {
    last.end = Math.max(last.end, range.end);
  } else {
    ranges.push({ ...range });
  }
}

export function overlaps(a: TimeRange, b: TimeRange): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Remove every blocker from the ranges
 */
export function subtractRanges(ranges: TimeRange[], blockers: TimeRange[]): TimeRange[] {
  let result = ranges.map((range) => ({ ...range }));
  for (const blocker of blockers) {
    const next: TimeRange[] = [];
    for (const range of result) {
      if (!overlaps(range, blocker)) {
        next.push(range);
        continue;
      }
      if (range.start < blocker.start) next.push({ start: range.start, end: blocker.start });
      if (blocker.end < range.end) next.push({ start: blocker.end, end: range.end });
    }
    result = next;
  }
  return result.sort((a, b) => a.start - b.start);
}

/**
 * Split [start, end) into pieces of at most `maxSteps` steps
 */
export function splitRange(range: TimeRange, stepMs: number, maxSteps: number): TimeRange[] {
  const size = stepMs * Math.max(1, maxSteps);
  const pieces: TimeRange[] = [];
  for (let start = range.start; start < range.end; start += size) {
    pieces.push({ start, end: Math.min(start + size, range.end) });
  }
  return pieces;
}
