import type { FetchTask } from '@gapless/schemas';

export interface QueuedTask {
  task: FetchTask;
  /** Position assigned on first enqueue; retries keep it */
  seq: number;
}

function seriesOf(task: FetchTask): string {
  return `${task.symbol}:${task.interval}`;
}

/**
 * Priority queue with per-series ordering rules:
 *
 * - live before backfill, then by original enqueue order
 * - live tasks of one series dispatch strictly in order, so a live task
 *   waiting out a retry delay holds back the live tasks queued after it
 * - backfill for a series waits while any live task of that series is
 *   queued or running
 */
export class TaskQueue {
  private entries: QueuedTask[] = [];
  private nextSeq = 0;

  get size(): number {
    return this.entries.length;
  }

  push(task: FetchTask, seq?: number): QueuedTask {
    const entry: QueuedTask = { task, seq: seq ?? this.nextSeq++ };
    this.entries.push(entry);
    return entry;
  }

  /**
   * Remove and return the next dispatchable task, if any
   *
   * @param running - tasks currently executing
   */
  take(now: number, running: Iterable<QueuedTask>): QueuedTask | undefined {
    const liveRunning = new Set<string>();
    const liveSeries = new Set<string>();
    for (const { task } of running) {
      if (task.priority === 'live') {
        liveRunning.add(seriesOf(task));
        liveSeries.add(seriesOf(task));
      }
    }
    for (const { task } of this.entries) {
      if (task.priority === 'live') liveSeries.add(seriesOf(task));
    }

    const ordered = [...this.entries].sort(
      (a, b) => rank(a.task) - rank(b.task) || a.seq - b.seq
    );
    const liveBlocked = new Set(liveRunning);

    for (const entry of ordered) {
      const series = seriesOf(entry.task);
      if (entry.task.priority === 'live') {
        if (liveBlocked.has(series)) continue;
        // this entry is the oldest live task of its series: it either runs or holds the series
        liveBlocked.add(series);
        if (entry.task.notBefore > now) continue;
      } else {
        if (liveSeries.has(series) || entry.task.notBefore > now) continue;
      }
      this.entries.splice(this.entries.indexOf(entry), 1);
      return entry;
    }
    return undefined;
  }

  /**
   * Earliest future notBefore among queued tasks
   */
  nextWakeAt(now: number): number | null {
    let earliest: number | null = null;
    for (const { task } of this.entries) {
      if (task.notBefore > now && (earliest === null || task.notBefore < earliest)) {
        earliest = task.notBefore;
      }
    }
    return earliest;
  }

  drain(): QueuedTask[] {
    const drained = this.entries;
    this.entries = [];
    return drained;
  }

  countBy(priority: FetchTask['priority']): number {
    return this.entries.filter(({ task }) => task.priority === priority).length;
  }
}

function rank(task: FetchTask): number {
  return task.priority === 'live' ? 0 : 1;
}
