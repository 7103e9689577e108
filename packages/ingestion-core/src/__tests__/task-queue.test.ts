import { describe, it, expect } from 'vitest';
import { TaskQueue, type QueuedTask } from '../scheduler/task-queue';
import { makeTask } from './helpers';

const backfill = { priority: 'backfill' as const, origin: { kind: 'gap' as const, gapId: 'g' } };

function takeIds(queue: TaskQueue, now = 0, running: QueuedTask[] = []): string[] {
  const ids: string[] = [];
  for (let entry = queue.take(now, running); entry; entry = queue.take(now, running)) {
    ids.push(entry.task.id);
  }
  return ids;
}

describe('TaskQueue', () => {
  it('should dispatch live before backfill, then in enqueue order', () => {
    const queue = new TaskQueue();
    queue.push(makeTask('b1', { ...backfill, symbol: 'ETHUSDT' }));
    queue.push(makeTask('l1', { symbol: 'SOLUSDT' }));
    queue.push(makeTask('b2', { ...backfill, symbol: 'ADAUSDT' }));
    queue.push(makeTask('l2', { symbol: 'XRPUSDT' }));

    expect(takeIds(queue)).toEqual(['l1', 'l2', 'b1', 'b2']);
  });

  it('should hold backfill while live work for the same series is queued', () => {
    const queue = new TaskQueue();
    queue.push(makeTask('b1', backfill));
    queue.push(makeTask('l1', { notBefore: 100 }));

    expect(queue.take(50, [])).toBeUndefined();
    expect(takeIds(queue, 100)).toEqual(['l1', 'b1']);
  });

  it('should hold backfill while live work for the same series is running', () => {
    const queue = new TaskQueue();
    const running = [{ task: makeTask('l0'), seq: 99 }];
    queue.push(makeTask('b1', backfill));
    queue.push(makeTask('b2', { ...backfill, symbol: 'ETHUSDT' }));

    expect(takeIds(queue, 0, running)).toEqual(['b2']);
    expect(takeIds(queue)).toEqual(['b1']);
  });

  it('should keep live tasks of one series in order across retry delays', () => {
    const queue = new TaskQueue();
    const first = queue.push(makeTask('l1'));
    queue.push(makeTask('l2'));
    queue.push(makeTask('other', { symbol: 'ETHUSDT' }));

    expect(queue.take(0, [])?.task.id).toBe('l1');
    // l1 failed and waits for its retry with its original position
    queue.push(makeTask('l1', { attempt: 1, notBefore: 500 }), first.seq);

    expect(takeIds(queue, 100)).toEqual(['other']);
    expect(takeIds(queue, 500)).toEqual(['l1', 'l2']);
  });

  it('should report the earliest pending wake-up and counts', () => {
    const queue = new TaskQueue();
    queue.push(makeTask('a', { notBefore: 300 }));
    queue.push(makeTask('b', { ...backfill, notBefore: 200 }));
    queue.push(makeTask('c', backfill));

    expect(queue.nextWakeAt(100)).toBe(200);
    expect(queue.nextWakeAt(300)).toBeNull();
    expect(queue.countBy('live')).toBe(1);
    expect(queue.countBy('backfill')).toBe(2);

    expect(queue.drain().map((entry) => entry.task.id)).toEqual(['a', 'b', 'c']);
    expect(queue.size).toBe(0);
  });
});
