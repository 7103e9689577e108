import type { FetchTask } from '@gapless/schemas';
import { createLogger, isIngestionError, sleep, toError, toErrorMessage } from '@gapless/utils';
import type { RetryPolicy } from '../retry/retry-policy';
import { TaskQueue, type QueuedTask } from './task-queue';

const logger = createLogger('ingestion:scheduler');

export type TaskOutcome =
  | { status: 'succeeded' }
  | { status: 'abandoned'; error: Error; reason: 'fatal' | 'attempts_exhausted' }
  | { status: 'cancelled' };

export interface WorkerPoolOptions {
  concurrency: number;
  retryPolicy: RetryPolicy;
  execute: (task: FetchTask, signal: AbortSignal) => Promise<void>;
  /** Called once per task with its final outcome; errors are logged, never rethrown */
  onSettled?: (task: FetchTask, outcome: TaskOutcome) => Promise<void> | void;
  now?: () => number;
}

export interface WorkerPoolStats {
  queuedLive: number;
  queuedBackfill: number;
  running: number;
  accepting: boolean;
}

/**
 * Bounded pool of workers pulling from the task queue.
 *
 * Failed tasks go back on the queue with `notBefore` set from the retry
 * policy and keep their original position; a waiting retry never holds a
 * worker.
 */
export class WorkerPool {
  private options: WorkerPoolOptions;
  private now: () => number;
  private queue = new TaskQueue();
  private running: Set<QueuedTask> = new Set();
  private settling = 0;
  private controller = new AbortController();
  private wakeTimer: ReturnType<typeof setTimeout> | null = null;
  private accepting = true;
  private idleWaiters: Array<() => void> = [];

  constructor(options: WorkerPoolOptions) {
    this.options = options;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Queue a task. Returns false once the pool is stopping.
   */
  submit(task: FetchTask): boolean {
    if (!this.accepting) return false;
    this.queue.push(task);
    this.pump();
    return true;
  }

  stats(): WorkerPoolStats {
    return {
      queuedLive: this.queue.countBy('live'),
      queuedBackfill: this.queue.countBy('backfill'),
      running: this.running.size,
      accepting: this.accepting,
    };
  }

  /**
   * Resolves when nothing is queued, running or settling
   */
  idle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stop accepting work, cancel queued tasks, give running tasks `graceMs`
   * to finish, then abort them.
   */
  async stop(graceMs: number): Promise<void> {
    this.accepting = false;
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }

    const dropped = this.queue.drain();
    for (const { task } of dropped) {
      await this.settle(task, { status: 'cancelled' });
    }

    const grace = new AbortController();
    const graceElapsed = sleep(graceMs, grace.signal).then(
      () => 'timeout' as const,
      () => 'idle' as const
    );
    const result = await Promise.race([this.idle().then(() => 'idle' as const), graceElapsed]);
    grace.abort();

    if (result === 'timeout') {
      logger.warn(
        { event: 'shutdown_abort', running: this.running.size, graceMs },
        'Grace period elapsed, aborting in-flight tasks'
      );
      this.controller.abort(new Error('Worker pool stopped'));
      await this.idle();
    }

    logger.info({ event: 'worker_pool_stopped', cancelled: dropped.length }, 'Worker pool stopped');
  }

  private isIdle(): boolean {
    return this.queue.size === 0 && this.running.size === 0 && this.settling === 0;
  }

  private checkIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private pump(): void {
    while (this.running.size < this.options.concurrency) {
      const entry = this.queue.take(this.now(), this.running);
      if (!entry) break;
      this.running.add(entry);
      this.run(entry).catch((error: unknown) => {
        logger.error({ event: 'worker_crashed', taskId: entry.task.id, error: toErrorMessage(error) }, 'Worker crashed');
      });
    }
    this.scheduleWake();
    this.checkIdle();
  }

  private scheduleWake(): void {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    if (!this.accepting) return;
    const now = this.now();
    const wakeAt = this.queue.nextWakeAt(now);
    if (wakeAt === null) return;
    this.wakeTimer = setTimeout(() => {
      this.wakeTimer = null;
      this.pump();
    }, wakeAt - now);
  }

  private async run(entry: QueuedTask): Promise<void> {
    const { task } = entry;
    const signal = this.controller.signal;
    let outcome: TaskOutcome | null = null;
    this.settling++;

    try {
      await this.options.execute(task, signal);
      outcome = { status: 'succeeded' };
    } catch (error) {
      outcome = this.handleFailure(entry, error, signal);
    } finally {
      this.running.delete(entry);
    }

    try {
      if (outcome) await this.settle(task, outcome);
    } finally {
      this.settling--;
      this.pump();
    }
  }

  private handleFailure(entry: QueuedTask, error: unknown, signal: AbortSignal): TaskOutcome | null {
    const { task } = entry;
    if (signal.aborted || !this.accepting) {
      return { status: 'cancelled' };
    }

    const failedAttempts = task.attempt + 1;
    const decision = this.options.retryPolicy.decide(failedAttempts, error);
    const context = {
      taskId: task.id,
      symbol: task.symbol,
      interval: task.interval,
      start: task.start,
      end: task.end,
      priority: task.priority,
      origin: task.origin.kind === 'gap' ? task.origin.gapId : 'live',
      attempt: failedAttempts,
      kind: isIngestionError(error) ? error.kind : 'unknown',
      error: toErrorMessage(error),
    };

    if (decision.action === 'retry') {
      logger.warn({ event: 'task_retry', ...context, delayMs: decision.delayMs }, 'Task failed, retry scheduled');
      this.queue.push({ ...task, attempt: failedAttempts, notBefore: this.now() + decision.delayMs }, entry.seq);
      return null;
    }

    logger.error({ event: 'task_abandoned', ...context, reason: decision.reason }, 'Task abandoned');
    return { status: 'abandoned', error: toError(error), reason: decision.reason };
  }

  private async settle(task: FetchTask, outcome: TaskOutcome): Promise<void> {
    if (!this.options.onSettled) return;
    try {
      await this.options.onSettled(task, outcome);
    } catch (error) {
      logger.error(
        { event: 'settle_failed', taskId: task.id, status: outcome.status, error: toErrorMessage(error) },
        'Task settlement handler failed'
      );
    }
  }
}
