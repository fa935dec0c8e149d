import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';

export type PoolTask<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Bounded, FIFO executor for downloads and subprocess calls so a slow transfer
 * never starves metadata resolution for other requests.
 */
export class WorkerPool {
  private readonly limit: LimitFunction;

  constructor(concurrency: number) {
    this.limit = pLimit(Math.max(1, Math.floor(concurrency)));
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  /**
   * Queues `task`. The task receives a signal that aborts when the caller's
   * does; a caller that aborts while still queued rejects at once and its task
   * never runs.
   */
  run<T>(task: PoolTask<T>, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      const onQueuedAbort = (): void => reject(signal?.reason);
      signal?.addEventListener('abort', onQueuedAbort, { once: true });

      const queued = this.limit(async () => {
        signal?.removeEventListener('abort', onQueuedAbort);
        signal?.throwIfAborted();
        const controller = new AbortController();
        const forward = (): void => controller.abort(signal?.reason);
        signal?.addEventListener('abort', forward, { once: true });
        try {
          return await task(controller.signal);
        } finally {
          signal?.removeEventListener('abort', forward);
        }
      });
      void queued.then(resolve, reject);
    });
  }
}
