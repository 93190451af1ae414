import type { AgentError } from "../protocol/errors";
import { abortReason } from "../utils/abort";

interface QueuedTask {
  signal?: AbortSignal;
  start: () => Promise<void>;
  skip: (reason: AgentError) => void;
}

/**
 * Queue-based limiter: at most `maxConcurrent` tasks run at once, the rest
 * wait in submission order. A queued task whose signal aborted is rejected
 * without ever starting.
 */
export class ConcurrencyLimiter {
  private queue: QueuedTask[] = [];
  private activeTasks = 0;

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${maxConcurrent}`);
    }
  }

  schedule<T>(run: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        signal,
        start: () => Promise.resolve().then(run).then(resolve, reject),
        skip: reject,
      });
      this.processQueue();
    });
  }

  getStatus() {
    return {
      queueLength: this.queue.length,
      activeTasks: this.activeTasks,
      maxConcurrent: this.maxConcurrent,
    };
  }

  private processQueue(): void {
    while (this.activeTasks < this.maxConcurrent && this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) {
        return;
      }
      if (task.signal?.aborted) {
        task.skip(abortReason(task.signal));
        continue;
      }

      this.activeTasks++;
      void task.start().finally(() => {
        this.activeTasks--;
        this.processQueue();
      });
    }
  }
}
