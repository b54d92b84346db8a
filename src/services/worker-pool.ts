/**
 * Bounded executor for adapter work.
 *
 * At most `size` attempts run at once. Further calls to {@link WorkerPool.run}
 * wait in FIFO order for a free slot. Both the HTTP path and the queue worker
 * dispatch attempts through one shared pool. Slots bound concurrency only; the
 * CPU-bound parse stages are handed to the threads of a ParseWorkerPool.
 *
 * @module services/worker-pool
 */

export interface WorkerPoolStats {
  size: number;
  active: number;
  queued: number;
  completed: number;
}

interface Waiter {
  start: () => void;
}

export class WorkerPool {
  private readonly size: number;
  private active = 0;
  private completed = 0;
  private readonly waiting: Waiter[] = [];

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`WorkerPool size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  run<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.active++;
        // Never on the caller's stack, even when fn is synchronous up to its first await.
        void Promise.resolve()
          .then(fn)
          .then(resolve, reject)
          .finally(() => this.release());
      };

      if (this.active < this.size) {
        start();
      } else {
        this.waiting.push({ start });
      }
    });
  }

  stats(): WorkerPoolStats {
    return {
      size: this.size,
      active: this.active,
      queued: this.waiting.length,
      completed: this.completed
    };
  }

  private release(): void {
    this.active--;
    this.completed++;
    const next = this.waiting.shift();
    if (next) {
      next.start();
    }
  }
}
