/** Thrown by `get()` when its signal is aborted while waiting. */
export class QueueGetAbortedError extends Error {
  constructor() {
    super('Queue get() aborted');
    this.name = 'QueueGetAbortedError';
  }
}

interface Waiter<T> {
  resolve: (item: T) => void;
  reject: (err: Error) => void;
}

/**
 * Unbounded FIFO queue with awaitable `get()`.
 *
 * Items handed to a waiting getter skip the buffer entirely.
 * `unfinished` counts items that were put but not yet marked done via
 * `taskDone()`, mirroring the processing lifecycle of the consumer.
 */
export class AsyncQueue<T extends NonNullable<unknown>> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private unfinishedTasks = 0;

  /** Number of items buffered and not yet taken. */
  get size(): number {
    return this.items.length;
  }

  /** Number of items put and not yet marked done. */
  get unfinished(): number {
    return this.unfinishedTasks;
  }

  put(item: T): void {
    this.unfinishedTasks++;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Returns an item previously taken with `get()` to the head of the queue.
   * Does not count as a new unfinished task.
   */
  requeue(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return;
    }
    this.items.unshift(item);
  }

  get(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new QueueGetAbortedError());
    }

    const head = this.items.shift();
    if (head !== undefined) {
      return Promise.resolve(head);
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) this.waiters.splice(idx, 1);
        reject(new QueueGetAbortedError());
      };

      const waiter: Waiter<T> = {
        resolve: (item) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(item);
        },
        reject,
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Non-blocking take; `undefined` when empty. */
  getNowait(): T | undefined {
    return this.items.shift();
  }

  taskDone(): void {
    if (this.unfinishedTasks <= 0) {
      throw new Error('taskDone() called more times than there were items');
    }
    this.unfinishedTasks--;
  }
}
