import {
  QueueCancelledError,
  QueueClosedError,
  QueueStateError,
} from "../utils/errors.js";
import type { QueueStats, SharedQueue } from "./types.js";

interface Waiter<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
  detach: () => void;
}

/**
 * Work Queue
 *
 * In-memory FIFO shared by every worker of a run. Tracks how many items
 * were enqueued but not yet marked done; the queue is drained when that
 * count reaches zero.
 *
 * Dequeue waiters are served in arrival order. Each item is handed to
 * exactly one waiter: handing an item over and removing it from the buffer
 * happen in the same synchronous step, so concurrent consumers on the event
 * loop cannot observe the same item.
 */
export class WorkQueue<T> implements SharedQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private drainWaiters: Array<() => void> = [];
  private isClosed = false;
  private counters = { enqueued: 0, dequeued: 0, done: 0 };

  get size(): number {
    return this.items.length;
  }

  get outstanding(): number {
    return this.counters.enqueued - this.counters.done;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  enqueue(item: T): void {
    if (this.isClosed) {
      throw new QueueClosedError();
    }

    this.counters.enqueued++;

    const waiter = this.waiters.shift();
    if (waiter) {
      this.counters.dequeued++;
      waiter.detach();
      waiter.resolve(item);
      return;
    }

    this.items.push(item);
  }

  dequeue(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new QueueCancelledError(signal.reason));
    }

    if (this.size > 0) {
      return Promise.resolve(this.take());
    }

    if (this.isClosed) {
      return Promise.reject(new QueueClosedError());
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((entry) => entry !== waiter);
        reject(new QueueCancelledError(signal?.reason));
      };

      const waiter: Waiter<T> = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  markDone(): void {
    if (this.outstanding <= 0) {
      throw new QueueStateError(
        "markDone() called more times than items were enqueued",
      );
    }

    this.counters.done++;

    if (this.outstanding === 0) {
      const waiters = this.drainWaiters;
      this.drainWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  waitUntilDrained(): Promise<void> {
    if (this.outstanding === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  /**
   * Stop handing out work. Pending dequeues reject with QueueClosedError;
   * buffered items stay counted as outstanding.
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.detach();
      waiter.reject(new QueueClosedError());
    }
  }

  stats(): QueueStats {
    return {
      ...this.counters,
      pending: this.size,
      inFlight: Math.max(0, this.counters.dequeued - this.counters.done),
    };
  }

  private take(): T {
    const [item] = this.items.splice(0, 1);
    this.counters.dequeued++;
    return item;
  }
}
