import { describe, it, expect } from "vitest";
import { WorkQueue } from "../src/workers/work-queue.js";
import {
  QueueCancelledError,
  QueueClosedError,
  QueueStateError,
} from "../src/utils/errors.js";

describe("WorkQueue", () => {
  it("hands out items in enqueue order", async () => {
    const queue = new WorkQueue<string>();
    queue.enqueue("A");
    queue.enqueue("B");
    queue.enqueue("C");

    expect(await queue.dequeue()).toBe("A");
    expect(await queue.dequeue()).toBe("B");
    expect(await queue.dequeue()).toBe("C");
    expect(queue.size).toBe(0);
  });

  it("wakes a waiting consumer when an item arrives", async () => {
    const queue = new WorkQueue<string>();
    const pending = queue.dequeue();

    queue.enqueue("late");

    await expect(pending).resolves.toBe("late");
    expect(queue.stats()).toEqual({
      enqueued: 1,
      dequeued: 1,
      done: 0,
      pending: 0,
      inFlight: 1,
    });
  });

  it("serves waiting consumers in arrival order", async () => {
    const queue = new WorkQueue<number>();
    const first = queue.dequeue();
    const second = queue.dequeue();

    queue.enqueue(1);
    queue.enqueue(2);

    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
  });

  it("delivers every item exactly once to concurrent consumers", async () => {
    const queue = new WorkQueue<number>();
    for (let i = 0; i < 50; i++) {
      queue.enqueue(i);
    }

    const seen: number[] = [];
    const consumer = async () => {
      while (queue.size > 0) {
        seen.push(await queue.dequeue());
        await Promise.resolve();
        queue.markDone();
      }
    };

    await Promise.all([consumer(), consumer(), consumer(), consumer()]);

    expect(seen).toHaveLength(50);
    expect(new Set(seen).size).toBe(50);
    expect(queue.outstanding).toBe(0);
  });

  it("counts outstanding items until they are marked done", async () => {
    const queue = new WorkQueue<string>();
    queue.enqueue("A");
    queue.enqueue("B");
    expect(queue.outstanding).toBe(2);

    await queue.dequeue();
    await queue.dequeue();
    expect(queue.outstanding).toBe(2);

    queue.markDone();
    expect(queue.outstanding).toBe(1);
  });

  it("waits for markDone, not dequeue, before reporting drained", async () => {
    const queue = new WorkQueue<string>();
    queue.enqueue("A");
    await queue.dequeue();

    let drained = false;
    const drain = queue.waitUntilDrained().then(() => {
      drained = true;
    });

    await Promise.resolve();
    expect(drained).toBe(false);

    queue.markDone();
    await drain;
    expect(drained).toBe(true);
  });

  it("reports an empty queue as drained immediately", async () => {
    const queue = new WorkQueue<string>();
    await expect(queue.waitUntilDrained()).resolves.toBeUndefined();
  });

  it("rejects markDone beyond the number of enqueued items", () => {
    const queue = new WorkQueue<string>();
    expect(() => queue.markDone()).toThrow(QueueStateError);
  });

  it("rejects pending dequeues when closed", async () => {
    const queue = new WorkQueue<string>();
    const pending = queue.dequeue();

    queue.close();

    await expect(pending).rejects.toBeInstanceOf(QueueClosedError);
    await expect(queue.dequeue()).rejects.toBeInstanceOf(QueueClosedError);
    expect(() => queue.enqueue("A")).toThrow(QueueClosedError);
  });

  it("cancels a waiting dequeue through its abort signal", async () => {
    const queue = new WorkQueue<string>();
    const controller = new AbortController();
    const pending = queue.dequeue(controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(QueueCancelledError);

    // The cancelled waiter must not swallow the next item
    queue.enqueue("A");
    await expect(queue.dequeue()).resolves.toBe("A");
  });

  it("rejects immediately when the signal is already aborted", async () => {
    const queue = new WorkQueue<string>();
    queue.enqueue("A");
    const controller = new AbortController();
    controller.abort();

    await expect(queue.dequeue(controller.signal)).rejects.toBeInstanceOf(
      QueueCancelledError,
    );
    expect(queue.size).toBe(1);
  });
});
