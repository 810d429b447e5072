import { Worker as Thread } from "node:worker_threads";

/**
 * Stand-in for the CPU-bound step that follows parsing. The blocking wait
 * runs on a worker thread so the event loop, and every other pipeline
 * worker on it, keeps running meanwhile.
 */
export interface ProcessingSimulator {
  run(durationMs: number): Promise<void>;
  close(): Promise<void>;
}

// Evaluated as a CommonJS script inside each thread
const BLOCKING_SOURCE = `
const { parentPort } = require("node:worker_threads");
const cell = new Int32Array(new SharedArrayBuffer(4));
parentPort.on("message", (durationMs) => {
  Atomics.wait(cell, 0, 0, durationMs);
  parentPort.postMessage("done");
});
`;

interface Job {
  durationMs: number;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Keeps a set of blocking threads and reuses idle ones. A new thread is
 * started only when every existing one is busy, up to `maxThreads`; beyond
 * that jobs wait for the next idle thread.
 */
export class ThreadedProcessingSimulator implements ProcessingSimulator {
  private readonly maxThreads: number;
  private idle: Thread[] = [];
  private busy = new Set<Thread>();
  private backlog: Job[] = [];
  private isClosed = false;

  constructor(maxThreads = 4) {
    this.maxThreads = Math.max(1, maxThreads);
  }

  run(durationMs: number): Promise<void> {
    if (durationMs <= 0) {
      return Promise.resolve();
    }
    if (this.isClosed) {
      return Promise.reject(new Error("Processing simulator is closed"));
    }

    return new Promise<void>((resolve, reject) => {
      this.backlog.push({ durationMs, resolve, reject });
      this.pump();
    });
  }

  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    const pending = this.backlog;
    this.backlog = [];
    for (const job of pending) {
      job.reject(new Error("Processing simulator is closed"));
    }

    const threads = [...this.idle, ...this.busy];
    this.idle = [];
    this.busy.clear();
    await Promise.all(threads.map((thread) => thread.terminate()));
  }

  private pump(): void {
    while (this.backlog.length > 0) {
      const thread = this.acquire();
      if (!thread) {
        return;
      }
      const [job] = this.backlog.splice(0, 1);
      this.dispatch(thread, job);
    }
  }

  private acquire(): Thread | undefined {
    const reused = this.idle.pop();
    if (reused) {
      return reused;
    }
    if (this.busy.size >= this.maxThreads) {
      return undefined;
    }
    return new Thread(BLOCKING_SOURCE, { eval: true });
  }

  private dispatch(thread: Thread, job: Job): void {
    this.busy.add(thread);

    const cleanup = () => {
      thread.off("message", onMessage);
      thread.off("error", onError);
      thread.off("exit", onExit);
      this.busy.delete(thread);
    };
    const onMessage = () => {
      cleanup();
      job.resolve();
      if (this.isClosed) {
        return;
      }
      this.idle.push(thread);
      this.pump();
    };
    const onError = (error: Error) => {
      cleanup();
      job.reject(error);
      void thread.terminate();
      this.pump();
    };
    const onExit = (code: number) => {
      cleanup();
      job.reject(new Error(`Processing thread exited with code ${code}`));
      this.pump();
    };

    thread.on("message", onMessage);
    thread.on("error", onError);
    thread.on("exit", onExit);
    thread.postMessage(job.durationMs);
  }
}

/**
 * Skips the step entirely; used when the configured delay is zero.
 */
export const noopProcessingSimulator: ProcessingSimulator = {
  run: () => Promise.resolve(),
  close: () => Promise.resolve(),
};
