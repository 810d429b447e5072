import { Worker } from "./worker.js";
import type {
  ItemProcessor,
  Locator,
  SharedQueue,
  WorkerPoolOptions,
  WorkerPoolResult,
  WorkerReport,
  WorkerState,
} from "./types.js";

/**
 * Worker Pool Manager
 *
 * Starts a fixed number of workers on one shared queue, then cancels them
 * once the coordinator has seen the queue drain and waits for every loop
 * to exit.
 */
export class WorkerPool {
  private queue: SharedQueue<Locator>;
  private workerCount: number;
  private processItem: ItemProcessor;
  private options: WorkerPoolOptions;
  private controller: AbortController;
  private workers: Worker[];
  private runs: Promise<WorkerReport>[];

  constructor(
    queue: SharedQueue<Locator>,
    workerCount: number,
    processItem: ItemProcessor,
    options: WorkerPoolOptions,
  ) {
    this.queue = queue;
    this.workerCount = Math.max(1, Math.floor(workerCount));
    this.processItem = processItem;
    this.options = options;
    this.controller = new AbortController();
    this.workers = [];
    this.runs = [];
  }

  /**
   * Start all workers
   */
  start(): void {
    if (this.runs.length > 0) {
      throw new Error("Worker pool already started");
    }

    const log = this.options.logger;
    log.debug(`Starting ${this.workerCount} workers...`);

    for (let id = 0; id < this.workerCount; id++) {
      const worker = new Worker(id, this.queue, this.processItem, {
        signal: this.controller.signal,
        logger: log,
        onResult: this.options.onResult,
      });
      this.workers.push(worker);
      this.runs.push(worker.run());
    }

    log.debug(`All ${this.workerCount} workers started`);
  }

  /**
   * Rejects as soon as any worker loop throws. Processing never throws, so
   * this only fires on a queue or programming fault.
   */
  crashed(): Promise<never> {
    return new Promise<never>((_resolve, reject) => {
      for (const run of this.runs) {
        run.catch(reject);
      }
    });
  }

  /**
   * Signal cancellation. Workers observe it the next time they wait for an
   * item; work already in progress runs to completion.
   */
  cancel(): void {
    this.controller.abort();
    this.queue.close();
  }

  /**
   * Wait for every worker loop to exit.
   */
  async join(): Promise<WorkerPoolResult> {
    const settled = await Promise.allSettled(this.runs);
    const reports: WorkerReport[] = [];
    const failures: unknown[] = [];

    for (const outcome of settled) {
      if (outcome.status === "fulfilled") {
        reports.push(outcome.value);
      } else {
        failures.push(outcome.reason);
      }
    }

    if (failures.length > 0) {
      throw new AggregateError(failures, "One or more workers crashed");
    }

    return { totalWorkers: this.workerCount, workers: reports };
  }

  /**
   * Cancel and join in one step
   */
  async terminate(): Promise<WorkerPoolResult> {
    this.cancel();
    return this.join();
  }

  getStates(): WorkerState[] {
    return this.workers.map((worker) => worker.state);
  }

  getWorkerCount(): number {
    return this.workerCount;
  }
}
