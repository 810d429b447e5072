/**
 * Worker
 *
 * Long-lived loop that:
 * 1. Dequeues the next locator from the shared queue
 * 2. Hands it to the item processor
 * 3. Marks it done on the queue
 * 4. Exits when the queue stops handing out work (cancellation)
 *
 * Cancellation is only observed while waiting in dequeue. An item that has
 * been dequeued is always processed and marked done.
 */

import { describeError, isQueueShutdown } from "../utils/errors.js";
import type {
  ItemProcessor,
  Locator,
  SharedQueue,
  WorkerOptions,
  WorkerReport,
  WorkerState,
  WorkResult,
} from "./types.js";

export class Worker {
  readonly id: number;
  private queue: SharedQueue<Locator>;
  private processItem: ItemProcessor;
  private options: WorkerOptions;
  private currentState: WorkerState;
  private report: WorkerReport;

  constructor(
    id: number,
    queue: SharedQueue<Locator>,
    processItem: ItemProcessor,
    options: WorkerOptions,
  ) {
    this.id = id;
    this.queue = queue;
    this.processItem = processItem;
    this.options = options;
    this.currentState = "idle";
    this.report = { workerId: id, processed: 0, succeeded: 0, failed: 0 };
  }

  get state(): WorkerState {
    return this.currentState;
  }

  /**
   * Runs until cancelled. Resolves with the worker's counters.
   */
  async run(): Promise<WorkerReport> {
    const log = this.options.logger;
    log.debug(`[worker-${this.id}] Started`);

    while (true) {
      this.currentState = "dequeuing";

      let locator: Locator;
      try {
        locator = await this.queue.dequeue(this.options.signal);
      } catch (error) {
        if (isQueueShutdown(error)) {
          this.currentState = "cancelled";
          break;
        }
        throw error;
      }

      this.currentState = "processing";
      try {
        const result = await this.processItem(locator, this.id);
        this.report.processed++;
        if (result.status === "ok") {
          this.report.succeeded++;
        } else {
          this.report.failed++;
        }
        this.notify(result);
      } finally {
        this.queue.markDone();
      }

      this.currentState = "idle";
    }

    log.debug(
      `[worker-${this.id}] Cancelled after ${this.report.processed} items: ${this.report.succeeded} succeeded, ${this.report.failed} failed`,
    );

    return { ...this.report };
  }

  private notify(result: WorkResult): void {
    try {
      this.options.onResult?.(result);
    } catch (error) {
      this.options.logger.warn(
        `[worker-${this.id}] Result listener failed: ${describeError(error)}`,
      );
    }
  }
}
