import { createHttpClient, type HttpClient } from "../fetch/http-client.js";
import {
  DEFAULT_PARSE_OPTIONS,
  type ParseOptions,
} from "../parser/csv-parser.js";
import { describeError } from "../utils/errors.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { formatSeconds, startTimer } from "../utils/timer.js";
import {
  ThreadedProcessingSimulator,
  noopProcessingSimulator,
  type ProcessingSimulator,
} from "./processing-simulator.js";
import { createItemProcessor } from "./processor.js";
import { WorkerPool } from "./worker-pool.js";
import { WorkQueue } from "./work-queue.js";
import type {
  CoordinatorOptions,
  CoordinatorResult,
  Locator,
  QueueProgress,
  SharedQueue,
  WorkResult,
  WorkerPoolResult,
} from "./types.js";

export const DEFAULT_WORKERS = 5;
export const DEFAULT_TIMEOUT_MS = 5000;
export const DEFAULT_PROCESSING_DELAY_MS = 500;

/**
 * Coordinator (Producer)
 *
 * Runs one pass of the pipeline:
 * 1. Loads every locator into a fresh queue, in list order
 * 2. Acquires the shared network context
 * 3. Starts the worker pool on that queue and context
 * 4. Waits for the queue to drain
 * 5. Cancels and joins the workers
 * 6. Releases the network context and reports the run
 */
export class Coordinator {
  private options: Required<
    Pick<CoordinatorOptions, "workers" | "timeoutMs" | "processingDelayMs">
  > &
    CoordinatorOptions;
  private parseOptions: ParseOptions;
  private log: Logger;

  constructor(options: CoordinatorOptions = {}) {
    this.options = {
      workers: DEFAULT_WORKERS,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      processingDelayMs: DEFAULT_PROCESSING_DELAY_MS,
      ...options,
    };
    this.parseOptions = { ...DEFAULT_PARSE_OPTIONS, ...options.parseOptions };
    this.log = (options.logger ?? defaultLogger).child("coordinator");
  }

  /**
   * Main run method
   */
  async run(locators: readonly Locator[]): Promise<CoordinatorResult> {
    const elapsed = startTimer(this.options.clock);
    const workerCount = Math.max(1, Math.floor(this.options.workers));

    // Phase 1: Load the queue
    const queue = this.options.createQueue?.() ?? new WorkQueue<Locator>();
    for (const locator of locators) {
      queue.enqueue(locator);
    }
    this.log.info(
      `Queue loaded with ${queue.size} locators for ${workerCount} workers`,
    );

    const tally = { succeeded: 0, failed: 0 };
    const onResult = (result: WorkResult) => {
      if (result.status === "ok") {
        tally.succeeded++;
      } else {
        tally.failed++;
      }
      this.reportProgress(queue, locators.length, tally);
    };

    // Phase 2: Acquire the shared network context
    const client = await this.acquireClient(workerCount);
    let simulator = noopProcessingSimulator;

    try {
      simulator = this.createSimulator(workerCount);

      // Phase 3: Start workers
      const pool = new WorkerPool(
        queue,
        workerCount,
        createItemProcessor({
          client,
          parseOptions: this.parseOptions,
          timeoutMs: this.options.timeoutMs,
          processingDelayMs: this.options.processingDelayMs,
          simulator,
          logger: (this.options.logger ?? defaultLogger).child("processor"),
          clock: this.options.clock,
        }),
        {
          logger: (this.options.logger ?? defaultLogger).child("worker"),
          onResult,
        },
      );

      pool.start();
      this.reportProgress(queue, locators.length, tally);

      // Phase 4 + 5: Wait for drain, then cancel and join on every path
      let poolResult: WorkerPoolResult;
      try {
        await Promise.race([queue.waitUntilDrained(), pool.crashed()]);
      } finally {
        pool.cancel();
        poolResult = await pool.join();
      }

      const durationMs = elapsed();
      this.log.info(`Entire Run took: ${formatSeconds(durationMs)}`);

      return {
        total: locators.length,
        succeeded: tally.succeeded,
        failed: tally.failed,
        durationMs,
        workersUsed: workerCount,
        workers: poolResult.workers,
      };
    } finally {
      // Phase 6: Release shared resources
      await simulator.close();
      await client.close();
    }
  }

  private async acquireClient(workerCount: number): Promise<HttpClient> {
    if (this.options.createClient) {
      return this.options.createClient();
    }
    return createHttpClient({ connectionsPerOrigin: workerCount });
  }

  private createSimulator(workerCount: number): ProcessingSimulator {
    if (this.options.createSimulator) {
      return this.options.createSimulator();
    }
    return this.options.processingDelayMs > 0
      ? new ThreadedProcessingSimulator(workerCount)
      : noopProcessingSimulator;
  }

  private reportProgress(
    queue: SharedQueue<Locator>,
    total: number,
    tally: { succeeded: number; failed: number },
  ): void {
    if (!this.options.onProgress) {
      return;
    }
    const stats = queue.stats();
    const finished = tally.succeeded + tally.failed;
    const progress: QueueProgress = {
      total,
      pending: stats.pending,
      inProgress: Math.max(0, stats.dequeued - finished),
      completed: tally.succeeded,
      failed: tally.failed,
    };
    try {
      this.options.onProgress(progress);
    } catch (error) {
      this.log.warn(`Progress listener failed: ${describeError(error)}`);
    }
  }
}
