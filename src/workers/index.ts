/**
 * Fetch-and-Parse Worker Pool
 *
 * Producer-Consumer Pipeline: a fixed number of workers consume locators
 * from one shared in-memory queue, fetch and parse each resource, and are
 * cancelled once the queue drains.
 *
 * Usage:
 *   import { Coordinator } from "./src/workers/index.js";
 *
 *   const coordinator = new Coordinator({ workers: 5, timeoutMs: 5000 });
 *   const result = await coordinator.run([
 *     "https://example.com/a.csv",
 *     "https://example.com/b.csv",
 *   ]);
 */

// Main classes
export {
  Coordinator,
  DEFAULT_PROCESSING_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_WORKERS,
} from "./coordinator.js";
export { WorkerPool } from "./worker-pool.js";
export { WorkQueue } from "./work-queue.js";
export { Worker } from "./worker.js";
export { createItemProcessor, processItem } from "./processor.js";
export {
  ThreadedProcessingSimulator,
  noopProcessingSimulator,
} from "./processing-simulator.js";
export type { ProcessingSimulator } from "./processing-simulator.js";

// Types
export type {
  Locator,
  SharedQueue,
  QueueStats,
  QueueProgress,
  WorkerState,
  WorkResult,
  ProcessorContext,
  ItemProcessor,
  WorkerOptions,
  WorkerReport,
  WorkerPoolOptions,
  WorkerPoolResult,
  CoordinatorOptions,
  CoordinatorResult,
} from "./types.js";
