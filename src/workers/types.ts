/**
 * Type definitions for the fetch-and-parse worker pool
 * Producer-Consumer Pipeline Architecture
 */

import type { HttpClient } from "../fetch/http-client.js";
import type { ParseOptions, RecordPreview } from "../parser/csv-parser.js";
import type { Logger } from "../utils/logger.js";
import type { Clock } from "../utils/timer.js";
import type { ProcessingSimulator } from "./processing-simulator.js";

/**
 * Identifies one fetchable resource (a URL)
 */
export type Locator = string;

/**
 * Contract of the shared queue the workers consume from
 */
export interface SharedQueue<T> {
  enqueue(item: T): void;
  dequeue(signal?: AbortSignal): Promise<T>;
  markDone(): void;
  waitUntilDrained(): Promise<void>;
  close(): void;
  readonly size: number;
  readonly outstanding: number;
  readonly closed: boolean;
  stats(): QueueStats;
}

/**
 * Counters kept by the queue
 */
export interface QueueStats {
  enqueued: number;
  dequeued: number;
  done: number;
  /** Buffered, not yet handed to a worker */
  pending: number;
  /** Handed to a worker, not yet marked done */
  inFlight: number;
}

/**
 * Progress statistics for a run
 */
export interface QueueProgress {
  total: number;
  pending: number;
  inProgress: number;
  completed: number;
  failed: number;
}

/**
 * Worker lifecycle
 * idle -> dequeuing -> processing -> idle -> ... ; terminal: cancelled
 */
export type WorkerState = "idle" | "dequeuing" | "processing" | "cancelled";

/**
 * Outcome of one work item
 */
export type WorkResult =
  | {
      status: "ok";
      locator: Locator;
      workerId: number;
      preview: RecordPreview;
      rowCount: number;
      durationMs: number;
    }
  | {
      status: "failed";
      locator: Locator;
      workerId: number;
      error: unknown;
      durationMs: number;
    };

/**
 * Collaborators shared by every work item of a run
 */
export interface ProcessorContext {
  client: HttpClient;
  parseOptions: ParseOptions;
  timeoutMs: number;
  processingDelayMs: number;
  simulator: ProcessingSimulator;
  logger: Logger;
  clock?: Clock;
}

export type ItemProcessor = (
  locator: Locator,
  workerId: number,
) => Promise<WorkResult>;

/**
 * Options for individual workers
 */
export interface WorkerOptions {
  signal: AbortSignal;
  logger: Logger;
  onResult?: (result: WorkResult) => void;
}

/**
 * Result from a worker run
 */
export interface WorkerReport {
  workerId: number;
  processed: number;
  succeeded: number;
  failed: number;
}

/**
 * Options for the WorkerPool
 */
export interface WorkerPoolOptions {
  logger: Logger;
  onResult?: (result: WorkResult) => void;
}

/**
 * Result from the WorkerPool
 */
export interface WorkerPoolResult {
  totalWorkers: number;
  workers: WorkerReport[];
}

/**
 * Options for the Coordinator
 */
export interface CoordinatorOptions {
  workers?: number;
  timeoutMs?: number;
  processingDelayMs?: number;
  parseOptions?: Partial<ParseOptions>;
  logger?: Logger;
  clock?: Clock;
  /** Acquires the shared network context; released when the run ends */
  createClient?: () => HttpClient | Promise<HttpClient>;
  createSimulator?: () => ProcessingSimulator;
  createQueue?: () => SharedQueue<Locator>;
  onProgress?: (progress: QueueProgress) => void;
}

/**
 * Result from the Coordinator run
 */
export interface CoordinatorResult {
  total: number;
  succeeded: number;
  failed: number;
  durationMs: number;
  workersUsed: number;
  workers: WorkerReport[];
}
