import { MultiProgressBars } from "multi-progress-bars";
import chalk from "chalk";
import type { QueueProgress } from "../workers/types.js";

const TASK_NAME = "Items";

// Progress bar manager singleton
let mpb: MultiProgressBars | null = null;

/**
 * Initialize the progress bar manager
 */
export function initProgressBars(): MultiProgressBars {
  if (!mpb) {
    mpb = new MultiProgressBars({
      anchor: "bottom",
      persist: true,
      border: true,
      initMessage: " Fetch Progress ",
    });
  }
  return mpb;
}

/**
 * Close and cleanup progress bars
 */
export function closeProgressBars(): void {
  if (mpb) {
    mpb.close();
    mpb = null;
  }
}

/**
 * Add the item progress task
 */
export function addItemProgressTask(totalItems: number): void {
  const bars = initProgressBars();
  bars.addTask(TASK_NAME, {
    type: "percentage",
    barTransformFn: chalk.green,
    nameTransformFn: chalk.green.bold,
    message: `0/${totalItems} items`,
  });
}

export function formatProgressMessage(progress: QueueProgress): string {
  const finished = progress.completed + progress.failed;
  const failed = progress.failed > 0 ? `, ${progress.failed} failed` : "";
  return `${finished}/${progress.total} items (${progress.inProgress} in progress${failed})`;
}

/**
 * Update item progress from a coordinator progress report
 */
export function updateItemProgress(progress: QueueProgress): void {
  if (!mpb || progress.total === 0) return;
  const finished = progress.completed + progress.failed;
  mpb.updateTask(TASK_NAME, {
    percentage: finished / progress.total,
    message: formatProgressMessage(progress),
  });
}

/**
 * Mark the item task as done
 */
export function markItemsDone(message?: string): void {
  if (!mpb) return;
  mpb.done(TASK_NAME, {
    message: message || "Complete",
    barTransformFn: chalk.gray,
  });
}
