import { performance } from "node:perf_hooks";

export type Clock = () => number;

export const systemClock: Clock = () => performance.now();

/**
 * Starts a stopwatch; the returned function reports elapsed milliseconds.
 */
export function startTimer(clock: Clock = systemClock): () => number {
  const startedAt = clock();
  return () => clock() - startedAt;
}

/** Seconds with four decimals, as used in the `-> took:` lines. */
export function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(4);
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${seconds}s`;
  }
}

export function formatRate(durationMs: number, completed: number): string {
  const seconds = durationMs / 1000;
  const rate = seconds > 0 ? completed / seconds : 0;
  return `${rate.toFixed(1)} items/second`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
