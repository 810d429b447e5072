import type { FetchOptions, HttpClient } from "../src/fetch/http-client.js";
import { FetchError } from "../src/utils/errors.js";
import { createLogger, createMemorySink } from "../src/utils/logger.js";
import { sleep } from "../src/utils/timer.js";

export type FetchBehaviour =
  | { type: "text"; body: string; latencyMs?: number }
  | { type: "timeout" }
  | { type: "transport"; status?: number };

/**
 * In-process HttpClient. Each locator maps to a behaviour; unknown locators
 * fall back to `fallback`.
 */
export class StubHttpClient implements HttpClient {
  readonly requests: string[] = [];
  closed = false;

  constructor(
    private readonly fallback: FetchBehaviour,
    private readonly behaviours: Record<string, FetchBehaviour> = {},
  ) {}

  async fetch(locator: string, options: FetchOptions): Promise<Uint8Array> {
    this.requests.push(locator);
    const behaviour = this.behaviours[locator] ?? this.fallback;

    switch (behaviour.type) {
      case "text":
        if (behaviour.latencyMs) {
          await sleep(behaviour.latencyMs);
        }
        return new TextEncoder().encode(behaviour.body);
      case "timeout":
        throw FetchError.timeout(locator, options.timeoutMs);
      case "transport":
        throw FetchError.transport(
          locator,
          new Error("connection refused"),
          behaviour.status,
        );
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function createTestLogger() {
  const memory = createMemorySink();
  return {
    ...memory,
    logger: createLogger({ sink: memory.sink, verbose: true }),
  };
}

/**
 * Clock that advances by `stepMs` every time it is read.
 */
export function createSteppingClock(stepMs: number): () => number {
  let now = 0;
  return () => {
    const current = now;
    now += stepMs;
    return current;
  };
}
