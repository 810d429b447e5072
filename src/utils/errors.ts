/**
 * Error taxonomy for the fetch-and-parse pipeline.
 *
 * Fetch and parse errors are caught at the work item boundary and only ever
 * surface as log lines. Queue and config errors are setup failures and
 * propagate to the caller.
 */

export type ErrorCode =
  | "FETCH_TIMEOUT"
  | "FETCH_TRANSPORT"
  | "PARSE_MALFORMED"
  | "PARSE_UNSUPPORTED_OPTIONS"
  | "QUEUE_CLOSED"
  | "QUEUE_CANCELLED"
  | "QUEUE_STATE"
  | "CONFIG_INVALID";

export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

export type FetchErrorKind = "timeout" | "transport";

export class FetchError extends PipelineError {
  readonly kind: FetchErrorKind;
  readonly locator: string;
  readonly status?: number;

  constructor(
    kind: FetchErrorKind,
    locator: string,
    message: string,
    options: { cause?: unknown; status?: number } = {},
  ) {
    super(kind === "timeout" ? "FETCH_TIMEOUT" : "FETCH_TRANSPORT", message, {
      cause: options.cause,
    });
    this.name = "FetchError";
    this.kind = kind;
    this.locator = locator;
    this.status = options.status;
  }

  static timeout(locator: string, timeoutMs: number): FetchError {
    return new FetchError(
      "timeout",
      locator,
      `Request to ${locator} timed out after ${timeoutMs}ms`,
    );
  }

  static transport(
    locator: string,
    cause: unknown,
    status?: number,
  ): FetchError {
    const reason =
      status !== undefined ? `HTTP ${status}` : getErrorMessage(cause);
    return new FetchError(
      "transport",
      locator,
      `Request to ${locator} failed: ${reason}`,
      { cause, status },
    );
  }
}

export type ParseErrorKind = "malformed" | "unsupported-options";

export class ParseError extends PipelineError {
  readonly kind: ParseErrorKind;

  constructor(kind: ParseErrorKind, message: string, cause?: unknown) {
    super(
      kind === "malformed" ? "PARSE_MALFORMED" : "PARSE_UNSUPPORTED_OPTIONS",
      message,
      { cause },
    );
    this.name = "ParseError";
    this.kind = kind;
  }
}

export class QueueClosedError extends PipelineError {
  constructor() {
    super("QUEUE_CLOSED", "Queue is closed");
    this.name = "QueueClosedError";
  }
}

export class QueueCancelledError extends PipelineError {
  constructor(reason?: unknown) {
    super("QUEUE_CANCELLED", "Dequeue was cancelled", { cause: reason });
    this.name = "QueueCancelledError";
  }
}

export class QueueStateError extends PipelineError {
  constructor(message: string) {
    super("QUEUE_STATE", message);
    this.name = "QueueStateError";
  }
}

export class ConfigError extends PipelineError {
  readonly fields: string[];

  constructor(message: string, fields: string[]) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
    this.fields = fields;
  }
}

/**
 * True when a dequeue ended because the queue stopped handing out work,
 * which is how workers learn they have been cancelled.
 */
export function isQueueShutdown(
  error: unknown,
): error is QueueClosedError | QueueCancelledError {
  return (
    error instanceof QueueClosedError || error instanceof QueueCancelledError
  );
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

/**
 * One-line description used in log output, e.g.
 * `FetchError(timeout): Request to A timed out after 5000ms`.
 */
export function describeError(error: unknown): string {
  if (error instanceof FetchError || error instanceof ParseError) {
    return `${error.name}(${error.kind}): ${error.message}`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${getErrorMessage(error)}`;
  }
  return String(error);
}
