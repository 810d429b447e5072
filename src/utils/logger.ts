import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogRecord {
  time: Date;
  level: LogLevel;
  component: string;
  location: string;
  message: string;
  error?: unknown;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  /** Same sink and component, tagged with a different source location. */
  child(location: string): Logger;
}

export interface LoggerOptions {
  component?: string;
  location?: string;
  sink?: LogSink;
  verbose?: boolean | (() => boolean);
}

const originalConsole = {
  log: console.log.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
};

const DEFAULT_COMPONENT = "tabfetch";

let isVerbose = false;
let droppedRecords = 0;

export function setVerboseMode(verbose: boolean): void {
  isVerbose = verbose;
}

export function isVerboseMode(): boolean {
  return isVerbose;
}

/** Records a sink threw on since the process started. */
export function getDroppedRecordCount(): number {
  return droppedRecords;
}

const levelColors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatClock(time: Date): string {
  return `${pad(time.getHours())}:${pad(time.getMinutes())}:${pad(time.getSeconds())}`;
}

/**
 * `[HH:MM:SS] [component]:[location] [LEVEL] - message`
 */
export function formatRecord(
  record: LogRecord,
  colorize: (level: LogLevel, text: string) => string = (_level, text) =>
    text,
): string {
  const level = colorize(record.level, record.level.toUpperCase());
  return `[${formatClock(record.time)}] [${record.component}]:[${record.location}] [${level}] - ${record.message}`;
}

export const consoleSink: LogSink = (record) => {
  const line = formatRecord(record, (level, text) => levelColors[level](text));
  const method =
    record.level === "error" ? "error" : record.level === "warn" ? "warn" : "log";
  originalConsole[method](line);

  if (record.error instanceof Error && record.error.stack) {
    originalConsole[method](chalk.gray(record.error.stack));
  }
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const component = options.component ?? DEFAULT_COMPONENT;
  const location = options.location ?? "main";
  const sink = options.sink ?? consoleSink;
  const verbose = options.verbose ?? isVerboseMode;
  const debugEnabled =
    typeof verbose === "function" ? verbose : () => verbose;

  const emit = (level: LogLevel, message: string, error?: unknown): void => {
    try {
      sink({ time: new Date(), level, component, location, message, error });
    } catch {
      // Sink failures drop the record
      droppedRecords++;
    }
  };

  return {
    debug(message) {
      if (!debugEnabled()) {
        return;
      }
      emit("debug", message);
    },
    info(message) {
      emit("info", message);
    },
    warn(message) {
      emit("warn", message);
    },
    error(message, error) {
      emit("error", message, error);
    },
    child(childLocation) {
      return createLogger({
        component,
        location: childLocation,
        sink,
        verbose,
      });
    },
  };
}

export const logger = createLogger();

/**
 * Collects records in memory. Used by tests to assert on log output.
 */
export function createMemorySink(): {
  sink: LogSink;
  records: LogRecord[];
  messages: (level?: LogLevel) => string[];
} {
  const records: LogRecord[] = [];
  return {
    sink: (record) => {
      records.push(record);
    },
    records,
    messages: (level) =>
      records
        .filter((record) => level === undefined || record.level === level)
        .map((record) => record.message),
  };
}

type ConsoleMethods = Pick<Console, "log" | "warn" | "error">;

/**
 * Sends stray console output through the captured console methods. The
 * arguments pass through unformatted so banners and boxes keep their layout.
 */
export function installConsoleBridge(
  target: ConsoleMethods = console,
  writer: ConsoleMethods = originalConsole,
): void {
  target.log = (...args: unknown[]) => writer.log(...args);
  target.warn = (...args: unknown[]) => writer.warn(...args);
  target.error = (...args: unknown[]) => writer.error(...args);
}
