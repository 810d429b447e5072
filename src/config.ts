import { z } from "zod";
import { ConfigError } from "./utils/errors.js";
import {
  DEFAULT_PROCESSING_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_WORKERS,
} from "./workers/coordinator.js";

export const MAX_WORKERS = 64;

const booleanFlag = z.preprocess((value) => {
  if (typeof value !== "string") {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "y"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no", "n"].includes(normalized)) {
    return false;
  }
  return value;
}, z.boolean());

const pipelineConfigSchema = z.object({
  workers: z.coerce.number().int().min(1).max(MAX_WORKERS),
  timeoutMs: z.coerce.number().int().positive(),
  processingDelayMs: z.coerce.number().int().min(0),
  encoding: z.string().trim().min(1),
  delimiter: z
    .string()
    .refine((value) => [...value].length === 1, "must be a single character"),
  verbose: booleanFlag,
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

/**
 * Raw values as they arrive from the command line; every field optional.
 */
export interface CliConfigInput {
  workers?: string | number;
  timeout?: string | number;
  delay?: string | number;
  encoding?: string;
  delimiter?: string;
  verbose?: boolean;
  sequential?: boolean;
}

type RawConfig = Partial<Record<keyof PipelineConfig, unknown>>;

export const DEFAULT_CONFIG: PipelineConfig = {
  workers: DEFAULT_WORKERS,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  processingDelayMs: DEFAULT_PROCESSING_DELAY_MS,
  encoding: "utf-8",
  delimiter: ",",
  verbose: false,
};

const ENV_KEYS: Record<string, keyof PipelineConfig> = {
  TABFETCH_WORKERS: "workers",
  TABFETCH_TIMEOUT_MS: "timeoutMs",
  TABFETCH_PROCESSING_DELAY_MS: "processingDelayMs",
  TABFETCH_ENCODING: "encoding",
  TABFETCH_DELIMITER: "delimiter",
  TABFETCH_VERBOSE: "verbose",
};

function fromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }
  return raw;
}

function fromCli(cli: CliConfigInput): RawConfig {
  const pairs: Array<[keyof PipelineConfig, unknown]> = [
    ["workers", cli.workers],
    ["timeoutMs", cli.timeout],
    ["processingDelayMs", cli.delay],
    ["encoding", cli.encoding],
    ["delimiter", cli.delimiter],
    ["verbose", cli.verbose],
  ];
  const raw: RawConfig = {};
  for (const [key, value] of pairs) {
    if (value !== undefined) {
      raw[key] = value;
    }
  }
  return raw;
}

/**
 * Defaults, then environment, then command line. `--sequential` pins the
 * pool to one worker.
 */
export function resolveConfig(
  cli: CliConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): PipelineConfig {
  const merged: RawConfig = {
    ...DEFAULT_CONFIG,
    ...fromEnv(env),
    ...fromCli(cli),
  };
  if (cli.sequential) {
    merged.workers = 1;
  }

  const parsed = pipelineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const fields = [
      ...new Set(parsed.error.issues.map((issue) => issue.path.join("."))),
    ];
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`, fields);
  }

  return parsed.data;
}

/**
 * One locator per line; blank lines and `#` comments are skipped.
 */
export function loadLocators(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}
