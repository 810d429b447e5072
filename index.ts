#!/usr/bin/env node
/**
 * tabfetch CLI
 *
 * Fetches a list of tabular resources (CSV over HTTP) through a bounded pool
 * of concurrent workers, parses each one and logs a preview of its first row
 * together with per-item and whole-run timings.
 *
 * @module index
 * @version 1.0.0
 * @license MIT
 */

// ============================================================================
// SECTION 1: IMPORTS
// ============================================================================

import { Command } from "commander";
import chalk from "chalk";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { resolveConfig, type PipelineConfig } from "./src/config.js";
import { PromptType } from "./src/types/enums.js";
import { describeError } from "./src/utils/errors.js";
import {
  cleanupAfterPromptExit,
  collectLocators,
  showConfiguration,
  showHeader,
  showRunSummary,
} from "./src/utils/helpers.js";
import {
  installConsoleBridge,
  logger,
  setVerboseMode,
} from "./src/utils/logger.js";
import {
  addItemProgressTask,
  closeProgressBars,
  initProgressBars,
  markItemsDone,
  updateItemProgress,
} from "./src/utils/progress.js";
import { prompt } from "./src/utils/prompt.js";
import { Coordinator } from "./src/workers/index.js";

// ============================================================================
// SECTION 2: CONSTANTS & CONFIGURATION
// ============================================================================

function readVersion(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  // Beside the sources when run with tsx, one level up from dist/
  const candidates = [
    path.join(here, "package.json"),
    path.join(here, "..", "package.json"),
  ];
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(candidate, "utf-8"));
      if (
        typeof parsed === "object" &&
        parsed !== null &&
        "version" in parsed &&
        typeof parsed.version === "string"
      ) {
        return parsed.version;
      }
    }
  }
  return "0.0.0";
}

const VERSION = readVersion();

interface CliOptions {
  file?: string;
  workers?: string;
  timeout?: string;
  delay?: string;
  encoding?: string;
  delimiter?: string;
  sequential: boolean;
  verbose: boolean;
  interactive: boolean;
  progress: boolean;
  banner: boolean;
}

/** Commander.js program instance */
const program = new Command();

installConsoleBridge();

// ============================================================================
// SECTION 3: INTERACTIVE MODE
// ============================================================================

async function promptForLocatorFile(defaultFile?: string): Promise<string> {
  const filePath = await prompt({
    type: PromptType.Input,
    message: "Path to a file with one locator per line:",
    default: defaultFile,
    validate: (value) =>
      fs.existsSync(path.resolve(value.trim())) || "File does not exist",
    cleanup: cleanupAfterPromptExit,
  });
  return filePath.trim();
}

async function promptForWorkers(initial: number): Promise<string> {
  return prompt({
    type: PromptType.Input,
    message: "Number of parallel workers:",
    default: String(initial),
    validate: (value) =>
      /^\d+$/.test(value.trim()) && Number(value) >= 1
        ? true
        : "Enter a positive integer",
    cleanup: cleanupAfterPromptExit,
  });
}

// ============================================================================
// SECTION 4: RUN
// ============================================================================

async function runPipeline(
  locators: string[],
  config: PipelineConfig,
  showProgress: boolean,
): Promise<void> {
  if (showProgress) {
    initProgressBars();
    addItemProgressTask(locators.length);
  }

  const coordinator = new Coordinator({
    workers: config.workers,
    timeoutMs: config.timeoutMs,
    processingDelayMs: config.processingDelayMs,
    parseOptions: {
      encoding: config.encoding,
      delimiter: config.delimiter,
    },
    logger,
    onProgress: showProgress ? updateItemProgress : undefined,
  });

  try {
    const result = await coordinator.run(locators);
    markItemsDone(
      result.failed > 0 ? `${result.failed} failed` : "All items parsed",
    );
    closeProgressBars();
    showRunSummary(result);
  } finally {
    closeProgressBars();
  }
}

// ============================================================================
// SECTION 5: MAIN APPLICATION
// ============================================================================

/**
 * Main application entry point.
 * Handles CLI setup, input collection and the pipeline run.
 */
async function main(): Promise<void> {
  // -------------------------------------------------------------------------
  // CLI Setup
  // -------------------------------------------------------------------------
  program
    .name("tabfetch")
    .description(
      "Fetch CSV resources concurrently and preview their first rows",
    )
    .version(VERSION)
    .argument("[locators...]", "URLs of the resources to fetch")
    .option("-f, --file <path>", "File with one locator per line")
    .option("-w, --workers <number>", "Number of parallel workers (1-64)")
    .option("-t, --timeout <ms>", "Per-fetch timeout in milliseconds")
    .option("--delay <ms>", "Simulated processing time per item in milliseconds")
    .option("-e, --encoding <name>", "Text encoding of the resources")
    .option("--delimiter <char>", "Field delimiter")
    .option("--sequential", "Process items one at a time", false)
    .option("-v, --verbose", "Show verbose debug output", false)
    .option(
      "-i, --interactive",
      "Interactive mode: prompt for the locator file and worker count",
      false,
    )
    .option("--no-progress", "Disable the progress bar")
    .option("--no-banner", "Do not print the banner")
    .configureHelp({
      sortSubcommands: true,
      helpWidth: 80,
    })
    .addHelpText(
      "after",
      `
    Examples:
    - Two resources, default pool: tabfetch https://example.com/a.csv https://example.com/b.csv
    - From a file: tabfetch -f ./locators.txt
    - Ten workers, 2s timeout: tabfetch -f ./locators.txt -w 10 -t 2000
    - Sequential: tabfetch -f ./locators.txt --sequential
    - Semicolon separated, latin1: tabfetch -f ./locators.txt --delimiter ";" -e latin1
    - Interactive: tabfetch -i

    Environment:
    - TABFETCH_WORKERS, TABFETCH_TIMEOUT_MS, TABFETCH_PROCESSING_DELAY_MS,
      TABFETCH_ENCODING, TABFETCH_DELIMITER, TABFETCH_VERBOSE
      `,
    )
    .parse();

  const options = program.opts<CliOptions>();
  const positional = program.args;

  // -------------------------------------------------------------------------
  // Setup Signal Handlers for Graceful Interruption
  // -------------------------------------------------------------------------
  let isShuttingDown = false;

  process.on("SIGINT", () => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.warn(chalk.yellow("Interrupted by user (Ctrl+C)"));
    closeProgressBars();
    process.exit(130);
  });

  process.on("SIGTERM", () => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.warn(chalk.gray("Received SIGTERM"));
    closeProgressBars();
    process.exit(143);
  });

  if (options.banner) {
    showHeader(VERSION);
  }

  // -------------------------------------------------------------------------
  // Collect locators
  // -------------------------------------------------------------------------
  const isInteractiveMode =
    options.interactive || (positional.length === 0 && !options.file);

  const { locators, source } = await collectLocators({
    positional,
    file: options.file,
    interactive: isInteractiveMode,
    promptForFile: promptForLocatorFile,
  });

  let workers = options.workers;
  if (isInteractiveMode) {
    workers = await promptForWorkers(resolveConfig({ workers }).workers);
  }

  if (locators.length === 0) {
    throw new Error("No locators given");
  }

  // -------------------------------------------------------------------------
  // Apply Settings
  // -------------------------------------------------------------------------
  const config = resolveConfig({
    workers,
    timeout: options.timeout,
    delay: options.delay,
    encoding: options.encoding,
    delimiter: options.delimiter,
    verbose: options.verbose || undefined,
    sequential: options.sequential,
  });
  setVerboseMode(config.verbose);

  showConfiguration(config, locators.length, source);

  if (isInteractiveMode) {
    const proceed = await prompt({
      type: PromptType.Confirm,
      message: `Start fetching ${locators.length} locators?`,
      default: true,
      cleanup: cleanupAfterPromptExit,
    });
    if (!proceed) {
      logger.info(chalk.gray("Aborted."));
      return;
    }
  }

  console.log(chalk.green("\nStarting run...\n"));

  // Progress bars redraw the terminal; keep them off when output is piped
  await runPipeline(
    locators,
    config,
    options.progress && process.stdout.isTTY === true,
  );

  console.log(chalk.green.bold("Run completed."));
}

// ============================================================================
// SECTION 6: ERROR HANDLING
// ============================================================================

main()
  .then(() => {
    process.exit(0);
  })
  .catch((err: unknown) => {
    closeProgressBars();
    logger.error(chalk.red(describeError(err)), err);
    process.exit(1);
  });
