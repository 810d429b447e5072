import chalk from "chalk";
import fs from "fs";
import path from "path";
import type { PipelineConfig } from "../config.js";
import { loadLocators } from "../config.js";
import type { CoordinatorResult } from "../workers/types.js";
import { getAsciiArt } from "./ascii.js";
import { closeProgressBars } from "./progress.js";
import { formatDuration, formatRate } from "./timer.js";

export function showHeader(version: string): void {
  console.log(chalk.cyan(getAsciiArt("tabfetch")));
  console.log(
    chalk.cyan.bold(`Concurrent tabular resource fetcher (Version ${version})`),
  );
}

export function showConfiguration(
  config: PipelineConfig,
  locatorCount: number,
  source: string,
): void {
  console.log(chalk.cyan("\nCollected inputs:"));
  console.log(chalk.white(`  Locators: ${locatorCount} (${source})`));

  if (config.workers === 1) {
    console.log(chalk.white(`  Mode: Sequential`));
  } else {
    console.log(chalk.white(`  Mode: Parallel (${config.workers} workers)`));
  }

  console.log(chalk.white(`  Fetch timeout: ${config.timeoutMs}ms`));
  console.log(chalk.white(`  Processing delay: ${config.processingDelayMs}ms`));
  console.log(
    chalk.white(
      `  Parsing: encoding=${config.encoding} delimiter=${JSON.stringify(config.delimiter)}`,
    ),
  );
  console.log(chalk.white(`  Verbose: ${config.verbose ? "Yes" : "No"}`));
}

export function showRunSummary(result: CoordinatorResult): void {
  const row = (label: string, value: string) =>
    `║   ${`${label}: ${value}`.padEnd(47)}║`;

  console.log(chalk.white("\n╔══════════════════════════════════════════════════╗"));
  console.log(chalk.white("║                     SUMMARY                      ║"));
  console.log(chalk.white("╠══════════════════════════════════════════════════╣"));
  console.log(chalk.white(row("Total Items", String(result.total))));
  console.log(chalk.green(row("✓ Parsed", String(result.succeeded))));
  console.log(
    result.failed > 0
      ? chalk.red(row("✗ Failed", String(result.failed)))
      : chalk.white(row("✗ Failed", "0")),
  );
  console.log(chalk.white(row("Workers Used", String(result.workersUsed))));
  console.log(chalk.white(row("Duration", formatDuration(result.durationMs))));
  console.log(
    chalk.white(
      row("Average", formatRate(result.durationMs, result.succeeded + result.failed)),
    ),
  );
  console.log(chalk.white("╚══════════════════════════════════════════════════╝\n"));
}

/**
 * Read a locator file relative to the working directory.
 */
export function readLocatorFile(filePath: string): string[] {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Locator file not found: ${resolved}`);
  }
  return loadLocators(fs.readFileSync(resolved, "utf-8"));
}

export interface LocatorSources {
  positional: string[];
  file?: string;
  interactive: boolean;
  /** Asks for a locator file; receives `file` as the suggested default. */
  promptForFile: (defaultFile?: string) => Promise<string>;
}

/**
 * Positional locators first, then the locator file. In interactive mode the
 * file comes from the prompt, which offers `file` as its default, so it is
 * read once.
 */
export async function collectLocators(
  sources: LocatorSources,
): Promise<{ locators: string[]; source: string }> {
  const { positional, file } = sources;

  if (sources.interactive) {
    const chosen = await sources.promptForFile(file);
    return {
      locators: [...positional, ...readLocatorFile(chosen)],
      source: "interactive",
    };
  }

  if (file) {
    return {
      locators: [...positional, ...readLocatorFile(file)],
      source: positional.length > 0 ? "arguments + file" : file,
    };
  }

  return { locators: [...positional], source: "arguments" };
}

export function cleanupAfterPromptExit(): void {
  closeProgressBars();
}
