import { confirm, input } from "@inquirer/prompts";
import chalk from "chalk";
import { PromptType } from "../types/enums.js";
import { logger } from "./logger.js";

type CleanupFn = () => Promise<void> | void;

type BasePromptOptions = {
  message: string;
  cleanup?: CleanupFn;
};

export type InputPromptOptions = BasePromptOptions & {
  type: PromptType.Input;
  default?: string;
  validate?: (value: string) => boolean | string;
};

export type ConfirmPromptOptions = BasePromptOptions & {
  type: PromptType.Confirm;
  default?: boolean;
};

function isExitPromptError(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}

async function handlePromptExit(cleanup?: CleanupFn): Promise<never> {
  logger.info(chalk.yellow("Prompt cancelled by user (Ctrl+C)"));
  logger.info(chalk.gray("Cleaning up resources..."));
  if (cleanup) {
    await cleanup();
  }
  logger.info(chalk.gray("Exiting..."));
  process.exit(130);
}

async function withPromptExit<T>(
  ask: () => Promise<T>,
  cleanup?: CleanupFn,
): Promise<T> {
  try {
    return await ask();
  } catch (error) {
    if (isExitPromptError(error)) {
      return handlePromptExit(cleanup);
    }
    throw error;
  }
}

export function prompt(options: InputPromptOptions): Promise<string>;
export function prompt(options: ConfirmPromptOptions): Promise<boolean>;
export function prompt(
  options: InputPromptOptions | ConfirmPromptOptions,
): Promise<string | boolean> {
  switch (options.type) {
    case PromptType.Input:
      return withPromptExit(
        () =>
          input({
            message: options.message,
            default: options.default,
            validate: options.validate,
          }),
        options.cleanup,
      );
    case PromptType.Confirm:
      return withPromptExit(
        () =>
          confirm({
            message: options.message,
            default: options.default,
          }),
        options.cleanup,
      );
  }
}
