import figlet from "figlet";
import { getErrorMessage } from "./errors.js";
import { logger } from "./logger.js";

/**
 * Generate ASCII art text for the CLI banner
 * @param msg - Message to convert to ASCII art
 */
export const getAsciiArt = (msg: string): string => {
  try {
    return figlet.textSync(msg, {
      font: "Standard",
      horizontalLayout: "default",
      verticalLayout: "default",
      width: 80,
      whitespaceBreak: true,
    });
  } catch (error) {
    logger.warn(
      `Font rendering failed (${getErrorMessage(error)}), using plain banner`,
    );
    return msg;
  }
};
