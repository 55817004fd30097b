/**
 * @summary Shared failure reporting for CLI commands.
 */

import chalk from "chalk";
import { isCoinlabError } from "@coinlab/core";

/**
 * Print an error and mark the process as failed without exiting, so any
 * cleanup still pending in the command runs.
 */
export function reportFailure(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  if (isCoinlabError(error)) {
    console.error(chalk.red(`Error [${error.code}]:`), message);
  } else {
    console.error(chalk.red("Error:"), message);
  }
  process.exitCode = 1;
}
