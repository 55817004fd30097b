/**
 * @summary Executable entry point for the `coinlab` CLI.
 */

import chalk from "chalk";
import { createProgram } from "./program.js";

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  const program = createProgram();

  await program.parseAsync(process.argv);

  // Show help if no command provided
  if (!process.argv.slice(2).length) {
    console.log(chalk.cyan("\ncoinlab CLI"));
    console.log(chalk.gray("Addresses, keys and simulated coin ledgers\n"));
    program.outputHelp();
  }
}

main().catch((error: unknown) => {
  console.error(chalk.red("Fatal error:"), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
