/**
 * @summary CLI commands converting between puzzle hashes and addresses.
 *
 * Used by:
 * - The program factory (program.ts) to register 'encode' and 'decode'
 */

import chalk from "chalk";
import type { Command } from "commander";
import { DEFAULT_ADDRESS_PREFIX, decodePuzzleHash, encodePuzzleHash } from "@coinlab/core";
import { reportFailure } from "./report.js";

/**
 * Register the 'encode' command.
 *
 * @example
 * ```bash
 * coinlab encode 0x4f45...c8d1
 * coinlab encode 4f45...c8d1 --prefix txch
 * ```
 */
export function registerEncodeCommand(program: Command): void {
  program
    .command("encode <puzzle-hash>")
    .description("Encode a puzzle hash as a bech32m address")
    .option("-p, --prefix <prefix>", "Address prefix", DEFAULT_ADDRESS_PREFIX)
    .action((puzzleHash: string, options: EncodeOptions) => {
      try {
        console.log(encodePuzzleHash(puzzleHash, options.prefix));
      } catch (error) {
        reportFailure(error);
      }
    });
}

/**
 * Register the 'decode' command.
 *
 * @example
 * ```bash
 * coinlab decode xch1...
 * coinlab decode xch1... --verbose
 * ```
 */
export function registerDecodeCommand(program: Command): void {
  program
    .command("decode <address>")
    .description("Decode a bech32m address to its puzzle hash")
    .option("-v, --verbose", "Also print the address prefix", false)
    .action((address: string, options: DecodeOptions) => {
      try {
        const decoded = decodePuzzleHash(address);
        console.log(decoded.puzzleHash);
        if (options.verbose) {
          console.log(chalk.gray("  Prefix:"), decoded.prefix);
        }
      } catch (error) {
        reportFailure(error);
      }
    });
}

interface EncodeOptions {
  prefix: string;
}

interface DecodeOptions {
  verbose: boolean;
}
