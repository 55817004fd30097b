/**
 * @summary Factory for the `coinlab` command line program.
 *
 * Available commands:
 * - coinlab encode <puzzle-hash>  - Puzzle hash to bech32m address
 * - coinlab decode <address>      - bech32m address to puzzle hash
 * - coinlab keys [index]          - Inspect simulation keys
 * - coinlab simulate              - Run a scripted two-wallet session
 * - coinlab init [dir]            - Scaffold a skeleton test
 * - coinlab test [dir]            - Run, list (--discover) or scaffold (--init) tests
 */

import { Command } from "commander";
import {
  registerDecodeCommand,
  registerEncodeCommand,
  registerInitCommand,
  registerKeysCommand,
  registerSimulateCommand,
  registerTestCommand,
} from "./commands/index.js";

/**
 * Package version - should match package.json.
 */
export const VERSION = "0.1.0";

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("coinlab")
    .description("coinlab CLI - addresses, keys and simulated coin ledgers")
    .version(VERSION);

  registerEncodeCommand(program);
  registerDecodeCommand(program);
  registerKeysCommand(program);
  registerSimulateCommand(program);
  registerInitCommand(program);
  registerTestCommand(program);

  return program;
}
