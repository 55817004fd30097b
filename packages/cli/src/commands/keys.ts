/**
 * @summary CLI command to inspect deterministic simulation keys.
 *
 * Prints what a Network session would give the wallet at a key index:
 * the public key, its standard puzzle hash and the matching address.
 * Index 0 is the session's `nobody` wallet; wallets made afterwards take
 * 1, 2, ... in creation order.
 *
 * Used by:
 * - The program factory (program.ts) to register the 'keys' command
 */

import chalk from "chalk";
import type { Command } from "commander";
import {
  DEFAULT_KEYCHAIN_SEED,
  DeterministicKeychain,
  NETWORKS,
  encodePuzzleHash,
  standardPuzzle,
} from "@coinlab/core";
import { reportFailure } from "./report.js";

/**
 * Key material for one keychain index.
 */
export interface KeyDescription {
  index: number;
  publicKey: string;
  puzzleHash: string;
  address: string;
}

/**
 * Derive the key at `index` and describe it.
 *
 * @throws Error if the index is not a non-negative integer
 */
export function describeKey(
  index: number,
  seed: string = DEFAULT_KEYCHAIN_SEED,
  prefix: string = NETWORKS.simulator.addressPrefix
): KeyDescription {
  const { publicKey } = new DeterministicKeychain(seed).derive(index);
  const puzzleHash = standardPuzzle(publicKey).hash();
  return { index, publicKey, puzzleHash, address: encodePuzzleHash(puzzleHash, prefix) };
}

/**
 * Parse a key index argument.
 *
 * @throws Error if the value is not a non-negative integer
 */
export function parseKeyIndex(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid key index: ${value}`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Register the 'keys' command.
 *
 * @example
 * ```bash
 * coinlab keys
 * coinlab keys 2 --seed test-seed
 * ```
 */
export function registerKeysCommand(program: Command): void {
  program
    .command("keys [index]")
    .description("Show the simulation key, puzzle hash and address at an index")
    .option("-s, --seed <seed>", "Keychain seed", DEFAULT_KEYCHAIN_SEED)
    .option("-p, --prefix <prefix>", "Address prefix", NETWORKS.simulator.addressPrefix)
    .action((index: string | undefined, options: KeysOptions) => {
      try {
        const key = describeKey(parseKeyIndex(index ?? "0"), options.seed, options.prefix);
        console.log(chalk.blue("Key index:"), key.index);
        console.log(chalk.gray("  Public key:"), key.publicKey);
        console.log(chalk.gray("  Puzzle hash:"), key.puzzleHash);
        console.log(chalk.gray("  Address:"), key.address);
      } catch (error) {
        reportFailure(error);
      }
    });
}

interface KeysOptions {
  seed: string;
  prefix: string;
}
