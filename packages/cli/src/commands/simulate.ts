/**
 * @summary CLI command running a scripted two-wallet simulation.
 *
 * Farms blocks to alice, has alice give bob an amount, prints both
 * balances and closes the session. Handy as a smoke test of the whole
 * stack: selection, combining, signing and block production.
 *
 * Used by:
 * - The program factory (program.ts) to register the 'simulate' command
 */

import chalk from "chalk";
import type { Command } from "commander";
import { withNetwork, type NetworkConfig } from "@coinlab/wallet";
import { reportFailure } from "./report.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SimulationOptions {
  /** Blocks farmed to alice before the transfer */
  blocks: number;

  /** Amount alice gives bob */
  amount: bigint;

  /** Session configuration */
  network?: NetworkConfig;
}

export interface SimulationSummary {
  height: number;
  time: number;
  alice: bigint;
  bob: bigint;
}

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

/**
 * Run the scripted simulation in a fresh session.
 *
 * @throws InsufficientFundsError if the farmed rewards cannot cover `amount`
 * @throws LedgerRejectedError if the transfer is rejected
 */
export async function runSimulation(options: SimulationOptions): Promise<SimulationSummary> {
  return withNetwork(async (network) => {
    const alice = network.makeWallet("alice");
    const bob = network.makeWallet("bob");

    for (let i = 0; i < options.blocks; i++) {
      await network.farmBlock(alice);
    }

    const given = await alice.giveChia(bob, options.amount);
    if (given === null) {
      throw new Error(`Transfer of ${options.amount} from alice to bob was rejected`);
    }

    return {
      height: network.height,
      time: network.time,
      alice: alice.balance(),
      bob: bob.balance(),
    };
  }, options.network);
}

/**
 * Parse a non-negative integer option.
 *
 * @throws Error if the value is not a non-negative integer
 */
export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid block count: ${value}`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse a positive amount option.
 *
 * @throws Error if the value is not a positive integer
 */
export function parseAmount(value: string): bigint {
  if (!/^\d+$/.test(value) || BigInt(value) === 0n) {
    throw new Error(`Invalid amount: ${value}`);
  }
  return BigInt(value);
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

/**
 * Register the 'simulate' command.
 *
 * @example
 * ```bash
 * coinlab simulate
 * coinlab simulate --blocks 3 --amount 2500000000000 --debug
 * ```
 */
export function registerSimulateCommand(program: Command): void {
  program
    .command("simulate")
    .description("Farm blocks to alice, give bob an amount, print balances")
    .option("-b, --blocks <count>", "Blocks farmed to alice", "1")
    .option("-a, --amount <amount>", "Amount alice gives bob", "1000")
    .option("-d, --debug", "Log session activity", false)
    .action(async (options: SimulateOptions) => {
      try {
        const blocks = parseCount(options.blocks);
        const amount = parseAmount(options.amount);

        console.log(chalk.blue("Simulating:"), `${blocks} block(s), transfer ${amount}`);
        const summary = await runSimulation({ blocks, amount, network: { debug: options.debug } });

        console.log(chalk.green("\nSession finished"));
        console.log(chalk.gray("  Height:"), summary.height);
        console.log(chalk.gray("  Time:"), new Date(summary.time * 1000).toISOString());
        console.log(chalk.gray("  alice:"), summary.alice.toString());
        console.log(chalk.gray("  bob:"), summary.bob.toString());
      } catch (error) {
        reportFailure(error);
      }
    });
}

interface SimulateOptions {
  blocks: string;
  amount: string;
  debug: boolean;
}
