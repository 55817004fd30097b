/**
 * @summary Network session: ledger, clock and wallets.
 *
 * The Network owns the ledger and every Wallet. It is the only writer of
 * wallet coin sets: after each block it re-queries the ledger for every
 * wallet's unspent coins and replaces the set wholesale, so wallet state
 * cannot drift from the ledger even when a block touched coins the wallet
 * did not spend itself.
 *
 * Usage:
 * ```typescript
 * await withNetwork(async (network) => {
 *   const alice = network.makeWallet("alice");
 *   const bob = network.makeWallet("bob");
 *   await network.farmBlock(alice);
 *   await alice.giveChia(bob, 1000n);
 * });
 * ```
 */

import {
  DeterministicKeychain,
  SessionClosedError,
  type BlockEffects,
  type Condition,
  type KeyService,
  type LedgerService,
  type Program,
  type PushResult,
  type SpendBundle,
} from "@coinlab/core";
import { SpendSimulator } from "@coinlab/simulator";
import { mergeNetworkConfig, validateNetworkConfig, type NetworkConfig } from "./config.js";
import { durationToSeconds, type DurationInput } from "./duration.js";
import { Wallet, type WalletHost } from "./wallet.js";

/**
 * Options for skipTime.
 */
export interface SkipTimeOptions {
  /**
   * Wallet credited with every block's reward.
   * @default the network's `nobody` wallet
   */
  farmer?: Wallet;
}

export class Network implements WalletHost {
  /** Sink for block rewards nobody claimed */
  readonly nobody: Wallet;

  private readonly ledger: LedgerService;
  private readonly keys: KeyService;
  private readonly debug: boolean;
  private readonly walletsByKey = new Map<string, Wallet>();
  private closed = false;

  private constructor(ledger: LedgerService, keys: KeyService, debug: boolean) {
    this.ledger = ledger;
    this.keys = keys;
    this.debug = debug;
    this.nobody = this.makeWallet("nobody");
  }

  /**
   * Create a session.
   *
   * @throws ConfigurationError if the configuration is invalid
   */
  static async create(config: NetworkConfig = {}): Promise<Network> {
    validateNetworkConfig(config);
    const merged = mergeNetworkConfig(config);

    const ledger =
      merged.ledger ?? new SpendSimulator({ debug: merged.debug, ...merged.simulator });
    const keys = merged.keys ?? new DeterministicKeychain(merged.keychainSeed);
    const network = new Network(ledger, keys, merged.debug);
    network.log(`Created session at height ${ledger.currentHeight()}, time ${ledger.currentTime()}`);
    return network;
  }

  get genesisChallenge(): string {
    return this.ledger.genesisChallenge;
  }

  // ---------------------------------------------------------------------------
  // Wallets
  // ---------------------------------------------------------------------------

  /**
   * Create a wallet whose standard coins the session tracks. Wallets get
   * consecutive key indexes, starting from 0 for `nobody`.
   */
  makeWallet(name: string): Wallet {
    this.ensureOpen("make a wallet");
    const index = this.walletsByKey.size;
    const wallet = new Wallet(this, name, this.keys.derive(index), this.debug);
    this.walletsByKey.set(wallet.publicKey, wallet);
    this.log(`Made wallet ${name} with key index ${index}`);
    return wallet;
  }

  wallets(): Wallet[] {
    return [...this.walletsByKey.values()];
  }

  // ---------------------------------------------------------------------------
  // Transactions and Blocks
  // ---------------------------------------------------------------------------

  /**
   * Submit a bundle. A rejection returns immediately with time unchanged;
   * an accepted bundle is committed by farming one block (reward to
   * `nobody`), whose effects are returned.
   */
  async pushTx(bundle: SpendBundle): Promise<PushResult> {
    this.ensureOpen("push a transaction");

    const submitted = await this.ledger.submit(bundle);
    if (!submitted.accepted) {
      this.log(`Transaction rejected: ${submitted.reason}`);
      return { status: "rejected", error: submitted.reason };
    }

    const effects = await this.farmBlock();
    return { status: "committed", additions: effects.additions, removals: effects.removals };
  }

  /**
   * Produce one block crediting `farmer`, then refresh every wallet.
   */
  async farmBlock(farmer: Wallet = this.nobody): Promise<BlockEffects> {
    this.ensureOpen("farm a block");

    const effects = await this.ledger.farmBlock(farmer.puzzleHash);
    for (const wallet of this.walletsByKey.values()) {
      const records = await this.ledger.getCoinRecordsByPuzzleHash(wallet.puzzleHash);
      wallet.replaceCoins(records.map((record) => record.coin));
    }

    this.log(`Farmed block ${effects.height} to ${farmer.name}`);
    return effects;
  }

  /**
   * Farm blocks until ledger time has advanced by `duration`.
   *
   * @returns The number of blocks farmed
   */
  async skipTime(duration: DurationInput, options: SkipTimeOptions = {}): Promise<number> {
    this.ensureOpen("skip time");
    const target = this.ledger.currentTime() + durationToSeconds(duration);

    let blocks = 0;
    while (this.ledger.currentTime() < target) {
      await this.farmBlock(options.farmer);
      blocks++;
    }
    return blocks;
  }

  // ---------------------------------------------------------------------------
  // Ledger Views
  // ---------------------------------------------------------------------------

  /** Ledger time in seconds */
  get time(): number {
    this.ensureOpen("read the time");
    return this.ledger.currentTime();
  }

  getTimestamp(): number {
    return this.time;
  }

  get height(): number {
    this.ensureOpen("read the height");
    return this.ledger.currentHeight();
  }

  runPuzzle(puzzle: Program, solution: Program): Condition[] {
    this.ensureOpen("run a puzzle");
    return this.ledger.runPuzzle(puzzle, solution);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Release the ledger. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.ledger.close();
    this.log("Closed session");
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private ensureOpen(operation: string): void {
    if (this.closed) {
      throw new SessionClosedError(operation);
    }
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[Network] ${message}`);
    }
  }
}

/**
 * Run `fn` against a fresh session, closing it on every exit path.
 */
export async function withNetwork<T>(
  fn: (network: Network) => Promise<T>,
  config: NetworkConfig = {}
): Promise<T> {
  const network = await Network.create(config);
  try {
    return await fn(network);
  } finally {
    await network.close();
  }
}
