/**
 * @summary In-process ledger implementing LedgerService.
 *
 * SpendSimulator keeps the whole ledger in memory: a coin store, a mempool
 * of accepted bundles waiting for the next block, a block height and a
 * clock. It runs the same checks on submit and again when a block is
 * farmed, so a bundle that became invalid in between is dropped rather
 * than committed.
 *
 * Usage:
 * ```typescript
 * const ledger = new SpendSimulator({ poolReward: 10n, farmerReward: 0n });
 * await ledger.farmBlock(puzzleHash);
 * const records = await ledger.getCoinRecordsByPuzzleHash(puzzleHash);
 * ```
 */

import {
  SessionClosedError,
  normalizeBytes32,
  spendBundleId,
  type BlockEffects,
  type Coin,
  type CoinQueryOptions,
  type CoinRecord,
  type Condition,
  type LedgerService,
  type Program,
  type SpendBundle,
  type SubmitResult,
} from "@coinlab/core";
import {
  mergeSimulatorConfig,
  validateSimulatorConfig,
  type ResolvedSimulatorConfig,
  type SimulatorConfig,
} from "./config.js";
import { CoinStore } from "./coin-store.js";
import { isSpendValidationError } from "./errors.js";
import { evaluatePuzzle } from "./evaluator.js";
import { createRewardCoins } from "./rewards.js";
import { validateBundle, type BundleEffects } from "./validation.js";

interface PendingBundle {
  bundleId: string;
  bundle: SpendBundle;
}

export class SpendSimulator implements LedgerService {
  readonly genesisChallenge: string;

  private readonly config: ResolvedSimulatorConfig;
  private readonly store = new CoinStore();
  private mempool: PendingBundle[] = [];
  private height = 0;
  private timestamp: number;
  private closed = false;

  /**
   * @throws ConfigurationError if the configuration is invalid
   */
  constructor(config: SimulatorConfig = {}) {
    validateSimulatorConfig(config);
    this.config = mergeSimulatorConfig(config);
    this.genesisChallenge = this.config.genesisChallenge;
    this.timestamp = this.config.startTimestamp;
  }

  // ---------------------------------------------------------------------------
  // Submission
  // ---------------------------------------------------------------------------

  async submit(bundle: SpendBundle): Promise<SubmitResult> {
    this.ensureOpen("submit a spend bundle");

    const pendingSpends = new Set<string>();
    for (const pending of this.mempool) {
      for (const spend of pending.bundle.coinSpends) {
        pendingSpends.add(spend.coin.id);
      }
    }

    try {
      this.validate(bundle, pendingSpends);
    } catch (error) {
      if (isSpendValidationError(error)) {
        this.log(`Rejected bundle: ${error.message}`);
        return { accepted: false, reason: error.code };
      }
      throw error;
    }

    const bundleId = spendBundleId(bundle);
    this.mempool.push({ bundleId, bundle });
    this.log(`Accepted bundle ${bundleId.slice(0, 16)}... (${bundle.coinSpends.length} spends)`);
    return { accepted: true, bundleId };
  }

  /**
   * Number of accepted bundles waiting for a block.
   */
  get mempoolSize(): number {
    return this.mempool.length;
  }

  // ---------------------------------------------------------------------------
  // Block Production
  // ---------------------------------------------------------------------------

  async farmBlock(beneficiaryPuzzleHash: string): Promise<BlockEffects> {
    this.ensureOpen("farm a block");
    const beneficiary = normalizeBytes32(beneficiaryPuzzleHash, "beneficiary puzzle hash");

    const height = this.height + 1;
    const timestamp = this.timestamp + this.config.blockTimeSeconds;
    const additions: Coin[] = [];
    const removals: Coin[] = [];
    let fees = 0n;

    const pending = this.mempool;
    this.mempool = [];
    for (const { bundleId, bundle } of pending) {
      let effects: BundleEffects;
      try {
        effects = this.validate(bundle, new Set());
      } catch (error) {
        if (isSpendValidationError(error)) {
          this.log(`Dropped bundle ${bundleId.slice(0, 16)}...: ${error.message}`);
          continue;
        }
        throw error;
      }

      for (const coin of effects.removals) {
        this.store.markSpent(coin.id, height);
        removals.push(coin);
      }
      for (const coin of effects.additions) {
        this.store.add(coin, height, timestamp, false);
        additions.push(coin);
      }
      fees += effects.fees;
    }

    for (const coin of createRewardCoins(
      this.genesisChallenge,
      height,
      beneficiary,
      this.config.poolReward,
      this.config.farmerReward + fees
    )) {
      this.store.add(coin, height, timestamp, true);
      additions.push(coin);
    }

    this.height = height;
    this.timestamp = timestamp;
    this.log(
      `Farmed block ${height} at ${timestamp}: +${additions.length} -${removals.length} coins`
    );

    return { height, timestamp, additions, removals };
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  async getCoinRecordsByPuzzleHash(
    puzzleHash: string,
    options: CoinQueryOptions = {}
  ): Promise<CoinRecord[]> {
    this.ensureOpen("query coins");
    return this.store.byPuzzleHash(
      normalizeBytes32(puzzleHash, "puzzle hash"),
      options.includeSpent ?? false
    );
  }

  async getCoinRecord(coinId: string): Promise<CoinRecord | null> {
    this.ensureOpen("query coins");
    return this.store.get(normalizeBytes32(coinId, "coin id")) ?? null;
  }

  currentTime(): number {
    this.ensureOpen("read ledger time");
    return this.timestamp;
  }

  currentHeight(): number {
    this.ensureOpen("read ledger height");
    return this.height;
  }

  /**
   * Advance the clock without producing a block.
   */
  passTime(seconds: number): void {
    this.ensureOpen("pass time");
    if (!Number.isSafeInteger(seconds) || seconds < 0) {
      throw new RangeError(`Invalid time step: ${seconds}`);
    }
    this.timestamp += seconds;
  }

  runPuzzle(puzzle: Program, solution: Program): Condition[] {
    this.ensureOpen("run a puzzle");
    return evaluatePuzzle(puzzle, solution);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.mempool = [];
    this.store.clear();
    this.log("Closed");
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private validate(bundle: SpendBundle, pendingSpends: ReadonlySet<string>): BundleEffects {
    return validateBundle(bundle, {
      lookupCoin: (coinId) => this.store.get(coinId),
      pendingSpends,
      timestamp: this.timestamp,
      height: this.height,
      genesisChallenge: this.genesisChallenge,
    });
  }

  private ensureOpen(operation: string): void {
    if (this.closed) {
      throw new SessionClosedError(operation);
    }
  }

  private log(message: string): void {
    if (this.config.debug) {
      console.log(`[SpendSimulator] ${message}`);
    }
  }
}
