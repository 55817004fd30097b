/**
 * @summary Ledger service interface definitions.
 *
 * The ledger is an external collaborator: it validates and commits spend
 * bundles, produces blocks, keeps ledger time and answers coin queries.
 * Sessions talk to it only through this interface; wallets never do.
 *
 * Implemented by:
 * - SpendSimulator in @coinlab/simulator (in-process stand-in)
 */

import type { Coin } from "./coin.js";
import type { Condition } from "./conditions.js";
import type { Program } from "./program.js";
import type { SpendBundle } from "./spend.js";

// ---------------------------------------------------------------------------
// Coin Records
// ---------------------------------------------------------------------------

/**
 * Ledger bookkeeping for one coin.
 */
export interface CoinRecord {
  readonly coin: Coin;

  /** Height of the block that created the coin */
  readonly confirmedHeight: number;

  /** Height of the block that spent the coin, or null while unspent */
  readonly spentHeight: number | null;

  /** Ledger time (seconds) of the creating block */
  readonly timestamp: number;

  /** Whether the coin is a block reward */
  readonly coinbase: boolean;
}

/**
 * Options for coin queries.
 */
export interface CoinQueryOptions {
  /**
   * Include coins that have already been spent.
   * @default false
   */
  includeSpent?: boolean;
}

// ---------------------------------------------------------------------------
// Submission and Blocks
// ---------------------------------------------------------------------------

/**
 * Outcome of submitting a bundle for inclusion.
 */
export type SubmitResult =
  | { readonly accepted: true; readonly bundleId: string }
  | { readonly accepted: false; readonly reason: string };

/**
 * Effects of producing one block.
 */
export interface BlockEffects {
  /** Height of the new block */
  readonly height: number;

  /** Ledger time (seconds) after the block */
  readonly timestamp: number;

  /** Coins created, including rewards */
  readonly additions: readonly Coin[];

  /** Coins spent */
  readonly removals: readonly Coin[];
}

// ---------------------------------------------------------------------------
// Ledger Interface
// ---------------------------------------------------------------------------

export interface LedgerService {
  /** Domain parameter appended to AGG_SIG_ME messages */
  readonly genesisChallenge: string;

  /**
   * Validate a bundle and queue it for the next block.
   *
   * @returns Acceptance, or the ledger's rejection reason
   */
  submit(bundle: SpendBundle): Promise<SubmitResult>;

  /**
   * Produce one block: commit queued bundles, pay the block reward to
   * `beneficiaryPuzzleHash`, advance ledger time.
   */
  farmBlock(beneficiaryPuzzleHash: string): Promise<BlockEffects>;

  /**
   * Coins locked by a puzzle hash.
   */
  getCoinRecordsByPuzzleHash(
    puzzleHash: string,
    options?: CoinQueryOptions
  ): Promise<CoinRecord[]>;

  /** Current ledger time in seconds */
  currentTime(): number;

  /** Current block height (0 before the first block) */
  currentHeight(): number;

  /**
   * Advance ledger time without producing a block.
   */
  passTime(seconds: number): void;

  /**
   * Evaluate a puzzle against a solution without touching ledger state.
   * Used to discover which signatures a spend will require.
   *
   * @throws If the puzzle fails to evaluate
   */
  runPuzzle(puzzle: Program, solution: Program): Condition[];

  /** Release ledger resources */
  close(): Promise<void>;
}
