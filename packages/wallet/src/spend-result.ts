/**
 * @summary Interpretation of push results.
 */

import { LedgerRejectedError, type Coin, type PushResult } from "@coinlab/core";

/**
 * What a pushed transaction did, from the caller's point of view.
 *
 * A rejection is carried as `error`, with no outputs. Callers filter
 * `outputs` by puzzle hash to find the coins a transaction gave them.
 */
export class SpendResult {
  /** The raw push result */
  readonly result: PushResult;

  /** Ledger-supplied rejection reason, or null when committed */
  readonly error: string | null;

  /** Coins created by the block that committed the transaction */
  readonly outputs: readonly Coin[];

  /** Coins destroyed by that block */
  readonly removals: readonly Coin[];

  constructor(result: PushResult) {
    this.result = result;
    if (result.status === "rejected") {
      this.error = result.error;
      this.outputs = [];
      this.removals = [];
    } else {
      this.error = null;
      this.outputs = result.additions;
      this.removals = result.removals;
    }
  }

  get ok(): boolean {
    return this.error === null;
  }

  /**
   * Outputs locked to `puzzleHash`, i.e. the standard coins a wallet with
   * that puzzle hash received.
   */
  findStandardCoins(puzzleHash: string): Coin[] {
    const wanted = puzzleHash.replace(/^0x/, "").toLowerCase();
    return this.outputs.filter((coin) => coin.puzzleHash === wanted);
  }

  /**
   * @throws LedgerRejectedError if the transaction was rejected
   */
  orThrow(operation?: string): this {
    if (this.error !== null) {
      throw new LedgerRejectedError(this.error, operation);
    }
    return this;
  }
}
