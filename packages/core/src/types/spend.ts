/**
 * @summary Coin spends, spend bundles and push results.
 *
 * A spend bundle is the transaction unit: an ordered list of coin spends
 * and one aggregate signature over everything they require. The ledger
 * commits all of a bundle's spends or none of them.
 */

import { aggregateSignatures } from "../crypto/bls.js";
import { canonicalize } from "../utils/canonical-json.js";
import { sha256Hex, utf8ToBytes } from "../utils/hash.js";
import type { Coin } from "./coin.js";
import type { Program } from "./program.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * One coin being consumed, with the puzzle that locks it and the solution
 * that unlocks it.
 */
export interface CoinSpend {
  readonly coin: Coin;
  readonly puzzle: Program;
  readonly solution: Program;
}

/**
 * An atomically-committed group of coin spends.
 */
export interface SpendBundle {
  readonly coinSpends: readonly CoinSpend[];

  /** Hex aggregate G2 signature */
  readonly aggregatedSignature: string;
}

/**
 * Result of pushing a bundle through a session.
 *
 * A rejection is an expected outcome (for example a race against another
 * spend of the same coin), so it is data rather than an exception.
 */
export type PushResult =
  | {
      readonly status: "rejected";
      /** Ledger-supplied reason */
      readonly error: string;
    }
  | {
      readonly status: "committed";
      /** Coins created by the block that included the bundle */
      readonly additions: readonly Coin[];
      /** Coins destroyed by that block */
      readonly removals: readonly Coin[];
    };

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Build a spend bundle from spends and their individual signatures.
 */
export function createSpendBundle(
  coinSpends: readonly CoinSpend[],
  signatures: readonly string[]
): SpendBundle {
  return {
    coinSpends: [...coinSpends],
    aggregatedSignature: aggregateSignatures(signatures),
  };
}

/**
 * Content id of a bundle: SHA256 of its canonical JSON.
 */
export function spendBundleId(bundle: SpendBundle): string {
  const json = {
    coinSpends: bundle.coinSpends.map((s) => ({
      coin: s.coin.toJSON(),
      puzzle: s.puzzle.toHex(),
      solution: s.solution.toHex(),
    })),
    aggregatedSignature: bundle.aggregatedSignature.toLowerCase(),
  };
  return sha256Hex(utf8ToBytes(canonicalize(json)));
}
