/**
 * @summary Atomic combine protocol.
 *
 * The ledger spends coins independently, yet merging N coins into one must
 * be all-or-nothing. Announcements tie the spends together:
 *
 * - the merged coin is predicted up front as
 *   `Coin(last.id, ownerPuzzleHash, sum of amounts)`
 * - every input but the last only asserts the announcement
 *   `sha256(last.id || merged.id)`
 * - the last input makes that announcement and creates the merged coin
 *
 * If any spend is dropped, the assertions fail and the ledger rejects the
 * whole bundle, so no input is consumed.
 */

import {
  Coin,
  announcementId,
  assertCoinAnnouncement,
  createCoin,
  createCoinAnnouncement,
  sumAmounts,
  type CoinSpend,
  type Program,
} from "@coinlab/core";
import { standardCoinSpend } from "./spend-builder.js";

export interface CombinePlan {
  /** Spends in input order; the last one creates the merged coin */
  spends: CoinSpend[];

  /** The coin the bundle will create */
  merged: Coin;
}

/**
 * Predict the coin that combining `coins` will create.
 *
 * @throws RangeError if `coins` is empty
 */
export function predictMergedCoin(coins: readonly Coin[], puzzleHash: string): Coin {
  const last = coins[coins.length - 1];
  if (last === undefined) {
    throw new RangeError("Cannot combine an empty list of coins");
  }
  return new Coin(last.id, puzzleHash, sumAmounts(coins));
}

/**
 * Build the unsigned spends merging `coins`, all locked by `puzzle`, into a
 * single coin locked by the same puzzle.
 *
 * @throws RangeError if `coins` is empty
 * @throws Error if a coin is not locked by `puzzle`
 */
export function planCombine(coins: readonly Coin[], puzzle: Program): CombinePlan {
  const last = coins[coins.length - 1];
  if (last === undefined) {
    throw new RangeError("Cannot combine an empty list of coins");
  }

  const puzzleHash = puzzle.hash();
  for (const coin of coins) {
    if (coin.puzzleHash !== puzzleHash) {
      throw new Error(`Coin ${coin.id} is not locked by the combining puzzle`);
    }
  }

  const merged = predictMergedCoin(coins, puzzleHash);
  const assertion = assertCoinAnnouncement(announcementId(last.id, merged.id));
  const spends = coins
    .slice(0, -1)
    .map((coin) => standardCoinSpend(coin, puzzle, [assertion]));
  spends.push(
    standardCoinSpend(last, puzzle, [
      createCoinAnnouncement(merged.id),
      createCoin(puzzleHash, merged.amount),
    ])
  );

  return { spends, merged };
}
