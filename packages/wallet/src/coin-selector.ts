/**
 * @summary Greedy streaming coin selection.
 *
 * Picks a small set of coins whose amounts sum to at least a target. Coins
 * are fed one at a time; the kept list stays sorted largest first and the
 * smallest kept coins are evicted whenever the rest still cover the target.
 *
 * The policy is a single online pass and is not globally optimal: it may
 * keep more (and larger) coins than the true minimal covering subset. Which
 * coins it keeps decides which coins a wallet combines, so callers rely on
 * this exact behavior.
 *
 * Used by:
 * - Wallet.chooseCoin to find or assemble a funding coin
 */

import type { Coin } from "@coinlab/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Coins chosen to cover a target, largest first.
 */
export interface CoinSelection<C extends Coin = Coin> {
  coins: C[];
  total: bigint;
}

// ---------------------------------------------------------------------------
// Streaming Selector
// ---------------------------------------------------------------------------

/**
 * @example
 * ```typescript
 * const selector = new CoinSelector(25n);
 * for (const coin of wallet.coins()) selector.add(coin);
 * const selection = selector.result(); // null when the coins cannot cover 25
 * ```
 */
export class CoinSelector<C extends Coin = Coin> {
  readonly target: bigint;

  private readonly kept: C[] = [];
  private total = 0n;

  /**
   * @throws RangeError if the target is not positive
   */
  constructor(target: bigint) {
    if (target <= 0n) {
      throw new RangeError(`Selection target must be positive, got ${target}`);
    }
    this.target = target;
  }

  add(coin: C): void {
    // Before the first strictly smaller coin, so equal amounts keep arrival order
    const index = this.kept.findIndex((kept) => kept.amount < coin.amount);
    if (index === -1) {
      this.kept.push(coin);
    } else {
      this.kept.splice(index, 0, coin);
    }
    this.total += coin.amount;

    for (;;) {
      const smallest = this.kept[this.kept.length - 1];
      if (smallest === undefined || this.total - smallest.amount < this.target) {
        break;
      }
      this.kept.pop();
      this.total -= smallest.amount;
    }
  }

  /**
   * Current selection, or null if the coins seen so far cannot cover the
   * target.
   */
  result(): CoinSelection<C> | null {
    if (this.total < this.target) {
      return null;
    }
    return { coins: [...this.kept], total: this.total };
  }
}

/**
 * Run the selector over `coins` in iteration order.
 *
 * @returns The selection, or null when the coins cannot cover `target`
 */
export function selectCoins<C extends Coin>(
  target: bigint,
  coins: Iterable<C>
): CoinSelection<C> | null {
  const selector = new CoinSelector<C>(target);
  for (const coin of coins) {
    selector.add(coin);
  }
  return selector.result();
}
