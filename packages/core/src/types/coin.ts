/**
 * @summary Coin value objects.
 *
 * A coin is identified by the content hash of its three fields, so two
 * coins with the same parent, puzzle hash and amount are the same coin.
 * Coins are immutable; spending one destroys it and creates new coins.
 *
 * Used by:
 * - Wallet coin tracking and coin selection
 * - Spend construction (CoinSpend) and ledger records
 */

import { bytesToHex, concatBytes, hexToBytes, intToBytes, normalizeBytes32, sha256 } from "../utils/hash.js";

/**
 * Largest amount a coin may hold (exclusive bound is 2^64).
 */
export const MAX_COIN_AMOUNT = 2n ** 64n - 1n;

/**
 * JSON form of a coin. Amounts are decimal strings to survive JSON.
 */
export interface CoinJson {
  parentId: string;
  puzzleHash: string;
  amount: string;
}

/**
 * Compute a coin id from its fields.
 *
 * id = sha256(parentId || puzzleHash || intToBytes(amount))
 */
export function computeCoinId(
  parentId: string,
  puzzleHash: string,
  amount: bigint
): string {
  return bytesToHex(
    sha256(concatBytes(hexToBytes(parentId), hexToBytes(puzzleHash), intToBytes(amount)))
  );
}

export class Coin {
  /** Id of the coin whose spend created this coin */
  readonly parentId: string;

  /** Hash of the puzzle locking this coin */
  readonly puzzleHash: string;

  /** Value held by the coin, in the ledger's smallest unit */
  readonly amount: bigint;

  private cachedId: string | undefined;

  /**
   * @throws Error if either hash is not 32 bytes or the amount is out of range
   */
  constructor(parentId: string, puzzleHash: string, amount: bigint) {
    if (amount < 0n || amount > MAX_COIN_AMOUNT) {
      throw new Error(`Coin amount out of range: ${amount}`);
    }
    this.parentId = normalizeBytes32(parentId, "parent id");
    this.puzzleHash = normalizeBytes32(puzzleHash, "puzzle hash");
    this.amount = amount;
  }

  /**
   * The coin's unique id (its "name").
   */
  get id(): string {
    if (this.cachedId === undefined) {
      this.cachedId = computeCoinId(this.parentId, this.puzzleHash, this.amount);
    }
    return this.cachedId;
  }

  equals(other: Coin): boolean {
    return this.id === other.id;
  }

  toJSON(): CoinJson {
    return {
      parentId: this.parentId,
      puzzleHash: this.puzzleHash,
      amount: this.amount.toString(),
    };
  }

  static fromJSON(json: CoinJson): Coin {
    return new Coin(json.parentId, json.puzzleHash, BigInt(json.amount));
  }

  toString(): string {
    return `Coin(${this.id.slice(0, 16)}..., amount=${this.amount})`;
  }
}

/**
 * Sum the amounts of a collection of coins.
 */
export function sumAmounts(coins: Iterable<Coin>): bigint {
  let total = 0n;
  for (const coin of coins) {
    total += coin.amount;
  }
  return total;
}
