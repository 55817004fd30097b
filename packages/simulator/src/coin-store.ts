/**
 * @summary In-memory coin store keyed by coin id.
 */

import type { Coin, CoinRecord } from "@coinlab/core";

export class CoinStore {
  private readonly records = new Map<string, CoinRecord>();

  /**
   * Record a newly created coin.
   *
   * @throws Error if a coin with the same id already exists
   */
  add(coin: Coin, height: number, timestamp: number, coinbase: boolean): CoinRecord {
    if (this.records.has(coin.id)) {
      throw new Error(`Coin ${coin.id} already exists`);
    }
    const record: CoinRecord = {
      coin,
      confirmedHeight: height,
      spentHeight: null,
      timestamp,
      coinbase,
    };
    this.records.set(coin.id, record);
    return record;
  }

  /**
   * @throws Error if the coin is unknown or already spent
   */
  markSpent(coinId: string, height: number): void {
    const record = this.records.get(coinId);
    if (record === undefined || record.spentHeight !== null) {
      throw new Error(`Coin ${coinId} is not unspent`);
    }
    this.records.set(coinId, { ...record, spentHeight: height });
  }

  get(coinId: string): CoinRecord | undefined {
    return this.records.get(coinId);
  }

  byPuzzleHash(puzzleHash: string, includeSpent: boolean): CoinRecord[] {
    const result: CoinRecord[] = [];
    for (const record of this.records.values()) {
      if (record.coin.puzzleHash !== puzzleHash) continue;
      if (!includeSpent && record.spentHeight !== null) continue;
      result.push(record);
    }
    return result;
  }

  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
  }
}
