/**
 * @summary Block reward coins.
 *
 * Reward coins have no real parent. Their parent ids are synthesized from
 * the genesis challenge and the block height, so every block's rewards are
 * distinct coins even when paid to the same puzzle hash.
 */

import { Coin, bytesToHex, concatBytes, hexToBytes } from "@coinlab/core";

function uint128ToBytes(value: number): Uint8Array {
  const out = new Uint8Array(16);
  let v = BigInt(value);
  for (let i = 15; i >= 0; i--) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

/**
 * Parent id of the pool reward at `height`: first half of the genesis
 * challenge followed by the height.
 */
export function poolParentId(genesisChallenge: string, height: number): string {
  return bytesToHex(concatBytes(hexToBytes(genesisChallenge).slice(0, 16), uint128ToBytes(height)));
}

/**
 * Parent id of the farmer reward at `height`: second half of the genesis
 * challenge followed by the height.
 */
export function farmerParentId(genesisChallenge: string, height: number): string {
  return bytesToHex(concatBytes(hexToBytes(genesisChallenge).slice(16, 32), uint128ToBytes(height)));
}

/**
 * Reward coins for the block at `height`. Zero-value rewards are omitted.
 */
export function createRewardCoins(
  genesisChallenge: string,
  height: number,
  puzzleHash: string,
  poolReward: bigint,
  farmerReward: bigint
): Coin[] {
  const coins: Coin[] = [];
  if (poolReward > 0n) {
    coins.push(new Coin(poolParentId(genesisChallenge, height), puzzleHash, poolReward));
  }
  if (farmerReward > 0n) {
    coins.push(new Coin(farmerParentId(genesisChallenge, height), puzzleHash, farmerReward));
  }
  return coins;
}
