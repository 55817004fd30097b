/**
 * @summary Deterministic in-memory key derivation.
 *
 * WARNING: keys are derived from a seed held in memory with a plain hash.
 * This is meant for simulations and tests, never for real funds.
 */

import type { KeyPair, KeyService } from "../types/keys.js";
import { concatBytes, sha256, uint32ToBytes, utf8ToBytes } from "../utils/hash.js";
import { publicKeyFor } from "./bls.js";

/**
 * Seed used when none is supplied.
 */
export const DEFAULT_KEYCHAIN_SEED = "coinlab:simulation-keys";

/**
 * Key service deriving `sha256(seed || u32be(index))` secret keys.
 *
 * The top two bits of the digest are cleared so that every secret key is
 * below the BLS12-381 group order.
 *
 * @example
 * ```typescript
 * const keys = new DeterministicKeychain("test-seed");
 * const { publicKey } = keys.derive(1);
 * ```
 */
export class DeterministicKeychain implements KeyService {
  private readonly seed: Uint8Array;
  private readonly cache = new Map<number, KeyPair>();

  constructor(seed: string | Uint8Array = DEFAULT_KEYCHAIN_SEED) {
    this.seed = typeof seed === "string" ? utf8ToBytes(seed) : Uint8Array.from(seed);
  }

  derive(index: number): KeyPair {
    const cached = this.cache.get(index);
    if (cached !== undefined) {
      return cached;
    }

    const secretKey = sha256(concatBytes(this.seed, uint32ToBytes(index)));
    secretKey[0] = (secretKey[0] ?? 0) & 0x3f;
    if (secretKey.every((b) => b === 0)) {
      throw new Error(`Derived a zero secret key for index ${index}`);
    }

    const pair: KeyPair = { publicKey: publicKeyFor(secretKey), secretKey };
    this.cache.set(index, pair);
    return pair;
  }
}
