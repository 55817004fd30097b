/**
 * @summary bech32m address encoding for puzzle hashes.
 *
 * A wallet address is just a puzzle hash rendered as bech32m with a
 * network prefix ("xch" on mainnet, "txch" on test networks).
 */

import { bech32m } from "@scure/base";
import { bytesToHex, hexToBytes, normalizeBytes32 } from "./hash.js";

/**
 * Default human-readable prefix for encoded addresses.
 */
export const DEFAULT_ADDRESS_PREFIX = "xch";

/**
 * Result of decoding an address.
 */
export interface DecodedAddress {
  /** Human-readable prefix (e.g. "xch") */
  prefix: string;

  /** 32-byte puzzle hash as lowercase hex */
  puzzleHash: string;
}

/**
 * Encode a puzzle hash as a bech32m address.
 *
 * @example
 * encodePuzzleHash("00".repeat(32), "txch");
 */
export function encodePuzzleHash(
  puzzleHash: string,
  prefix: string = DEFAULT_ADDRESS_PREFIX
): string {
  const bytes = hexToBytes(normalizeBytes32(puzzleHash, "puzzle hash"));
  return bech32m.encode(prefix, bech32m.toWords(bytes));
}

/**
 * Decode a bech32m address back to its prefix and puzzle hash.
 *
 * @throws Error if the checksum is wrong or the payload is not 32 bytes
 */
export function decodePuzzleHash(address: string): DecodedAddress {
  const { prefix, bytes } = bech32m.decodeToBytes(address);
  if (bytes.length !== 32) {
    throw new Error(
      `Invalid address payload: expected 32 bytes, got ${bytes.length}`
    );
  }
  return { prefix, puzzleHash: bytesToHex(bytes) };
}
