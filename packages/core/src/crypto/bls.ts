/**
 * @summary BLS12-381 signing primitives.
 *
 * Public keys live in G1 (48 bytes compressed), signatures in G2 (96 bytes
 * compressed). Signatures over distinct messages aggregate into a single
 * signature that verifies against the full list of (key, message) pairs,
 * which is what lets a spend bundle carry one signature for all its spends.
 *
 * Requires:
 * - @noble/curves for the pairing-friendly curve
 */

import { bls12_381 } from "@noble/curves/bls12-381";
import { bytesToHex, hexToBytes } from "../utils/hash.js";

/**
 * Compressed encoding of the G2 identity: the aggregate of zero signatures.
 */
export const EMPTY_SIGNATURE = "c0" + "00".repeat(95);

/**
 * A public key and the message it must have signed.
 */
export interface SignaturePair {
  /** Hex G1 public key */
  publicKey: string;

  /** Full signed message bytes */
  message: Uint8Array;
}

/**
 * Derive the G1 public key (hex) for a secret key.
 */
export function publicKeyFor(secretKey: Uint8Array): string {
  return bytesToHex(bls12_381.getPublicKey(secretKey));
}

/**
 * Sign a message, returning the hex G2 signature.
 */
export function sign(secretKey: Uint8Array, message: Uint8Array): string {
  return bytesToHex(bls12_381.sign(message, secretKey));
}

/**
 * Aggregate signatures into one. The empty list aggregates to the identity.
 */
export function aggregateSignatures(signatures: readonly string[]): string {
  const nonEmpty = signatures.filter((s) => s.toLowerCase() !== EMPTY_SIGNATURE);
  if (nonEmpty.length === 0) {
    return EMPTY_SIGNATURE;
  }
  if (nonEmpty.length === 1) {
    const [only] = nonEmpty;
    return only === undefined ? EMPTY_SIGNATURE : only.toLowerCase();
  }
  return bytesToHex(bls12_381.aggregateSignatures(nonEmpty.map((s) => hexToBytes(s))));
}

/**
 * Verify an aggregate signature against every (public key, message) pair.
 *
 * With no pairs, only the identity signature verifies. Malformed keys or
 * signatures verify as false rather than throwing.
 */
export function verifyAggregate(
  signature: string,
  pairs: readonly SignaturePair[]
): boolean {
  if (pairs.length === 0) {
    return signature.toLowerCase() === EMPTY_SIGNATURE;
  }
  if (signature.toLowerCase() === EMPTY_SIGNATURE) {
    return false;
  }
  try {
    return bls12_381.verifyBatch(
      hexToBytes(signature),
      pairs.map((p) => p.message),
      pairs.map((p) => hexToBytes(p.publicKey))
    );
  } catch {
    return false;
  }
}
