/**
 * @summary SHA256 hashing and byte encoding utilities.
 *
 * Coin ids, puzzle hashes and announcement ids are all SHA256 digests that
 * are computed on hot paths (every coin lookup derives an id), so hashing is
 * synchronous here and backed by @noble/hashes rather than Web Crypto.
 *
 * Used by:
 * - Coin id and announcement id derivation
 * - Program hashing (puzzle hash / tree hash)
 * - Key derivation in the deterministic keychain
 */

import { sha256 as nobleSha256 } from "@noble/hashes/sha256";

// ---------------------------------------------------------------------------
// Core Hash Functions
// ---------------------------------------------------------------------------

/**
 * Compute SHA256 hash of a Uint8Array.
 *
 * @example
 * const hash = sha256(utf8ToBytes("hello"));
 */
export function sha256(data: Uint8Array): Uint8Array {
  return nobleSha256(data);
}

/**
 * Compute SHA256 hash and return as lowercase hex.
 *
 * @example
 * sha256Hex(utf8ToBytes("hello"));
 * // "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824"
 */
export function sha256Hex(data: Uint8Array): string {
  return bytesToHex(sha256(data));
}

/**
 * Hash the concatenation of several byte strings.
 */
export function sha256Concat(...parts: Uint8Array[]): Uint8Array {
  return sha256(concatBytes(...parts));
}

// ---------------------------------------------------------------------------
// Hex Encoding Utilities
// ---------------------------------------------------------------------------

/**
 * Convert bytes to lowercase hex string.
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

/**
 * Convert hex string to bytes.
 *
 * @param hex - Hex string (with or without 0x prefix)
 * @throws Error if hex string is invalid
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.startsWith("0x") ? hex.slice(2) : hex;

  if (cleanHex.length % 2 !== 0) {
    throw new Error("Hex string must have even length");
  }
  if (!/^[0-9a-fA-F]*$/.test(cleanHex)) {
    throw new Error("Invalid hex character");
  }

  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < cleanHex.length; i += 2) {
    bytes[i / 2] = parseInt(cleanHex.slice(i, i + 2), 16);
  }
  return bytes;
}

/**
 * Check if a string is a valid hex string.
 *
 * @param expectedLength - Expected byte length (optional)
 */
export function isValidHex(value: string, expectedLength?: number): boolean {
  const cleanHex = value.startsWith("0x") ? value.slice(2) : value;

  if (!/^[0-9a-fA-F]*$/.test(cleanHex)) {
    return false;
  }

  if (cleanHex.length % 2 !== 0) {
    return false;
  }

  if (expectedLength !== undefined && cleanHex.length !== expectedLength * 2) {
    return false;
  }

  return true;
}

/**
 * Normalize a 32-byte hash to lowercase hex without a 0x prefix.
 *
 * @throws Error if the value is not 32 bytes of hex
 */
export function normalizeBytes32(value: string, label = "value"): string {
  if (!isValidHex(value, 32)) {
    throw new Error(`Invalid ${label}: expected 32 bytes of hex, got "${value}"`);
  }
  const clean = value.startsWith("0x") ? value.slice(2) : value;
  return clean.toLowerCase();
}

// ---------------------------------------------------------------------------
// Byte Helpers
// ---------------------------------------------------------------------------

/**
 * Concatenate byte arrays.
 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * UTF-8 encode a string.
 */
export function utf8ToBytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/**
 * Encode an integer as minimal big-endian two's complement bytes.
 *
 * Zero encodes to the empty byte string; a leading 0x00 is kept when the
 * high bit would otherwise flip the sign (128 -> 0x0080).
 *
 * @example
 * bytesToHex(intToBytes(0n));    // ""
 * bytesToHex(intToBytes(127n));  // "7f"
 * bytesToHex(intToBytes(128n));  // "0080"
 * bytesToHex(intToBytes(-1n));   // "ff"
 */
export function intToBytes(value: bigint): Uint8Array {
  if (value === 0n) {
    return new Uint8Array(0);
  }

  const bytes: number[] = [];
  let v = value;
  // Collect little-endian bytes until the remaining value is pure sign extension
  for (;;) {
    const byte = Number(v & 0xffn);
    bytes.push(byte);
    v >>= 8n;
    const signBitSet = (byte & 0x80) !== 0;
    if ((v === 0n && !signBitSet) || (v === -1n && signBitSet)) {
      break;
    }
  }
  return Uint8Array.from(bytes.reverse());
}

/**
 * Encode an unsigned 32-bit integer as 4 big-endian bytes.
 */
export function uint32ToBytes(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new Error(`Value out of uint32 range: ${value}`);
  }
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value, false);
  return out;
}
