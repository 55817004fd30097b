/**
 * @summary Central export point for utility functions in @coinlab/core.
 *
 * Usage:
 * ```typescript
 * import { canonicalize, sha256Hex, encodePuzzleHash } from "@coinlab/core/utils";
 * ```
 */

// ---------------------------------------------------------------------------
// Canonical JSON Utilities
// ---------------------------------------------------------------------------

export type { JsonValue, CanonicalizeOptions } from "./canonical-json.js";

export { canonicalize, canonicalEquals, isJsonValue } from "./canonical-json.js";

// ---------------------------------------------------------------------------
// Hash Utilities
// ---------------------------------------------------------------------------

export {
  sha256,
  sha256Hex,
  sha256Concat,
  bytesToHex,
  hexToBytes,
  isValidHex,
  normalizeBytes32,
  concatBytes,
  utf8ToBytes,
  intToBytes,
  uint32ToBytes,
} from "./hash.js";

// ---------------------------------------------------------------------------
// Address Utilities
// ---------------------------------------------------------------------------

export type { DecodedAddress } from "./address.js";

export {
  DEFAULT_ADDRESS_PREFIX,
  encodePuzzleHash,
  decodePuzzleHash,
} from "./address.js";
