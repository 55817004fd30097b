/**
 * @summary Main entry point for @coinlab/core package.
 *
 * This package provides the data model and primitives of the coin ledger:
 * coins, programs, conditions and spend bundles, the ledger and key service
 * interfaces the wallet is written against, BLS signing and SHA256 hashing,
 * and the puzzle builders the simulator knows how to evaluate.
 *
 * Key features:
 * - Content-addressed Coin ids and puzzle hashes
 * - Condition encoding with a validating decoder
 * - BLS12-381 signing and aggregation
 * - Deterministic keychain for simulations
 * - bech32m puzzle hash addresses
 *
 * Usage:
 * ```typescript
 * import {
 *   Coin,
 *   standardPuzzle,
 *   createCoin,
 *   DeterministicKeychain,
 * } from "@coinlab/core";
 * ```
 *
 * Subpath exports:
 * - @coinlab/core/types - Data model and interfaces only
 * - @coinlab/core/utils - Hash, address and canonical JSON helpers only
 */

// ---------------------------------------------------------------------------
// Type Exports
// ---------------------------------------------------------------------------

export * from "./types/index.js";

// ---------------------------------------------------------------------------
// Crypto
// ---------------------------------------------------------------------------

export type { SignaturePair } from "./crypto/bls.js";

export {
  EMPTY_SIGNATURE,
  publicKeyFor,
  sign,
  aggregateSignatures,
  verifyAggregate,
} from "./crypto/bls.js";

export { DEFAULT_KEYCHAIN_SEED, DeterministicKeychain } from "./crypto/keychain.js";

// ---------------------------------------------------------------------------
// Puzzles
// ---------------------------------------------------------------------------

export type { PuzzleKindValue } from "./puzzles.js";

export {
  PuzzleKind,
  standardPuzzle,
  delegatedConditionsProgram,
  standardSolution,
  anyoneCanSpendPuzzle,
  conditionsSolution,
  fixedConditionsPuzzle,
  timelockPuzzle,
} from "./puzzles.js";

// ---------------------------------------------------------------------------
// Networks
// ---------------------------------------------------------------------------

export type { NetworkParameters, NetworkName } from "./networks.js";

export {
  NETWORKS,
  SIMULATOR_GENESIS_CHALLENGE,
  DEFAULT_GENESIS_CHALLENGE,
  isNetworkName,
  getNetwork,
} from "./networks.js";

// ---------------------------------------------------------------------------
// Utility Exports
// ---------------------------------------------------------------------------

export * from "./utils/index.js";
