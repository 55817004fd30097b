/**
 * @summary Central export point for all type definitions in @coinlab/core.
 *
 * This file re-exports the value objects, interfaces and error classes from
 * the types subdirectory. It provides a single import point for consumers
 * who need the data model without the crypto and puzzle helpers.
 *
 * Usage:
 * ```typescript
 * import { Coin, Program, type SpendBundle } from "@coinlab/core/types";
 * import { InsufficientFundsError, isCoinlabError } from "@coinlab/core/types";
 * ```
 */

// ---------------------------------------------------------------------------
// Coins and Programs
// ---------------------------------------------------------------------------

export type { CoinJson } from "./coin.js";

export { Coin, MAX_COIN_AMOUNT, computeCoinId, sumAmounts } from "./coin.js";

export { Program } from "./program.js";

export { Contract, ContractCoin } from "./contract.js";

// ---------------------------------------------------------------------------
// Conditions
// ---------------------------------------------------------------------------

export type {
  ConditionOpcodeValue,
  AggSigUnsafeCondition,
  AggSigMeCondition,
  CreateCoinCondition,
  ReserveFeeCondition,
  CreateCoinAnnouncementCondition,
  AssertCoinAnnouncementCondition,
  AssertMyCoinIdCondition,
  AssertSecondsAbsoluteCondition,
  AssertHeightAbsoluteCondition,
  Condition,
} from "./conditions.js";

export {
  ConditionOpcode,
  ConditionParseError,
  createCoin,
  createCoinAnnouncement,
  assertCoinAnnouncement,
  aggSigMe,
  aggSigUnsafe,
  reserveFee,
  assertMyCoinId,
  assertSecondsAbsolute,
  assertHeightAbsolute,
  announcementId,
  conditionToJson,
  conditionsToJson,
  conditionFromJson,
  conditionsFromJson,
} from "./conditions.js";

// ---------------------------------------------------------------------------
// Spends
// ---------------------------------------------------------------------------

export type { CoinSpend, SpendBundle, PushResult } from "./spend.js";

export { createSpendBundle, spendBundleId } from "./spend.js";

// ---------------------------------------------------------------------------
// Ledger and Key Interfaces
// ---------------------------------------------------------------------------

export type {
  CoinRecord,
  CoinQueryOptions,
  SubmitResult,
  BlockEffects,
  LedgerService,
} from "./ledger.js";

export type { KeyPair, KeyService } from "./keys.js";

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

export {
  CoinlabError,
  InsufficientFundsError,
  InvalidRecipientError,
  LedgerRejectedError,
  InvariantViolationError,
  SessionClosedError,
  ConfigurationError,
  isCoinlabError,
  isInsufficientFundsError,
  isLedgerRejectedError,
} from "./errors.js";
