/**
 * @summary Spend conditions: the instructions a puzzle emits when spent.
 *
 * Conditions are what the ledger actually acts on. A puzzle plus its
 * solution evaluates to a list of conditions; the ledger then creates
 * coins, checks announcements, timelocks and signatures accordingly.
 *
 * Wire form is a JSON list `[opcode, ...args]` with amounts as decimal
 * strings, the shape puzzles and solutions embed them in.
 *
 * Used by:
 * - Wallet spend construction (transfer, combine, launch)
 * - Simulator condition checks
 */

import type { JsonValue } from "../utils/canonical-json.js";
import { bytesToHex, concatBytes, hexToBytes, isValidHex, normalizeBytes32, sha256 } from "../utils/hash.js";
import { MAX_COIN_AMOUNT } from "./coin.js";

// ---------------------------------------------------------------------------
// Opcodes
// ---------------------------------------------------------------------------

/**
 * Numeric condition opcodes.
 */
export const ConditionOpcode = {
  AGG_SIG_UNSAFE: 49,
  AGG_SIG_ME: 50,
  CREATE_COIN: 51,
  RESERVE_FEE: 52,
  CREATE_COIN_ANNOUNCEMENT: 60,
  ASSERT_COIN_ANNOUNCEMENT: 61,
  ASSERT_MY_COIN_ID: 70,
  ASSERT_SECONDS_ABSOLUTE: 81,
  ASSERT_HEIGHT_ABSOLUTE: 83,
} as const;

export type ConditionOpcodeValue = (typeof ConditionOpcode)[keyof typeof ConditionOpcode];

// ---------------------------------------------------------------------------
// Condition Types
// ---------------------------------------------------------------------------

export interface AggSigUnsafeCondition {
  readonly opcode: typeof ConditionOpcode.AGG_SIG_UNSAFE;
  readonly publicKey: string;
  readonly message: string;
}

/**
 * Signature over `message || coinId || genesisChallenge`.
 */
export interface AggSigMeCondition {
  readonly opcode: typeof ConditionOpcode.AGG_SIG_ME;
  readonly publicKey: string;
  readonly message: string;
}

export interface CreateCoinCondition {
  readonly opcode: typeof ConditionOpcode.CREATE_COIN;
  readonly puzzleHash: string;
  readonly amount: bigint;
}

export interface ReserveFeeCondition {
  readonly opcode: typeof ConditionOpcode.RESERVE_FEE;
  readonly amount: bigint;
}

export interface CreateCoinAnnouncementCondition {
  readonly opcode: typeof ConditionOpcode.CREATE_COIN_ANNOUNCEMENT;
  readonly message: string;
}

/**
 * Requires `sha256(coinId || message)` to be announced in the same bundle.
 */
export interface AssertCoinAnnouncementCondition {
  readonly opcode: typeof ConditionOpcode.ASSERT_COIN_ANNOUNCEMENT;
  readonly announcementId: string;
}

export interface AssertMyCoinIdCondition {
  readonly opcode: typeof ConditionOpcode.ASSERT_MY_COIN_ID;
  readonly coinId: string;
}

export interface AssertSecondsAbsoluteCondition {
  readonly opcode: typeof ConditionOpcode.ASSERT_SECONDS_ABSOLUTE;
  readonly seconds: number;
}

export interface AssertHeightAbsoluteCondition {
  readonly opcode: typeof ConditionOpcode.ASSERT_HEIGHT_ABSOLUTE;
  readonly height: number;
}

export type Condition =
  | AggSigUnsafeCondition
  | AggSigMeCondition
  | CreateCoinCondition
  | ReserveFeeCondition
  | CreateCoinAnnouncementCondition
  | AssertCoinAnnouncementCondition
  | AssertMyCoinIdCondition
  | AssertSecondsAbsoluteCondition
  | AssertHeightAbsoluteCondition;

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function createCoin(puzzleHash: string, amount: bigint): CreateCoinCondition {
  return {
    opcode: ConditionOpcode.CREATE_COIN,
    puzzleHash: normalizeBytes32(puzzleHash, "puzzle hash"),
    amount,
  };
}

export function createCoinAnnouncement(message: string): CreateCoinAnnouncementCondition {
  return { opcode: ConditionOpcode.CREATE_COIN_ANNOUNCEMENT, message: message.toLowerCase() };
}

export function assertCoinAnnouncement(announcementId: string): AssertCoinAnnouncementCondition {
  return {
    opcode: ConditionOpcode.ASSERT_COIN_ANNOUNCEMENT,
    announcementId: normalizeBytes32(announcementId, "announcement id"),
  };
}

export function aggSigMe(publicKey: string, message: string): AggSigMeCondition {
  return { opcode: ConditionOpcode.AGG_SIG_ME, publicKey: publicKey.toLowerCase(), message: message.toLowerCase() };
}

export function aggSigUnsafe(publicKey: string, message: string): AggSigUnsafeCondition {
  return { opcode: ConditionOpcode.AGG_SIG_UNSAFE, publicKey: publicKey.toLowerCase(), message: message.toLowerCase() };
}

export function reserveFee(amount: bigint): ReserveFeeCondition {
  return { opcode: ConditionOpcode.RESERVE_FEE, amount };
}

export function assertMyCoinId(coinId: string): AssertMyCoinIdCondition {
  return { opcode: ConditionOpcode.ASSERT_MY_COIN_ID, coinId: normalizeBytes32(coinId, "coin id") };
}

export function assertSecondsAbsolute(seconds: number): AssertSecondsAbsoluteCondition {
  return { opcode: ConditionOpcode.ASSERT_SECONDS_ABSOLUTE, seconds };
}

export function assertHeightAbsolute(height: number): AssertHeightAbsoluteCondition {
  return { opcode: ConditionOpcode.ASSERT_HEIGHT_ABSOLUTE, height };
}

/**
 * Id of the announcement `message` made by coin `coinId`.
 */
export function announcementId(coinId: string, message: string): string {
  return bytesToHex(sha256(concatBytes(hexToBytes(coinId), hexToBytes(message))));
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

/**
 * Error raised when a condition list cannot be decoded.
 */
export class ConditionParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConditionParseError";
  }
}

/**
 * Encode a condition to its JSON list form.
 */
export function conditionToJson(condition: Condition): JsonValue {
  switch (condition.opcode) {
    case ConditionOpcode.AGG_SIG_UNSAFE:
    case ConditionOpcode.AGG_SIG_ME:
      return [condition.opcode, condition.publicKey, condition.message];
    case ConditionOpcode.CREATE_COIN:
      return [condition.opcode, condition.puzzleHash, condition.amount.toString()];
    case ConditionOpcode.RESERVE_FEE:
      return [condition.opcode, condition.amount.toString()];
    case ConditionOpcode.CREATE_COIN_ANNOUNCEMENT:
      return [condition.opcode, condition.message];
    case ConditionOpcode.ASSERT_COIN_ANNOUNCEMENT:
      return [condition.opcode, condition.announcementId];
    case ConditionOpcode.ASSERT_MY_COIN_ID:
      return [condition.opcode, condition.coinId];
    case ConditionOpcode.ASSERT_SECONDS_ABSOLUTE:
      return [condition.opcode, condition.seconds];
    case ConditionOpcode.ASSERT_HEIGHT_ABSOLUTE:
      return [condition.opcode, condition.height];
  }
}

export function conditionsToJson(conditions: readonly Condition[]): JsonValue[] {
  return conditions.map(conditionToJson);
}

/**
 * Decode a condition from its JSON list form.
 *
 * @throws ConditionParseError if the list is malformed
 */
export function conditionFromJson(value: JsonValue): Condition {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConditionParseError("Condition must be a non-empty list");
  }
  const [opcode, ...args] = value;

  switch (opcode) {
    case ConditionOpcode.AGG_SIG_UNSAFE:
      return aggSigUnsafe(hexArg(args, 0, 48, "public key"), hexArg(args, 1, undefined, "message"));
    case ConditionOpcode.AGG_SIG_ME:
      return aggSigMe(hexArg(args, 0, 48, "public key"), hexArg(args, 1, undefined, "message"));
    case ConditionOpcode.CREATE_COIN:
      return createCoin(hexArg(args, 0, 32, "puzzle hash"), amountArg(args, 1));
    case ConditionOpcode.RESERVE_FEE:
      return reserveFee(amountArg(args, 0));
    case ConditionOpcode.CREATE_COIN_ANNOUNCEMENT:
      return createCoinAnnouncement(hexArg(args, 0, undefined, "message"));
    case ConditionOpcode.ASSERT_COIN_ANNOUNCEMENT:
      return assertCoinAnnouncement(hexArg(args, 0, 32, "announcement id"));
    case ConditionOpcode.ASSERT_MY_COIN_ID:
      return assertMyCoinId(hexArg(args, 0, 32, "coin id"));
    case ConditionOpcode.ASSERT_SECONDS_ABSOLUTE:
      return assertSecondsAbsolute(integerArg(args, 0, "seconds"));
    case ConditionOpcode.ASSERT_HEIGHT_ABSOLUTE:
      return assertHeightAbsolute(integerArg(args, 0, "height"));
    default:
      throw new ConditionParseError(`Unknown condition opcode: ${JSON.stringify(opcode)}`);
  }
}

/**
 * Decode a list of conditions.
 *
 * @throws ConditionParseError if the value is not a list of valid conditions
 */
export function conditionsFromJson(value: JsonValue): Condition[] {
  if (!Array.isArray(value)) {
    throw new ConditionParseError("Conditions must be a list");
  }
  return value.map(conditionFromJson);
}

function hexArg(
  args: JsonValue[],
  index: number,
  byteLength: number | undefined,
  label: string
): string {
  const value = args[index];
  if (typeof value !== "string" || !isValidHex(value, byteLength)) {
    throw new ConditionParseError(`Invalid ${label} argument: ${JSON.stringify(value)}`);
  }
  return value.startsWith("0x") ? value.slice(2) : value;
}

function amountArg(args: JsonValue[], index: number): bigint {
  const value = args[index];
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw new ConditionParseError(`Invalid amount argument: ${JSON.stringify(value)}`);
  }
  const amount = BigInt(value);
  if (amount > MAX_COIN_AMOUNT) {
    throw new ConditionParseError(`Amount out of range: ${value}`);
  }
  return amount;
}

function integerArg(args: JsonValue[], index: number, label: string): number {
  const value = args[index];
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw new ConditionParseError(`Invalid ${label} argument: ${JSON.stringify(value)}`);
  }
  return value;
}
