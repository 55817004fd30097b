/**
 * @summary Rejection codes reported by the simulator.
 *
 * A rejected bundle is reported to the submitter as one of these codes.
 * Inside the simulator a failing check throws SpendValidationError, which
 * submit() turns back into a rejection.
 */

import { CoinlabError } from "@coinlab/core";

export const RejectionCode = {
  INVALID_SPEND_BUNDLE: "INVALID_SPEND_BUNDLE",
  UNKNOWN_UNSPENT: "UNKNOWN_UNSPENT",
  DOUBLE_SPEND: "DOUBLE_SPEND",
  WRONG_PUZZLE_HASH: "WRONG_PUZZLE_HASH",
  PUZZLE_EVALUATION_FAILED: "PUZZLE_EVALUATION_FAILED",
  INVALID_CONDITION: "INVALID_CONDITION",
  ASSERT_ANNOUNCE_CONSUMED_FAILED: "ASSERT_ANNOUNCE_CONSUMED_FAILED",
  DUPLICATE_OUTPUT: "DUPLICATE_OUTPUT",
  MINTING_COIN: "MINTING_COIN",
  RESERVE_FEE_CONDITION_FAILED: "RESERVE_FEE_CONDITION_FAILED",
  ASSERT_SECONDS_ABSOLUTE_FAILED: "ASSERT_SECONDS_ABSOLUTE_FAILED",
  ASSERT_HEIGHT_ABSOLUTE_FAILED: "ASSERT_HEIGHT_ABSOLUTE_FAILED",
  ASSERT_MY_COIN_ID_FAILED: "ASSERT_MY_COIN_ID_FAILED",
  BAD_AGGREGATE_SIGNATURE: "BAD_AGGREGATE_SIGNATURE",
} as const;

export type RejectionCodeValue = (typeof RejectionCode)[keyof typeof RejectionCode];

/**
 * A bundle failed one of the ledger's checks.
 */
export class SpendValidationError extends CoinlabError {
  readonly code: RejectionCodeValue;

  /** Coin whose spend failed, when the failure belongs to one spend */
  readonly coinId?: string | undefined;

  constructor(code: RejectionCodeValue, detail: string, coinId?: string, cause?: Error) {
    super(`${code}: ${detail}`, cause);
    this.code = code;
    this.coinId = coinId;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      coinId: this.coinId,
    };
  }
}

export function isSpendValidationError(error: unknown): error is SpendValidationError {
  return error instanceof SpendValidationError;
}
