/**
 * @summary Bundle validation against ledger state.
 *
 * Checks run in this order, and the first failure wins:
 * 1. the bundle has spends and spends no coin twice
 * 2. every coin exists unspent and is not claimed by a pending bundle
 * 3. every puzzle matches its coin and evaluates
 * 4. condition checks (announcements, outputs, fees, time, coin ids)
 * 5. the aggregate signature
 */

import {
  Coin,
  ConditionOpcode,
  announcementId,
  concatBytes,
  hexToBytes,
  verifyAggregate,
  type CoinRecord,
  type SignaturePair,
  type SpendBundle,
} from "@coinlab/core";
import { RejectionCode, SpendValidationError } from "./errors.js";
import { evaluatePuzzle } from "./evaluator.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Ledger state a bundle is checked against.
 */
export interface ValidationContext {
  lookupCoin(coinId: string): CoinRecord | undefined;

  /** Coin ids already claimed by bundles waiting for a block */
  pendingSpends: ReadonlySet<string>;

  /** Ledger time (seconds) */
  timestamp: number;

  height: number;

  genesisChallenge: string;
}

/**
 * What a valid bundle does to the ledger.
 */
export interface BundleEffects {
  removals: Coin[];
  additions: Coin[];

  /** Inputs minus outputs */
  fees: bigint;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Validate a bundle and compute its effects.
 *
 * @throws SpendValidationError naming the first failed check
 */
export function validateBundle(bundle: SpendBundle, context: ValidationContext): BundleEffects {
  if (bundle.coinSpends.length === 0) {
    throw new SpendValidationError(RejectionCode.INVALID_SPEND_BUNDLE, "bundle has no spends");
  }

  const removals: Coin[] = [];
  const seen = new Set<string>();
  for (const spend of bundle.coinSpends) {
    const id = spend.coin.id;
    if (seen.has(id)) {
      throw new SpendValidationError(RejectionCode.DOUBLE_SPEND, "coin spent twice in bundle", id);
    }
    seen.add(id);

    const record = context.lookupCoin(id);
    if (record === undefined) {
      throw new SpendValidationError(RejectionCode.UNKNOWN_UNSPENT, "coin does not exist", id);
    }
    if (record.spentHeight !== null) {
      throw new SpendValidationError(
        RejectionCode.DOUBLE_SPEND,
        `coin already spent at height ${record.spentHeight}`,
        id
      );
    }
    if (context.pendingSpends.has(id)) {
      throw new SpendValidationError(RejectionCode.DOUBLE_SPEND, "coin spent by a pending bundle", id);
    }
    removals.push(record.coin);
  }

  const additions: Coin[] = [];
  const outputIds = new Set<string>();
  const announcements = new Set<string>();
  const asserted: Array<{ coinId: string; announcementId: string }> = [];
  const pairs: SignaturePair[] = [];
  const challenge = hexToBytes(context.genesisChallenge);
  let reserved = 0n;

  for (const spend of bundle.coinSpends) {
    const coin = spend.coin;
    if (spend.puzzle.hash() !== coin.puzzleHash) {
      throw new SpendValidationError(
        RejectionCode.WRONG_PUZZLE_HASH,
        `puzzle hashes to ${spend.puzzle.hash()}`,
        coin.id
      );
    }

    for (const condition of evaluatePuzzle(spend.puzzle, spend.solution)) {
      switch (condition.opcode) {
        case ConditionOpcode.CREATE_COIN: {
          const output = new Coin(coin.id, condition.puzzleHash, condition.amount);
          if (outputIds.has(output.id)) {
            throw new SpendValidationError(
              RejectionCode.DUPLICATE_OUTPUT,
              `output ${output.id} created twice`,
              coin.id
            );
          }
          outputIds.add(output.id);
          additions.push(output);
          break;
        }
        case ConditionOpcode.CREATE_COIN_ANNOUNCEMENT:
          announcements.add(announcementId(coin.id, condition.message));
          break;
        case ConditionOpcode.ASSERT_COIN_ANNOUNCEMENT:
          asserted.push({ coinId: coin.id, announcementId: condition.announcementId });
          break;
        case ConditionOpcode.RESERVE_FEE:
          reserved += condition.amount;
          break;
        case ConditionOpcode.ASSERT_MY_COIN_ID:
          if (condition.coinId !== coin.id) {
            throw new SpendValidationError(
              RejectionCode.ASSERT_MY_COIN_ID_FAILED,
              `asserted ${condition.coinId}`,
              coin.id
            );
          }
          break;
        case ConditionOpcode.ASSERT_SECONDS_ABSOLUTE:
          if (context.timestamp < condition.seconds) {
            throw new SpendValidationError(
              RejectionCode.ASSERT_SECONDS_ABSOLUTE_FAILED,
              `ledger time ${context.timestamp} is before ${condition.seconds}`,
              coin.id
            );
          }
          break;
        case ConditionOpcode.ASSERT_HEIGHT_ABSOLUTE:
          if (context.height < condition.height) {
            throw new SpendValidationError(
              RejectionCode.ASSERT_HEIGHT_ABSOLUTE_FAILED,
              `ledger height ${context.height} is below ${condition.height}`,
              coin.id
            );
          }
          break;
        case ConditionOpcode.AGG_SIG_ME:
          pairs.push({
            publicKey: condition.publicKey,
            message: concatBytes(hexToBytes(condition.message), hexToBytes(coin.id), challenge),
          });
          break;
        case ConditionOpcode.AGG_SIG_UNSAFE:
          pairs.push({ publicKey: condition.publicKey, message: hexToBytes(condition.message) });
          break;
      }
    }
  }

  for (const assertion of asserted) {
    if (!announcements.has(assertion.announcementId)) {
      throw new SpendValidationError(
        RejectionCode.ASSERT_ANNOUNCE_CONSUMED_FAILED,
        `announcement ${assertion.announcementId} not made in bundle`,
        assertion.coinId
      );
    }
  }

  const inputTotal = removals.reduce((sum, c) => sum + c.amount, 0n);
  const outputTotal = additions.reduce((sum, c) => sum + c.amount, 0n);
  if (outputTotal > inputTotal) {
    throw new SpendValidationError(
      RejectionCode.MINTING_COIN,
      `outputs ${outputTotal} exceed inputs ${inputTotal}`
    );
  }
  const fees = inputTotal - outputTotal;
  if (fees < reserved) {
    throw new SpendValidationError(
      RejectionCode.RESERVE_FEE_CONDITION_FAILED,
      `fees ${fees} below reserved ${reserved}`
    );
  }

  if (!verifyAggregate(bundle.aggregatedSignature, pairs)) {
    throw new SpendValidationError(RejectionCode.BAD_AGGREGATE_SIGNATURE, "signature does not verify");
  }

  return { removals, additions, fees };
}
