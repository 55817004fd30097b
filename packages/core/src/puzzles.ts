/**
 * @summary Builders for the puzzle kinds the simulator understands.
 *
 * Every puzzle is a JSON object tagged by `kind`. These builders produce the
 * locking programs; evaluating them is the ledger's job.
 *
 * - standard: spendable by one key; the solution carries the delegated
 *   conditions and the key must sign their hash (AGG_SIG_ME)
 * - anyone_can_spend: the solution is the condition list
 * - fixed_conditions: the conditions are baked into the puzzle
 * - timelock: asserts a minimum ledger time, then runs an inner puzzle
 */

import { conditionsToJson, type Condition } from "./types/conditions.js";
import { Program } from "./types/program.js";

export const PuzzleKind = {
  STANDARD: "standard",
  ANYONE_CAN_SPEND: "anyone_can_spend",
  FIXED_CONDITIONS: "fixed_conditions",
  TIMELOCK: "timelock",
} as const;

export type PuzzleKindValue = (typeof PuzzleKind)[keyof typeof PuzzleKind];

/**
 * Standard puzzle locked to a public key.
 */
export function standardPuzzle(publicKey: string): Program {
  return Program.fromJson({ kind: PuzzleKind.STANDARD, publicKey: publicKey.toLowerCase() });
}

/**
 * The delegated program whose hash the key holder signs.
 */
export function delegatedConditionsProgram(conditions: readonly Condition[]): Program {
  return Program.fromJson(conditionsToJson(conditions));
}

/**
 * Solution to a standard puzzle emitting `conditions`.
 */
export function standardSolution(conditions: readonly Condition[]): Program {
  return Program.fromJson({ conditions: conditionsToJson(conditions) });
}

export function anyoneCanSpendPuzzle(): Program {
  return Program.fromJson({ kind: PuzzleKind.ANYONE_CAN_SPEND });
}

/**
 * Solution to an anyone-can-spend puzzle.
 */
export function conditionsSolution(conditions: readonly Condition[]): Program {
  return Program.fromJson(conditionsToJson(conditions));
}

export function fixedConditionsPuzzle(conditions: readonly Condition[]): Program {
  return Program.fromJson({
    kind: PuzzleKind.FIXED_CONDITIONS,
    conditions: conditionsToJson(conditions),
  });
}

/**
 * Puzzle that cannot be spent before ledger time `seconds`.
 */
export function timelockPuzzle(seconds: number, inner: Program): Program {
  if (!Number.isSafeInteger(seconds) || seconds < 0) {
    throw new Error(`Invalid timelock: ${seconds}`);
  }
  return Program.fromJson({
    kind: PuzzleKind.TIMELOCK,
    seconds,
    inner: inner.toJson(),
  });
}
