/**
 * @summary Evaluates the puzzle kinds the simulator understands.
 *
 * This is deliberately not a script interpreter. Each puzzle kind built by
 * the @coinlab/core puzzle builders has a fixed meaning here; anything else
 * fails evaluation.
 */

import {
  ConditionParseError,
  Program,
  PuzzleKind,
  aggSigMe,
  assertSecondsAbsolute,
  conditionsFromJson,
  delegatedConditionsProgram,
  isValidHex,
  type Condition,
  type JsonValue,
} from "@coinlab/core";
import { RejectionCode, SpendValidationError } from "./errors.js";

/**
 * Nesting limit for wrapper puzzles such as timelocks.
 */
export const MAX_PUZZLE_DEPTH = 16;

type JsonObject = { [key: string]: JsonValue };

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function evaluationFailed(detail: string, cause?: Error): SpendValidationError {
  return new SpendValidationError(RejectionCode.PUZZLE_EVALUATION_FAILED, detail, undefined, cause);
}

function decode(program: Program, what: string): JsonValue {
  try {
    return program.toJson();
  } catch (error) {
    throw evaluationFailed(
      `${what} is not a JSON program`,
      error instanceof Error ? error : undefined
    );
  }
}

function parseConditions(value: JsonValue | undefined): Condition[] {
  if (value === undefined) {
    throw new SpendValidationError(RejectionCode.INVALID_CONDITION, "missing condition list");
  }
  try {
    return conditionsFromJson(value);
  } catch (error) {
    if (error instanceof ConditionParseError) {
      throw new SpendValidationError(RejectionCode.INVALID_CONDITION, error.message, undefined, error);
    }
    throw error;
  }
}

/**
 * Run `puzzle` with `solution`, returning the conditions it emits.
 *
 * @throws SpendValidationError (PUZZLE_EVALUATION_FAILED or INVALID_CONDITION)
 */
export function evaluatePuzzle(puzzle: Program, solution: Program, depth = 0): Condition[] {
  if (depth > MAX_PUZZLE_DEPTH) {
    throw evaluationFailed(`puzzle nesting exceeds ${MAX_PUZZLE_DEPTH}`);
  }

  const source = decode(puzzle, "puzzle");
  if (!isJsonObject(source) || typeof source["kind"] !== "string") {
    throw evaluationFailed("puzzle has no kind");
  }

  switch (source["kind"]) {
    case PuzzleKind.STANDARD: {
      const publicKey = source["publicKey"];
      if (typeof publicKey !== "string" || !isValidHex(publicKey, 48)) {
        throw evaluationFailed("standard puzzle has no valid public key");
      }
      const args = decode(solution, "solution");
      if (!isJsonObject(args)) {
        throw evaluationFailed("standard solution must be an object");
      }
      const delegated = parseConditions(args["conditions"]);
      return [aggSigMe(publicKey, delegatedConditionsProgram(delegated).hash()), ...delegated];
    }

    case PuzzleKind.ANYONE_CAN_SPEND:
      return parseConditions(decode(solution, "solution"));

    case PuzzleKind.FIXED_CONDITIONS:
      return parseConditions(source["conditions"]);

    case PuzzleKind.TIMELOCK: {
      const seconds = source["seconds"];
      const inner = source["inner"];
      if (typeof seconds !== "number" || !Number.isSafeInteger(seconds) || seconds < 0) {
        throw evaluationFailed("timelock has no valid seconds");
      }
      if (inner === undefined) {
        throw evaluationFailed("timelock has no inner puzzle");
      }
      return [
        assertSecondsAbsolute(seconds),
        ...evaluatePuzzle(Program.fromJson(inner), solution, depth + 1),
      ];
    }

    default:
      throw evaluationFailed(`unknown puzzle kind "${source["kind"]}"`);
  }
}
