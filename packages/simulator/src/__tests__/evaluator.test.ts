/**
 * @summary Tests for puzzle evaluation and reward coin ids.
 */

import { describe, it, expect } from 'vitest';
import {
  Program,
  anyoneCanSpendPuzzle,
  assertSecondsAbsolute,
  conditionsSolution,
  createCoin,
  fixedConditionsPuzzle,
  reserveFee,
  timelockPuzzle,
} from '@coinlab/core';
import { evaluatePuzzle, MAX_PUZZLE_DEPTH } from '../evaluator.js';
import { RejectionCode, SpendValidationError } from '../errors.js';
import { createRewardCoins, farmerParentId, poolParentId } from '../rewards.js';

const PUZZLE_HASH = 'ab'.repeat(32);

function rejectionOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof SpendValidationError) return error.code;
    throw error;
  }
  return undefined;
}

describe('evaluatePuzzle', () => {
  it('emits fixed conditions regardless of the solution', () => {
    const puzzle = fixedConditionsPuzzle([reserveFee(1n)]);
    expect(evaluatePuzzle(puzzle, conditionsSolution([createCoin(PUZZLE_HASH, 5n)]))).toEqual([
      reserveFee(1n),
    ]);
  });

  it('prefixes timelocked conditions with the time assertion', () => {
    const puzzle = timelockPuzzle(500, anyoneCanSpendPuzzle());
    expect(evaluatePuzzle(puzzle, conditionsSolution([createCoin(PUZZLE_HASH, 5n)]))).toEqual([
      assertSecondsAbsolute(500),
      createCoin(PUZZLE_HASH, 5n),
    ]);
  });

  it('fails a puzzle without a kind', () => {
    expect(rejectionOf(() => evaluatePuzzle(Program.fromJson([1, 2]), conditionsSolution([])))).toBe(
      RejectionCode.PUZZLE_EVALUATION_FAILED
    );
  });

  it('fails a standard puzzle whose solution is not an object', () => {
    const puzzle = Program.fromJson({ kind: 'standard', publicKey: 'aa'.repeat(48) });
    expect(rejectionOf(() => evaluatePuzzle(puzzle, conditionsSolution([])))).toBe(
      RejectionCode.PUZZLE_EVALUATION_FAILED
    );
  });

  it('fails a standard solution with no conditions', () => {
    const puzzle = Program.fromJson({ kind: 'standard', publicKey: 'aa'.repeat(48) });
    expect(rejectionOf(() => evaluatePuzzle(puzzle, Program.fromJson({})))).toBe(
      RejectionCode.INVALID_CONDITION
    );
  });

  it('limits wrapper nesting', () => {
    let puzzle = anyoneCanSpendPuzzle();
    for (let i = 0; i <= MAX_PUZZLE_DEPTH; i++) {
      puzzle = timelockPuzzle(0, puzzle);
    }
    expect(rejectionOf(() => evaluatePuzzle(puzzle, conditionsSolution([])))).toBe(
      RejectionCode.PUZZLE_EVALUATION_FAILED
    );
  });
});

describe('reward coins', () => {
  const challenge = '11'.repeat(16) + '22'.repeat(16);

  it('derives parent ids from the challenge halves and the height', () => {
    expect(poolParentId(challenge, 1)).toBe('11'.repeat(16) + '00'.repeat(15) + '01');
    expect(farmerParentId(challenge, 258)).toBe('22'.repeat(16) + '00'.repeat(14) + '0102');
  });

  it('omits zero rewards', () => {
    expect(createRewardCoins(challenge, 1, PUZZLE_HASH, 10n, 0n).map((c) => c.amount)).toEqual([10n]);
    expect(createRewardCoins(challenge, 1, PUZZLE_HASH, 0n, 0n)).toEqual([]);
  });
});
