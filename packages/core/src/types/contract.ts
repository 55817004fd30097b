/**
 * @summary Contracts and the coins they lock.
 *
 * There are two kinds of coins in practice:
 * - wallet coins, which make up an actor's liquid balance
 * - contract coins, which lock value behind a program for some purpose
 *   other than being spent as money
 *
 * A Contract is not spendable itself. It names a puzzle, and predicts the
 * coins that puzzle will own once a spend creates them.
 */

import { DEFAULT_GENESIS_CHALLENGE } from "../networks.js";
import { normalizeBytes32 } from "../utils/hash.js";
import { Coin } from "./coin.js";
import type { Program } from "./program.js";

/**
 * A coin together with the puzzle that unlocks it.
 */
export class ContractCoin extends Coin {
  readonly puzzle: Program;

  /**
   * @throws Error if `puzzle` does not hash to `puzzleHash`
   */
  constructor(parentId: string, puzzleHash: string, amount: bigint, puzzle: Program) {
    super(parentId, puzzleHash, amount);
    if (puzzle.hash() !== this.puzzleHash) {
      throw new Error(
        `Puzzle hash mismatch: puzzle hashes to ${puzzle.hash()}, coin expects ${this.puzzleHash}`
      );
    }
    this.puzzle = puzzle;
  }

  /**
   * Wrap an existing coin with its puzzle.
   */
  static wrap(coin: Coin, puzzle: Program): ContractCoin {
    return new ContractCoin(coin.parentId, coin.puzzleHash, coin.amount, puzzle);
  }

  /**
   * Strip the puzzle, leaving the plain coin.
   */
  asCoin(): Coin {
    return new Coin(this.parentId, this.puzzleHash, this.amount);
  }

  /**
   * The contract this coin's puzzle represents.
   */
  contract(genesisChallenge: string = DEFAULT_GENESIS_CHALLENGE): Contract {
    return new Contract(this.puzzle, genesisChallenge);
  }
}

export class Contract {
  readonly puzzle: Program;

  /** Genesis challenge of the network the contract targets */
  readonly genesisChallenge: string;

  constructor(puzzle: Program, genesisChallenge: string = DEFAULT_GENESIS_CHALLENGE) {
    this.puzzle = puzzle;
    this.genesisChallenge = normalizeBytes32(genesisChallenge, "genesis challenge");
  }

  puzzleHash(): string {
    return this.puzzle.hash();
  }

  /**
   * Predict the coin this contract owns after `parent` is spent to create it.
   *
   * This is a prediction, not a ledger fact, until that spend commits.
   */
  customCoin(parent: Coin, amount: bigint): ContractCoin {
    return new ContractCoin(parent.id, this.puzzleHash(), amount, this.puzzle);
  }
}
