/**
 * @summary Wallet actor: coins, balance and value-moving operations.
 *
 * A Wallet owns a key pair, the standard puzzle for its public key, and the
 * set of unspent coins locked to that puzzle. It never talks to the ledger:
 * transactions go through its WalletHost (the Network session), and the
 * host replaces the coin set wholesale after every block.
 *
 * Used by:
 * - Network.makeWallet
 * - Tests and simulations driving actors
 */

import {
  Contract,
  ContractCoin,
  InsufficientFundsError,
  InvalidRecipientError,
  InvariantViolationError,
  LedgerRejectedError,
  Program,
  createCoin,
  standardPuzzle,
  standardSolution,
  sumAmounts,
  type Coin,
  type CoinSpend,
  type Condition,
  type KeyPair,
  type PushResult,
  type SpendBundle,
} from "@coinlab/core";
import { planCombine } from "./combine.js";
import { selectCoins } from "./coin-selector.js";
import { buildSpendBundle, standardCoinSpend, type SigningContext } from "./spend-builder.js";
import { SpendResult } from "./spend-result.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * The session services a wallet uses.
 */
export interface WalletHost {
  readonly genesisChallenge: string;

  /**
   * Submit a bundle; on acceptance one block is produced and every wallet
   * is refreshed before this resolves.
   */
  pushTx(bundle: SpendBundle): Promise<PushResult>;

  /** Dry-run evaluation, used to discover signature requirements */
  runPuzzle(puzzle: Program, solution: Program): Condition[];
}

/**
 * Where a created coin goes.
 */
export type Recipient =
  | { readonly kind: "actor"; readonly wallet: Wallet; readonly puzzleHash: string }
  | { readonly kind: "contract"; readonly contract: Contract; readonly puzzleHash: string };

/**
 * Value transfer out of a standard coin.
 */
export interface TransferOptions {
  /**
   * Amount sent to `to`.
   * @default 1n
   */
  amount?: bigint;

  /**
   * Receiver of `amount`.
   * @default the spending wallet
   */
  to?: Wallet | Contract;

  /** Receiver of `coin.amount - amount`. Without it the rest is left as fee. */
  remainder?: Wallet | Contract;

  solution?: never;
}

/**
 * Spend with a caller-built solution, passed to the coin's puzzle verbatim.
 */
export interface CustomSolutionOptions {
  solution: Program;

  amount?: never;
  to?: never;
  remainder?: never;
}

export type SpendOptions = TransferOptions | CustomSolutionOptions;

function isCustomSolution(options: SpendOptions): options is CustomSolutionOptions {
  return options.solution !== undefined;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}

/**
 * Resolve a recipient into a tagged Recipient.
 *
 * @throws InvalidRecipientError if the value is neither a Wallet nor a Contract
 */
export function resolveRecipient(value: unknown): Recipient {
  if (value instanceof Wallet) {
    return { kind: "actor", wallet: value, puzzleHash: value.puzzleHash };
  }
  if (value instanceof Contract) {
    return { kind: "contract", contract: value, puzzleHash: value.puzzleHash() };
  }
  throw new InvalidRecipientError(describeValue(value));
}

// ---------------------------------------------------------------------------
// Wallet
// ---------------------------------------------------------------------------

export class Wallet {
  readonly name: string;
  readonly publicKey: string;

  /** Standard puzzle locking this wallet's coins */
  readonly puzzle: Program;
  readonly puzzleHash: string;

  private readonly keys: KeyPair;
  private readonly host: WalletHost;
  private readonly debug: boolean;
  private usableCoins = new Map<string, Coin>();

  constructor(host: WalletHost, name: string, keys: KeyPair, debug = false) {
    this.host = host;
    this.name = name;
    this.keys = keys;
    this.publicKey = keys.publicKey;
    this.puzzle = standardPuzzle(keys.publicKey);
    this.puzzleHash = this.puzzle.hash();
    this.debug = debug;
  }

  // ---------------------------------------------------------------------------
  // Coin Set
  // ---------------------------------------------------------------------------

  /**
   * Sum of the amounts of held coins.
   */
  balance(): bigint {
    let total = 0n;
    for (const coin of this.usableCoins.values()) {
      total += coin.amount;
    }
    return total;
  }

  coins(): Coin[] {
    return [...this.usableCoins.values()];
  }

  get coinCount(): number {
    return this.usableCoins.size;
  }

  /**
   * Replace the held coin set. Only the owning session calls this, after
   * each block.
   *
   * @internal
   */
  replaceCoins(coins: Iterable<Coin>): void {
    const next = new Map<string, Coin>();
    for (const coin of coins) {
      next.set(coin.id, coin);
    }
    this.usableCoins = next;
  }

  /**
   * Wrap a coin locked to this wallet with the wallet's puzzle.
   *
   * @throws Error if the coin is locked to another puzzle
   */
  spendableCoin(coin: Coin): ContractCoin {
    return ContractCoin.wrap(coin, this.puzzle);
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  /**
   * Find a single coin holding at least `amount`, combining coins first if
   * no single coin is large enough.
   *
   * Each combine leaves one coin fewer, so the loop runs at most once per
   * held coin.
   *
   * @throws InsufficientFundsError if the balance cannot cover `amount`
   * @throws LedgerRejectedError if a needed combine is rejected
   */
  async chooseCoin(amount: bigint): Promise<ContractCoin> {
    const maxCombines = this.usableCoins.size;

    for (let combines = 0; combines <= maxCombines; combines++) {
      const selection = selectCoins(amount, this.usableCoins.values());
      if (selection === null) {
        throw new InsufficientFundsError(amount, this.balance(), this.name);
      }

      const [only, ...rest] = selection.coins;
      if (only !== undefined && rest.length === 0) {
        return this.spendableCoin(only);
      }

      this.log(`Combining ${selection.coins.length} coins to cover ${amount}`);
      const result = await this.combineCoins(selection.coins);
      if (result.error !== null) {
        throw new LedgerRejectedError(result.error, "combine");
      }
    }

    throw new InvariantViolationError(
      "combine progress",
      `a single coin within ${maxCombines} combines`,
      `${this.usableCoins.size} coins`
    );
  }

  /**
   * Merge `coins` into one coin of their summed value in a single atomic
   * transaction.
   *
   * Block rewards paid to this wallet by the committing block (the
   * `nobody` wallet farms every pushed transaction) are counted on top of
   * the merged coin.
   *
   * @returns The push result; a rejection consumes nothing
   * @throws InvariantViolationError if, after a commit, the balance or the
   *   coin count differs from the merge plus any credited rewards
   */
  async combineCoins(coins: readonly Coin[]): Promise<SpendResult> {
    const startBalance = this.balance();
    const startCount = this.usableCoins.size;

    const { spends, merged } = planCombine(coins, this.puzzle);
    const result = await this.push(spends);
    if (result.error !== null) {
      this.log(`Combine rejected: ${result.error}`);
      return result;
    }

    const credited = result
      .findStandardCoins(this.puzzleHash)
      .filter((coin) => coin.id !== merged.id);
    const expectedBalance = startBalance + sumAmounts(credited);
    if (this.balance() !== expectedBalance) {
      throw new InvariantViolationError(
        "balance",
        expectedBalance.toString(),
        this.balance().toString()
      );
    }
    const expectedCount = startCount - (coins.length - 1) + credited.length;
    if (this.usableCoins.size !== expectedCount) {
      throw new InvariantViolationError(
        "coin count",
        expectedCount.toString(),
        this.usableCoins.size.toString()
      );
    }
    return result;
  }

  /**
   * Spend one coin, either as a value transfer or with a custom solution.
   *
   * @throws InvalidRecipientError if `to` or `remainder` is not a Wallet or Contract
   * @throws InsufficientFundsError if a remainder is requested and `amount`
   *   exceeds the coin
   */
  async spendCoin(coin: ContractCoin, options: SpendOptions = {}): Promise<SpendResult> {
    let solution: Program;
    if (isCustomSolution(options)) {
      solution = options.solution;
    } else {
      const amount = options.amount ?? 1n;
      const target = options.to === undefined ? this.puzzleHash : resolveRecipient(options.to).puzzleHash;
      const conditions: Condition[] = [createCoin(target, amount)];

      if (options.remainder !== undefined) {
        const remainder = resolveRecipient(options.remainder);
        const remaining = coin.amount - amount;
        if (remaining < 0n) {
          throw new InsufficientFundsError(amount, coin.amount, this.name);
        }
        conditions.push(createCoin(remainder.puzzleHash, remaining));
      }
      solution = standardSolution(conditions);
    }

    return this.push([{ coin: coin.asCoin(), puzzle: coin.puzzle, solution }]);
  }

  /**
   * Lock `amount` into a new coin owned by `contract`, with change back to
   * this wallet.
   *
   * @returns The contract's new coin, or null if the ledger rejected the spend
   * @throws InsufficientFundsError if no funding coin can be found
   */
  async launchContract(contract: Contract | Program, amount = 1n): Promise<ContractCoin | null> {
    const target =
      contract instanceof Program ? new Contract(contract, this.host.genesisChallenge) : contract;
    const funding = await this.chooseCoin(amount);

    const conditions: Condition[] = [createCoin(target.puzzleHash(), amount)];
    if (amount < funding.amount) {
      conditions.push(createCoin(this.puzzleHash, funding.amount - amount));
    }

    const result = await this.push([standardCoinSpend(funding.asCoin(), this.puzzle, conditions)]);
    if (result.error !== null) {
      this.log(`Launch rejected: ${result.error}`);
      return null;
    }
    return target.customCoin(funding, amount);
  }

  /**
   * Send `amount` to another wallet as a fresh standard coin.
   *
   * @returns The recipient's new coin, or null if the ledger rejected the spend
   */
  async giveChia(target: Wallet, amount: bigint): Promise<ContractCoin | null> {
    return this.launchContract(new Contract(target.puzzle, this.host.genesisChallenge), amount);
  }

  toString(): string {
    return `Wallet(name=${this.name}, puzzleHash=${this.puzzleHash}, balance=${this.balance()})`;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private signingContext(): SigningContext {
    return {
      keys: this.keys,
      genesisChallenge: this.host.genesisChallenge,
      runPuzzle: (puzzle, solution) => this.host.runPuzzle(puzzle, solution),
    };
  }

  private async push(spends: readonly CoinSpend[]): Promise<SpendResult> {
    const bundle = buildSpendBundle(spends, this.signingContext());
    return new SpendResult(await this.host.pushTx(bundle));
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[Wallet:${this.name}] ${message}`);
    }
  }
}
