/**
 * @summary Integration tests for wallet operations against the simulator.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  Contract,
  InsufficientFundsError,
  InvalidRecipientError,
  LedgerRejectedError,
  aggSigUnsafe,
  anyoneCanSpendPuzzle,
  conditionsSolution,
  createCoin,
  fixedConditionsPuzzle,
} from "@coinlab/core";
import { Network } from "../network.js";
import { resolveRecipient, Wallet } from "../wallet.js";
import { setupNetwork } from "../testing.js";

// ---------------------------------------------------------------------------
// Test Fixtures
// ---------------------------------------------------------------------------

/** Every farmed block pays a single coin of this amount */
const REWARD = 10n;

const config = { simulator: { poolReward: REWARD, farmerReward: 0n } };

const amountsOf = (wallet: Wallet): bigint[] =>
  wallet
    .coins()
    .map((c) => c.amount)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

const totalHeld = (net: Network): bigint =>
  net.wallets().reduce((sum, wallet) => sum + wallet.balance(), 0n);

let network: Network;
let alice: Wallet;
let bob: Wallet;

beforeEach(async () => {
  ({ network, alice, bob } = await setupNetwork(config));
});

afterEach(async () => {
  await network.close();
});

// ---------------------------------------------------------------------------
// Setup Tests
// ---------------------------------------------------------------------------

describe("setupNetwork", () => {
  it("funds alice and bob with one reward each", () => {
    expect(alice.balance()).toBe(REWARD);
    expect(bob.balance()).toBe(REWARD);
    expect(network.height).toBe(2);
  });

  it("gives each wallet its own puzzle", () => {
    expect(alice.puzzleHash).not.toBe(bob.puzzleHash);
    expect(network.wallets().map((w) => w.name)).toEqual(["nobody", "alice", "bob"]);
  });
});

// ---------------------------------------------------------------------------
// chooseCoin Tests
// ---------------------------------------------------------------------------

describe("chooseCoin", () => {
  it("returns a single large enough coin without a transaction", async () => {
    const height = network.height;

    const coin = await alice.chooseCoin(4n);

    expect(coin.amount).toBe(10n);
    expect(coin.puzzleHash).toBe(alice.puzzleHash);
    expect(network.height).toBe(height);
  });

  it("picks the large coin over a small one", async () => {
    const [start] = alice.coins();
    if (start === undefined) throw new Error("alice has no coin");

    // Split the 10 into 4 and 6
    await alice
      .spendCoin(alice.spendableCoin(start), { amount: 4n, to: alice, remainder: alice })
      .then((r) => r.orThrow());
    expect(amountsOf(alice)).toEqual([4n, 6n]);

    const coin = await alice.chooseCoin(5n);
    expect(coin.amount).toBe(6n);
    expect(alice.coinCount).toBe(2);
  });

  it("combines coins when none is large enough", async () => {
    await network.farmBlock(alice);
    await network.farmBlock(alice);
    expect(amountsOf(alice)).toEqual([10n, 10n, 10n]);
    const height = network.height;

    const coin = await alice.chooseCoin(25n);

    expect(coin.amount).toBe(30n);
    expect(alice.coins()).toHaveLength(1);
    expect(alice.balance()).toBe(30n);
    expect(network.height).toBe(height + 1);
  });

  it("throws InsufficientFundsError when the balance is too low", async () => {
    await expect(alice.chooseCoin(11n)).rejects.toThrow(InsufficientFundsError);
    await expect(alice.chooseCoin(11n)).rejects.toThrow(
      "Insufficient funds in wallet alice: need 11, have 10 (short by 1)"
    );
  });
});

// ---------------------------------------------------------------------------
// combineCoins Tests
// ---------------------------------------------------------------------------

describe("combineCoins", () => {
  it("merges coins into one of the same total", async () => {
    await network.farmBlock(alice);
    const coins = alice.coins();

    const result = await alice.combineCoins(coins);

    expect(result.ok).toBe(true);
    expect(result.removals).toHaveLength(2);
    expect(result.findStandardCoins(alice.puzzleHash).map((c) => c.amount)).toEqual([20n]);
    expect(amountsOf(alice)).toEqual([20n]);
  });

  it("consumes nothing when one input is already spent", async () => {
    await network.farmBlock(alice);
    await network.farmBlock(alice);
    const coins = alice.coins();
    const [first] = coins;
    if (first === undefined) throw new Error("alice has no coin");

    await alice.spendCoin(alice.spendableCoin(first), { amount: 10n, to: bob }).then((r) => r.orThrow());
    const height = network.height;

    const result = await alice.combineCoins(coins);

    expect(result.error).toBe("DOUBLE_SPEND");
    expect(amountsOf(alice)).toEqual([10n, 10n]);
    expect(network.height).toBe(height);
  });

  it("consumes nothing when the announcing input is already spent", async () => {
    await network.farmBlock(alice);
    await network.farmBlock(alice);
    const coins = alice.coins();
    const last = coins[coins.length - 1];
    if (last === undefined) throw new Error("alice has no coin");

    await alice.spendCoin(alice.spendableCoin(last), { amount: 10n, to: bob }).then((r) => r.orThrow());
    const untouched = coins.slice(0, -1).map((c) => c.id).sort();
    const height = network.height;

    const result = await alice.combineCoins(coins);

    expect(result.error).toBe("DOUBLE_SPEND");
    expect(alice.coins().map((c) => c.id).sort()).toEqual(untouched);
    expect(network.height).toBe(height);
  });

  it("counts the block reward when the farming wallet combines", async () => {
    const fresh = await Network.create(config);
    try {
      await fresh.farmBlock();
      await fresh.farmBlock();
      const { nobody } = fresh;
      expect(amountsOf(nobody)).toEqual([10n, 10n]);

      const result = await nobody.combineCoins(nobody.coins());

      expect(result.ok).toBe(true);
      // Merged 20 plus the 10 reward for the combining block
      expect(amountsOf(nobody)).toEqual([10n, 20n]);
    } finally {
      await fresh.close();
    }
  });
});

// ---------------------------------------------------------------------------
// spendCoin Tests
// ---------------------------------------------------------------------------

describe("spendCoin", () => {
  it("sends one unit to itself by default", async () => {
    const [coin] = alice.coins();
    if (coin === undefined) throw new Error("alice has no coin");

    const result = await alice.spendCoin(alice.spendableCoin(coin));

    expect(result.ok).toBe(true);
    // The other 9 are left as fee
    expect(amountsOf(alice)).toEqual([1n]);
  });

  it("pays a wallet and returns the remainder", async () => {
    const [coin] = alice.coins();
    if (coin === undefined) throw new Error("alice has no coin");

    const result = await alice.spendCoin(alice.spendableCoin(coin), {
      amount: 3n,
      to: bob,
      remainder: alice,
    });

    expect(result.findStandardCoins(bob.puzzleHash).map((c) => c.amount)).toEqual([3n]);
    expect(alice.balance()).toBe(7n);
    expect(bob.balance()).toBe(13n);
  });

  it("rejects a spent coin and leaves balances unchanged", async () => {
    const [coin] = alice.coins();
    if (coin === undefined) throw new Error("alice has no coin");
    const spendable = alice.spendableCoin(coin);
    await alice.spendCoin(spendable, { amount: 10n, to: bob }).then((r) => r.orThrow());

    const again = await alice.spendCoin(spendable, { amount: 10n, to: bob });

    expect(again.error).toBe("DOUBLE_SPEND");
    expect(alice.balance()).toBe(0n);
    expect(bob.balance()).toBe(20n);
  });

  it("throws when the remainder would be negative", async () => {
    const [coin] = alice.coins();
    if (coin === undefined) throw new Error("alice has no coin");

    await expect(
      alice.spendCoin(alice.spendableCoin(coin), { amount: 11n, to: bob, remainder: alice })
    ).rejects.toThrow(InsufficientFundsError);
  });

  it("commits a contract spend that demands the owner's unsafe signature", async () => {
    const message = "cd".repeat(32);
    const puzzle = fixedConditionsPuzzle([
      aggSigUnsafe(alice.publicKey, message),
      createCoin(bob.puzzleHash, 4n),
    ]);
    const launched = await alice.launchContract(puzzle, 4n);
    if (launched === null) throw new Error("launch rejected");

    const result = await alice.spendCoin(launched, { solution: conditionsSolution([]) });

    expect(result.ok).toBe(true);
    expect(bob.balance()).toBe(14n);
  });

  it("rejects the same spend signed by another wallet", async () => {
    const puzzle = fixedConditionsPuzzle([
      aggSigUnsafe(alice.publicKey, "cd".repeat(32)),
      createCoin(bob.puzzleHash, 4n),
    ]);
    const launched = await alice.launchContract(puzzle, 4n);
    if (launched === null) throw new Error("launch rejected");
    const height = network.height;

    const result = await bob.spendCoin(launched, { solution: conditionsSolution([]) });

    expect(result.error).toBe("BAD_AGGREGATE_SIGNATURE");
    expect(bob.balance()).toBe(10n);
    expect(network.height).toBe(height);
  });

  it("spends a contract coin with a custom solution", async () => {
    const contract = new Contract(anyoneCanSpendPuzzle(), network.genesisChallenge);
    const launched = await alice.launchContract(contract, 4n);
    if (launched === null) throw new Error("launch rejected");

    const result = await alice.spendCoin(launched, {
      solution: conditionsSolution([createCoin(bob.puzzleHash, 4n)]),
    });

    expect(result.ok).toBe(true);
    expect(bob.balance()).toBe(14n);
  });
});

// ---------------------------------------------------------------------------
// launchContract / giveChia Tests
// ---------------------------------------------------------------------------

describe("launchContract", () => {
  it("returns the contract coin and keeps the change", async () => {
    const puzzle = anyoneCanSpendPuzzle();

    const launched = await alice.launchContract(puzzle, 1n);

    expect(launched?.amount).toBe(1n);
    expect(launched?.puzzleHash).toBe(puzzle.hash());
    expect(launched?.puzzle.equals(puzzle)).toBe(true);
    expect(amountsOf(alice)).toEqual([9n]);
  });

  it("sends no change when the funding coin matches exactly", async () => {
    const launched = await alice.launchContract(anyoneCanSpendPuzzle(), 10n);

    expect(launched?.amount).toBe(10n);
    expect(alice.coinCount).toBe(0);
  });

  it("throws when the wallet cannot fund the launch", async () => {
    await expect(alice.launchContract(anyoneCanSpendPuzzle(), 50n)).rejects.toThrow(
      InsufficientFundsError
    );
  });
});

describe("launchContract from a single 5-unit coin", () => {
  it("leaves a change coin of 4", async () => {
    const { network: small, alice: funder } = await setupNetwork({
      simulator: { poolReward: 5n, farmerReward: 0n },
    });
    try {
      const launched = await funder.launchContract(anyoneCanSpendPuzzle(), 1n);

      expect(launched?.amount).toBe(1n);
      expect(amountsOf(funder)).toEqual([4n]);
    } finally {
      await small.close();
    }
  });
});

describe("giveChia", () => {
  it("moves value between wallets", async () => {
    const given = await alice.giveChia(bob, 3n);

    expect(given?.amount).toBe(3n);
    expect(given?.puzzleHash).toBe(bob.puzzleHash);
    expect(alice.balance()).toBe(7n);
    expect(bob.balance()).toBe(13n);
  });

  it("combines first when needed", async () => {
    await network.farmBlock(alice);

    await alice.giveChia(bob, 15n);

    expect(alice.balance()).toBe(5n);
    expect(bob.balance()).toBe(25n);
  });
});

describe("giveChia from the farming wallet", () => {
  it("combines its reward coins and pays out", async () => {
    const fresh = await Network.create(config);
    try {
      await fresh.farmBlock();
      await fresh.farmBlock();
      const { nobody } = fresh;
      const carol = fresh.makeWallet("carol");

      const given = await nobody.giveChia(carol, 15n);

      expect(given?.amount).toBe(15n);
      expect(carol.balance()).toBe(15n);
      // 20 merged, +10 reward, 15 sent with 5 change, +10 reward
      expect(nobody.balance()).toBe(25n);
    } finally {
      await fresh.close();
    }
  });
});

// ---------------------------------------------------------------------------
// Value Conservation
// ---------------------------------------------------------------------------

describe("value conservation", () => {
  it("moves fees to the farmer without creating value", async () => {
    const [coin] = alice.coins();
    if (coin === undefined) throw new Error("alice has no coin");

    await alice.spendCoin(alice.spendableCoin(coin), { amount: 3n, to: bob }).then((r) => r.orThrow());

    expect(alice.balance()).toBe(0n);
    expect(bob.balance()).toBe(13n);
    // Pool reward 10 plus the 7 left as fee
    expect(network.nobody.balance()).toBe(17n);
    expect(totalHeld(network)).toBe(REWARD * BigInt(network.height));
  });

  it("holds across combines and launches", async () => {
    await network.farmBlock(alice);
    await network.farmBlock(alice);

    await alice.giveChia(bob, 25n);
    await alice.launchContract(anyoneCanSpendPuzzle(), 2n);

    expect(alice.balance()).toBe(3n);
    expect(bob.balance()).toBe(35n);
    // Everything minted is held by a wallet except the 2 locked in the contract
    expect(totalHeld(network)).toBe(REWARD * BigInt(network.height) - 2n);
  });
});

// ---------------------------------------------------------------------------
// resolveRecipient Tests
// ---------------------------------------------------------------------------

describe("resolveRecipient", () => {
  it("resolves a wallet to its standard puzzle hash", () => {
    expect(resolveRecipient(bob)).toEqual({
      kind: "actor",
      wallet: bob,
      puzzleHash: bob.puzzleHash,
    });
  });

  it("resolves a contract to its puzzle hash", () => {
    const contract = new Contract(anyoneCanSpendPuzzle());
    const recipient = resolveRecipient(contract);

    expect(recipient.kind).toBe("contract");
    expect(recipient.puzzleHash).toBe(anyoneCanSpendPuzzle().hash());
  });

  it("rejects anything else", () => {
    expect(() => resolveRecipient("bob")).toThrow(InvalidRecipientError);
    expect(() => resolveRecipient("bob")).toThrow(
      "Recipient must be a Wallet or a Contract, got string"
    );
    expect(() => resolveRecipient(null)).toThrow("got null");
  });
});

// ---------------------------------------------------------------------------
// Error Surface
// ---------------------------------------------------------------------------

describe("rejected combines inside chooseCoin", () => {
  it("surface as LedgerRejectedError", async () => {
    await network.farmBlock(alice);
    const [coin] = alice.coins();
    if (coin === undefined) throw new Error("alice has no coin");

    // Put the spent coin back into the wallet's view
    const stale = alice.coins();
    await alice.spendCoin(alice.spendableCoin(coin), { amount: 10n, to: bob }).then((r) => r.orThrow());
    alice.replaceCoins(stale);

    await expect(alice.chooseCoin(15n)).rejects.toThrow(LedgerRejectedError);
  });
});
