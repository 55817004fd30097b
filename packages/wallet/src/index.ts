/**
 * @summary Main entry point for @coinlab/wallet package.
 *
 * Wallet actors, coin selection, the atomic combine protocol and the
 * Network session that drives a ledger.
 *
 * Usage:
 * ```typescript
 * import { setupNetwork } from "@coinlab/wallet";
 *
 * const { network, alice, bob } = await setupNetwork();
 * try {
 *   await alice.giveChia(bob, 1000n);
 * } finally {
 *   await network.close();
 * }
 * ```
 */

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export { Network, withNetwork } from "./network.js";

export type { SkipTimeOptions } from "./network.js";

export type { NetworkConfig } from "./config.js";

export { DEFAULT_NETWORK_CONFIG, validateNetworkConfig, mergeNetworkConfig } from "./config.js";

export type { DurationInput } from "./duration.js";

export { durationToSeconds } from "./duration.js";

// ---------------------------------------------------------------------------
// Wallet
// ---------------------------------------------------------------------------

export { Wallet, resolveRecipient } from "./wallet.js";

export type {
  WalletHost,
  Recipient,
  SpendOptions,
  TransferOptions,
  CustomSolutionOptions,
} from "./wallet.js";

export { SpendResult } from "./spend-result.js";

// ---------------------------------------------------------------------------
// Spend Construction
// ---------------------------------------------------------------------------

export type { CoinSelection } from "./coin-selector.js";

export { CoinSelector, selectCoins } from "./coin-selector.js";

export type { CombinePlan } from "./combine.js";

export { planCombine, predictMergedCoin } from "./combine.js";

export type { SigningContext } from "./spend-builder.js";

export {
  aggSigMeMessage,
  standardCoinSpend,
  signCoinSpends,
  buildSpendBundle,
} from "./spend-builder.js";

// ---------------------------------------------------------------------------
// Test Fixtures
// ---------------------------------------------------------------------------

export type { TestNetwork } from "./testing.js";

export { setupNetwork } from "./testing.js";
