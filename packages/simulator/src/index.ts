/**
 * @summary Main entry point for @coinlab/simulator package.
 *
 * An in-process LedgerService: coin store, mempool, puzzle evaluation,
 * condition and signature checks, block rewards and a ledger clock. Tests
 * and the wallet's Network session run against it with no external process.
 *
 * Usage:
 * ```typescript
 * import { SpendSimulator } from "@coinlab/simulator";
 *
 * const ledger = new SpendSimulator({ blockTimeSeconds: 10 });
 * ```
 */

export { SpendSimulator } from "./spend-simulator.js";

export type { SimulatorConfig, ResolvedSimulatorConfig } from "./config.js";

export {
  DEFAULT_SIMULATOR_CONFIG,
  validateSimulatorConfig,
  mergeSimulatorConfig,
} from "./config.js";

export type { RejectionCodeValue } from "./errors.js";

export { RejectionCode, SpendValidationError, isSpendValidationError } from "./errors.js";

export { MAX_PUZZLE_DEPTH, evaluatePuzzle } from "./evaluator.js";

export type { ValidationContext, BundleEffects } from "./validation.js";

export { validateBundle } from "./validation.js";

export { CoinStore } from "./coin-store.js";

export { createRewardCoins, poolParentId, farmerParentId } from "./rewards.js";
