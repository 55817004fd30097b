/**
 * @summary Configuration types and defaults for the spend simulator.
 *
 * The simulator is a single in-process ledger: it needs a genesis challenge
 * to check AGG_SIG_ME messages against, a clock, and the block reward it
 * pays out. Everything has a default so `new SpendSimulator()` just works.
 *
 * Used by:
 * - SpendSimulator construction
 * - Network configuration in @coinlab/wallet
 */

import {
  ConfigurationError,
  DEFAULT_GENESIS_CHALLENGE,
  MAX_COIN_AMOUNT,
  isValidHex,
} from "@coinlab/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Configuration options for the spend simulator.
 */
export interface SimulatorConfig {
  /**
   * Genesis challenge mixed into AGG_SIG_ME messages.
   * @default the simulator network's challenge
   */
  genesisChallenge?: string;

  /**
   * Ledger time (unix seconds) before the first block.
   * @default 1620061201
   */
  startTimestamp?: number;

  /**
   * Seconds of ledger time each block advances.
   * @default 20
   */
  blockTimeSeconds?: number;

  /**
   * Pool share of the block reward.
   * A zero reward creates no coin.
   * @default 1_750_000_000_000n
   */
  poolReward?: bigint;

  /**
   * Farmer share of the block reward, before fees.
   * @default 250_000_000_000n
   */
  farmerReward?: bigint;

  /**
   * Enable debug logging.
   * @default false
   */
  debug?: boolean;
}

/**
 * Simulator configuration with every default applied.
 */
export type ResolvedSimulatorConfig = Required<SimulatorConfig>;

// ---------------------------------------------------------------------------
// Default Configuration
// ---------------------------------------------------------------------------

export const DEFAULT_SIMULATOR_CONFIG: ResolvedSimulatorConfig = {
  genesisChallenge: DEFAULT_GENESIS_CHALLENGE,
  startTimestamp: 1620061201,
  blockTimeSeconds: 20,
  poolReward: 1_750_000_000_000n,
  farmerReward: 250_000_000_000n,
  debug: false,
};

// ---------------------------------------------------------------------------
// Configuration Validation
// ---------------------------------------------------------------------------

/**
 * Validate simulator configuration.
 *
 * @throws ConfigurationError if a value is out of range
 */
export function validateSimulatorConfig(config: SimulatorConfig): void {
  if (config.genesisChallenge !== undefined && !isValidHex(config.genesisChallenge, 32)) {
    throw new ConfigurationError(
      `Invalid genesisChallenge: expected 32 bytes of hex, got "${config.genesisChallenge}"`
    );
  }

  if (config.startTimestamp !== undefined) {
    if (!Number.isSafeInteger(config.startTimestamp) || config.startTimestamp < 0) {
      throw new ConfigurationError(`Invalid startTimestamp: ${config.startTimestamp}`);
    }
  }

  if (config.blockTimeSeconds !== undefined) {
    if (!Number.isSafeInteger(config.blockTimeSeconds) || config.blockTimeSeconds < 1) {
      throw new ConfigurationError(`Invalid blockTimeSeconds: ${config.blockTimeSeconds}`);
    }
  }

  for (const [name, reward] of [
    ["poolReward", config.poolReward],
    ["farmerReward", config.farmerReward],
  ] as const) {
    if (reward !== undefined && (reward < 0n || reward > MAX_COIN_AMOUNT)) {
      throw new ConfigurationError(`Invalid ${name}: ${reward}`);
    }
  }
}

/**
 * Merge user configuration with defaults.
 *
 * @returns Complete configuration with defaults applied
 */
export function mergeSimulatorConfig(config: SimulatorConfig = {}): ResolvedSimulatorConfig {
  const genesisChallenge = config.genesisChallenge ?? DEFAULT_SIMULATOR_CONFIG.genesisChallenge;
  return {
    genesisChallenge: genesisChallenge.replace(/^0x/, "").toLowerCase(),
    startTimestamp: config.startTimestamp ?? DEFAULT_SIMULATOR_CONFIG.startTimestamp,
    blockTimeSeconds: config.blockTimeSeconds ?? DEFAULT_SIMULATOR_CONFIG.blockTimeSeconds,
    poolReward: config.poolReward ?? DEFAULT_SIMULATOR_CONFIG.poolReward,
    farmerReward: config.farmerReward ?? DEFAULT_SIMULATOR_CONFIG.farmerReward,
    debug: config.debug ?? DEFAULT_SIMULATOR_CONFIG.debug,
  };
}
