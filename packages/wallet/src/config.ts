/**
 * @summary Configuration types and defaults for a Network session.
 *
 * A session needs a ledger and a key service. By default it builds its own
 * SpendSimulator and a DeterministicKeychain; either can be injected
 * instead, for example to share a ledger with other tooling.
 *
 * Used by:
 * - Network.create
 * - setupNetwork / withNetwork
 */

import {
  ConfigurationError,
  DEFAULT_KEYCHAIN_SEED,
  type KeyService,
  type LedgerService,
} from "@coinlab/core";
import type { SimulatorConfig } from "@coinlab/simulator";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Configuration options for a Network session.
 */
export interface NetworkConfig {
  /**
   * Options for the session's own SpendSimulator.
   * Ignored when `ledger` is given, so the two may not be combined.
   */
  simulator?: SimulatorConfig;

  /**
   * Ledger to run against instead of a new SpendSimulator.
   * The session takes ownership and closes it on close().
   */
  ledger?: LedgerService;

  /**
   * Key service to derive wallet keys from.
   * May not be combined with `keychainSeed`.
   */
  keys?: KeyService;

  /**
   * Seed for the default DeterministicKeychain.
   * @default "coinlab:simulation-keys"
   */
  keychainSeed?: string;

  /**
   * Enable debug logging.
   * @default false
   */
  debug?: boolean;
}

// ---------------------------------------------------------------------------
// Default Configuration
// ---------------------------------------------------------------------------

export const DEFAULT_NETWORK_CONFIG = {
  keychainSeed: DEFAULT_KEYCHAIN_SEED,
  debug: false,
} as const satisfies Partial<NetworkConfig>;

// ---------------------------------------------------------------------------
// Configuration Validation
// ---------------------------------------------------------------------------

/**
 * Validate session configuration.
 *
 * Simulator options are validated by the simulator itself.
 *
 * @throws ConfigurationError if options conflict or are empty
 */
export function validateNetworkConfig(config: NetworkConfig): void {
  if (config.ledger !== undefined && config.simulator !== undefined) {
    throw new ConfigurationError("ledger and simulator options are mutually exclusive");
  }

  if (config.keys !== undefined && config.keychainSeed !== undefined) {
    throw new ConfigurationError("keys and keychainSeed options are mutually exclusive");
  }

  if (config.keychainSeed !== undefined && config.keychainSeed.length === 0) {
    throw new ConfigurationError("keychainSeed must not be empty");
  }
}

/**
 * Merge user configuration with defaults.
 */
export function mergeNetworkConfig(
  config: NetworkConfig = {}
): NetworkConfig & { keychainSeed: string; debug: boolean } {
  return {
    ...config,
    keychainSeed: config.keychainSeed ?? DEFAULT_NETWORK_CONFIG.keychainSeed,
    debug: config.debug ?? DEFAULT_NETWORK_CONFIG.debug,
  };
}
