/**
 * @summary Network parameters: address prefixes and genesis challenges.
 *
 * The genesis challenge is the domain parameter mixed into every AGG_SIG_ME
 * message, so a signature made for one network can never be replayed on
 * another. The address prefix only affects how puzzle hashes are rendered.
 *
 * Used by:
 * - Contract construction (the challenge a contract targets)
 * - Simulator defaults
 * - CLI address encoding
 */

import { sha256Hex, utf8ToBytes } from "./utils/hash.js";

// ---------------------------------------------------------------------------
// Network Constants
// ---------------------------------------------------------------------------

/**
 * Parameters describing one coin network.
 */
export interface NetworkParameters {
  /** bech32m human-readable prefix */
  addressPrefix: string;

  /** 32-byte genesis challenge (hex), appended to AGG_SIG_ME messages */
  genesisChallenge: string;
}

/**
 * Genesis challenge used by the in-process simulator.
 */
export const SIMULATOR_GENESIS_CHALLENGE = sha256Hex(
  utf8ToBytes("coinlab:simulator:genesis")
);

/**
 * Known networks by name.
 */
export const NETWORKS = {
  mainnet: {
    addressPrefix: "xch",
    genesisChallenge:
      "ccd5bb71183532bff220ba46c268991a3ff07eb358e8255a65c30a2dce0e5fbb",
  },
  simulator: {
    addressPrefix: "txch",
    genesisChallenge: SIMULATOR_GENESIS_CHALLENGE,
  },
} as const satisfies Record<string, NetworkParameters>;

/**
 * Type for known network names.
 */
export type NetworkName = keyof typeof NETWORKS;

/**
 * Genesis challenge used when none is specified.
 */
export const DEFAULT_GENESIS_CHALLENGE: string = NETWORKS.simulator.genesisChallenge;

// ---------------------------------------------------------------------------
// Lookup Functions
// ---------------------------------------------------------------------------

/**
 * Check whether a string names a known network.
 */
export function isNetworkName(name: string): name is NetworkName {
  return Object.prototype.hasOwnProperty.call(NETWORKS, name);
}

/**
 * Get the parameters of a known network.
 *
 * @throws Error if the name is not recognized
 *
 * @example
 * getNetwork("mainnet").addressPrefix // "xch"
 */
export function getNetwork(name: string): NetworkParameters {
  if (!isNetworkName(name)) {
    throw new Error(
      `Unknown network: ${name}. Known networks: ${Object.keys(NETWORKS).join(", ")}`
    );
  }
  return NETWORKS[name];
}
