/**
 * @summary Fixtures for tests that need funded wallets.
 */

import { Network } from "./network.js";
import type { NetworkConfig } from "./config.js";
import type { Wallet } from "./wallet.js";

export interface TestNetwork {
  network: Network;
  alice: Wallet;
  bob: Wallet;
}

/**
 * Create a session with two wallets, `alice` and `bob`, and farm one block
 * to each so both start with the block reward.
 *
 * The caller closes the returned network.
 */
export async function setupNetwork(config: NetworkConfig = {}): Promise<TestNetwork> {
  const network = await Network.create(config);
  try {
    const alice = network.makeWallet("alice");
    const bob = network.makeWallet("bob");
    await network.farmBlock(alice);
    await network.farmBlock(bob);
    return { network, alice, bob };
  } catch (error) {
    await network.close();
    throw error;
  }
}
