/**
 * @summary Coin spend construction and signing.
 *
 * Signing does not assume anything about a puzzle. Each spend is run
 * through the ledger's evaluator, and every AGG_SIG_ME / AGG_SIG_UNSAFE
 * condition naming the signer's key is signed. This covers standard coins
 * and contract coins whose custom solutions demand the wallet's signature.
 */

import {
  ConditionOpcode,
  concatBytes,
  createSpendBundle,
  hexToBytes,
  sign,
  standardSolution,
  type Coin,
  type CoinSpend,
  type Condition,
  type KeyPair,
  type Program,
  type SpendBundle,
} from "@coinlab/core";

/**
 * What signing needs from the wallet and its session.
 */
export interface SigningContext {
  keys: KeyPair;
  genesisChallenge: string;
  runPuzzle(puzzle: Program, solution: Program): Condition[];
}

/**
 * The bytes an AGG_SIG_ME condition requires signed:
 * `message || coinId || genesisChallenge`.
 */
export function aggSigMeMessage(message: string, coinId: string, genesisChallenge: string): Uint8Array {
  return concatBytes(hexToBytes(message), hexToBytes(coinId), hexToBytes(genesisChallenge));
}

/**
 * A spend of a standard coin emitting `conditions`.
 */
export function standardCoinSpend(
  coin: Coin,
  puzzle: Program,
  conditions: readonly Condition[]
): CoinSpend {
  return { coin, puzzle, solution: standardSolution(conditions) };
}

/**
 * Sign every signature requirement the spends place on `context.keys`.
 *
 * @throws If a puzzle fails to evaluate
 */
export function signCoinSpends(spends: readonly CoinSpend[], context: SigningContext): string[] {
  const { keys } = context;
  const signatures: string[] = [];

  for (const spend of spends) {
    for (const condition of context.runPuzzle(spend.puzzle, spend.solution)) {
      if (condition.opcode === ConditionOpcode.AGG_SIG_ME && condition.publicKey === keys.publicKey) {
        signatures.push(
          sign(
            keys.secretKey,
            aggSigMeMessage(condition.message, spend.coin.id, context.genesisChallenge)
          )
        );
      } else if (
        condition.opcode === ConditionOpcode.AGG_SIG_UNSAFE &&
        condition.publicKey === keys.publicKey
      ) {
        signatures.push(sign(keys.secretKey, hexToBytes(condition.message)));
      }
    }
  }

  return signatures;
}

/**
 * Sign spends and bundle them under one aggregate signature.
 */
export function buildSpendBundle(spends: readonly CoinSpend[], context: SigningContext): SpendBundle {
  return createSpendBundle(spends, signCoinSpends(spends, context));
}
