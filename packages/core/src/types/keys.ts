/**
 * @summary Key management boundary.
 *
 * The wallet treats keys as opaque handles: a public key it can compare and
 * publish, and a secret key it hands to the signing primitive. How keys are
 * derived is the key service's business.
 */

/**
 * A BLS key pair.
 */
export interface KeyPair {
  /** Hex-encoded compressed G1 public key (48 bytes) */
  readonly publicKey: string;

  /** 32-byte secret scalar */
  readonly secretKey: Uint8Array;
}

/**
 * Maps an index to a key pair. Deriving the same index twice must return
 * the same keys.
 */
export interface KeyService {
  derive(index: number): KeyPair;
}
