/**
 * @summary Custom error classes for wallet and session failures.
 *
 * This file defines a hierarchy of typed errors for precise error handling
 * in spend construction. Each error type carries relevant context for
 * debugging and programmatic error handling.
 *
 * Propagation policy:
 * - Selection and recipient errors are raised: the caller could have
 *   checked for them before calling.
 * - Ledger rejections are normally returned as data (see PushResult);
 *   LedgerRejectedError exists for callers that prefer to throw.
 * - Nothing in this library retries automatically.
 */

// ---------------------------------------------------------------------------
// Base Error
// ---------------------------------------------------------------------------

/**
 * Base class for all coinlab errors.
 *
 * Provides common functionality including error code and optional cause.
 */
export abstract class CoinlabError extends Error {
  /** Machine-readable error code for programmatic handling */
  abstract readonly code: string;

  /** Original error that caused this error, if any */
  override readonly cause?: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;

    // Maintains proper stack trace for where our error was thrown (V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause?.message,
    };
  }
}

// ---------------------------------------------------------------------------
// Insufficient Funds Error
// ---------------------------------------------------------------------------

/**
 * Error thrown when no selection of coins can cover a target amount.
 */
export class InsufficientFundsError extends CoinlabError {
  readonly code = "INSUFFICIENT_FUNDS" as const;

  /** The amount that had to be covered */
  readonly requiredAmount: bigint;

  /** The total value that was available */
  readonly availableAmount: bigint;

  /** Name of the wallet that came up short, if known */
  readonly wallet?: string | undefined;

  constructor(requiredAmount: bigint, availableAmount: bigint, wallet?: string) {
    const who = wallet !== undefined ? ` in wallet ${wallet}` : "";
    super(
      `Insufficient funds${who}: need ${requiredAmount}, have ${availableAmount} ` +
        `(short by ${requiredAmount - availableAmount})`
    );
    this.requiredAmount = requiredAmount;
    this.availableAmount = availableAmount;
    this.wallet = wallet;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      requiredAmount: this.requiredAmount.toString(),
      availableAmount: this.availableAmount.toString(),
      wallet: this.wallet,
    };
  }
}

// ---------------------------------------------------------------------------
// Invalid Recipient Error
// ---------------------------------------------------------------------------

/**
 * Error thrown when a recipient is neither a wallet nor a contract.
 */
export class InvalidRecipientError extends CoinlabError {
  readonly code = "INVALID_RECIPIENT" as const;

  /** Description of the value that was received */
  readonly received: string;

  constructor(received: string) {
    super(`Recipient must be a Wallet or a Contract, got ${received}`);
    this.received = received;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      received: this.received,
    };
  }
}

// ---------------------------------------------------------------------------
// Ledger Rejected Error
// ---------------------------------------------------------------------------

/**
 * Error form of a ledger rejection.
 */
export class LedgerRejectedError extends CoinlabError {
  readonly code = "LEDGER_REJECTED" as const;

  /** The ledger's rejection reason */
  readonly reason: string;

  /** Operation that submitted the rejected bundle */
  readonly operation?: string | undefined;

  constructor(reason: string, operation?: string) {
    const op = operation !== undefined ? `${operation} ` : "";
    super(`Ledger rejected ${op}transaction: ${reason}`);
    this.reason = reason;
    this.operation = operation;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reason: this.reason,
      operation: this.operation,
    };
  }
}

// ---------------------------------------------------------------------------
// Invariant Violation Error
// ---------------------------------------------------------------------------

/**
 * Error thrown when wallet state after a commit disagrees with what the
 * committed transaction must have done.
 */
export class InvariantViolationError extends CoinlabError {
  readonly code = "INVARIANT_VIOLATION" as const;

  /** Name of the violated invariant */
  readonly invariant: string;

  readonly expected: string;

  readonly actual: string;

  constructor(invariant: string, expected: string, actual: string) {
    super(`Invariant "${invariant}" violated: expected ${expected}, got ${actual}`);
    this.invariant = invariant;
    this.expected = expected;
    this.actual = actual;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      invariant: this.invariant,
      expected: this.expected,
      actual: this.actual,
    };
  }
}

// ---------------------------------------------------------------------------
// Session Closed Error
// ---------------------------------------------------------------------------

/**
 * Error thrown when a closed session is used.
 */
export class SessionClosedError extends CoinlabError {
  readonly code = "SESSION_CLOSED" as const;

  /** The operation that was attempted */
  readonly operation: string;

  constructor(operation: string) {
    super(`Cannot ${operation}: session is closed`);
    this.operation = operation;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
    };
  }
}

// ---------------------------------------------------------------------------
// Configuration Error
// ---------------------------------------------------------------------------

/**
 * Validation error for session or ledger configuration.
 */
export class ConfigurationError extends CoinlabError {
  readonly code = "CONFIGURATION_ERROR" as const;
}

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

/**
 * Type guard to check if an error is a CoinlabError.
 */
export function isCoinlabError(error: unknown): error is CoinlabError {
  return error instanceof CoinlabError;
}

/**
 * Type guard to check if an error is an InsufficientFundsError.
 */
export function isInsufficientFundsError(
  error: unknown
): error is InsufficientFundsError {
  return error instanceof InsufficientFundsError;
}

/**
 * Type guard to check if an error is a LedgerRejectedError.
 */
export function isLedgerRejectedError(
  error: unknown
): error is LedgerRejectedError {
  return error instanceof LedgerRejectedError;
}
