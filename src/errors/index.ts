/**
 * Typed error hierarchy for the flash loan kit.
 *
 * Every error carries a machine-readable code. None of them is retried:
 * a flash loan either settles completely inside one transaction or the
 * transaction reverts.
 */

export class FlashKitError extends Error {
  readonly code: string;

  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'FlashKitError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedNetworkError extends FlashKitError {
  constructor(network: string) {
    super('UNSUPPORTED_NETWORK', `No configuration registered for network ${network}`, { network });
    this.name = 'UnsupportedNetworkError';
  }
}

export class PoolNotFoundError extends FlashKitError {
  constructor(tokenA: string, tokenB: string) {
    super('POOL_NOT_FOUND', `Pool not found for tokens ${tokenA} / ${tokenB}`, { tokenA, tokenB });
    this.name = 'PoolNotFoundError';
  }
}

/**
 * Callback selector or initiator does not match a flash loan issued by us.
 */
export class InvalidCallbackError extends FlashKitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_CALLBACK', message, details);
    this.name = 'InvalidCallbackError';
  }
}

export class MalformedPayloadError extends FlashKitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MALFORMED_PAYLOAD', message, details);
    this.name = 'MalformedPayloadError';
  }
}

export class ArithmeticOverflowError extends FlashKitError {
  constructor(operation: string, left: bigint, right: bigint) {
    super('ARITHMETIC_OVERFLOW', `uint256 overflow in ${operation}`, {
      operation,
      left: left.toString(),
      right: right.toString(),
    });
    this.name = 'ArithmeticOverflowError';
  }
}

/**
 * The callback came from an address other than the pool the loan was taken from.
 */
export class PoolMismatchError extends FlashKitError {
  constructor(expected: string, actual: string) {
    super('POOL_MISMATCH', `Callback sender ${actual} is not the borrowed pool ${expected}`, { expected, actual });
    this.name = 'PoolMismatchError';
  }
}

export class AssetNotInPoolError extends FlashKitError {
  constructor(pool: string, asset: string) {
    super('ASSET_NOT_IN_POOL', `Asset ${asset} is not held by pool ${pool}`, { pool, asset });
    this.name = 'AssetNotInPoolError';
  }
}

export class SettlementError extends FlashKitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SETTLEMENT_FAILED', message, details);
    this.name = 'SettlementError';
  }
}

export class InsufficientLiquidityError extends FlashKitError {
  constructor(pool: string, requested: bigint, reserve: bigint) {
    super('INSUFFICIENT_LIQUIDITY', `Pool ${pool} cannot lend ${requested} (reserve ${reserve})`, {
      pool,
      requested: requested.toString(),
      reserve: reserve.toString(),
    });
    this.name = 'InsufficientLiquidityError';
  }
}

export class TransactionError extends FlashKitError {
  readonly txHash?: string;

  constructor(message: string, txHash?: string, details?: Record<string, unknown>) {
    super('TRANSACTION_FAILED', message, details);
    this.name = 'TransactionError';
    this.txHash = txHash;
  }
}

export class ValidationError extends FlashKitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

export const errorMessage = (error: unknown): string => (
  error instanceof Error ? error.message : String(error)
);
