/**
 * Engine error taxonomy.
 *
 * Every failed entry point throws exactly one EngineError. The category tells
 * callers (and the HTTP layer) what kind of failure it was; the code names the
 * specific rule that rejected the call.
 */

export type EngineErrorCategory =
  | 'validation'
  | 'invariant'
  | 'oracle'
  | 'transfer'
  | 'liquidation'
  | 'reentrancy'
  | 'rollback';

export type EngineErrorCode =
  | 'AmountMustBeMoreThanZero'
  | 'NotAllowedToken'
  | 'ConfigLengthMismatch'
  | 'DuplicateCollateral'
  | 'InsufficientBalance'
  | 'BreaksHealthFactor'
  | 'InvalidPrice'
  | 'StalePrice'
  | 'TransferFailed'
  | 'MintFailed'
  | 'HealthFactorOk'
  | 'InsufficientCollateral'
  | 'Reentrancy'
  | 'RollbackFailed';

export type ErrorDetails = Record<string, string | number | bigint | boolean | undefined>;

export class EngineError extends Error {
  constructor(
    public readonly category: EngineErrorCategory,
    public readonly code: EngineErrorCode,
    message: string,
    public readonly details: ErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EngineError';
  }
}

export class ValidationError extends EngineError {
  constructor(code: EngineErrorCode, message: string, details?: ErrorDetails) {
    super('validation', code, message, details);
    this.name = 'ValidationError';
  }
}

export class InvariantViolation extends EngineError {
  constructor(message: string, details?: ErrorDetails) {
    super('invariant', 'BreaksHealthFactor', message, details);
    this.name = 'InvariantViolation';
  }
}

export class OracleError extends EngineError {
  constructor(code: 'InvalidPrice' | 'StalePrice', message: string, details?: ErrorDetails) {
    super('oracle', code, message, details);
    this.name = 'OracleError';
  }
}

export class TransferError extends EngineError {
  constructor(code: 'TransferFailed' | 'MintFailed', message: string, details?: ErrorDetails, cause?: unknown) {
    super('transfer', code, message, details, cause === undefined ? undefined : { cause });
    this.name = 'TransferError';
  }
}

export class LiquidationError extends EngineError {
  constructor(code: 'HealthFactorOk' | 'InsufficientCollateral', message: string, details?: ErrorDetails) {
    super('liquidation', code, message, details);
    this.name = 'LiquidationError';
  }
}

export class ReentrancyError extends EngineError {
  constructor(operation: string, active: string) {
    super('reentrancy', 'Reentrancy', `Reentrant call to ${operation} while ${active} is active`, {
      operation,
      active
    });
    this.name = 'ReentrancyError';
  }
}

/**
 * A compensation step failed while unwinding a failed operation. The engine's
 * ledger is restored; an external collaborator may not be.
 */
export class RollbackError extends EngineError {
  constructor(
    operation: string,
    public readonly failedSteps: string[],
    cause: unknown
  ) {
    super(
      'rollback',
      'RollbackFailed',
      `Rollback of ${operation} incomplete: ${failedSteps.join(', ')}`,
      { operation, failedSteps: failedSteps.length },
      { cause }
    );
    this.name = 'RollbackError';
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
