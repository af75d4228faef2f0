/**
 * Backtest Error Taxonomy
 *
 * Every failure raised by the sizing, fee-accrual, block-resolution and
 * lifecycle code is one of these classes. They carry a `code` discriminant so
 * callers can switch on the failure kind without instanceof chains.
 */

export type BacktestErrorCode =
  | 'INVALID_INPUT'
  | 'FUTURE_TARGET'
  | 'NO_CONVERGENCE'
  | 'INVALID_RANGE'
  | 'DEGENERATE_RANGE'
  | 'INVALID_PERIOD'
  | 'UPSTREAM_UNAVAILABLE';

/**
 * Base class for all backtest errors
 */
export class BacktestError extends Error {
  constructor(
    message: string,
    public readonly code: BacktestErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BacktestError';
  }
}

/**
 * Malformed input: naive calendar time, invalid number, zero price reading,
 * opening over an already open position.
 */
export class InvalidInputError extends BacktestError {
  constructor(message: string, details?: Record<string, unknown>, code: BacktestErrorCode = 'INVALID_INPUT') {
    super(message, code, details);
    this.name = 'InvalidInputError';
  }
}

/**
 * Target time lies after the latest block's timestamp
 */
export class FutureTargetError extends InvalidInputError {
  constructor(
    public readonly targetTimestamp: number,
    public readonly latestTimestamp: number
  ) {
    super(
      `Target time ${targetTimestamp} is in the future relative to latest block (${latestTimestamp})`,
      { targetTimestamp, latestTimestamp },
      'FUTURE_TARGET'
    );
    this.name = 'FutureTargetError';
  }
}

/**
 * Block search exhausted its tries without reaching the tolerance
 */
export class NoConvergenceError extends BacktestError {
  constructor(
    public readonly targetTimestamp: number,
    public readonly tries: number
  ) {
    super(
      `Block search did not converge for timestamp ${targetTimestamp} after ${tries} tries`,
      'NO_CONVERGENCE',
      { targetTimestamp, tries }
    );
    this.name = 'NoConvergenceError';
  }
}

/**
 * Price range bounds inverted or non-positive price
 */
export class InvalidRangeError extends BacktestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_RANGE', details);
    this.name = 'InvalidRangeError';
  }
}

/**
 * Liquidity sizing denominator is zero or the range has no width
 */
export class DegenerateRangeError extends BacktestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DEGENERATE_RANGE', details);
    this.name = 'DegenerateRangeError';
  }
}

/**
 * Non-positive elapsed time between two snapshots
 */
export class InvalidPeriodError extends BacktestError {
  constructor(public readonly periodSeconds: number) {
    super(
      `Invalid snapshot time period; periodSeconds must be positive (got ${periodSeconds})`,
      'INVALID_PERIOD',
      { periodSeconds }
    );
    this.name = 'InvalidPeriodError';
  }
}

/**
 * A chain-state or price-source read failed
 */
export class UpstreamUnavailableError extends BacktestError {
  constructor(
    message: string,
    public readonly source: string,
    cause?: unknown
  ) {
    super(message, 'UPSTREAM_UNAVAILABLE', { source }, { cause });
    this.name = 'UpstreamUnavailableError';
  }
}

/**
 * Type guard for any error of the taxonomy
 */
export function isBacktestError(error: unknown): error is BacktestError {
  return error instanceof BacktestError;
}
