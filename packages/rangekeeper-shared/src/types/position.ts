/**
 * Position Types
 */

/**
 * Price bounds in human units (quote per base). Invariant: 0 < lowerBound < upperBound.
 */
export interface PriceRange {
  lowerBound: number;
  upperBound: number;
}

/**
 * Multiplicative factors applied to a center price to derive a PriceRange
 */
export interface RangeFactors {
  lowerBoundFactor: number;
  upperBoundFactor: number;
}

/**
 * An open simulated liquidity position
 */
export interface LiquidityPosition {
  readonly openPrice: number;
  readonly range: PriceRange;
  readonly openTimestamp: Date;
  readonly capitalDeployed: number;
  /** Concentrated liquidity sizing constant (human units) */
  readonly liquidity: number;
}

/**
 * Two-state position lifecycle
 */
export type PositionState =
  | { readonly status: 'empty' }
  | { readonly status: 'open'; readonly position: LiquidityPosition };

export const EMPTY_POSITION: PositionState = Object.freeze({ status: 'empty' });
