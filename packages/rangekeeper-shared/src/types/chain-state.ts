/**
 * Chain State Types
 *
 * Values read from a Uniswap V3 pool at one block.
 */

/**
 * Block selector accepted by chain-state reads
 */
export type BlockIdentifier = number | 'latest';

/**
 * Block number and timestamp (epoch seconds)
 */
export interface BlockHeader {
  number: number;
  timestamp: number;
}

/**
 * Fee growth values for the two pool tokens (Q128 fixed-point)
 */
export interface FeeGrowthPair {
  feeGrowth0: bigint;
  feeGrowth1: bigint;
}

/**
 * Decimal counts of token0 and token1
 */
export interface TokenDecimals {
  token0Decimals: number;
  token1Decimals: number;
}

/**
 * Immutable fee-growth snapshot captured at one block.
 *
 * `rawPrice` is token1 per token0 in raw units (sqrtPriceX96^2 / 2^192) or
 * a pinned override. `humanPrice` is the decimal-adjusted mid price in quote
 * per base, with token0 as the quote token.
 */
export interface ChainStateSnapshot {
  readonly blockNumber: number;
  readonly blockTimestamp: number;
  readonly feeGrowthGlobal0: bigint;
  readonly feeGrowthGlobal1: bigint;
  readonly lowerTick: number;
  readonly upperTick: number;
  readonly lowerTickFeeGrowthOutside0: bigint;
  readonly lowerTickFeeGrowthOutside1: bigint;
  readonly upperTickFeeGrowthOutside0: bigint;
  readonly upperTickFeeGrowthOutside1: bigint;
  readonly token0Decimals: number;
  readonly token1Decimals: number;
  readonly rawPrice: number;
  readonly humanPrice: number;
}

/**
 * Pins the price used for range derivation instead of reading slot0
 */
export type PriceOverride =
  | { kind: 'raw'; value: number }
  | { kind: 'human'; value: number };
