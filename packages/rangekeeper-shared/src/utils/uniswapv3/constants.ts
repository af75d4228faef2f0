/**
 * Uniswap V3 Constants
 */

/** 2^96, scale of sqrtPriceX96 */
export const Q96 = 1n << 96n;

/** 2^128, scale of feeGrowth*X128 accumulators */
export const Q128 = 1n << 128n;

/** uint256 modulus for wrapping accumulator arithmetic */
export const UINT256_MODULUS = 1n << 256n;

/** Geometric spacing between adjacent ticks (0.01%) */
export const TICK_BASE = 1.0001;

export const SECONDS_PER_YEAR = 365 * 24 * 3600;
