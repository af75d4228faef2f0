/**
 * Uniswap V3 Fee Growth Utilities
 *
 * Fee growth "inside" a tick range is derived from the pool's global
 * accumulators and the per-tick "outside" accumulators:
 *
 *   feeGrowthInside = feeGrowthGlobal - feeGrowthOutside(lower) - feeGrowthOutside(upper)
 *
 * The accumulators are Q128 fixed-point uint256 counters on chain and can
 * wrap. By default the difference between two snapshots is taken as a raw
 * signed bigint (assumes no wraparound within a backtest period), so a delta
 * can come out negative around tick crossings. `wrapCorrection` switches to
 * uint256 modular subtraction.
 */

import type { ChainStateSnapshot } from '../../types/index.js';
import { Q128, UINT256_MODULUS } from './constants.js';

/**
 * Difference with uint256 wraparound semantics: (a - b) mod 2^256
 *
 * @example
 * safeDiff(50n, (1n << 256n) - 100n); // 150n
 */
export function safeDiff(a: bigint, b: bigint): bigint {
  const mask = UINT256_MODULUS - 1n;
  return (a - b + UINT256_MODULUS) & mask;
}

/**
 * Fee growth inside a range for both tokens
 */
export interface FeeGrowthInside {
  inside0: bigint;
  inside1: bigint;
}

/**
 * Fee growth accrued per unit of liquidity between two snapshots
 */
export interface FeeGrowthDelta {
  delta0: bigint;
  delta1: bigint;
}

export interface FeeGrowthOptions {
  /** Use uint256 modular subtraction instead of the raw signed difference */
  wrapCorrection?: boolean;
}

function subtract(a: bigint, b: bigint, wrapCorrection: boolean): bigint {
  return wrapCorrection ? safeDiff(a, b) : a - b;
}

/**
 * feeGrowthGlobal - outside(lower) - outside(upper), per token
 */
export function computeFeeGrowthInside(
  snapshot: ChainStateSnapshot,
  options: FeeGrowthOptions = {}
): FeeGrowthInside {
  const wrap = options.wrapCorrection ?? false;

  const inside0 = subtract(
    subtract(snapshot.feeGrowthGlobal0, snapshot.lowerTickFeeGrowthOutside0, wrap),
    snapshot.upperTickFeeGrowthOutside0,
    wrap
  );
  const inside1 = subtract(
    subtract(snapshot.feeGrowthGlobal1, snapshot.lowerTickFeeGrowthOutside1, wrap),
    snapshot.upperTickFeeGrowthOutside1,
    wrap
  );

  return { inside0, inside1 };
}

/**
 * inside(snapshot1) - inside(snapshot0), per token
 */
export function computeFeeGrowthDelta(
  snapshot0: ChainStateSnapshot,
  snapshot1: ChainStateSnapshot,
  options: FeeGrowthOptions = {}
): FeeGrowthDelta {
  const wrap = options.wrapCorrection ?? false;
  const start = computeFeeGrowthInside(snapshot0, options);
  const end = computeFeeGrowthInside(snapshot1, options);

  return {
    delta0: subtract(end.inside0, start.inside0, wrap),
    delta1: subtract(end.inside1, start.inside1, wrap),
  };
}

/**
 * Convert a Q128 fee growth delta into raw token units for `liquidity`:
 * (delta / 2^128) * liquidity
 */
export function feeGrowthToTokenAmount(feeGrowthDelta: bigint, liquidity: number): number {
  return (Number(feeGrowthDelta) / Number(Q128)) * liquidity;
}
