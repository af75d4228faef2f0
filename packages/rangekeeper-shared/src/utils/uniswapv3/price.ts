/**
 * Pool price conversions
 *
 * The pool's raw price is token1 per token0 in smallest units. The human
 * price is always quote per base; which of the two tokens is the quote
 * depends on the pool's orientation:
 *
 *   quote-is-token0: human = (1 / raw) * 10^(d1 - d0)
 *   base-is-token0:  human = raw * 10^(d0 - d1)
 */

import { InvalidInputError } from '../../errors/index.js';
import { Q96 } from './constants.js';

export type PoolOrientation = 'quote-is-token0' | 'base-is-token0';

export const POOL_ORIENTATIONS = ['quote-is-token0', 'base-is-token0'] as const satisfies readonly PoolOrientation[];

/**
 * Raw price (token1 per token0, smallest units) from slot0's sqrtPriceX96
 *
 * @example
 * sqrtPriceX96ToRawPrice(79228162514264337593543950336n); // 1 (sqrtPriceX96 = 2^96)
 */
export function sqrtPriceX96ToRawPrice(sqrtPriceX96: bigint): number {
  const sqrtRatio = Number(sqrtPriceX96) / Number(Q96);
  return sqrtRatio * sqrtRatio;
}

/**
 * Human price (quote per base) from a raw pool price
 *
 * @throws InvalidInputError on a zero or non-finite raw price
 */
export function rawPriceToHumanPrice(
  rawPrice: number,
  token0Decimals: number,
  token1Decimals: number,
  orientation: PoolOrientation = 'quote-is-token0'
): number {
  if (!Number.isFinite(rawPrice) || rawPrice === 0) {
    throw new InvalidInputError('Invalid price reading (zero)', { rawPrice });
  }
  return orientation === 'quote-is-token0'
    ? (1 / rawPrice) * 10 ** (token1Decimals - token0Decimals)
    : rawPrice * 10 ** (token0Decimals - token1Decimals);
}

/**
 * Inverse of rawPriceToHumanPrice
 *
 * @throws InvalidInputError on a zero or non-finite human price
 */
export function humanPriceToRawPrice(
  humanPrice: number,
  token0Decimals: number,
  token1Decimals: number,
  orientation: PoolOrientation = 'quote-is-token0'
): number {
  if (!Number.isFinite(humanPrice) || humanPrice === 0) {
    throw new InvalidInputError('Invalid human price (zero)', { humanPrice });
  }
  return orientation === 'quote-is-token0'
    ? 10 ** (token1Decimals - token0Decimals) / humanPrice
    : humanPrice * 10 ** (token1Decimals - token0Decimals);
}
