/**
 * Concentrated liquidity sizing and valuation in human units.
 *
 * A position of liquidity L over [pa, pb] holds
 *   base  = L * (1/sqrt(p) - 1/sqrt(pb))
 *   quote = L * (sqrt(p) - sqrt(pa))
 * while the price is inside the range, and only one of them outside it.
 */

import { DegenerateRangeError, InvalidRangeError } from '../../errors/index.js';
import type { PriceRange, RangeFactors } from '../../types/index.js';

/**
 * Where a price sits relative to a range
 */
export type RangePhase = 'below' | 'in-range' | 'above';

/**
 * Derive [center * lowerBoundFactor, center * upperBoundFactor]
 *
 * @throws InvalidRangeError if center is not positive or the bounds invert
 */
export function priceRangeAround(center: number, factors: RangeFactors): PriceRange {
  if (!Number.isFinite(center) || center <= 0) {
    throw new InvalidRangeError(`Current price must be positive (got ${center})`, { center });
  }

  const lowerBound = center * factors.lowerBoundFactor;
  const upperBound = center * factors.upperBoundFactor;

  if (!(lowerBound > 0) || lowerBound >= upperBound) {
    throw new InvalidRangeError('Invalid bounds: lower bound must be < upper bound', {
      lowerBound,
      upperBound,
    });
  }

  return { lowerBound, upperBound };
}

export function determineRangePhase(price: number, range: PriceRange): RangePhase {
  if (price <= range.lowerBound) {
    return 'below';
  }
  if (price >= range.upperBound) {
    return 'above';
  }
  return 'in-range';
}

/**
 * Clamp a reference price into [lowerBound, upperBound]
 */
export function clampToRange(price: number, range: PriceRange): number {
  return Math.max(Math.min(price, range.upperBound), range.lowerBound);
}

/**
 * Liquidity mintable with `capital` (quote units) at `price` over the range.
 *
 * L = capital / ((1/sqrt(p) - 1/sqrt(pb)) * p + (sqrt(p) - sqrt(pa)))
 *
 * @throws InvalidRangeError if price is not positive
 * @throws DegenerateRangeError if lowerBound >= upperBound or the denominator is zero
 */
export function sizeLiquidity(
  capital: number,
  price: number,
  lowerBound: number,
  upperBound: number
): number {
  if (!(price > 0)) {
    throw new InvalidRangeError('Current price must be positive', { price });
  }
  if (lowerBound >= upperBound) {
    throw new DegenerateRangeError('Lower bound must be less than upper bound', {
      lowerBound,
      upperBound,
    });
  }

  const baseFactor = 1 / Math.sqrt(price) - 1 / Math.sqrt(upperBound);
  const quoteFactor = Math.sqrt(price) - Math.sqrt(lowerBound);
  const denominator = baseFactor * price + quoteFactor;

  if (denominator === 0) {
    throw new DegenerateRangeError(
      'Liquidity denominator computed as zero. Check price parameters.',
      { price, lowerBound, upperBound }
    );
  }

  return capital / denominator;
}

/**
 * Mark-to-market value (quote units) of liquidity L over the range at `price`
 */
export function positionValue(
  liquidity: number,
  lowerBound: number,
  upperBound: number,
  price: number
): number {
  const sqrtLower = Math.sqrt(lowerBound);
  const sqrtUpper = Math.sqrt(upperBound);

  switch (determineRangePhase(price, { lowerBound, upperBound })) {
    case 'below': {
      // Entirely base asset
      const baseTokens = liquidity * (1 / sqrtLower - 1 / sqrtUpper);
      return baseTokens * price;
    }
    case 'above':
      // Entirely quote asset
      return liquidity * (sqrtUpper - sqrtLower);
    case 'in-range': {
      const sqrtPrice = Math.sqrt(price);
      const baseTokens = liquidity * (1 / sqrtPrice - 1 / sqrtUpper);
      const quoteTokens = liquidity * (sqrtPrice - sqrtLower);
      return baseTokens * price + quoteTokens;
    }
  }
}
