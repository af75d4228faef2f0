/**
 * Tick conversions on the 1.0001 geometric price grid.
 */

import { InvalidInputError } from '../../errors/index.js';
import { TICK_BASE } from './constants.js';

const LOG_TICK_BASE = Math.log(TICK_BASE);

/**
 * Index of the tick at or below `price`: floor(ln(price) / ln(1.0001)).
 *
 * The quotient is snapped to the nearest integer when it lies within float
 * noise of one, so that priceToTick(tickToPrice(k)) === k.
 *
 * @throws InvalidInputError if price is not a positive finite number
 */
export function priceToTick(price: number): number {
  if (!Number.isFinite(price) || price <= 0) {
    throw new InvalidInputError(`Cannot derive tick from price ${price}`, { price });
  }

  const exact = Math.log(price) / LOG_TICK_BASE;
  const nearest = Math.round(exact);
  if (Math.abs(exact - nearest) < 1e-9) {
    return nearest;
  }
  return Math.floor(exact);
}

/**
 * Price at the lower edge of a tick: 1.0001^tick
 */
export function tickToPrice(tick: number): number {
  return Math.pow(TICK_BASE, tick);
}
