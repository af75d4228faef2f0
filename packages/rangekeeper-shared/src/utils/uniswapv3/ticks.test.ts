import { describe, it, expect } from 'vitest';
import { priceToTick, tickToPrice } from './ticks.js';
import { InvalidInputError } from '../../errors/index.js';

/**
 * Deterministic pseudo-random generator (LCG) so failures are reproducible
 */
function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}

describe('priceToTick', () => {
  it('should map price 1 to tick 0', () => {
    expect(priceToTick(1)).toBe(0);
  });

  it('should floor prices between ticks', () => {
    expect(priceToTick(1.00005)).toBe(0);
    expect(priceToTick(0.99995)).toBe(-1);
    expect(priceToTick(0.5)).toBe(-6932);
  });

  it('should compute ticks for typical ETH/USD prices', () => {
    expect(priceToTick(2000)).toBe(76012);
    expect(priceToTick(1700)).toBe(74387);
    expect(priceToTick(2300)).toBe(77410);
  });

  it('should invert tickToPrice for integer ticks', () => {
    const ticks = [-200000, -76012, -1234, -1, 0, 1, 7, 20000, 76012, 200000];
    for (const k of ticks) {
      expect(priceToTick(tickToPrice(k))).toBe(k);
    }
  });

  it('should invert tickToPrice for randomized integer ticks', () => {
    const rng = createRng(42);
    for (let i = 0; i < 500; i++) {
      const k = Math.floor(rng() * 600000) - 300000;
      expect(priceToTick(tickToPrice(k))).toBe(k);
    }
  });

  it('should be monotonically non-decreasing in price', () => {
    const rng = createRng(7);
    const prices = Array.from({ length: 1000 }, () => Math.exp(rng() * 40 - 20)).sort(
      (a, b) => a - b
    );

    let previous = -Infinity;
    for (const price of prices) {
      const tick = priceToTick(price);
      expect(tick).toBeGreaterThanOrEqual(previous);
      previous = tick;
    }
  });

  it('should reject non-positive prices', () => {
    expect(() => priceToTick(0)).toThrow(InvalidInputError);
    expect(() => priceToTick(-5)).toThrow(InvalidInputError);
    expect(() => priceToTick(Number.NaN)).toThrow(InvalidInputError);
  });
});

describe('tickToPrice', () => {
  it('should return 1.0001^tick', () => {
    expect(tickToPrice(0)).toBe(1);
    expect(tickToPrice(1)).toBeCloseTo(1.0001, 12);
    expect(tickToPrice(-1)).toBeCloseTo(1 / 1.0001, 12);
  });
});
