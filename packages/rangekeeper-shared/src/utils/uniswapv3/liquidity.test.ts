import { describe, it, expect } from 'vitest';
import {
  sizeLiquidity,
  positionValue,
  priceRangeAround,
  clampToRange,
  determineRangePhase,
} from './liquidity.js';
import { DegenerateRangeError, InvalidRangeError } from '../../errors/index.js';

describe('Concentrated liquidity math', () => {
  const lowerBound = 1700;
  const upperBound = 2300;

  describe('sizeLiquidity', () => {
    it('should size liquidity for 10,000 capital at price 2000 over (1700, 2300)', () => {
      const liquidity = sizeLiquidity(10_000, 2000, lowerBound, upperBound);
      expect(liquidity).toBeCloseTo(1536.3862275604706, 8);
    });

    it('should scale linearly with capital', () => {
      const one = sizeLiquidity(1_000, 2000, lowerBound, upperBound);
      const ten = sizeLiquidity(10_000, 2000, lowerBound, upperBound);
      expect(ten / one).toBeCloseTo(10, 10);
    });

    it('should reject a non-positive price', () => {
      expect(() => sizeLiquidity(10_000, 0, lowerBound, upperBound)).toThrow(InvalidRangeError);
      expect(() => sizeLiquidity(10_000, -1, lowerBound, upperBound)).toThrow(InvalidRangeError);
    });

    it('should reject inverted or empty ranges', () => {
      expect(() => sizeLiquidity(10_000, 2000, 2300, 1700)).toThrow(DegenerateRangeError);
      expect(() => sizeLiquidity(10_000, 2000, 2000, 2000)).toThrow(DegenerateRangeError);
    });
  });

  describe('positionValue', () => {
    it('should reconstruct capital at the sizing price (round trip)', () => {
      const cases: Array<[number, number, number, number]> = [
        [10_000, 2000, 1700, 2300],
        [5_000, 1.25, 1.0, 1.5],
        [250_000, 64_000, 60_000, 70_000],
        [1, 0.0003, 0.0002, 0.0009],
      ];

      for (const [capital, price, lower, upper] of cases) {
        const liquidity = sizeLiquidity(capital, price, lower, upper);
        expect(positionValue(liquidity, lower, upper, price)).toBeCloseTo(capital, 6);
      }
    });

    it('should value a position fully in quote above the range', () => {
      const liquidity = sizeLiquidity(10_000, 2000, lowerBound, upperBound);
      expect(positionValue(liquidity, lowerBound, upperBound, 2500)).toBeCloseTo(
        10335.668041419423,
        6
      );
    });

    it('should value a position fully in base below the range', () => {
      const liquidity = sizeLiquidity(10_000, 2000, lowerBound, upperBound);
      expect(positionValue(liquidity, lowerBound, upperBound, 1500)).toBeCloseTo(
        7840.457999019209,
        6
      );
    });

    it('should be continuous at both range bounds', () => {
      const liquidity = sizeLiquidity(10_000, 2000, lowerBound, upperBound);
      const epsilon = 1e-9;

      const atLower = positionValue(liquidity, lowerBound, upperBound, lowerBound);
      const justInsideLower = positionValue(liquidity, lowerBound, upperBound, lowerBound + epsilon);
      expect(justInsideLower).toBeCloseTo(atLower, 5);

      const atUpper = positionValue(liquidity, lowerBound, upperBound, upperBound);
      const justInsideUpper = positionValue(liquidity, lowerBound, upperBound, upperBound - epsilon);
      expect(justInsideUpper).toBeCloseTo(atUpper, 5);
    });

    it('should return 0 for zero liquidity', () => {
      expect(positionValue(0, lowerBound, upperBound, 2000)).toBe(0);
    });
  });

  describe('priceRangeAround', () => {
    it('should apply the range factors to the center price', () => {
      const range = priceRangeAround(2000, { lowerBoundFactor: 0.85, upperBoundFactor: 1.15 });
      expect(range.lowerBound).toBeCloseTo(1700, 9);
      expect(range.upperBound).toBeCloseTo(2300, 9);
    });

    it('should reject non-positive center prices', () => {
      expect(() =>
        priceRangeAround(0, { lowerBoundFactor: 0.85, upperBoundFactor: 1.15 })
      ).toThrow(InvalidRangeError);
    });

    it('should reject inverted factors', () => {
      expect(() =>
        priceRangeAround(2000, { lowerBoundFactor: 1.15, upperBoundFactor: 0.85 })
      ).toThrow(InvalidRangeError);
    });
  });

  describe('range helpers', () => {
    const range = { lowerBound, upperBound };

    it('should clamp prices into the range', () => {
      expect(clampToRange(1500, range)).toBe(1700);
      expect(clampToRange(2500, range)).toBe(2300);
      expect(clampToRange(2000, range)).toBe(2000);
    });

    it('should classify the range phase', () => {
      expect(determineRangePhase(1700, range)).toBe('below');
      expect(determineRangePhase(2000, range)).toBe('in-range');
      expect(determineRangePhase(2300, range)).toBe('above');
    });
  });
});
