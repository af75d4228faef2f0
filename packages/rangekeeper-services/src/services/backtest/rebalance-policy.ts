/**
 * Rebalance Policy
 *
 * Decides, per price sample, whether a volatility wick starts a cooldown and
 * whether the price has left the buffered range. Holds no state; the runner
 * owns `cooldownUntil`.
 */

import { addHours, type PriceRange, type PricePoint } from '@rangekeeper/shared';
import type { BacktestConfig } from '../../config/index.js';

export type PolicyConfig = Pick<
  BacktestConfig,
  'bufferPct' | 'wickThresholdPct' | 'wickLookbackHours' | 'wickCooldownHours'
>;

export interface WickDetection {
  pastPrice: number;
  changePct: number;
  /** Set when the move starts a new cooldown */
  cooldownUntil: Date | null;
}

export type RebalanceDecision =
  | { action: 'hold' }
  | { action: 'rebalance' }
  | { action: 'skip-cooldown'; cooldownUntil: Date };

export class RebalancePolicy {
  constructor(private readonly config: PolicyConfig) {}

  /**
   * Latest sample at or before `timestamp - wickLookbackHours` among the
   * first `endIndex` samples (sorted ascending), or null if none.
   */
  findLookbackSample(samples: readonly PricePoint[], endIndex: number, timestamp: Date): PricePoint | null {
    const cutoff = addHours(timestamp, -this.config.wickLookbackHours).getTime();

    let low = 0;
    let high = Math.min(endIndex, samples.length);
    // First index whose timestamp is after the cutoff
    while (low < high) {
      const mid = Math.floor((low + high) / 2);
      const sample = samples[mid];
      if (sample && sample.timestamp.getTime() <= cutoff) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    return low > 0 ? (samples[low - 1] ?? null) : null;
  }

  /**
   * Compare `price` with the lookback price. A move of at least
   * wickThresholdPct outside an active cooldown starts a new one.
   */
  detectWick(
    price: number,
    pastPrice: number,
    timestamp: Date,
    cooldownUntil: Date | null
  ): WickDetection {
    const changePct = Math.abs(price - pastPrice) / pastPrice;
    const cooldownActive = cooldownUntil !== null && timestamp < cooldownUntil;

    return {
      pastPrice,
      changePct,
      cooldownUntil:
        changePct >= this.config.wickThresholdPct && !cooldownActive
          ? addHours(timestamp, this.config.wickCooldownHours)
          : null,
    };
  }

  /**
   * price < lower * (1 - buffer) or price > upper * (1 + buffer)
   */
  isOutsideBufferedRange(price: number, range: PriceRange): boolean {
    const { bufferPct } = this.config;
    return price < range.lowerBound * (1 - bufferPct) || price > range.upperBound * (1 + bufferPct);
  }

  decide(price: number, range: PriceRange, timestamp: Date, cooldownUntil: Date | null): RebalanceDecision {
    if (!this.isOutsideBufferedRange(price, range)) {
      return { action: 'hold' };
    }
    if (cooldownUntil !== null && timestamp < cooldownUntil) {
      return { action: 'skip-cooldown', cooldownUntil };
    }
    return { action: 'rebalance' };
  }
}
