/**
 * Backtest Runner
 *
 * Drives the position lifecycle through a chronological price series:
 *
 *   1. open a position if none is held
 *   2. start a cooldown on a wick against the lookback price
 *   3. rebalance when the price leaves the buffered range, unless cooling down
 *   4. record the position value
 *
 * Lifecycle failures abort the run. Samples without a usable price or
 * timestamp are skipped with a warning.
 */

import type { PricePoint } from '@rangekeeper/shared';
import type { BacktestConfig } from '../../config/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { PositionLifecycleService } from '../position-lifecycle/index.js';
import type { Recorder } from '../types/index.js';
import { RebalancePolicy } from './rebalance-policy.js';

export interface BacktestRunnerDependencies {
  lifecycle: PositionLifecycleService;
  recorder: Recorder;
  config: BacktestConfig;
  /** Defaults to a policy built from the config */
  policy?: RebalancePolicy;
}

export interface BacktestSummary {
  initialCapital: number;
  /** Mark-to-market value at the last processed price */
  finalValue: number;
  finalCapital: number;
  rebalanceCount: number;
  /** Range breaches ignored because a cooldown was active */
  skippedInCooldown: number;
  samplesProcessed: number;
  /** Samples dropped for an invalid timestamp or a non-finite or non-positive price */
  samplesSkipped: number;
  /** (finalValue - initialCapital) / initialCapital, in percent */
  returnPct: number;
  cooldownUntil: Date | null;
}

export class BacktestRunner {
  private readonly lifecycle: PositionLifecycleService;
  private readonly recorder: Recorder;
  private readonly policy: RebalancePolicy;
  private readonly logger: ServiceLogger;

  constructor(dependencies: BacktestRunnerDependencies) {
    this.lifecycle = dependencies.lifecycle;
    this.recorder = dependencies.recorder;
    this.policy = dependencies.policy ?? new RebalancePolicy(dependencies.config);
    this.logger = createServiceLogger('BacktestRunner');
  }

  async run(series: readonly PricePoint[]): Promise<BacktestSummary> {
    log.methodEntry(this.logger, 'run', { samples: series.length });

    const samples = this.usableSamples(series);
    const initialCapital = this.lifecycle.getCapital();

    let cooldownUntil: Date | null = null;
    let rebalanceCount = 0;
    let skippedInCooldown = 0;
    let lastPrice: number | null = null;

    for (const [index, { timestamp, price }] of samples.entries()) {
      let state = this.lifecycle.getState();
      if (state.status === 'empty') {
        this.lifecycle.open(price, timestamp);
        state = this.lifecycle.getState();
      }

      const lookback = this.policy.findLookbackSample(samples, index, timestamp);
      if (lookback) {
        const wick = this.policy.detectWick(price, lookback.price, timestamp, cooldownUntil);
        if (wick.cooldownUntil) {
          cooldownUntil = wick.cooldownUntil;
          this.logger.info(
            {
              timestamp: timestamp.toISOString(),
              changePct: wick.changePct * 100,
              cooldownUntil: cooldownUntil.toISOString(),
            },
            'Price wick detected, cooldown started'
          );
        }
      }

      if (state.status === 'open') {
        const decision = this.policy.decide(price, state.position.range, timestamp, cooldownUntil);

        switch (decision.action) {
          case 'skip-cooldown':
            skippedInCooldown++;
            this.logger.info(
              {
                timestamp: timestamp.toISOString(),
                price,
                cooldownUntil: decision.cooldownUntil.toISOString(),
              },
              'Rebalance condition met during cooldown, skipping'
            );
            break;
          case 'rebalance':
            this.logger.info(
              { timestamp: timestamp.toISOString(), price },
              'Price outside buffered range, rebalancing'
            );
            await this.lifecycle.rebalance(price, timestamp);
            rebalanceCount++;
            this.recorder.recordRebalance(timestamp, this.lifecycle.getValue(price), price);
            break;
          case 'hold':
            break;
        }
      }

      this.recorder.recordSample(timestamp, this.lifecycle.getValue(price), price);
      lastPrice = price;
    }

    const finalValue = lastPrice === null ? 0 : this.lifecycle.getValue(lastPrice);
    const summary: BacktestSummary = {
      initialCapital,
      finalValue,
      finalCapital: this.lifecycle.getCapital(),
      rebalanceCount,
      skippedInCooldown,
      samplesProcessed: samples.length,
      samplesSkipped: series.length - samples.length,
      returnPct:
        lastPrice === null ? 0 : ((finalValue - initialCapital) / initialCapital) * 100,
      cooldownUntil,
    };

    log.methodExit(this.logger, 'run', {
      finalValue,
      rebalanceCount,
      skippedInCooldown,
      samplesProcessed: summary.samplesProcessed,
    });
    return summary;
  }

  /**
   * Chronologically sorted samples with a valid timestamp and a finite, positive price
   */
  private usableSamples(series: readonly PricePoint[]): PricePoint[] {
    const usable: PricePoint[] = [];

    for (const sample of series) {
      const time = sample.timestamp.getTime();
      if (Number.isNaN(time) || !Number.isFinite(sample.price) || sample.price <= 0) {
        this.logger.warn(
          { timestamp: Number.isNaN(time) ? null : sample.timestamp.toISOString(), price: sample.price },
          'Skipping sample without a usable price or timestamp'
        );
        continue;
      }
      usable.push(sample);
    }

    return usable.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }
}
