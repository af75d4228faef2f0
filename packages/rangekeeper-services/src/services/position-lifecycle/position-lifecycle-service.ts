/**
 * Position Lifecycle Service
 *
 * Owns the single simulated position and the running capital.
 *
 *   empty --open--> open --close--> empty
 *                   open --rebalance--> open
 *
 * Every operation computes its full result before assigning state, so a
 * failing sizing or fee computation leaves position and capital untouched.
 */

import {
  EMPTY_POSITION,
  InvalidInputError,
  InvalidRangeError,
  clampToRange,
  positionValue,
  priceRangeAround,
  sizeLiquidity,
  toUtcDate,
  type LiquidityPosition,
  type PositionState,
  type TimestampInput,
} from '@rangekeeper/shared';
import type { BacktestConfig } from '../../config/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { FeeAccrualResult, FeeCalculator } from '../fee-accrual/index.js';

export interface PositionLifecycleServiceDependencies {
  feeCalculator: FeeCalculator;
  config: BacktestConfig;
}

export interface CloseResult {
  /** Capital after the close (equals the previous capital for a no-op close) */
  capital: number;
  /** False when there was no open position */
  closed: boolean;
  valueBeforeSlippage: number;
  valueAfterSlippage: number;
  feesUsd: number;
  fees: FeeAccrualResult | null;
}

export interface RebalanceResult {
  close: CloseResult;
  position: LiquidityPosition;
}

interface LifecycleState {
  position: PositionState;
  capital: number;
}

export class PositionLifecycleService {
  private readonly feeCalculator: FeeCalculator;
  private readonly config: BacktestConfig;
  private readonly logger: ServiceLogger;

  private state: PositionState = EMPTY_POSITION;
  private capital: number;

  constructor(dependencies: PositionLifecycleServiceDependencies) {
    this.feeCalculator = dependencies.feeCalculator;
    this.config = dependencies.config;
    this.capital = dependencies.config.initialCapital;
    this.logger = createServiceLogger('PositionLifecycleService');
  }

  getState(): PositionState {
    return this.state;
  }

  getCapital(): number {
    return this.capital;
  }

  /**
   * Mark-to-market value of the open position, 0 when empty
   */
  getValue(price: number): number {
    if (this.state.status === 'empty') {
      return 0;
    }
    const { liquidity, range } = this.state.position;
    return positionValue(liquidity, range.lowerBound, range.upperBound, price);
  }

  /**
   * Deploy the current capital into a range around `price`
   *
   * @throws InvalidInputError if a position is already open
   * @throws InvalidRangeError if price is not positive
   */
  open(price: number, timestamp: TimestampInput): LiquidityPosition {
    if (this.state.status === 'open') {
      throw new InvalidInputError('A position is already open', {
        openTimestamp: this.state.position.openTimestamp.toISOString(),
      });
    }

    const position = this.buildPosition(price, timestamp, this.capital);
    this.state = { status: 'open', position };

    this.logger.info(
      {
        openTimestamp: position.openTimestamp.toISOString(),
        price,
        lowerBound: position.range.lowerBound,
        upperBound: position.range.upperBound,
        liquidity: position.liquidity,
        capital: position.capitalDeployed,
      },
      'Opened position'
    );
    return position;
  }

  /**
   * Withdraw at `price`, apply slippage and add accrued fees to the capital.
   * A no-op returning the current capital when no position is open.
   */
  async close(price: number, timestamp: TimestampInput): Promise<CloseResult> {
    if (this.state.status === 'empty') {
      this.logger.info('No active position to close');
      return {
        capital: this.capital,
        closed: false,
        valueBeforeSlippage: 0,
        valueAfterSlippage: 0,
        feesUsd: 0,
        fees: null,
      };
    }

    const { result, next } = await this.computeClose(this.state.position, price, timestamp);
    this.commit(next);
    return result;
  }

  /**
   * Close and reopen at `price`. Position and capital change together or not at all.
   */
  async rebalance(price: number, timestamp: TimestampInput): Promise<RebalanceResult> {
    if (this.state.status === 'empty') {
      throw new InvalidInputError('No active position to rebalance');
    }

    log.methodEntry(this.logger, 'rebalance', { price });

    const { result: close, next } = await this.computeClose(this.state.position, price, timestamp);
    const position = this.buildPosition(price, timestamp, next.capital);

    this.commit({ position: { status: 'open', position }, capital: next.capital });

    log.methodExit(this.logger, 'rebalance', { capital: next.capital });
    return { close, position };
  }

  private async computeClose(
    position: LiquidityPosition,
    price: number,
    timestamp: TimestampInput
  ): Promise<{ result: CloseResult; next: LifecycleState }> {
    if (!(price > 0)) {
      throw new InvalidRangeError(`Current price must be positive (got ${price})`, { price });
    }

    const closeTimestamp = toUtcDate(timestamp, { assumeUtc: true });
    const { liquidity, range } = position;

    const valueBeforeSlippage = positionValue(liquidity, range.lowerBound, range.upperBound, price);
    const valueAfterSlippage = valueBeforeSlippage * (1 - this.config.slippageFactor);

    const fees = await this.feeCalculator.calculateFees({
      startTime: position.openTimestamp,
      endTime: closeTimestamp,
      capital: this.capital,
      closePrice: price,
    });

    const capital = valueAfterSlippage + fees.feesUsd;

    this.logger.info(
      {
        closeTimestamp: closeTimestamp.toISOString(),
        price,
        valueBeforeSlippage,
        valueAfterSlippage,
        slippageFactor: this.config.slippageFactor,
        feesUsd: fees.feesUsd,
        capital,
      },
      'Closed position'
    );

    return {
      result: {
        capital,
        closed: true,
        valueBeforeSlippage,
        valueAfterSlippage,
        feesUsd: fees.feesUsd,
        fees,
      },
      next: { position: EMPTY_POSITION, capital },
    };
  }

  private buildPosition(price: number, timestamp: TimestampInput, capital: number): LiquidityPosition {
    const range = priceRangeAround(price, this.config);
    const referencePrice = clampToRange(price, range);
    const liquidity = sizeLiquidity(capital, referencePrice, range.lowerBound, range.upperBound);

    return Object.freeze({
      openPrice: price,
      range,
      openTimestamp: toUtcDate(timestamp, { assumeUtc: true }),
      capitalDeployed: capital,
      liquidity,
    });
  }

  private commit(next: LifecycleState): void {
    this.state = next.position;
    this.capital = next.capital;
  }
}
