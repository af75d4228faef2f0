/**
 * Fee Accrual Service
 *
 * Estimates the trading fees a simulated position would have earned between
 * two blocks from the pool's fee-growth accumulators:
 *
 *   1. snapshot the accumulators at the start and end block, with tick bounds
 *      derived from the pool price and the configured range factors
 *   2. take the fee growth inside the range at both blocks and their delta
 *   3. scale by a simulated liquidity for the deployed capital
 *   4. convert to USD and annualize
 */

import {
  DegenerateRangeError,
  InvalidPeriodError,
  SECONDS_PER_YEAR,
  computeFeeGrowthDelta,
  feeGrowthToTokenAmount,
  humanPriceToRawPrice,
  priceToTick,
  rawPriceToHumanPrice,
  type BlockIdentifier,
  type ChainStateSnapshot,
  type FeeGrowthDelta,
  type PoolOrientation,
  type PriceOverride,
  type TimestampInput,
} from '@rangekeeper/shared';
import type { BacktestConfig } from '../../config/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { BlockResolver } from '../block/index.js';
import type { ChainStateProvider } from '../types/index.js';

export interface FeeAccrualServiceDependencies {
  chainStateProvider: ChainStateProvider;
  blockResolver: BlockResolver;
  config: BacktestConfig;
  /** Which pool token is the quote. Defaults to token0 */
  orientation?: PoolOrientation;
}

export interface FeeComputationInput {
  /** Simulated liquidity in raw units */
  liquidity: number;
  /** Capital the APR is expressed against */
  capital: number;
  /** Snapshot whose prices convert fees to USD. Defaults to the end snapshot */
  pricingSnapshot?: ChainStateSnapshot;
}

export interface FeeAccrualResult {
  feesToken0Raw: number;
  feesToken1Raw: number;
  feesUsd: number;
  /** Annualized percentage */
  apr: number;
  periodSeconds: number;
  liquidity: number;
}

export interface CalculateFeesInput {
  startTime: TimestampInput;
  endTime: TimestampInput;
  capital: number;
  /** Human price (quote per base) pinned for the end snapshot's range */
  closePrice?: number;
}

/**
 * Anything that can price fees for a holding period
 */
export interface FeeCalculator {
  calculateFees(input: CalculateFeesInput): Promise<FeeAccrualResult>;
}

export class FeeAccrualService implements FeeCalculator {
  private readonly chainStateProvider: ChainStateProvider;
  private readonly blockResolver: BlockResolver;
  private readonly config: BacktestConfig;
  private readonly orientation: PoolOrientation;
  private readonly logger: ServiceLogger;

  constructor(dependencies: FeeAccrualServiceDependencies) {
    this.chainStateProvider = dependencies.chainStateProvider;
    this.blockResolver = dependencies.blockResolver;
    this.config = dependencies.config;
    this.orientation = dependencies.orientation ?? 'quote-is-token0';
    this.logger = createServiceLogger('FeeAccrualService');
  }

  /**
   * Capture the fee-growth state of the configured range at a block.
   *
   * The range is centered on the pool price at that block unless
   * `priceOverride` pins it.
   *
   * @throws InvalidInputError on a zero price reading
   * @throws UpstreamUnavailableError when a chain read fails
   */
  async snapshotAt(
    blockId: BlockIdentifier,
    priceOverride?: PriceOverride
  ): Promise<ChainStateSnapshot> {
    log.methodEntry(this.logger, 'snapshotAt', { blockId, priceOverride });

    const { token0Decimals, token1Decimals } = await this.chainStateProvider.tokenDecimals();
    const rawPrice = await this.resolveRawPrice(blockId, token0Decimals, token1Decimals, priceOverride);
    const humanPrice = rawPriceToHumanPrice(
      rawPrice,
      token0Decimals,
      token1Decimals,
      this.orientation
    );

    const lowerTick = priceToTick(humanPrice * this.config.lowerBoundFactor);
    const upperTick = priceToTick(humanPrice * this.config.upperBoundFactor);

    const globals = await this.chainStateProvider.feeGrowthGlobals(blockId);
    const lowerOutside = await this.chainStateProvider.tickFeeGrowthOutside(blockId, lowerTick);
    const upperOutside = await this.chainStateProvider.tickFeeGrowthOutside(blockId, upperTick);
    const header = await this.chainStateProvider.blockHeader(blockId);

    const snapshot: ChainStateSnapshot = Object.freeze({
      blockNumber: header.number,
      blockTimestamp: header.timestamp,
      feeGrowthGlobal0: globals.feeGrowth0,
      feeGrowthGlobal1: globals.feeGrowth1,
      lowerTick,
      upperTick,
      lowerTickFeeGrowthOutside0: lowerOutside.feeGrowth0,
      lowerTickFeeGrowthOutside1: lowerOutside.feeGrowth1,
      upperTickFeeGrowthOutside0: upperOutside.feeGrowth0,
      upperTickFeeGrowthOutside1: upperOutside.feeGrowth1,
      token0Decimals,
      token1Decimals,
      rawPrice,
      humanPrice,
    });

    log.methodExit(this.logger, 'snapshotAt', {
      blockNumber: snapshot.blockNumber,
      lowerTick,
      upperTick,
      humanPrice,
    });
    return snapshot;
  }

  /**
   * Fee growth inside the range accrued from `snapshot0` to `snapshot1`
   */
  delta(snapshot0: ChainStateSnapshot, snapshot1: ChainStateSnapshot): FeeGrowthDelta {
    return computeFeeGrowthDelta(snapshot0, snapshot1, {
      wrapCorrection: this.config.feeGrowthWrapCorrection,
    });
  }

  /**
   * Raw-unit liquidity that `capital` mints around the snapshot's raw price
   *
   * @throws DegenerateRangeError if the cost denominator is zero
   */
  simulateLiquidity(capital: number, pricingSnapshot: ChainStateSnapshot): number {
    const { rawPrice, humanPrice, token0Decimals, token1Decimals } = pricingSnapshot;

    const sqrtPrice = Math.sqrt(rawPrice);
    const sqrtLower = Math.sqrt(rawPrice * this.config.lowerBoundFactor);
    const sqrtUpper = Math.sqrt(rawPrice * this.config.upperBoundFactor);

    // The base-token leg is priced at humanPrice
    const quoteIsToken0 = this.orientation === 'quote-is-token0';
    const token0Amount = (sqrtUpper - sqrtPrice) / (sqrtPrice * sqrtUpper);
    const token1Amount = sqrtPrice - sqrtLower;
    const token0Cost = (quoteIsToken0 ? token0Amount : token0Amount * humanPrice) / 10 ** token0Decimals;
    const token1Cost = (quoteIsToken0 ? token1Amount * humanPrice : token1Amount) / 10 ** token1Decimals;
    const denominator = token0Cost + token1Cost;

    if (denominator === 0) {
      throw new DegenerateRangeError(
        'Liquidity denominator computed as zero. Check price parameters.',
        { rawPrice, humanPrice }
      );
    }

    return capital / denominator;
  }

  /**
   * Fees and APR earned by `liquidity` between two snapshots
   *
   * @throws InvalidPeriodError if snapshot1 is not after snapshot0
   */
  computeFeesAndApr(
    snapshot0: ChainStateSnapshot,
    snapshot1: ChainStateSnapshot,
    input: FeeComputationInput
  ): FeeAccrualResult {
    const periodSeconds = snapshot1.blockTimestamp - snapshot0.blockTimestamp;
    if (periodSeconds <= 0) {
      throw new InvalidPeriodError(periodSeconds);
    }

    const { liquidity, capital } = input;
    const pricing = input.pricingSnapshot ?? snapshot1;
    const { delta0, delta1 } = this.delta(snapshot0, snapshot1);

    const feesToken0Raw = feeGrowthToTokenAmount(delta0, liquidity);
    const feesToken1Raw = feeGrowthToTokenAmount(delta1, liquidity);

    const fees0 = feesToken0Raw / 10 ** snapshot1.token0Decimals;
    const fees1 = feesToken1Raw / 10 ** snapshot1.token1Decimals;
    const feesUsd =
      this.orientation === 'quote-is-token0'
        ? fees0 + fees1 * pricing.humanPrice
        : fees0 * pricing.humanPrice + fees1;

    const apr = (feesUsd / capital) * (SECONDS_PER_YEAR / periodSeconds) * 100;

    return { feesToken0Raw, feesToken1Raw, feesUsd, apr, periodSeconds, liquidity };
  }

  /**
   * Fees earned by `capital` deployed from `startTime` to `endTime`.
   *
   * The end snapshot's range is pinned to the start price, or to `closePrice`
   * when given, so both snapshots read the same or the closing ticks.
   */
  async calculateFees(input: CalculateFeesInput): Promise<FeeAccrualResult> {
    log.methodEntry(this.logger, 'calculateFees', {
      startTime: input.startTime,
      endTime: input.endTime,
      capital: input.capital,
      closePrice: input.closePrice,
    });

    try {
      const startBlock = await this.blockResolver.resolve(input.startTime);
      const endBlock = await this.blockResolver.resolve(input.endTime);

      const snapshot0 = await this.snapshotAt(startBlock);
      const endOverride: PriceOverride =
        input.closePrice === undefined
          ? { kind: 'raw', value: snapshot0.rawPrice }
          : { kind: 'human', value: input.closePrice };
      const snapshot1 = await this.snapshotAt(endBlock, endOverride);

      const liquidity = this.simulateLiquidity(input.capital, snapshot0);
      const result = this.computeFeesAndApr(snapshot0, snapshot1, {
        liquidity,
        capital: input.capital,
        pricingSnapshot: snapshot0,
      });

      log.methodExit(this.logger, 'calculateFees', {
        startBlock,
        endBlock,
        feesUsd: result.feesUsd,
        apr: result.apr,
      });
      return result;
    } catch (error) {
      log.methodError(this.logger, 'calculateFees', error);
      throw error;
    }
  }

  private async resolveRawPrice(
    blockId: BlockIdentifier,
    token0Decimals: number,
    token1Decimals: number,
    priceOverride?: PriceOverride
  ): Promise<number> {
    if (!priceOverride) {
      return this.chainStateProvider.slot0Price(blockId);
    }
    if (priceOverride.kind === 'raw') {
      return priceOverride.value;
    }
    return humanPriceToRawPrice(
      priceOverride.value,
      token0Decimals,
      token1Decimals,
      this.orientation
    );
  }
}
