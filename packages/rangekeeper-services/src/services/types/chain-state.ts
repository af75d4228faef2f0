/**
 * Capability interfaces consumed by the backtest services
 *
 * Implementations live under clients/ (viem, Binance) and testing/ (in-process
 * fakes). Every read is one awaited call.
 */

import type {
  BlockHeader,
  BlockIdentifier,
  FeeGrowthPair,
  PricePoint,
  TokenDecimals,
} from '@rangekeeper/shared';

/**
 * Read-only access to a Uniswap V3 pool's on-chain state at a given block
 */
export interface ChainStateProvider {
  /** Latest block number and timestamp */
  latestBlock(): Promise<BlockHeader>;

  /** Timestamp (epoch seconds) of block `blockNumber` */
  blockTimestamp(blockNumber: number): Promise<number>;

  /** Header of the block selected by `blockId` */
  blockHeader(blockId: BlockIdentifier): Promise<BlockHeader>;

  /** feeGrowthGlobal0X128 / feeGrowthGlobal1X128 */
  feeGrowthGlobals(blockId: BlockIdentifier): Promise<FeeGrowthPair>;

  /** feeGrowthOutside0X128 / feeGrowthOutside1X128 of `tick` */
  tickFeeGrowthOutside(blockId: BlockIdentifier, tick: number): Promise<FeeGrowthPair>;

  /** Raw price sqrtPriceX96^2 / 2^192 from slot0 */
  slot0Price(blockId: BlockIdentifier): Promise<number>;

  /** Decimals of token0 and token1 */
  tokenDecimals(): Promise<TokenDecimals>;
}

export interface PriceSeriesRequest {
  start: Date;
  end: Date;
}

/**
 * Hourly historical prices, gap-filled and sorted ascending
 */
export interface HistoricalPriceSource {
  fetchPriceSeries(request: PriceSeriesRequest): Promise<PricePoint[]>;
}

/**
 * Sink for per-step backtest output
 */
export interface Recorder {
  recordSample(timestamp: Date, value: number, price: number): void;
  recordRebalance(timestamp: Date, value: number, price: number): void;
}
