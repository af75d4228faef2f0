/**
 * In-process ChainStateProvider with uniformly spaced blocks.
 *
 * Block n has timestamp genesisTimestamp + n * blockTimeSeconds. Pool state
 * is supplied as functions of the block number so tests can script fee
 * growth between two blocks.
 */

import type {
  BlockHeader,
  BlockIdentifier,
  FeeGrowthPair,
  TokenDecimals,
} from '@rangekeeper/shared';
import type { ChainStateProvider } from '../services/types/index.js';

export interface FakeChainStateOptions {
  latestBlock: number;
  genesisTimestamp: number;
  blockTimeSeconds: number;
  rawPrice?: (blockNumber: number) => number;
  feeGrowthGlobals?: (blockNumber: number) => FeeGrowthPair;
  tickFeeGrowthOutside?: (blockNumber: number, tick: number) => FeeGrowthPair;
  decimals?: TokenDecimals;
}

const ZERO_GROWTH: FeeGrowthPair = { feeGrowth0: 0n, feeGrowth1: 0n };

export class FakeChainStateProvider implements ChainStateProvider {
  /** Block numbers passed to blockTimestamp, in call order */
  readonly probedBlocks: number[] = [];
  /** Ticks passed to tickFeeGrowthOutside, in call order */
  readonly probedTicks: number[] = [];
  /** Block selectors passed to slot0Price, in call order */
  readonly slot0Reads: BlockIdentifier[] = [];

  constructor(private readonly options: FakeChainStateOptions) {}

  async latestBlock(): Promise<BlockHeader> {
    return this.header(this.options.latestBlock);
  }

  async blockTimestamp(blockNumber: number): Promise<number> {
    this.probedBlocks.push(blockNumber);
    return this.header(blockNumber).timestamp;
  }

  async blockHeader(blockId: BlockIdentifier): Promise<BlockHeader> {
    return this.header(this.resolve(blockId));
  }

  async feeGrowthGlobals(blockId: BlockIdentifier): Promise<FeeGrowthPair> {
    return this.options.feeGrowthGlobals?.(this.resolve(blockId)) ?? ZERO_GROWTH;
  }

  async tickFeeGrowthOutside(blockId: BlockIdentifier, tick: number): Promise<FeeGrowthPair> {
    this.probedTicks.push(tick);
    return this.options.tickFeeGrowthOutside?.(this.resolve(blockId), tick) ?? ZERO_GROWTH;
  }

  async slot0Price(blockId: BlockIdentifier): Promise<number> {
    this.slot0Reads.push(blockId);
    return this.options.rawPrice?.(this.resolve(blockId)) ?? 1;
  }

  async tokenDecimals(): Promise<TokenDecimals> {
    return this.options.decimals ?? { token0Decimals: 6, token1Decimals: 18 };
  }

  /** Timestamp of block `blockNumber` under the uniform spacing */
  timestampOf(blockNumber: number): number {
    return this.options.genesisTimestamp + blockNumber * this.options.blockTimeSeconds;
  }

  private resolve(blockId: BlockIdentifier): number {
    return blockId === 'latest' ? this.options.latestBlock : blockId;
  }

  private header(blockNumber: number): BlockHeader {
    if (blockNumber < 0 || blockNumber > this.options.latestBlock) {
      throw new Error(`Block ${blockNumber} does not exist`);
    }
    return { number: blockNumber, timestamp: this.timestampOf(blockNumber) };
  }
}
