/**
 * Viem Chain State Provider
 *
 * Reads Uniswap V3 pool state at historical blocks through a viem
 * PublicClient. Each method is one awaited RPC read (two for token decimals,
 * which are cached per instance). RPC failures surface as
 * UpstreamUnavailableError with the viem error as cause.
 */

import { createPublicClient, erc20Abi, getAddress, http } from 'viem';
import type { Address, PublicClient } from 'viem';
import {
  UpstreamUnavailableError,
  isBacktestError,
  sqrtPriceX96ToRawPrice,
  type BlockHeader,
  type BlockIdentifier,
  type FeeGrowthPair,
  type TokenDecimals,
} from '@rangekeeper/shared';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { ChainStateProvider } from '../../services/types/index.js';
import { getChainConfig, getRpcUrl } from '../../config/index.js';
import { UNISWAP_V3_POOL_ABI } from './pool-abi.js';

const UPSTREAM_SOURCE = 'evm-rpc';

export interface ViemChainStateProviderDependencies {
  /** Viem PublicClient for the pool's chain */
  client: PublicClient;
  /** Pool contract address */
  poolAddress: string;
}

export class ViemChainStateProvider implements ChainStateProvider {
  private readonly client: PublicClient;
  private readonly poolAddress: Address;
  private readonly logger: ServiceLogger;
  private decimals: TokenDecimals | null = null;

  constructor(dependencies: ViemChainStateProviderDependencies) {
    this.client = dependencies.client;
    this.poolAddress = getAddress(dependencies.poolAddress);
    this.logger = createServiceLogger('ViemChainStateProvider');
  }

  /**
   * Build a provider for a configured chain, reading its RPC URL from the env
   */
  static forChain(
    chainName: string,
    poolAddress: string,
    env: Record<string, string | undefined> = process.env
  ): ViemChainStateProvider {
    const config = getChainConfig(chainName);
    const client = createPublicClient({
      chain: config.chain,
      transport: http(getRpcUrl(config.name, env)),
    });

    return new ViemChainStateProvider({ client, poolAddress });
  }

  async latestBlock(): Promise<BlockHeader> {
    return this.blockHeader('latest');
  }

  async blockTimestamp(blockNumber: number): Promise<number> {
    const header = await this.blockHeader(blockNumber);
    return header.timestamp;
  }

  async blockHeader(blockId: BlockIdentifier): Promise<BlockHeader> {
    return this.read('getBlock', { blockId }, async () => {
      const block =
        blockId === 'latest'
          ? await this.client.getBlock({ blockTag: 'latest' })
          : await this.client.getBlock({ blockNumber: BigInt(blockId) });

      return {
        number: Number(block.number),
        timestamp: Number(block.timestamp),
      };
    });
  }

  async feeGrowthGlobals(blockId: BlockIdentifier): Promise<FeeGrowthPair> {
    return this.read('feeGrowthGlobals', { blockId }, async () => {
      const blockNumber = toBlockNumber(blockId);

      const feeGrowth0 = await this.client.readContract({
        address: this.poolAddress,
        abi: UNISWAP_V3_POOL_ABI,
        functionName: 'feeGrowthGlobal0X128',
        blockNumber,
      });
      const feeGrowth1 = await this.client.readContract({
        address: this.poolAddress,
        abi: UNISWAP_V3_POOL_ABI,
        functionName: 'feeGrowthGlobal1X128',
        blockNumber,
      });

      return { feeGrowth0, feeGrowth1 };
    });
  }

  async tickFeeGrowthOutside(blockId: BlockIdentifier, tick: number): Promise<FeeGrowthPair> {
    return this.read('ticks', { blockId, tick }, async () => {
      const result = await this.client.readContract({
        address: this.poolAddress,
        abi: UNISWAP_V3_POOL_ABI,
        functionName: 'ticks',
        args: [tick],
        blockNumber: toBlockNumber(blockId),
      });

      return {
        feeGrowth0: result[2],
        feeGrowth1: result[3],
      };
    });
  }

  async slot0Price(blockId: BlockIdentifier): Promise<number> {
    return this.read('slot0', { blockId }, async () => {
      const result = await this.client.readContract({
        address: this.poolAddress,
        abi: UNISWAP_V3_POOL_ABI,
        functionName: 'slot0',
        blockNumber: toBlockNumber(blockId),
      });

      return sqrtPriceX96ToRawPrice(result[0]);
    });
  }

  async tokenDecimals(): Promise<TokenDecimals> {
    if (this.decimals) {
      return this.decimals;
    }

    const decimals = await this.read('tokenDecimals', {}, async () => {
      const token0 = await this.client.readContract({
        address: this.poolAddress,
        abi: UNISWAP_V3_POOL_ABI,
        functionName: 'token0',
      });
      const token1 = await this.client.readContract({
        address: this.poolAddress,
        abi: UNISWAP_V3_POOL_ABI,
        functionName: 'token1',
      });

      const token0Decimals = await this.client.readContract({
        address: token0,
        abi: erc20Abi,
        functionName: 'decimals',
      });
      const token1Decimals = await this.client.readContract({
        address: token1,
        abi: erc20Abi,
        functionName: 'decimals',
      });

      return { token0Decimals, token1Decimals };
    });

    this.logger.info(
      { poolAddress: this.poolAddress, ...decimals },
      'Token decimals loaded'
    );
    this.decimals = decimals;
    return decimals;
  }

  private async read<T>(
    operation: string,
    context: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    log.externalApiCall(this.logger, 'EVM RPC', operation, {
      poolAddress: this.poolAddress,
      ...context,
    });

    try {
      return await fn();
    } catch (error) {
      if (isBacktestError(error)) {
        throw error;
      }

      log.methodError(this.logger, operation, error, { poolAddress: this.poolAddress, ...context });
      throw new UpstreamUnavailableError(
        `Chain read ${operation} failed for pool ${this.poolAddress}`,
        UPSTREAM_SOURCE,
        error
      );
    }
  }
}

function toBlockNumber(blockId: BlockIdentifier): bigint | undefined {
  return blockId === 'latest' ? undefined : BigInt(blockId);
}
