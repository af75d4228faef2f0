/**
 * Block Resolver
 *
 * Maps a wall-clock time to a block number by bisecting block timestamps.
 * An average block time, when known, narrows the initial bracket around an
 * estimate instead of searching [0, latest].
 */

import {
  FutureTargetError,
  NoConvergenceError,
  toEpochSeconds,
  type TimestampInput,
} from '@rangekeeper/shared';
import type { BacktestConfig } from '../../config/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { ChainStateProvider } from '../types/index.js';

export interface BlockResolverDependencies {
  chainStateProvider: ChainStateProvider;
  config: BacktestConfig;
}

export interface ResolveBlockOptions {
  /** Average seconds per block. Unset or non-positive searches the full range */
  approxBlockTimeSeconds?: number;
  /** Accepted |blockTimestamp - target| in seconds */
  toleranceSeconds?: number;
  /** Maximum number of probed blocks */
  maxTries?: number;
}

interface SearchBracket {
  low: number;
  high: number;
}

export class BlockResolver {
  private readonly chainStateProvider: ChainStateProvider;
  private readonly config: BacktestConfig;
  private readonly logger: ServiceLogger;

  constructor(dependencies: BlockResolverDependencies) {
    this.chainStateProvider = dependencies.chainStateProvider;
    this.config = dependencies.config;
    this.logger = createServiceLogger('BlockResolver');
  }

  /**
   * Resolve the block closest to `targetTime`.
   *
   * Returns the first probed block within tolerance, the latest block when it
   * is already within tolerance, or the collapsed bracket's low end.
   *
   * @throws InvalidInputError for naive calendar strings and invalid numbers
   * @throws FutureTargetError when the target is after the latest block
   * @throws NoConvergenceError when maxTries probes did not converge
   * @throws UpstreamUnavailableError when a chain read fails
   */
  async resolve(targetTime: TimestampInput, options: ResolveBlockOptions = {}): Promise<number> {
    const targetTimestamp = toEpochSeconds(targetTime);
    const toleranceSeconds = options.toleranceSeconds ?? this.config.toleranceSeconds;
    const maxTries = options.maxTries ?? this.config.maxSearchTries;
    const approxBlockTimeSeconds =
      options.approxBlockTimeSeconds ?? this.config.approxBlockTimeSeconds;

    log.methodEntry(this.logger, 'resolve', { targetTimestamp, toleranceSeconds, maxTries });

    const latest = await this.chainStateProvider.latestBlock();

    if (targetTimestamp > latest.timestamp) {
      throw new FutureTargetError(targetTimestamp, latest.timestamp);
    }

    if (Math.abs(latest.timestamp - targetTimestamp) <= toleranceSeconds) {
      log.methodExit(this.logger, 'resolve', { blockNumber: latest.number, tries: 0 });
      return latest.number;
    }

    let { low, high } = this.initialBracket(
      latest.number,
      latest.timestamp - targetTimestamp,
      approxBlockTimeSeconds
    );

    let tries = 0;
    while (low < high && tries < maxTries) {
      const mid = Math.floor((low + high) / 2);
      const blockTimestamp = await this.chainStateProvider.blockTimestamp(mid);

      if (blockTimestamp < targetTimestamp) {
        low = mid + 1;
      } else {
        high = mid;
      }

      if (Math.abs(blockTimestamp - targetTimestamp) <= toleranceSeconds) {
        log.methodExit(this.logger, 'resolve', { blockNumber: mid, tries: tries + 1 });
        return mid;
      }

      tries++;
    }

    if (tries >= maxTries) {
      throw new NoConvergenceError(targetTimestamp, tries);
    }

    log.methodExit(this.logger, 'resolve', { blockNumber: low, tries });
    return low;
  }

  private initialBracket(
    latestNumber: number,
    secondsBack: number,
    approxBlockTimeSeconds: number | undefined
  ): SearchBracket {
    if (approxBlockTimeSeconds === undefined || approxBlockTimeSeconds <= 0) {
      return { low: 0, high: latestNumber };
    }

    const blocksBack = Math.trunc(secondsBack / approxBlockTimeSeconds);
    const guess = Math.max(0, Math.min(latestNumber - blocksBack, latestNumber));
    const low = Math.max(0, guess - 2 * blocksBack);
    const high = Math.min(latestNumber, guess + 2 * blocksBack);

    if (low >= high) {
      return { low: 0, high: latestNumber };
    }

    this.logger.debug({ guess, low, high, blocksBack }, 'Narrowed search bracket');
    return { low, high };
  }
}
