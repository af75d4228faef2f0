/**
 * Backtest CLI Configuration
 *
 * Environment-based configuration for one backtest run. The chain's average
 * block time fills in APPROX_BLOCK_TIME_SECONDS when it is not set.
 *
 * Env vars: see .env.example
 */

import {
  createBacktestConfig,
  getChainConfig,
  loadBacktestConfig,
  loadPoolConfig,
  loadPriceSourceConfig,
  type BacktestConfig,
  type BacktestConfigInput,
  type PoolConfig,
  type PriceSourceConfig,
} from '@rangekeeper/services';

/** Default history window when --start is omitted */
export const DEFAULT_LOOKBACK_DAYS = 240;

export interface AppConfig {
  backtest: BacktestConfig;
  pool: PoolConfig;
  priceSource: PriceSourceConfig;
}

export function loadAppConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: BacktestConfigInput = {}
): AppConfig {
  const pool = loadPoolConfig(env);
  const loaded = loadBacktestConfig(env, overrides);

  const backtest =
    loaded.approxBlockTimeSeconds === undefined
      ? createBacktestConfig({
          ...loaded,
          approxBlockTimeSeconds: getChainConfig(pool.chain).blockTimeSeconds,
        })
      : loaded;

  return {
    backtest,
    pool,
    priceSource: loadPriceSourceConfig(env),
  };
}
