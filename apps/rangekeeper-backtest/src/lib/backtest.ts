/**
 * Wires configuration, clients and services into one backtest run.
 */

import {
  BacktestRunner,
  BinanceKlineClient,
  BlockResolver,
  FeeAccrualService,
  PositionLifecycleService,
  PositionRecorder,
  ViemChainStateProvider,
  resolveBinanceSymbol,
  type BacktestSummary,
  type ChainStateProvider,
  type HistoricalPriceSource,
  type RecordingSummary,
} from '@rangekeeper/services';
import type { AppConfig } from './config.js';
import { backtestLogger } from './logger.js';

export interface BacktestRunOptions {
  start: Date;
  end: Date;
  clearCache?: boolean;
  /** Write the recorded series to this CSV file */
  csvPath?: string;
}

export interface BacktestRunDependencies {
  chainStateProvider?: ChainStateProvider;
  priceSource?: HistoricalPriceSource & { clearCache?: () => Promise<void> };
}

export interface BacktestRunResult {
  summary: BacktestSummary;
  recording: RecordingSummary | null;
}

export async function runBacktest(
  config: AppConfig,
  options: BacktestRunOptions,
  dependencies: BacktestRunDependencies = {}
): Promise<BacktestRunResult> {
  const chainStateProvider =
    dependencies.chainStateProvider ??
    ViemChainStateProvider.forChain(config.pool.chain, config.pool.address);
  const priceSource =
    dependencies.priceSource ??
    new BinanceKlineClient({
      config: config.priceSource,
      symbol: resolveBinanceSymbol(config.pool.name),
    });

  if (options.clearCache && priceSource.clearCache) {
    await priceSource.clearCache();
  }

  const series = await priceSource.fetchPriceSeries({ start: options.start, end: options.end });
  backtestLogger.info(
    { pool: config.pool.name, chain: config.pool.chain, samples: series.length },
    'Price series loaded'
  );

  const blockResolver = new BlockResolver({ chainStateProvider, config: config.backtest });
  const feeAccrual = new FeeAccrualService({
    chainStateProvider,
    blockResolver,
    config: config.backtest,
    orientation: config.pool.orientation,
  });
  const lifecycle = new PositionLifecycleService({
    feeCalculator: feeAccrual,
    config: config.backtest,
  });
  const recorder = new PositionRecorder();
  const runner = new BacktestRunner({ lifecycle, recorder, config: config.backtest });

  const summary = await runner.run(series);

  if (options.csvPath) {
    await recorder.writeCsv(options.csvPath);
    backtestLogger.info({ path: options.csvPath }, 'Recorded series written');
  }

  return { summary, recording: recorder.summary() };
}
