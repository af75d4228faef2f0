import { Command, InvalidArgumentError } from 'commander';
import { addHours, isBacktestError, toUtcDate } from '@rangekeeper/shared';
import { DEFAULT_LOOKBACK_DAYS, loadAppConfig } from '../lib/config.js';
import { runBacktest, type BacktestRunResult } from '../lib/backtest.js';
import { backtestLogger } from '../lib/logger.js';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a --start/--end value: YYYY-MM-DD (UTC midnight) or ISO-8601.
 * Values without an offset are read as UTC.
 */
export function parseDateOption(value: string): Date {
  try {
    return toUtcDate(DATE_ONLY.test(value) ? `${value}T00:00:00Z` : value, { assumeUtc: true });
  } catch {
    throw new InvalidArgumentError(`Invalid date: ${value}`);
  }
}

export function parseCapitalOption(value: string): number {
  const capital = Number(value);
  if (!Number.isFinite(capital) || capital <= 0) {
    throw new InvalidArgumentError(`Capital must be a positive number: ${value}`);
  }
  return capital;
}

interface RunCommandOptions {
  start?: Date;
  end?: Date;
  capital?: number;
  clearCache?: boolean;
  csv?: string;
}

export function formatResult({ summary, recording }: BacktestRunResult): string {
  const lines = [
    '',
    'Backtest Summary',
    `   Samples processed:    ${summary.samplesProcessed} (${summary.samplesSkipped} skipped)`,
    `   Initial capital:      ${summary.initialCapital.toFixed(2)}`,
    `   Final capital:        ${summary.finalCapital.toFixed(2)}`,
    `   Final value:          ${summary.finalValue.toFixed(2)}`,
    `   Return:               ${summary.returnPct.toFixed(2)}%`,
    `   Rebalances:           ${summary.rebalanceCount}`,
    `   Skipped in cooldown:  ${summary.skippedInCooldown}`,
  ];

  if (recording) {
    lines.push(
      `   Value range:          ${recording.minValue.toFixed(2)} - ${recording.maxValue.toFixed(2)}`,
      `   Max drawdown:         ${recording.maxDrawdownPct.toFixed(2)}%`
    );
  }

  return lines.join('\n');
}

export const runCommand = new Command('run')
  .description('Backtest the rebalancing strategy over historical hourly prices')
  .option('--start <date>', `Start date (default: ${DEFAULT_LOOKBACK_DAYS} days ago)`, parseDateOption)
  .option('--end <date>', 'End date (default: now)', parseDateOption)
  .option('--capital <amount>', 'Initial capital in quote units', parseCapitalOption)
  .option('--clear-cache', 'Clear the cached price series before running')
  .option('--csv <path>', 'Write the recorded value series to a CSV file')
  .action(async (options: RunCommandOptions) => {
    const end = options.end ?? new Date();
    const start = options.start ?? addHours(end, -24 * DEFAULT_LOOKBACK_DAYS);

    try {
      const config = loadAppConfig(
        process.env,
        options.capital === undefined ? {} : { initialCapital: options.capital }
      );

      backtestLogger.info(
        {
          pool: config.pool.name,
          chain: config.pool.chain,
          start: start.toISOString(),
          end: end.toISOString(),
        },
        'Starting backtest'
      );

      const result = await runBacktest(config, {
        start,
        end,
        clearCache: options.clearCache,
        csvPath: options.csv,
      });

      console.log(formatResult(result));
    } catch (error) {
      backtestLogger.error({
        error: error instanceof Error ? error.message : String(error),
        code: isBacktestError(error) ? error.code : undefined,
        msg: 'Backtest failed',
      });
      process.exitCode = 1;
    }
  });
