#!/usr/bin/env tsx
/**
 * Rangekeeper Backtest CLI
 */

import 'dotenv/config';
import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { backtestLogger } from './lib/logger.js';

const program = new Command();

program
  .name('rangekeeper-backtest')
  .description('Concentrated liquidity rebalancing backtest')
  .version('0.1.0');

program.addCommand(runCommand);

program.addHelpText(
  'after',
  `

Examples:
  $ rangekeeper-backtest run                                   Last 240 days
  $ rangekeeper-backtest run --start 2024-01-01 --end 2024-03-31
  $ rangekeeper-backtest run --clear-cache --csv ./data/run.csv
`
);

program.parseAsync().catch((error: unknown) => {
  backtestLogger.error({
    error: error instanceof Error ? error.message : String(error),
    msg: 'Unexpected CLI failure',
  });
  process.exit(1);
});
