/**
 * Backtest CLI Logging
 */

import { createServiceLogger } from '@rangekeeper/services';

export const backtestLogger = createServiceLogger('RangekeeperBacktest');
