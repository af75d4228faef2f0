/**
 * @rangekeeper/services
 *
 * Block resolution, fee accrual, position lifecycle and the backtest loop,
 * plus the viem and Binance clients they read from.
 */

export * from './config/index.js';
export * from './logging/index.js';
export * from './utils/index.js';
export * from './clients/index.js';
export * from './services/index.js';
