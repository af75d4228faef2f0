/**
 * Uniswap V3 Utilities
 */

export * from './constants.js';
export * from './ticks.js';
export * from './price.js';
export * from './liquidity.js';
export * from './fees.js';
