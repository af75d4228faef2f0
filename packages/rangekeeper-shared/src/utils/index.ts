/**
 * Utility functions for Rangekeeper
 */

// Uniswap V3 math
export * from './uniswapv3/index.js';

// Timestamp handling
export * from './time/timestamp.js';
