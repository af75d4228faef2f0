/**
 * @rangekeeper/shared
 *
 * Concentrated liquidity math, fee-growth accounting, shared types and the
 * error taxonomy. No I/O.
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './utils/index.js';
