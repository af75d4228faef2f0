export * from './types/index.js';
export * from './block/index.js';
export * from './fee-accrual/index.js';
export * from './position-lifecycle/index.js';
export * from './backtest/index.js';
