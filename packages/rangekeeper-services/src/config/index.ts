export * from './backtest-config.js';
export * from './chains.js';
export * from './pool-config.js';
