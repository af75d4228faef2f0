export * from './evm/index.js';
export * from './binance/index.js';
