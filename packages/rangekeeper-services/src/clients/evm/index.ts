export { ViemChainStateProvider } from './viem-chain-state-provider.js';
export type { ViemChainStateProviderDependencies } from './viem-chain-state-provider.js';
export { UNISWAP_V3_POOL_ABI } from './pool-abi.js';
