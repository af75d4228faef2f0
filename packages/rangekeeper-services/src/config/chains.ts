/**
 * Chain Configuration
 *
 * Supported networks with their viem chain objects, average block times and
 * the environment variable holding each chain's RPC URL.
 */

import type { Chain } from 'viem';
import { arbitrum, base, mainnet, optimism, polygon } from 'viem/chains';

export const SUPPORTED_CHAINS = ['ethereum', 'base', 'arbitrum', 'optimism', 'polygon'] as const;

export type SupportedChain = (typeof SUPPORTED_CHAINS)[number];

export interface ChainConfig {
  name: SupportedChain;
  chain: Chain;
  /** Average seconds per block, used to narrow block searches */
  blockTimeSeconds: number;
  rpcEnvVar: string;
}

export const CHAIN_CONFIGS: Record<SupportedChain, ChainConfig> = {
  ethereum: { name: 'ethereum', chain: mainnet, blockTimeSeconds: 12, rpcEnvVar: 'RPC_URL_ETHEREUM' },
  base: { name: 'base', chain: base, blockTimeSeconds: 2, rpcEnvVar: 'RPC_URL_BASE' },
  arbitrum: { name: 'arbitrum', chain: arbitrum, blockTimeSeconds: 0.25, rpcEnvVar: 'RPC_URL_ARBITRUM' },
  optimism: { name: 'optimism', chain: optimism, blockTimeSeconds: 2, rpcEnvVar: 'RPC_URL_OPTIMISM' },
  polygon: { name: 'polygon', chain: polygon, blockTimeSeconds: 2, rpcEnvVar: 'RPC_URL_POLYGON' },
};

/**
 * Check if a chain name is supported
 */
export function isSupportedChain(name: string): name is SupportedChain {
  return (SUPPORTED_CHAINS as readonly string[]).includes(name);
}

/**
 * Get the configuration of a supported chain
 *
 * @throws Error if the chain is not supported
 */
export function getChainConfig(name: string): ChainConfig {
  if (!isSupportedChain(name)) {
    throw new Error(`Unsupported blockchain: ${name}. Supported options are: ${SUPPORTED_CHAINS.join(', ')}`);
  }
  return CHAIN_CONFIGS[name];
}

/**
 * Get the RPC URL for a chain from the environment
 *
 * @throws Error if the variable is not set
 */
export function getRpcUrl(
  name: SupportedChain,
  env: Record<string, string | undefined> = process.env
): string {
  const { rpcEnvVar } = CHAIN_CONFIGS[name];
  const url = env[rpcEnvVar];

  if (!url) {
    throw new Error(`${rpcEnvVar} environment variable is required for chain ${name}`);
  }

  return url;
}
