/**
 * Pool and Price Source Configuration
 */

import { z } from 'zod';
import { POOL_ORIENTATIONS } from '@rangekeeper/shared';
import { SUPPORTED_CHAINS } from './chains.js';

const addressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, 'Pool address must be a 20-byte hex string');

export const poolConfigSchema = z.object({
  /** Pool contract address */
  address: addressSchema.default('0x6c561b446416e1a00e8e93e221854d6ea4171372'),
  /** "BASE/QUOTE" pair name, used to derive the exchange symbol */
  name: z
    .string()
    .regex(/^[A-Za-z0-9]+\/[A-Za-z0-9]+$/, 'Pool name must have the form BASE/QUOTE')
    .default('WETH/USDC'),
  chain: z.enum(SUPPORTED_CHAINS).default('base'),
  /** Which pool token is the quote; WETH sorts before USDC on Base */
  orientation: z.enum(POOL_ORIENTATIONS).default('base-is-token0'),
});

export type PoolConfig = Readonly<z.output<typeof poolConfigSchema>>;

export const priceSourceConfigSchema = z.object({
  apiUrl: z.string().url().default('https://api.binance.com'),
  /** Attempts per request before giving up */
  maxAttempts: z.coerce.number().int().positive().default(3),
  /** Fixed delay between attempts */
  retryDelayMs: z.coerce.number().int().min(0).default(1000),
  /** Directory for the cached price series */
  dataDir: z.string().min(1).default('./data'),
});

export type PriceSourceConfig = Readonly<z.output<typeof priceSourceConfigSchema>>;

function pickDefined(
  env: Record<string, string | undefined>,
  mapping: Record<string, string>
): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const [key, envVar] of Object.entries(mapping)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      picked[key] = value;
    }
  }
  return picked;
}

/**
 * Load pool configuration (POOL_ADDRESS, POOL_NAME, CHAIN, POOL_ORIENTATION)
 */
export function loadPoolConfig(env: Record<string, string | undefined> = process.env): PoolConfig {
  return Object.freeze(
    poolConfigSchema.parse(
      pickDefined(env, {
        address: 'POOL_ADDRESS',
        name: 'POOL_NAME',
        chain: 'CHAIN',
        orientation: 'POOL_ORIENTATION',
      })
    )
  );
}

/**
 * Load price source configuration
 * (BINANCE_API_URL, BINANCE_MAX_ATTEMPTS, BINANCE_RETRY_DELAY_MS, DATA_DIR)
 */
export function loadPriceSourceConfig(
  env: Record<string, string | undefined> = process.env
): PriceSourceConfig {
  return Object.freeze(
    priceSourceConfigSchema.parse(
      pickDefined(env, {
        apiUrl: 'BINANCE_API_URL',
        maxAttempts: 'BINANCE_MAX_ATTEMPTS',
        retryDelayMs: 'BINANCE_RETRY_DELAY_MS',
        dataDir: 'DATA_DIR',
      })
    )
  );
}
