/**
 * Backtest Configuration
 *
 * Read-only strategy and search parameters, validated with zod and frozen.
 * One value is built at startup and passed to every service constructor.
 */

import { z } from 'zod';

const booleanFromEnv = z.preprocess((value) => {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}, z.boolean());

export const backtestConfigSchema = z
  .object({
    /** Range lower bound as a multiple of the open price */
    lowerBoundFactor: z.coerce.number().positive().default(0.85),
    /** Range upper bound as a multiple of the open price */
    upperBoundFactor: z.coerce.number().positive().default(1.15),
    /** Tolerance band beyond the range before a rebalance fires */
    bufferPct: z.coerce.number().min(0).default(0.01),
    /** Absolute relative move over the lookback window that counts as a wick */
    wickThresholdPct: z.coerce.number().positive().default(0.08),
    wickLookbackHours: z.coerce.number().positive().default(12),
    wickCooldownHours: z.coerce.number().min(0).default(4),
    /** One-sided haircut applied to the position value on close */
    slippageFactor: z.coerce.number().min(0).lt(1).default(0.001),
    initialCapital: z.coerce.number().positive().default(10_000),
    toleranceSeconds: z.coerce.number().int().min(0).default(5),
    maxSearchTries: z.coerce.number().int().min(0).default(50),
    /** Average seconds per block; narrows the block search bracket when set */
    approxBlockTimeSeconds: z.coerce.number().positive().optional(),
    /** Use uint256 modular subtraction for fee-growth deltas */
    feeGrowthWrapCorrection: booleanFromEnv.default(false),
  })
  .refine((config) => config.lowerBoundFactor < config.upperBoundFactor, {
    message: 'lowerBoundFactor must be less than upperBoundFactor',
    path: ['lowerBoundFactor'],
  });

export type BacktestConfig = Readonly<z.output<typeof backtestConfigSchema>>;
export type BacktestConfigInput = z.input<typeof backtestConfigSchema>;

/**
 * Environment variable names for each configuration key
 */
const BACKTEST_ENV_VARS = {
  lowerBoundFactor: 'LOWER_BOUND_FACTOR',
  upperBoundFactor: 'UPPER_BOUND_FACTOR',
  bufferPct: 'BUFFER_PCT',
  wickThresholdPct: 'WICK_THRESHOLD_PCT',
  wickLookbackHours: 'WICK_LOOKBACK_HOURS',
  wickCooldownHours: 'WICK_COOLDOWN_HOURS',
  slippageFactor: 'SLIPPAGE_FACTOR',
  initialCapital: 'INITIAL_CAPITAL',
  toleranceSeconds: 'BLOCK_TOLERANCE_SECONDS',
  maxSearchTries: 'BLOCK_MAX_SEARCH_TRIES',
  approxBlockTimeSeconds: 'APPROX_BLOCK_TIME_SECONDS',
  feeGrowthWrapCorrection: 'FEE_GROWTH_WRAP_CORRECTION',
} as const satisfies Record<keyof BacktestConfigInput, string>;

/**
 * Build a frozen configuration from explicit values, applying defaults
 */
export function createBacktestConfig(input: BacktestConfigInput = {}): BacktestConfig {
  return Object.freeze(backtestConfigSchema.parse(input));
}

/**
 * Build a frozen configuration from environment variables
 *
 * @param env - Environment record (defaults to process.env)
 * @param overrides - Values taking precedence over the environment
 */
export function loadBacktestConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: BacktestConfigInput = {}
): BacktestConfig {
  const fromEnv: Record<string, string> = {};

  for (const [key, envVar] of Object.entries(BACKTEST_ENV_VARS)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      fromEnv[key] = value;
    }
  }

  return Object.freeze(backtestConfigSchema.parse({ ...fromEnv, ...overrides }));
}
