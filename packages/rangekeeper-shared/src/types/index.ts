export type {
  BlockIdentifier,
  BlockHeader,
  FeeGrowthPair,
  TokenDecimals,
  ChainStateSnapshot,
  PriceOverride,
} from './chain-state.js';
export {
  EMPTY_POSITION,
  type PriceRange,
  type RangeFactors,
  type LiquidityPosition,
  type PositionState,
} from './position.js';
export type { PricePoint } from './price-series.js';
