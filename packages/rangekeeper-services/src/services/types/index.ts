export type {
  ChainStateProvider,
  PriceSeriesRequest,
  HistoricalPriceSource,
  Recorder,
} from './chain-state.js';
