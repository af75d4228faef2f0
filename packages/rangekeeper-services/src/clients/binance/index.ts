export {
  BinanceKlineClient,
  BinanceApiError,
  extendMidnightEnd,
  resampleHourly,
  trimSeries,
  type BinanceKlineClientDependencies,
  type Kline,
} from './binance-kline-client.js';
export { PriceSeriesCache, type CacheKey } from './price-series-cache.js';
export {
  SUPPORTED_TOKENS,
  BINANCE_SYMBOLS,
  resolveTokenSymbol,
  resolveBinanceSymbol,
  type SupportedToken,
} from './binance-symbols.js';
