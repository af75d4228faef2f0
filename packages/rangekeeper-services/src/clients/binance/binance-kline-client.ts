/**
 * Binance Kline Client
 *
 * Historical hourly close prices from the Binance spot klines endpoint.
 *
 * - Pages through /api/v3/klines 1000 candles at a time
 * - Retries each page with a fixed delay (maxAttempts / retryDelayMs)
 * - Resamples to an hourly grid (last close per hour), forward then backward filled
 * - Trims to [start, end]; an end at exactly midnight UTC covers that whole day
 * - Caches the result as JSON in the data directory
 */

import { z } from 'zod';
import { UpstreamUnavailableError, type PricePoint } from '@rangekeeper/shared';
import type { PriceSourceConfig } from '../../config/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { HistoricalPriceSource, PriceSeriesRequest } from '../../services/types/index.js';
import { withRetry, sleep, type SleepFn } from '../../utils/index.js';
import { PriceSeriesCache } from './price-series-cache.js';

const KLINES_ENDPOINT = '/api/v3/klines';
const KLINE_INTERVAL = '1h';
const PAGE_LIMIT = 1000;
const HOUR_MS = 3_600_000;

/**
 * [openTime, open, high, low, close, volume, closeTime, ...]
 */
const klineSchema = z
  .tuple([z.number(), z.string(), z.string(), z.string(), z.string()])
  .rest(z.unknown());

const klinesResponseSchema = z.array(klineSchema);

export interface Kline {
  openTime: number;
  close: number;
}

export class BinanceApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'BinanceApiError';
  }
}

export interface BinanceKlineClientDependencies {
  config: PriceSourceConfig;
  /** Binance spot symbol, e.g. ETHUSDT */
  symbol: string;
  fetch?: typeof fetch;
  sleep?: SleepFn;
  /** Defaults to a JSON cache in config.dataDir; null disables caching */
  cache?: PriceSeriesCache | null;
}

export class BinanceKlineClient implements HistoricalPriceSource {
  private readonly config: PriceSourceConfig;
  private readonly symbol: string;
  private readonly fetchFn: typeof fetch;
  private readonly sleepFn: SleepFn;
  private readonly cache: PriceSeriesCache | null;
  private readonly logger: ServiceLogger;

  constructor(dependencies: BinanceKlineClientDependencies) {
    this.logger = createServiceLogger('BinanceKlineClient');
    this.config = dependencies.config;
    this.symbol = dependencies.symbol;
    this.fetchFn = dependencies.fetch ?? fetch;
    this.sleepFn = dependencies.sleep ?? sleep;
    this.cache =
      dependencies.cache === undefined
        ? new PriceSeriesCache(dependencies.config.dataDir, this.logger)
        : dependencies.cache;
  }

  /**
   * Hourly close prices covering [start, end], sorted ascending
   *
   * @throws UpstreamUnavailableError when Binance cannot be reached after retries
   */
  async fetchPriceSeries(request: PriceSeriesRequest): Promise<PricePoint[]> {
    const start = request.start;
    const end = extendMidnightEnd(request.end);
    const key = { symbol: this.symbol, start, end };

    log.methodEntry(this.logger, 'fetchPriceSeries', {
      symbol: this.symbol,
      start: start.toISOString(),
      end: end.toISOString(),
    });

    const cached = await this.cache?.read(key);
    if (cached) {
      this.logger.info({ symbol: this.symbol, points: cached.length }, 'Loaded cached price data');
      return cached;
    }

    const klines = await this.fetchKlines(start.getTime(), end.getTime());
    if (klines.length === 0) {
      throw new UpstreamUnavailableError(
        `No price data returned from Binance for ${this.symbol}`,
        'binance'
      );
    }

    const series = trimSeries(resampleHourly(klines), start, end);
    await this.cache?.write(key, series);

    log.methodExit(this.logger, 'fetchPriceSeries', { symbol: this.symbol, points: series.length });
    return series;
  }

  async clearCache(): Promise<void> {
    await this.cache?.clear(this.symbol);
  }

  /**
   * All 1h klines opening in [startMs, endMs]
   */
  async fetchKlines(startMs: number, endMs: number): Promise<Kline[]> {
    const klines: Kline[] = [];
    let pageStart = startMs;

    while (pageStart < endMs) {
      const page = await this.fetchPage(pageStart, endMs);
      if (page.length === 0) {
        break;
      }

      klines.push(...page);

      const last = page[page.length - 1];
      if (!last || page.length < PAGE_LIMIT) {
        break;
      }
      pageStart = last.openTime + 1;
      await this.sleepFn(this.config.retryDelayMs);
    }

    return klines;
  }

  private async fetchPage(startMs: number, endMs: number): Promise<Kline[]> {
    const url = new URL(KLINES_ENDPOINT, this.config.apiUrl);
    url.searchParams.set('symbol', this.symbol);
    url.searchParams.set('interval', KLINE_INTERVAL);
    url.searchParams.set('startTime', String(startMs));
    url.searchParams.set('endTime', String(endMs));
    url.searchParams.set('limit', String(PAGE_LIMIT));

    log.externalApiCall(this.logger, 'Binance', 'klines', {
      symbol: this.symbol,
      startTime: new Date(startMs).toISOString(),
    });

    try {
      return await withRetry(
        async () => {
          const response = await this.fetchFn(url.toString());
          if (!response.ok) {
            throw new BinanceApiError(
              `Binance HTTP error: ${response.status} ${response.statusText}`,
              response.status
            );
          }

          const rows = klinesResponseSchema.parse(await response.json());
          return rows.map((row) => ({ openTime: row[0], close: Number(row[4]) }));
        },
        { maxAttempts: this.config.maxAttempts, delayMs: this.config.retryDelayMs },
        this.logger,
        this.sleepFn
      );
    } catch (error) {
      log.methodError(this.logger, 'fetchPage', error, { symbol: this.symbol });
      throw new UpstreamUnavailableError(
        `Failed to fetch Binance data after ${this.config.maxAttempts} attempts`,
        'binance',
        error
      );
    }
  }
}

/**
 * An end at exactly 00:00:00 UTC is read as the whole day: 23:59:59
 */
export function extendMidnightEnd(end: Date): Date {
  if (end.getUTCHours() === 0 && end.getUTCMinutes() === 0 && end.getUTCSeconds() === 0) {
    return new Date(
      Date.UTC(end.getUTCFullYear(), end.getUTCMonth(), end.getUTCDate(), 23, 59, 59)
    );
  }
  return end;
}

/**
 * Last close per hour on a contiguous hourly grid from the first to the last
 * kline's hour. Empty hours take the previous close, or the next one before
 * the first valid close.
 */
export function resampleHourly(klines: readonly Kline[]): PricePoint[] {
  const closes = new Map<number, number>();
  const ordered = [...klines].sort((a, b) => a.openTime - b.openTime);

  for (const { openTime, close } of ordered) {
    closes.set(Math.floor(openTime / HOUR_MS) * HOUR_MS, close);
  }

  const buckets = [...closes.keys()];
  if (buckets.length === 0) {
    return [];
  }

  const first = Math.min(...buckets);
  const last = Math.max(...buckets);
  const grid: Array<{ hour: number; price: number | null }> = [];

  let previous: number | null = null;
  for (let hour = first; hour <= last; hour += HOUR_MS) {
    const close = closes.get(hour);
    const price: number | null = close !== undefined && Number.isFinite(close) ? close : previous;
    grid.push({ hour, price });
    previous = price;
  }

  // Backward fill the leading gap
  let next: number | null = null;
  for (let i = grid.length - 1; i >= 0; i--) {
    const cell = grid[i];
    if (!cell) continue;
    if (cell.price === null) {
      cell.price = next;
    } else {
      next = cell.price;
    }
  }

  return grid.flatMap(({ hour, price }) =>
    price === null ? [] : [{ timestamp: new Date(hour), price }]
  );
}

/**
 * Points with start <= timestamp <= end
 */
export function trimSeries(points: readonly PricePoint[], start: Date, end: Date): PricePoint[] {
  const from = start.getTime();
  const to = end.getTime();
  return points.filter(({ timestamp }) => {
    const time = timestamp.getTime();
    return time >= from && time <= to;
  });
}
