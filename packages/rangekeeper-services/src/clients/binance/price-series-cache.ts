/**
 * JSON file cache for an hourly price series
 *
 * One file per symbol in the data directory. A cached series is reused only
 * for the exact range it was fetched for.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { PricePoint } from '@rangekeeper/shared';
import type { ServiceLogger } from '../../logging/index.js';

const cachedSeriesSchema = z.object({
  symbol: z.string(),
  start: z.string().datetime(),
  end: z.string().datetime(),
  points: z.array(
    z.object({
      timestamp: z.string().datetime(),
      price: z.number(),
    })
  ),
});

export interface CacheKey {
  symbol: string;
  start: Date;
  end: Date;
}

export class PriceSeriesCache {
  constructor(
    private readonly dataDir: string,
    private readonly logger: ServiceLogger
  ) {}

  pathFor(symbol: string): string {
    return join(this.dataDir, `historical_prices_1h_${symbol}.json`);
  }

  /**
   * Cached series for the key, or null when missing, stale or unreadable
   */
  async read(key: CacheKey): Promise<PricePoint[] | null> {
    const path = this.pathFor(key.symbol);

    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    const parsed = cachedSeriesSchema.safeParse(safeJsonParse(raw));
    if (!parsed.success) {
      this.logger.warn({ path, issues: parsed.error.issues.length }, 'Ignoring unreadable price cache');
      return null;
    }

    const cached = parsed.data;
    if (
      cached.symbol !== key.symbol ||
      new Date(cached.start).getTime() !== key.start.getTime() ||
      new Date(cached.end).getTime() !== key.end.getTime()
    ) {
      this.logger.debug({ path }, 'Price cache covers a different range');
      return null;
    }

    return cached.points.map((point) => ({
      timestamp: new Date(point.timestamp),
      price: point.price,
    }));
  }

  async write(key: CacheKey, points: readonly PricePoint[]): Promise<void> {
    const path = this.pathFor(key.symbol);
    await mkdir(this.dataDir, { recursive: true });
    await writeFile(
      path,
      JSON.stringify({
        symbol: key.symbol,
        start: key.start.toISOString(),
        end: key.end.toISOString(),
        points: points.map((point) => ({
          timestamp: point.timestamp.toISOString(),
          price: point.price,
        })),
      }),
      'utf8'
    );
    this.logger.debug({ path, points: points.length }, 'Price series cached');
  }

  async clear(symbol: string): Promise<void> {
    await rm(this.pathFor(symbol), { force: true });
    this.logger.info({ symbol }, 'Cleared cached price data');
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
