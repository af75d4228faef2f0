/**
 * Position Recorder
 *
 * In-memory Recorder collecting the value series and rebalance events of a
 * run, with summary statistics and CSV export.
 */

import { writeFile } from 'node:fs/promises';
import type { Recorder } from '../types/index.js';

export interface RecordedPoint {
  timestamp: Date;
  value: number;
  price: number;
}

export interface RecordingSummary {
  sampleCount: number;
  rebalanceCount: number;
  startValue: number;
  endValue: number;
  minValue: number;
  maxValue: number;
  /** Largest peak-to-trough decline, as a percentage of the peak */
  maxDrawdownPct: number;
}

export const CSV_HEADER = 'timestamp,value,price,rebalance';

export class PositionRecorder implements Recorder {
  private readonly samples: RecordedPoint[] = [];
  private readonly rebalances: RecordedPoint[] = [];

  recordSample(timestamp: Date, value: number, price: number): void {
    this.samples.push({ timestamp, value, price });
  }

  recordRebalance(timestamp: Date, value: number, price: number): void {
    this.rebalances.push({ timestamp, value, price });
  }

  getSamples(): readonly RecordedPoint[] {
    return this.samples;
  }

  getRebalances(): readonly RecordedPoint[] {
    return this.rebalances;
  }

  summary(): RecordingSummary | null {
    const first = this.samples[0];
    const last = this.samples[this.samples.length - 1];
    if (!first || !last) {
      return null;
    }

    let minValue = first.value;
    let maxValue = first.value;
    let peak = first.value;
    let maxDrawdownPct = 0;

    for (const { value } of this.samples) {
      minValue = Math.min(minValue, value);
      maxValue = Math.max(maxValue, value);
      peak = Math.max(peak, value);
      if (peak > 0) {
        maxDrawdownPct = Math.max(maxDrawdownPct, ((peak - value) / peak) * 100);
      }
    }

    return {
      sampleCount: this.samples.length,
      rebalanceCount: this.rebalances.length,
      startValue: first.value,
      endValue: last.value,
      minValue,
      maxValue,
      maxDrawdownPct,
    };
  }

  /**
   * One row per sample; `rebalance` is 1 when a rebalance happened at that timestamp
   */
  toCsv(): string {
    const rebalanceTimes = new Set(this.rebalances.map((r) => r.timestamp.getTime()));
    const rows = this.samples.map(
      ({ timestamp, value, price }) =>
        `${timestamp.toISOString()},${value},${price},${rebalanceTimes.has(timestamp.getTime()) ? 1 : 0}`
    );
    return [CSV_HEADER, ...rows].join('\n') + '\n';
  }

  async writeCsv(path: string): Promise<void> {
    await writeFile(path, this.toCsv(), 'utf8');
  }
}
