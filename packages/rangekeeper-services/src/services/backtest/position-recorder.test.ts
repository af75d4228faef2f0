import { describe, it, expect } from 'vitest';
import { PositionRecorder, CSV_HEADER } from './position-recorder.js';

const t = (hour: number) => new Date(Date.UTC(2024, 0, 1, hour));

describe('PositionRecorder', () => {
  it('returns no summary before any sample', () => {
    expect(new PositionRecorder().summary()).toBeNull();
  });

  it('summarizes the value series', () => {
    const recorder = new PositionRecorder();
    recorder.recordSample(t(0), 100, 2000);
    recorder.recordSample(t(1), 120, 2100);
    recorder.recordSample(t(2), 90, 1900);
    recorder.recordSample(t(3), 110, 2050);
    recorder.recordRebalance(t(2), 90, 1900);

    expect(recorder.summary()).toEqual({
      sampleCount: 4,
      rebalanceCount: 1,
      startValue: 100,
      endValue: 110,
      minValue: 90,
      maxValue: 120,
      maxDrawdownPct: 25,
    });
  });

  it('exports samples as CSV with rebalance markers', () => {
    const recorder = new PositionRecorder();
    recorder.recordSample(t(0), 10000, 2000);
    recorder.recordRebalance(t(1), 9990.5, 2400);
    recorder.recordSample(t(1), 9990.5, 2400);

    expect(recorder.toCsv()).toBe(
      [
        CSV_HEADER,
        '2024-01-01T00:00:00.000Z,10000,2000,0',
        '2024-01-01T01:00:00.000Z,9990.5,2400,1',
        '',
      ].join('\n')
    );
  });
});
