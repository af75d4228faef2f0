import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { formatResult, parseCapitalOption, parseDateOption } from './run.js';

describe('parseDateOption', () => {
  it('reads a calendar date as UTC midnight', () => {
    expect(parseDateOption('2024-03-15').toISOString()).toBe('2024-03-15T00:00:00.000Z');
  });

  it('keeps an explicit offset', () => {
    expect(parseDateOption('2024-03-15T12:00:00+02:00').toISOString()).toBe(
      '2024-03-15T10:00:00.000Z'
    );
  });

  it('reads a timestamp without offset as UTC', () => {
    expect(parseDateOption('2024-03-15T12:30:00').toISOString()).toBe('2024-03-15T12:30:00.000Z');
  });

  it('rejects garbage', () => {
    expect(() => parseDateOption('next tuesday')).toThrow(InvalidArgumentError);
  });
});

describe('parseCapitalOption', () => {
  it('parses a positive amount', () => {
    expect(parseCapitalOption('2500.5')).toBe(2500.5);
  });

  it.each(['0', '-10', 'abc'])('rejects %s', (value) => {
    expect(() => parseCapitalOption(value)).toThrow(InvalidArgumentError);
  });
});

describe('formatResult', () => {
  const summary = {
    initialCapital: 10_000,
    finalValue: 10_250.4,
    finalCapital: 10_100,
    rebalanceCount: 3,
    skippedInCooldown: 1,
    samplesProcessed: 48,
    samplesSkipped: 2,
    returnPct: 2.50456,
    cooldownUntil: null,
  };

  it('prints the summary lines', () => {
    const lines = formatResult({ summary, recording: null }).split('\n');

    expect(lines).toContain('   Samples processed:    48 (2 skipped)');
    expect(lines).toContain('   Final value:          10250.40');
    expect(lines).toContain('   Return:               2.50%');
    expect(lines).toContain('   Rebalances:           3');
    expect(lines).toContain('   Skipped in cooldown:  1');
    expect(lines.some((line) => line.includes('Max drawdown'))).toBe(false);
  });

  it('adds the value range and drawdown when samples were recorded', () => {
    const recording = {
      sampleCount: 48,
      rebalanceCount: 3,
      startValue: 10_000,
      endValue: 10_250.4,
      minValue: 9_500,
      maxValue: 10_400,
      maxDrawdownPct: 8.654,
    };

    const lines = formatResult({ summary, recording }).split('\n');

    expect(lines).toContain('   Value range:          9500.00 - 10400.00');
    expect(lines).toContain('   Max drawdown:         8.65%');
  });
});
