/**
 * Timestamp normalization
 *
 * Accepts epoch seconds, Date instances and ISO-8601 strings. A string is
 * "timezone-aware" only when it carries `Z` or a `±hh:mm` offset.
 */

import { z } from 'zod';
import { InvalidInputError } from '../../errors/index.js';

export type TimestampInput = number | Date | string;

export interface NormalizeTimestampOptions {
  /**
   * Treat calendar strings without an offset as UTC instead of rejecting them.
   */
  assumeUtc?: boolean;
}

const awareIsoSchema = z.string().datetime({ offset: true });
const naiveIsoSchema = z.string().datetime({ local: true });

/**
 * Normalize a timestamp to a UTC Date.
 *
 * @throws InvalidInputError for naive strings (unless assumeUtc), unparseable
 *   strings, invalid dates and non-finite numbers
 */
export function toUtcDate(input: TimestampInput, options: NormalizeTimestampOptions = {}): Date {
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new InvalidInputError(`Timestamp must be a finite number (got ${input})`);
    }
    return new Date(input * 1000);
  }

  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new InvalidInputError('Timestamp is an invalid Date');
    }
    return input;
  }

  if (awareIsoSchema.safeParse(input).success) {
    return new Date(input);
  }

  if (naiveIsoSchema.safeParse(input).success) {
    if (!options.assumeUtc) {
      throw new InvalidInputError('Timestamp must be timezone-aware (UTC)', { input });
    }
    return new Date(`${input}Z`);
  }

  throw new InvalidInputError(`Unparseable timestamp: ${input}`, { input });
}

/**
 * Normalize a timestamp to integer epoch seconds (truncated).
 */
export function toEpochSeconds(
  input: TimestampInput,
  options: NormalizeTimestampOptions = {}
): number {
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new InvalidInputError(`Timestamp must be a finite number (got ${input})`);
    }
    return Math.trunc(input);
  }
  return Math.floor(toUtcDate(input, options).getTime() / 1000);
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * 3600 * 1000);
}
