/**
 * Human readable formatting of sizes and durations
 */

import { DiskError, ErrorCode, ErrorSeverity } from '../errors/index.js';
import type { SizeUnits } from '../types/disk.js';

const SIZE_UNITS: Record<SizeUnits, { divider: number; symbols: readonly string[] }> = {
  metric: { divider: 1000, symbols: ['B', 'kB', 'MB', 'GB', 'TB', 'PB', 'EB'] },
  iec: { divider: 1024, symbols: ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB'] },
  legacy: { divider: 1024, symbols: ['B', 'KB', 'MB', 'GB', 'TB', 'PB', 'EB'] },
};

export type TimeUnit = 'second' | 'minute' | 'hour' | 'day' | 'year';

const TIME_UNITS: readonly TimeUnit[] = ['second', 'minute', 'hour', 'day', 'year'];
const TIME_SHORT: Record<TimeUnit, string> = {
  second: 's',
  minute: 'min',
  hour: 'h',
  day: 'd',
  year: 'yr',
};
// Divider from each unit to the next one
const TIME_DIVIDERS: Record<TimeUnit, number> = {
  second: 60,
  minute: 60,
  hour: 24,
  day: 365,
  year: 1,
};

export interface HumanValue {
  value: number;
  unit: string;
}

function assertNonNegative(value: number, what: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new DiskError(
      `${what} must be a non-negative number, got ${value}`,
      ErrorCode.VALIDATION_ERROR,
      ErrorSeverity.LOW
    );
  }
}

/**
 * Scale a byte count to the largest unit that keeps the value >= 1
 */
export function sizeInHrf(bytes: number, units: SizeUnits = 'metric'): HumanValue {
  assertNonNegative(bytes, 'Size');
  const { divider, symbols } = SIZE_UNITS[units];

  let value = bytes;
  let index = 0;
  while (index < symbols.length - 1 && value >= divider) {
    value /= divider;
    index++;
  }
  return { value, unit: symbols[index] ?? 'B' };
}

export function formatSize(bytes: number, units: SizeUnits = 'metric', digits = 1): string {
  const { value, unit } = sizeInHrf(bytes, units);
  return `${value.toFixed(unit === 'B' ? 0 : digits)} ${unit}`;
}

/**
 * Scale a duration up from its unit (seconds to minutes to hours ...)
 */
export function timeInHrf(time: number, unit: TimeUnit = 'second', short = false): HumanValue {
  assertNonNegative(time, 'Time');

  let value = time;
  let index = TIME_UNITS.indexOf(unit);
  let current: TimeUnit = unit;
  while (index < TIME_UNITS.length - 1) {
    const divider = TIME_DIVIDERS[current];
    if (value < divider) {
      break;
    }
    value /= divider;
    index++;
    current = TIME_UNITS[index] ?? 'year';
  }
  return { value, unit: short ? TIME_SHORT[current] : current };
}
