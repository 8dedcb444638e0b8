/**
 * Unit tests for human readable formatting
 */

import { describe, it, expect } from '@jest/globals';
import { formatSize, sizeInHrf, timeInHrf } from './size.js';
import { DiskError, ErrorCode } from '../errors/index.js';

describe('sizeInHrf', () => {
  it('should keep small values in bytes', () => {
    expect(sizeInHrf(0)).toEqual({ value: 0, unit: 'B' });
    expect(sizeInHrf(999)).toEqual({ value: 999, unit: 'B' });
  });

  it('should scale by 1000 in metric units', () => {
    expect(sizeInHrf(1000)).toEqual({ value: 1, unit: 'kB' });
    expect(sizeInHrf(2500000000)).toEqual({ value: 2.5, unit: 'GB' });
  });

  it('should scale by 1024 in IEC and legacy units', () => {
    expect(sizeInHrf(1536, 'iec')).toEqual({ value: 1.5, unit: 'KiB' });
    expect(sizeInHrf(1536, 'legacy')).toEqual({ value: 1.5, unit: 'KB' });
    expect(sizeInHrf(3 * 1024 ** 3, 'iec')).toEqual({ value: 3, unit: 'GiB' });
  });

  it('should stop at the largest unit', () => {
    expect(sizeInHrf(1e21)).toEqual({ value: 1000, unit: 'EB' });
  });

  it('should reject negative sizes', () => {
    expect(() => sizeInHrf(-1)).toThrow(DiskError);
    expect(() => sizeInHrf(-1)).toThrow('Size must be a non-negative number, got -1');

    const error = (() => {
      try {
        sizeInHrf(Number.NaN);
      } catch (e) {
        return e;
      }
      return undefined;
    })();
    expect(error).toMatchObject({ code: ErrorCode.VALIDATION_ERROR });
  });
});

describe('formatSize', () => {
  it('should format with one decimal above bytes', () => {
    expect(formatSize(512)).toBe('512 B');
    expect(formatSize(1536, 'iec')).toBe('1.5 KiB');
    expect(formatSize(1024209543168)).toBe('1.0 TB');
  });
});

describe('timeInHrf', () => {
  it('should scale seconds up', () => {
    expect(timeInHrf(30)).toEqual({ value: 30, unit: 'second' });
    expect(timeInHrf(90)).toEqual({ value: 1.5, unit: 'minute' });
    expect(timeInHrf(7200, 'second', true)).toEqual({ value: 2, unit: 'h' });
  });

  it('should start from the given unit', () => {
    expect(timeInHrf(48, 'hour')).toEqual({ value: 2, unit: 'day' });
    expect(timeInHrf(730, 'day', true)).toEqual({ value: 2, unit: 'yr' });
    expect(timeInHrf(3, 'year')).toEqual({ value: 3, unit: 'year' });
  });

  it('should reject negative durations', () => {
    expect(() => timeInHrf(-5)).toThrow('Time must be a non-negative number, got -5');
  });
});
