import { describe, it, expect } from 'vitest';
import { addDays, countTripDays, parseIsoDate } from './dates';

describe('parseIsoDate', () => {
  it('parses calendar days as UTC midnight', () => {
    expect(parseIsoDate('2024-06-01')?.toISOString()).toBe('2024-06-01T00:00:00.000Z');
  });

  it('rejects impossible dates and other formats', () => {
    expect(parseIsoDate('2024-02-30')).toBeNull();
    expect(parseIsoDate('2024-6-1')).toBeNull();
    expect(parseIsoDate('June 1, 2024')).toBeNull();
  });
});

describe('addDays', () => {
  it('crosses month and leap-year boundaries', () => {
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-06-30', 2)).toBe('2024-07-02');
  });

  it('throws on an invalid start date', () => {
    expect(() => addDays('not-a-date', 1)).toThrow(RangeError);
  });
});

describe('countTripDays', () => {
  it('counts both ends of the range', () => {
    expect(countTripDays('2024-06-01', '2024-06-03')).toBe(3);
    expect(countTripDays('2024-06-01', '2024-06-01')).toBe(1);
  });

  it('returns 0 when the range is reversed or invalid', () => {
    expect(countTripDays('2024-06-05', '2024-06-01')).toBe(0);
    expect(countTripDays('2024-06-01', 'soon')).toBe(0);
  });
});
