import { describe, it, expect } from 'vitest';
import { durationDays, engagementValue, roundCurrency, taskValue } from '../src/engine/value.js';
import { InvalidRangeError, ValidationError } from '../src/engine/errors.js';

describe('durationDays', () => {
  it('counts a same-day task as one day', () => {
    expect(durationDays('2025-03-10', '2025-03-10')).toBe(1);
  });

  it('counts both ends, across month boundaries', () => {
    expect(durationDays('2025-03-10', '2025-03-14')).toBe(5);
    expect(durationDays('2025-02-27', '2025-03-02')).toBe(4);
    expect(durationDays('2024-02-28', '2024-03-01')).toBe(3);
  });

  it('rejects an end before the start', () => {
    expect(() => durationDays('2025-03-15', '2025-03-10')).toThrow(InvalidRangeError);
    expect(() => durationDays('2025-03-15', '2025-03-10')).toThrow('End date cannot be before start date.');
  });

  it('rejects malformed and impossible dates as validation errors', () => {
    expect(() => durationDays('2025-02-30', '2025-03-01')).toThrow('Start date is not a valid calendar date.');
    expect(() => durationDays('2025-03-01', '03/04/2025')).toThrow('End date must be a date in YYYY-MM-DD form.');
    expect(() => durationDays('2025-3-1', '2025-03-04')).toThrow(ValidationError);
  });
});

describe('engagementValue', () => {
  it('multiplies wage, hours and days', () => {
    expect(engagementValue(300, 4, 1)).toBe(1200);
    expect(engagementValue(12.5, 3, 2)).toBe(75);
  });

  it('is zero when wage or hours are unset or not positive', () => {
    expect(engagementValue(null, 4, 1)).toBe(0);
    expect(engagementValue(undefined, 4, 1)).toBe(0);
    expect(engagementValue(0, 4, 1)).toBe(0);
    expect(engagementValue(-10, 4, 1)).toBe(0);
    expect(engagementValue(300, 0, 1)).toBe(0);
    expect(engagementValue(300, null, 1)).toBe(0);
  });

  it('rounds to cents', () => {
    expect(roundCurrency(10 / 3)).toBe(3.33);
    expect(engagementValue(0.1, 3, 1)).toBe(0.3);
  });
});

describe('taskValue', () => {
  it('uses the task duration', () => {
    expect(taskValue({ wage_rate: 300, hours_per_day: 4, start_date: '2025-03-10', end_date: '2025-03-12' })).toBe(3600);
    expect(taskValue({ wage_rate: null, hours_per_day: 4, start_date: '2025-03-10', end_date: '2025-03-12' })).toBe(0);
  });
});
