import { InvalidRangeError, ValidationError } from './errors.js';
import type { Task } from '../models/types.js';

const DAY_MS = 24 * 3600 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Parses a `YYYY-MM-DD` calendar date to a UTC midnight timestamp. */
export function parseCalendarDate(value: string, field = 'date'): number {
  const m = ISO_DATE.exec(value.trim());
  if (!m) throw new ValidationError(`${field} must be a date in YYYY-MM-DD form.`);
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const ts = Date.UTC(year, month - 1, day);
  const back = new Date(ts);
  // Date.UTC rolls 2025-02-30 over to March; reject instead
  if (back.getUTCFullYear() !== year || back.getUTCMonth() !== month - 1 || back.getUTCDate() !== day) {
    throw new ValidationError(`${field} is not a valid calendar date.`);
  }
  return ts;
}

/** Inclusive day count: a task that starts and ends on the same day lasts 1 day. */
export function durationDays(start: string, end: string): number {
  const from = parseCalendarDate(start, 'Start date');
  const to = parseCalendarDate(end, 'End date');
  if (to < from) throw new InvalidRangeError();
  return Math.round((to - from) / DAY_MS) + 1;
}

export function roundCurrency(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

/**
 * Estimated economic value of one volunteer's work: wage × hours/day × days,
 * rounded to cents. Unset or non-positive inputs yield 0.
 */
export function engagementValue(wageRate: number | null | undefined, hoursPerDay: number | null | undefined, days: number): number {
  if (!wageRate || wageRate <= 0) return 0;
  if (!hoursPerDay || hoursPerDay <= 0 || days <= 0) return 0;
  return roundCurrency(wageRate * hoursPerDay * days);
}

export function taskValue(task: Pick<Task, 'wage_rate' | 'hours_per_day' | 'start_date' | 'end_date'>): number {
  return engagementValue(task.wage_rate, task.hours_per_day, durationDays(task.start_date, task.end_date));
}
