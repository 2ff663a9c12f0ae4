import { describe, it, expect } from 'vitest';
import {
  addDays,
  addMonths,
  addWeeks,
  calendarDate,
  formatDate,
  getDayOfWeek,
  getDaysInMonth,
  isLeapYear,
  parseDate,
  startOfDay,
  toMonth,
  toWeekday
} from '../utils.js';

describe('parseDate / formatDate', () => {
  it('should round a YYYY-MM-DD string through a local date', () => {
    const date = parseDate('2024-08-13');
    expect(date.getFullYear()).toBe(2024);
    expect(date.getMonth()).toBe(7);
    expect(date.getDate()).toBe(13);
    expect(formatDate(date)).toBe('2024-08-13');
  });

  it('should accept a leap day only in leap years', () => {
    expect(formatDate(parseDate('2024-02-29'))).toBe('2024-02-29');
    expect(() => parseDate('2023-02-29')).toThrow('Invalid date: 2023-02-29');
  });

  it('should reject other formats', () => {
    expect(() => parseDate('13/08/2024')).toThrow('Invalid date: 13/08/2024');
    expect(() => parseDate('2024-13-01')).toThrow('Invalid date: 2024-13-01');
  });
});

describe('calendarDate', () => {
  it('should build midnight local dates', () => {
    const date = calendarDate(2024, 8, 13);
    expect(formatDate(date)).toBe('2024-08-13');
    expect(date.getHours()).toBe(0);
  });

  it('should keep two-digit years literal', () => {
    expect(calendarDate(50, 1, 1).getFullYear()).toBe(50);
  });

  it('should roll overflowing days into the next month', () => {
    expect(formatDate(calendarDate(2024, 8, 32))).toBe('2024-09-01');
  });
});

describe('startOfDay', () => {
  it('should drop the time of day', () => {
    const date = startOfDay(new Date(2024, 7, 13, 15, 30));
    expect(formatDate(date)).toBe('2024-08-13');
    expect(date.getHours()).toBe(0);
    expect(date.getMinutes()).toBe(0);
  });
});

describe('addDays / addWeeks', () => {
  it('should cross month and year boundaries', () => {
    expect(formatDate(addDays(parseDate('2024-08-31'), 1))).toBe('2024-09-01');
    expect(formatDate(addDays(parseDate('2024-03-01'), -1))).toBe('2024-02-29');
    expect(formatDate(addDays(parseDate('2024-12-31'), 1))).toBe('2025-01-01');
  });

  it('should add whole weeks', () => {
    expect(formatDate(addWeeks(parseDate('2024-08-13'), 2))).toBe('2024-08-27');
    expect(formatDate(addWeeks(parseDate('2024-08-13'), -1))).toBe('2024-08-06');
  });

  it('should not mutate the input', () => {
    const date = parseDate('2024-08-13');
    addDays(date, 5);
    expect(formatDate(date)).toBe('2024-08-13');
  });
});

describe('addMonths', () => {
  it('should clamp to the last day of shorter months', () => {
    expect(formatDate(addMonths(parseDate('2023-01-31'), 1))).toBe('2023-02-28');
    expect(formatDate(addMonths(parseDate('2024-01-31'), 1))).toBe('2024-02-29');
    expect(formatDate(addMonths(parseDate('2024-03-31'), -1))).toBe('2024-02-29');
    expect(formatDate(addMonths(parseDate('2024-05-31'), 1))).toBe('2024-06-30');
  });

  it('should carry across years in both directions', () => {
    expect(formatDate(addMonths(parseDate('2024-12-15'), 1))).toBe('2025-01-15');
    expect(formatDate(addMonths(parseDate('2024-01-15'), -13))).toBe('2022-12-15');
    expect(formatDate(addMonths(parseDate('2024-08-13'), 24))).toBe('2026-08-13');
  });
});

describe('calendar helpers', () => {
  it('should count days per month', () => {
    expect(getDaysInMonth(2024, 2)).toBe(29);
    expect(getDaysInMonth(2023, 2)).toBe(28);
    expect(getDaysInMonth(2024, 4)).toBe(30);
    expect(getDaysInMonth(2024, 12)).toBe(31);
  });

  it('should detect leap years', () => {
    expect(isLeapYear(2000)).toBe(true);
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2024)).toBe(true);
    expect(isLeapYear(2023)).toBe(false);
  });

  it('should give Sunday-based weekdays', () => {
    expect(getDayOfWeek(parseDate('2024-08-13'))).toBe(2);
    expect(getDayOfWeek(parseDate('2024-08-18'))).toBe(0);
  });

  it('should wrap weekday numbers and narrow months', () => {
    expect(toWeekday(-1)).toBe(6);
    expect(toWeekday(9)).toBe(2);
    expect(toMonth(12)).toBe(12);
    expect(toMonth(13)).toBeUndefined();
  });
});
