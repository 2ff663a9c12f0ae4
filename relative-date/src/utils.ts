/**
 * Calendar Utilities Module
 *
 * Plain calendar-date helpers for relative date resolution. Dates are local
 * Date values at 00:00; time-of-day and timezone never enter the arithmetic.
 * Handles month boundaries and leap years.
 */

import { MONTH_IDS, WEEKDAY_IDS, Month, Weekday } from './types.js';

/**
 * Build a local calendar date (month is 1-indexed)
 */
export function calendarDate(year: number, month: number, day: number): Date {
  const result = new Date(2000, 0, 1);
  // setFullYear keeps years below 100 literal
  result.setFullYear(year, month - 1, day);
  result.setHours(0, 0, 0, 0);
  return result;
}

/**
 * Parse a YYYY-MM-DD string into a local calendar date
 */
export function parseDate(input: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(input.trim());
  if (!match) {
    throw new Error(`Invalid date: ${input}`);
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);

  if (month < 1 || month > 12 || day < 1 || day > getDaysInMonth(year, month)) {
    throw new Error(`Invalid date: ${input}`);
  }

  return calendarDate(year, month, day);
}

/**
 * Format a date as YYYY-MM-DD using its local calendar fields
 */
export function formatDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Drop the time-of-day part of a date
 */
export function startOfDay(date: Date): Date {
  return calendarDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
}

/**
 * Add days to a date
 */
export function addDays(date: Date, days: number): Date {
  return calendarDate(date.getFullYear(), date.getMonth() + 1, date.getDate() + days);
}

/**
 * Add weeks to a date
 */
export function addWeeks(date: Date, weeks: number): Date {
  return addDays(date, weeks * 7);
}

/**
 * Add months to a date (handles month boundaries correctly)
 */
export function addMonths(date: Date, months: number): Date {
  const totalMonths = date.getFullYear() * 12 + date.getMonth() + months;
  const newYear = Math.floor(totalMonths / 12);
  const newMonth = totalMonths - newYear * 12 + 1;

  // Handle day overflow (e.g., Jan 31 + 1 month = Feb 28/29)
  const newDay = Math.min(date.getDate(), getDaysInMonth(newYear, newMonth));

  return calendarDate(newYear, newMonth, newDay);
}

/**
 * Get day of week (0 = Sunday, 1 = Monday, ..., 6 = Saturday)
 */
export function getDayOfWeek(date: Date): Weekday {
  return toWeekday(date.getDay());
}

/**
 * Wrap any integer onto the 0-6 weekday range
 */
export function toWeekday(value: number): Weekday {
  return WEEKDAY_IDS[((value % 7) + 7) % 7];
}

/**
 * Narrow a 1-12 month number, undefined when out of range
 */
export function toMonth(value: number): Month | undefined {
  return MONTH_IDS.find((month) => month === value);
}

/**
 * Get number of days in a month (handles leap years)
 */
export function getDaysInMonth(year: number, month: number): number {
  // Month is 1-indexed (1 = January, 12 = December); day 0 of the next month
  return calendarDate(year, month + 1, 0).getDate();
}

/**
 * Check if a year is a leap year
 */
export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || (year % 400 === 0);
}
