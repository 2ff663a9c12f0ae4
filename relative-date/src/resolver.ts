/**
 * Resolver
 *
 * Maps a RelativeExpression and a reference date to an absolute calendar
 * date. Pure and total: every expression the matcher can build resolves.
 */

import { Month, Ordinal, RelativeExpression, Weekday } from './types.js';
import * as utils from './utils.js';

export function resolve(expression: RelativeExpression, referenceDate: Date): Date {
  const reference = utils.startOfDay(referenceDate);

  switch (expression.kind) {
    case 'today':
      return reference;
    case 'tomorrow':
      return utils.addDays(reference, 1);
    case 'yesterday':
      return utils.addDays(reference, -1);
    case 'offset_days':
      return utils.addDays(reference, expression.days);
    case 'offset_weeks':
      return utils.addWeeks(reference, expression.weeks);
    case 'offset_months':
      return utils.addMonths(reference, expression.months);
    case 'weekday_next':
      return utils.addDays(reference, daysUntilNext(utils.getDayOfWeek(reference), expression.weekday));
    case 'weekday_last':
      return utils.addDays(reference, -daysSinceLast(utils.getDayOfWeek(reference), expression.weekday));
    case 'weekday_this':
      return utils.addDays(reference, (expression.weekday - utils.getDayOfWeek(reference) + 7) % 7);
    case 'weekday_of_month':
      return nthWeekdayOfMonth(reference.getFullYear(), expression.month, expression.weekday, expression.ordinal);
  }
}

/**
 * Days (1-7) from `from` to the next `target`; the same weekday is a week away
 */
export function daysUntilNext(from: Weekday, target: Weekday): number {
  return ((target - from + 6) % 7) + 1;
}

/**
 * Days (1-7) back from `from` to the previous `target`
 */
export function daysSinceLast(from: Weekday, target: Weekday): number {
  return ((from - target + 6) % 7) + 1;
}

/**
 * Nth weekday of a month. Falls back to the last occurrence when the month
 * has no Nth one (a fifth Sunday) or when ordinal is -1.
 */
export function nthWeekdayOfMonth(year: number, month: Month, weekday: Weekday, ordinal: Ordinal): Date {
  const lastDay = utils.getDaysInMonth(year, month);

  if (ordinal !== -1) {
    const first = utils.getDayOfWeek(utils.calendarDate(year, month, 1));
    const day = 1 + ((weekday - first + 7) % 7) + (ordinal - 1) * 7;
    if (day <= lastDay) {
      return utils.calendarDate(year, month, day);
    }
  }

  const last = utils.getDayOfWeek(utils.calendarDate(year, month, lastDay));
  return utils.calendarDate(year, month, lastDay - ((last - weekday + 7) % 7));
}
