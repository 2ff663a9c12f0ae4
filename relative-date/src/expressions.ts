/**
 * RelativeExpression constructors and display helpers
 */

import {
  MONTH_NAMES,
  WEEKDAY_NAMES,
  Month,
  NamedWeekdayLast,
  NamedWeekdayNext,
  NamedWeekdayThis,
  OffsetDays,
  OffsetMonths,
  OffsetWeeks,
  Ordinal,
  RelativeExpression,
  Today,
  Tomorrow,
  Weekday,
  WeekdayOfMonth,
  Yesterday
} from './types.js';

export const today = (): Today => Object.freeze({ kind: 'today' });

export const tomorrow = (): Tomorrow => Object.freeze({ kind: 'tomorrow' });

export const yesterday = (): Yesterday => Object.freeze({ kind: 'yesterday' });

export const offsetDays = (days: number): OffsetDays => Object.freeze({ kind: 'offset_days', days });

export const offsetWeeks = (weeks: number): OffsetWeeks => Object.freeze({ kind: 'offset_weeks', weeks });

export const offsetMonths = (months: number): OffsetMonths => Object.freeze({ kind: 'offset_months', months });

export const weekdayNext = (weekday: Weekday): NamedWeekdayNext =>
  Object.freeze({ kind: 'weekday_next', weekday });

export const weekdayLast = (weekday: Weekday): NamedWeekdayLast =>
  Object.freeze({ kind: 'weekday_last', weekday });

export const weekdayThis = (weekday: Weekday): NamedWeekdayThis =>
  Object.freeze({ kind: 'weekday_this', weekday });

export const weekdayOfMonth = (ordinal: Ordinal, weekday: Weekday, month: Month): WeekdayOfMonth =>
  Object.freeze({ kind: 'weekday_of_month', ordinal, weekday, month });

/**
 * Render an expression for display, e.g. "OffsetDays(3)" or "NamedWeekdayNext(monday)"
 */
export function formatExpression(expression: RelativeExpression): string {
  switch (expression.kind) {
    case 'today':
      return 'Today';
    case 'tomorrow':
      return 'Tomorrow';
    case 'yesterday':
      return 'Yesterday';
    case 'offset_days':
      return `OffsetDays(${expression.days})`;
    case 'offset_weeks':
      return `OffsetWeeks(${expression.weeks})`;
    case 'offset_months':
      return `OffsetMonths(${expression.months})`;
    case 'weekday_next':
      return `NamedWeekdayNext(${WEEKDAY_NAMES[expression.weekday]})`;
    case 'weekday_last':
      return `NamedWeekdayLast(${WEEKDAY_NAMES[expression.weekday]})`;
    case 'weekday_this':
      return `NamedWeekdayThis(${WEEKDAY_NAMES[expression.weekday]})`;
    case 'weekday_of_month': {
      const ordinal = expression.ordinal === -1 ? 'last' : String(expression.ordinal);
      return `WeekdayOfMonth(${ordinal}, ${WEEKDAY_NAMES[expression.weekday]}, ${MONTH_NAMES[expression.month - 1]})`;
    }
  }
}
