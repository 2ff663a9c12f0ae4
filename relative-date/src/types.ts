/**
 * Relative Date Types
 *
 * Locale-independent representation of relative date expressions
 * ("amanhã", "em 3 dias", "next monday") and the lexicon tables that
 * produce them.
 */

/**
 * Weekday identifiers, 0 = Sunday (same convention as Date#getDay)
 */
export const WEEKDAY_IDS = [0, 1, 2, 3, 4, 5, 6] as const;
export type Weekday = typeof WEEKDAY_IDS[number];

export const WEEKDAY_NAMES = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday'
] as const;
export type WeekdayName = typeof WEEKDAY_NAMES[number];

/**
 * Weekday ids by canonical name
 */
export const WEEKDAYS: Readonly<Record<WeekdayName, Weekday>> = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6
};

/**
 * Months, 1 = January
 */
export const MONTH_IDS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12] as const;
export type Month = typeof MONTH_IDS[number];

export const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december'
] as const;
export type MonthName = typeof MONTH_NAMES[number];

/**
 * Occurrence of a weekday within a month; -1 is the last one
 */
export type Ordinal = 1 | 2 | 3 | 4 | 5 | -1;

/**
 * Calendar unit carried by offset templates
 */
export type DateUnit = 'day' | 'week' | 'month';

/**
 * Largest count a phrase may carry. Keeps every offset inside the Date range.
 */
export const MAX_QUANTITY = 100000;

/**
 * Locales shipped with the package. Other locales can be added by
 * dropping a lexicon file in the lexicon directory or by registering a table.
 */
export const BUILTIN_LOCALES = ['pt-BR', 'en'] as const;
export type LocaleId = typeof BUILTIN_LOCALES[number];

// ── Relative expressions ───────────────────────────────────────────────────

export interface Today {
  readonly kind: 'today';
}

export interface Tomorrow {
  readonly kind: 'tomorrow';
}

export interface Yesterday {
  readonly kind: 'yesterday';
}

export interface OffsetDays {
  readonly kind: 'offset_days';
  /** Signed day count */
  readonly days: number;
}

export interface OffsetWeeks {
  readonly kind: 'offset_weeks';
  readonly weeks: number;
}

export interface OffsetMonths {
  readonly kind: 'offset_months';
  readonly months: number;
}

/** Next occurrence strictly after the reference date */
export interface NamedWeekdayNext {
  readonly kind: 'weekday_next';
  readonly weekday: Weekday;
}

/** Previous occurrence strictly before the reference date */
export interface NamedWeekdayLast {
  readonly kind: 'weekday_last';
  readonly weekday: Weekday;
}

/** Occurrence within the coming seven days, the reference date included */
export interface NamedWeekdayThis {
  readonly kind: 'weekday_this';
  readonly weekday: Weekday;
}

/** Nth weekday of a month, in the reference date's year */
export interface WeekdayOfMonth {
  readonly kind: 'weekday_of_month';
  readonly ordinal: Ordinal;
  readonly weekday: Weekday;
  readonly month: Month;
}

export type RelativeExpression =
  | Today
  | Tomorrow
  | Yesterday
  | OffsetDays
  | OffsetWeeks
  | OffsetMonths
  | NamedWeekdayNext
  | NamedWeekdayLast
  | NamedWeekdayThis
  | WeekdayOfMonth;

export type RelativeExpressionKind = RelativeExpression['kind'];

// ── Lexicon tables ─────────────────────────────────────────────────────────

/**
 * Expression kinds a template can produce
 */
export type TemplateProduct =
  | 'offset'
  | 'weekday_next'
  | 'weekday_last'
  | 'weekday_this'
  | 'weekday_of_month';

export type TemplateDirection = 'future' | 'past';

export type TemplatePart =
  | { readonly type: 'literal'; readonly words: ReadonlySet<string> }
  | { readonly type: 'count' }
  | { readonly type: 'unit' }
  | { readonly type: 'weekday' }
  | { readonly type: 'ordinal' }
  | { readonly type: 'month' };

/**
 * Values read from a template's slots
 */
export interface TemplateCaptures {
  count?: number;
  unit?: DateUnit;
  weekday?: Weekday;
  ordinal?: Ordinal;
  month?: Month;
}

export interface LexiconTemplate {
  /** Pattern as written in the lexicon file */
  readonly pattern: string;
  readonly produces: TemplateProduct;
  readonly direction: TemplateDirection;
  readonly parts: readonly TemplatePart[];
  /** Most tokens this template can span */
  readonly maxTokens: number;
  /** Builds the expression from the captured slots */
  readonly build: (captures: TemplateCaptures) => RelativeExpression | undefined;
}

/**
 * Compiled, read-only lexicon for one locale. Every key is normalized text.
 */
export interface LexiconTable {
  readonly locale: string;
  readonly firstDayOfWeek: Weekday;
  readonly phrases: ReadonlyMap<string, RelativeExpression>;
  readonly templates: readonly LexiconTemplate[];
  readonly weekdays: ReadonlyMap<string, Weekday>;
  readonly numbers: ReadonlyMap<string, number>;
  readonly units: ReadonlyMap<string, DateUnit>;
  readonly ordinals: ReadonlyMap<string, Ordinal>;
  readonly months: ReadonlyMap<string, Month>;
  /** Longest weekday name, in tokens */
  readonly maxWeekdayTokens: number;
  /** Longest number word, in tokens */
  readonly maxNumberTokens: number;
  /** Longest token window any phrase or template can match */
  readonly maxSpan: number;
}

/**
 * An expression found inside free text
 */
export interface ExtractedExpression {
  expression: RelativeExpression;
  /** Matched normalized text */
  token: string;
  /** Start position in normalized text */
  start_pos: number;
  /** End position in normalized text (exclusive) */
  end_pos: number;
}
