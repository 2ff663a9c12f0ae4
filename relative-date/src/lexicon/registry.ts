import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { logger } from '../../../shared/observability/src/logger.js';
import { lexiconDir } from '../config.js';
import { InvalidQuantityError, LexiconError, UnsupportedLocaleError } from '../errors.js';
import { normalize, tokenize } from '../normalizer.js';
import { MAX_QUANTITY, WEEKDAY_NAMES, LexiconTable, RelativeExpression, Weekday } from '../types.js';
import { toWeekday } from '../utils.js';
import { loadLexiconFile } from './loader.js';

// ── Locale registry ─────────────────────────────────────────────────────────

const tables = new Map<string, LexiconTable>();

/** BCP 47-ish tags only; keeps lookups inside the lexicon directory */
const LOCALE_PATTERN = /^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,8})*$/;

/**
 * Get the lexicon table for a locale, loading `<locale>.yml` from the
 * lexicon directory on first use.
 */
export function lookup(locale: string): LexiconTable {
  const cached = tables.get(locale);
  if (cached) {
    return cached;
  }

  if (!LOCALE_PATTERN.test(locale)) {
    throw new UnsupportedLocaleError(locale);
  }

  const path = join(lexiconDir(), `${locale}.yml`);
  if (!existsSync(path)) {
    throw new UnsupportedLocaleError(locale);
  }

  const table = loadLexiconFile(path);
  if (table.locale !== locale) {
    throw new LexiconError(path, `declares locale "${table.locale}" but was loaded for "${locale}"`);
  }
  tables.set(locale, table);
  return table;
}

/** Register (or replace) a compiled lexicon */
export function registerLexicon(table: LexiconTable): void {
  if (tables.has(table.locale)) {
    logger.warn(`Overwriting existing lexicon: ${table.locale}`);
  }
  tables.set(table.locale, table);
}

/** Locales loaded or registered so far */
export function registeredLocales(): string[] {
  return [...tables.keys()];
}

/** Forget every loaded table; the next lookup reads lexicon files again */
export function clearLexiconCache(): void {
  tables.clear();
}

// ── Table queries ───────────────────────────────────────────────────────────

/** Exact-phrase lookup */
export function lookupPhrase(table: LexiconTable, text: string): RelativeExpression | undefined {
  return table.phrases.get(normalize(text));
}

/** Weekday-name lookup */
export function lookupWeekday(table: LexiconTable, name: string): Weekday | undefined {
  return table.weekdays.get(normalize(name));
}

export type QuantityRead =
  | { value: number; length: number }
  | { error: InvalidQuantityError; length: number };

const DIGITS = /^[+-]?\d+$/;

/**
 * Read a numeral slot starting at `start`: the longest number word, or a
 * single digit token. Always consumes at least one token.
 */
export function readQuantity(table: LexiconTable, tokens: readonly string[], start: number): QuantityRead {
  for (let length = Math.min(table.maxNumberTokens, tokens.length - start); length >= 1; length--) {
    const value = table.numbers.get(tokens.slice(start, start + length).join(' '));
    if (value !== undefined) {
      return { value, length };
    }
  }

  const token = tokens[start];
  if (!DIGITS.test(token)) {
    return { error: new InvalidQuantityError(token, 'not a number'), length: 1 };
  }

  const value = Number(token);
  if (!Number.isSafeInteger(value) || value > MAX_QUANTITY) {
    return { error: new InvalidQuantityError(token, 'too large'), length: 1 };
  }
  if (value <= 0) {
    return { error: new InvalidQuantityError(token, 'must be a positive count'), length: 1 };
  }
  return { value, length: 1 };
}

/**
 * Parse a whole string as a quantity (digits or a number word)
 */
export function parseQuantity(table: LexiconTable, text: string): number {
  const tokens = tokenize(normalize(text));
  if (tokens.length === 0) {
    throw new InvalidQuantityError(text, 'empty');
  }

  const read = readQuantity(table, tokens, 0);
  if ('error' in read) {
    throw read.error;
  }
  if (read.length !== tokens.length) {
    throw new InvalidQuantityError(text, 'not a number');
  }
  return read.value;
}

/**
 * Weekday names in the locale's week order, one entry per weekday
 */
export function weekdaysInLocaleOrder(
  table: LexiconTable
): { weekday: Weekday; name: (typeof WEEKDAY_NAMES)[number]; words: string[] }[] {
  return WEEKDAY_NAMES.map((_, offset) => {
    const weekday = toWeekday(table.firstDayOfWeek + offset);
    const words = [...table.weekdays.entries()]
      .filter(([, value]) => value === weekday)
      .map(([word]) => word);
    return { weekday, name: WEEKDAY_NAMES[weekday], words };
  });
}
