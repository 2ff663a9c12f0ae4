/**
 * Lexicon Loader
 *
 * Reads a locale's YAML lexicon, validates it and compiles it into an
 * immutable LexiconTable. Every surface form is normalized here so the
 * matcher only ever compares normalized tokens.
 */

import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { logger } from '../../../shared/observability/src/logger.js';
import { LexiconError } from '../errors.js';
import * as expr from '../expressions.js';
import { normalize, tokenize } from '../normalizer.js';
import {
  MONTH_NAMES,
  WEEKDAYS,
  WEEKDAY_NAMES,
  DateUnit,
  LexiconTable,
  LexiconTemplate,
  Month,
  Ordinal,
  RelativeExpression,
  TemplateCaptures,
  TemplatePart,
  Weekday
} from '../types.js';
import { toMonth } from '../utils.js';
import {
  LexiconFile,
  LexiconFileSchema,
  PhraseExpression,
  TemplateDefinition
} from './schema.js';

type SlotType = Exclude<TemplatePart['type'], 'literal'>;

const SLOT_PATTERN = /^\{(\w+)\}$/;

const SLOT_TYPES: Record<string, SlotType> = {
  count: 'count',
  unit: 'unit',
  weekday: 'weekday',
  ordinal: 'ordinal',
  month: 'month'
};

/** Slots each template kind must declare */
const REQUIRED_SLOTS: Record<TemplateDefinition['produces'], SlotType[]> = {
  offset: ['count', 'unit'],
  weekday_next: ['weekday'],
  weekday_last: ['weekday'],
  weekday_this: ['weekday'],
  weekday_of_month: ['ordinal', 'weekday', 'month']
};

/**
 * Read and compile a lexicon file
 */
export function loadLexiconFile(path: string): LexiconTable {
  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(path, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to read lexicon: ${path}`, { error: message });
    throw new LexiconError(path, message);
  }

  const table = buildLexiconTable(raw, path);
  logger.info(`Lexicon loaded for ${table.locale}: ${path}`, {
    phrases: table.phrases.size,
    templates: table.templates.length
  });
  return table;
}

/**
 * Validate a raw lexicon definition and compile it
 */
export function buildLexiconTable(raw: unknown, source = 'inline'): LexiconTable {
  const parsed = LexiconFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new LexiconError(source, issues);
  }
  return compile(parsed.data, source);
}

function compile(file: LexiconFile, source: string): LexiconTable {
  const weekdays = new Map<string, Weekday>();
  for (const name of WEEKDAY_NAMES) {
    for (const word of file.weekdays[name]) {
      addEntry(weekdays, word, WEEKDAYS[name], source, 'weekday');
    }
  }

  const numbers = new Map<string, number>();
  for (const [word, value] of Object.entries(file.numbers)) {
    addEntry(numbers, word, value, source, 'number');
  }

  const units = new Map<string, DateUnit>();
  for (const unit of ['day', 'week', 'month'] as const) {
    for (const word of file.units[unit]) {
      addEntry(units, word, unit, source, 'unit');
    }
  }

  const ordinals = new Map<string, Ordinal>();
  for (const [word, value] of Object.entries(file.ordinals)) {
    addEntry(ordinals, word, value, source, 'ordinal');
  }

  const months = new Map<string, Month>();
  if (file.months) {
    MONTH_NAMES.forEach((name, index) => {
      const month = toMonth(index + 1);
      if (file.months && month !== undefined) {
        for (const word of file.months[name]) {
          addEntry(months, word, month, source, 'month');
        }
      }
    });
  }

  const phrases = new Map<string, RelativeExpression>();
  for (const { phrase, expression } of file.phrases) {
    const key = normalize(phrase);
    const value = toExpression(expression);
    const existing = phrases.get(key);
    if (existing && JSON.stringify(existing) !== JSON.stringify(value)) {
      throw new LexiconError(source, `phrase "${phrase}" is declared with two meanings`);
    }
    phrases.set(key, value);
  }

  const maxWeekdayTokens = longestKey(weekdays);
  const maxNumberTokens = longestKey(numbers);

  const templates = file.templates.map((definition) =>
    compileTemplate(definition, source, { maxWeekdayTokens, maxNumberTokens, hasMonths: months.size > 0 })
  );

  const maxSpan = Math.max(1, longestKey(phrases), ...templates.map((t) => t.maxTokens));

  return Object.freeze({
    locale: file.locale,
    firstDayOfWeek: WEEKDAYS[file.first_day_of_week],
    phrases,
    templates: Object.freeze(templates),
    weekdays,
    numbers,
    units,
    ordinals,
    months,
    maxWeekdayTokens,
    maxNumberTokens,
    maxSpan
  });
}

/**
 * Compile one template pattern into its parts and expression builder
 */
export function compileTemplate(
  definition: TemplateDefinition,
  source: string,
  limits: { maxWeekdayTokens: number; maxNumberTokens: number; hasMonths: boolean }
): LexiconTemplate {
  const tokens = tokenize(normalize(definition.pattern));
  const parts: TemplatePart[] = [];
  const seen = new Set<SlotType>();

  for (const token of tokens) {
    const slot = SLOT_PATTERN.exec(token);
    if (slot) {
      const type = Object.hasOwn(SLOT_TYPES, slot[1]) ? SLOT_TYPES[slot[1]] : undefined;
      if (!type) {
        throw new LexiconError(source, `unknown slot {${slot[1]}} in "${definition.pattern}"`);
      }
      if (seen.has(type)) {
        throw new LexiconError(source, `slot {${type}} appears twice in "${definition.pattern}"`);
      }
      seen.add(type);
      parts.push({ type });
      continue;
    }

    const words = token.split('|').filter((word) => word.length > 0);
    if (words.length === 0) {
      throw new LexiconError(source, `empty alternative in "${definition.pattern}"`);
    }
    parts.push({ type: 'literal', words: new Set(words) });
  }

  for (const required of REQUIRED_SLOTS[definition.produces]) {
    if (!seen.has(required)) {
      throw new LexiconError(
        source,
        `template "${definition.pattern}" produces ${definition.produces} but has no {${required}} slot`
      );
    }
  }
  if (seen.has('month') && !limits.hasMonths) {
    throw new LexiconError(source, `template "${definition.pattern}" uses {month} but no months are declared`);
  }

  const maxTokens = parts.reduce((total, part) => {
    if (part.type === 'count') return total + Math.max(1, limits.maxNumberTokens);
    if (part.type === 'weekday') return total + limits.maxWeekdayTokens;
    return total + 1;
  }, 0);

  return Object.freeze({
    pattern: definition.pattern,
    produces: definition.produces,
    direction: definition.direction,
    parts: Object.freeze(parts),
    maxTokens,
    build: expressionBuilder(definition)
  });
}

function expressionBuilder(
  definition: TemplateDefinition
): (captures: TemplateCaptures) => RelativeExpression | undefined {
  const sign = definition.direction === 'past' ? -1 : 1;

  switch (definition.produces) {
    case 'offset':
      return ({ count, unit }) => {
        if (count === undefined || unit === undefined) return undefined;
        if (unit === 'week') return expr.offsetWeeks(sign * count);
        if (unit === 'month') return expr.offsetMonths(sign * count);
        return expr.offsetDays(sign * count);
      };
    case 'weekday_next':
      return ({ weekday }) => (weekday === undefined ? undefined : expr.weekdayNext(weekday));
    case 'weekday_last':
      return ({ weekday }) => (weekday === undefined ? undefined : expr.weekdayLast(weekday));
    case 'weekday_this':
      return ({ weekday }) => (weekday === undefined ? undefined : expr.weekdayThis(weekday));
    case 'weekday_of_month':
      return ({ ordinal, weekday, month }) =>
        ordinal === undefined || weekday === undefined || month === undefined
          ? undefined
          : expr.weekdayOfMonth(ordinal, weekday, month);
  }
}

function toExpression(expression: PhraseExpression): RelativeExpression {
  switch (expression.kind) {
    case 'today':
      return expr.today();
    case 'tomorrow':
      return expr.tomorrow();
    case 'yesterday':
      return expr.yesterday();
    case 'offset_days':
      return expr.offsetDays(expression.days);
    case 'offset_weeks':
      return expr.offsetWeeks(expression.weeks);
    case 'offset_months':
      return expr.offsetMonths(expression.months);
    case 'weekday_next':
      return expr.weekdayNext(WEEKDAYS[expression.weekday]);
    case 'weekday_last':
      return expr.weekdayLast(WEEKDAYS[expression.weekday]);
    case 'weekday_this':
      return expr.weekdayThis(WEEKDAYS[expression.weekday]);
  }
}

function addEntry<T>(map: Map<string, T>, word: string, value: T, source: string, label: string): void {
  const key = normalize(word);
  const existing = map.get(key);
  if (existing !== undefined && existing !== value) {
    throw new LexiconError(source, `${label} "${word}" maps to both ${String(existing)} and ${String(value)}`);
  }
  map.set(key, value);
}

/** Longest key of a table, in tokens */
function longestKey(map: ReadonlyMap<string, unknown>): number {
  let longest = 0;
  for (const key of map.keys()) {
    longest = Math.max(longest, tokenize(key).length);
  }
  return longest;
}
