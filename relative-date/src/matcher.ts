/**
 * Pattern Matcher
 *
 * Turns normalized text into a RelativeExpression using one locale's
 * lexicon: exact phrases first, then templates in declaration order.
 * Templates are matched in a single left-to-right pass over the tokens;
 * the whole input must be consumed.
 */

import { InvalidQuantityError, NoMatchError } from './errors.js';
import { readQuantity } from './lexicon/registry.js';
import { NormalizedText, tokenize } from './normalizer.js';
import {
  LexiconTable,
  LexiconTemplate,
  RelativeExpression,
  TemplateCaptures,
  Weekday
} from './types.js';

/**
 * Outcome of matching one token window
 */
export type TokenMatch =
  | { expression: RelativeExpression }
  | { invalid: InvalidQuantityError }
  | undefined;

/**
 * Match the full normalized text against a lexicon
 */
export function match(normalized: NormalizedText, lexicon: LexiconTable): RelativeExpression {
  const result = matchTokens(tokenize(normalized), lexicon);
  if (result === undefined) {
    throw new NoMatchError(normalized, lexicon.locale);
  }
  if ('invalid' in result) {
    throw result.invalid;
  }
  return result.expression;
}

/**
 * Match a token sequence: exact phrase, else the first template whose
 * skeleton covers every token. A skeleton that covers the tokens with a bad
 * quantity also ends the search: later templates are not tried.
 */
export function matchTokens(tokens: readonly string[], lexicon: LexiconTable): TokenMatch {
  if (tokens.length === 0) {
    return undefined;
  }

  const phrase = lexicon.phrases.get(tokens.join(' '));
  if (phrase) {
    return { expression: phrase };
  }

  for (const template of lexicon.templates) {
    const result = matchTemplate(tokens, template, lexicon);
    if (result !== undefined) {
      return result;
    }
  }
  return undefined;
}

/**
 * Match one template. A malformed quantity only counts once the rest of
 * the skeleton has matched.
 */
export function matchTemplate(
  tokens: readonly string[],
  template: LexiconTemplate,
  lexicon: LexiconTable
): TokenMatch {
  const captures: TemplateCaptures = {};
  let invalid: InvalidQuantityError | undefined;
  let pos = 0;

  for (const part of template.parts) {
    if (pos >= tokens.length) {
      return undefined;
    }
    const token = tokens[pos];

    switch (part.type) {
      case 'literal':
        if (!part.words.has(token)) return undefined;
        pos += 1;
        break;

      case 'unit': {
        const unit = lexicon.units.get(token);
        if (unit === undefined) return undefined;
        captures.unit = unit;
        pos += 1;
        break;
      }

      case 'ordinal': {
        const ordinal = lexicon.ordinals.get(token);
        if (ordinal === undefined) return undefined;
        captures.ordinal = ordinal;
        pos += 1;
        break;
      }

      case 'month': {
        const month = lexicon.months.get(token);
        if (month === undefined) return undefined;
        captures.month = month;
        pos += 1;
        break;
      }

      case 'weekday': {
        const weekday = readWeekday(tokens, pos, lexicon);
        if (weekday === undefined) return undefined;
        captures.weekday = weekday.value;
        pos += weekday.length;
        break;
      }

      case 'count': {
        const quantity = readQuantity(lexicon, tokens, pos);
        if ('error' in quantity) {
          invalid = quantity.error;
        } else {
          captures.count = quantity.value;
        }
        pos += quantity.length;
        break;
      }
    }
  }

  if (pos !== tokens.length) {
    return undefined;
  }
  if (invalid) {
    return { invalid };
  }

  const expression = template.build(captures);
  return expression ? { expression } : undefined;
}

/**
 * Longest weekday name starting at `start`
 */
function readWeekday(
  tokens: readonly string[],
  start: number,
  lexicon: LexiconTable
): { value: Weekday; length: number } | undefined {
  for (let length = Math.min(lexicon.maxWeekdayTokens, tokens.length - start); length >= 1; length--) {
    const value = lexicon.weekdays.get(tokens.slice(start, start + length).join(' '));
    if (value !== undefined) {
      return { value, length };
    }
  }
  return undefined;
}
