/**
 * Parser Test Suite
 *
 * Golden tests using fixed reference date: Tuesday, 2024-08-13
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { InvalidQuantityError, LexiconError, NoMatchError, UnsupportedLocaleError } from '../errors.js';
import {
  offsetDays,
  offsetWeeks,
  today,
  tomorrow,
  weekdayNext,
  weekdayOfMonth,
  yesterday
} from '../expressions.js';
import { clearLexiconCache, lookup } from '../lexicon/registry.js';
import { match } from '../matcher.js';
import { normalize } from '../normalizer.js';
import { parse, parseRelativeDate, ParseResult } from '../parser.js';
import { resolve } from '../resolver.js';
import { BUILTIN_LOCALES, RelativeExpression } from '../types.js';
import { formatDate, parseDate } from '../utils.js';

// Golden reference date: Tuesday, August 13, 2024
const REFERENCE_DATE = parseDate('2024-08-13');

function expectExpression(result: ParseResult): RelativeExpression {
  if (!result.success) {
    throw new Error(`Expected a match, got ${result.error.message}`);
  }
  return result.data;
}

function expectError(result: ParseResult): Error {
  if (result.success) {
    throw new Error('Expected a parse failure');
  }
  return result.error;
}

describe('Golden scenarios (pt-BR)', () => {
  it('should parse "amanhã" as tomorrow', () => {
    const expression = expectExpression(parse('amanhã', 'pt-BR'));
    expect(expression).toEqual(tomorrow());
    expect(formatDate(resolve(expression, REFERENCE_DATE))).toBe('2024-08-14');
  });

  it('should parse "ontem" as yesterday', () => {
    const expression = expectExpression(parse('ontem', 'pt-BR'));
    expect(expression).toEqual(yesterday());
    expect(formatDate(resolve(expression, REFERENCE_DATE))).toBe('2024-08-12');
  });

  it('should parse "em 3 dias" as a three day offset', () => {
    const expression = expectExpression(parse('em 3 dias', 'pt-BR'));
    expect(expression).toEqual(offsetDays(3));
    expect(formatDate(resolve(expression, REFERENCE_DATE))).toBe('2024-08-16');
  });

  it('should parse "próxima segunda" as next Monday', () => {
    const expression = expectExpression(parse('próxima segunda', 'pt-BR'));
    expect(expression).toEqual(weekdayNext(1));
    expect(formatDate(resolve(expression, REFERENCE_DATE))).toBe('2024-08-19');
  });

  it('should fail "hoje xyz" with NoMatchError', () => {
    const error = expectError(parse('hoje xyz', 'pt-BR'));
    expect(error).toBeInstanceOf(NoMatchError);
    expect(error.message).toBe('"hoje xyz" is not a relative date expression in pt-BR');
  });
});

describe('Additional phrases', () => {
  it('should resolve day after tomorrow and weeks', () => {
    expect(parseRelativeDate('depois de amanhã', 'pt-BR', REFERENCE_DATE)).toEqual({
      success: true,
      data: parseDate('2024-08-15')
    });
    expect(parseRelativeDate('daqui a duas semanas', 'pt-BR', REFERENCE_DATE)).toEqual({
      success: true,
      data: parseDate('2024-08-27')
    });
  });

  it('should resolve this-week weekdays', () => {
    expect(parseRelativeDate('quinta-feira', 'pt-BR', REFERENCE_DATE)).toEqual({
      success: true,
      data: parseDate('2024-08-15')
    });
    expect(parseRelativeDate('terça', 'pt-BR', REFERENCE_DATE)).toEqual({
      success: true,
      data: parseDate('2024-08-13')
    });
    expect(parseRelativeDate('esta terça', 'pt-BR', REFERENCE_DATE)).toEqual({
      success: true,
      data: parseDate('2024-08-13')
    });
  });

  it('should resolve ordinal weekdays of a month', () => {
    expect(parse('first sunday of october', 'en')).toEqual({ success: true, data: weekdayOfMonth(1, 0, 10) });
    expect(parseRelativeDate('first sunday of october', 'en', REFERENCE_DATE)).toEqual({
      success: true,
      data: parseDate('2024-10-06')
    });
    expect(parseRelativeDate('segunda segunda de outubro', 'pt-BR', REFERENCE_DATE)).toEqual({
      success: true,
      data: parseDate('2024-10-14')
    });
  });

  it('should parse English phrases', () => {
    expect(parse('Today', 'en')).toEqual({ success: true, data: today() });
    expect(parse('in two weeks', 'en')).toEqual({ success: true, data: offsetWeeks(2) });
  });
});

describe('Failures', () => {
  it('should report an unsupported locale', () => {
    const error = expectError(parse('hoje', 'fr'));
    expect(error).toBeInstanceOf(UnsupportedLocaleError);
  });

  it('should report an invalid quantity', () => {
    const error = expectError(parse('em 0 dias', 'pt-BR'));
    expect(error).toBeInstanceOf(InvalidQuantityError);
    expect(error.message).toBe('Invalid quantity "0": must be a positive count');
  });

  it('should reject counts too large to resolve', () => {
    const error = expectError(parse('em 9000000000000 dias', 'pt-BR'));
    expect(error).toBeInstanceOf(InvalidQuantityError);
    expect(error.message).toBe('Invalid quantity "9000000000000": too large');
    expect(expectError(parse('em 900000000000 meses', 'pt-BR')).message).toBe(
      'Invalid quantity "900000000000": too large'
    );
    expect(expectError(parse('em 100001 dias', 'pt-BR')).message).toBe('Invalid quantity "100001": too large');
  });

  it('should resolve the largest accepted count to a valid date', () => {
    const result = parseRelativeDate('em 100000 meses', 'pt-BR', REFERENCE_DATE);
    if (!result.success) {
      throw new Error(result.error.message);
    }
    expect(result.data.getFullYear()).toBe(10357);
    expect(result.data.getMonth()).toBe(11);
    expect(result.data.getDate()).toBe(13);
  });

  it('should pass failures through parseRelativeDate', () => {
    const result = parseRelativeDate('hoje xyz', 'pt-BR', REFERENCE_DATE);
    expect(result.success).toBe(false);
  });

  it('should fail rather than resolve a recognized prefix', () => {
    for (const text of ['amanhã cedo', 'em 3 dias depois', 'próxima segunda xyz']) {
      expect(expectError(parse(text, 'pt-BR'))).toBeInstanceOf(NoMatchError);
    }
  });

  describe('CLI settings', () => {
    const originalLocale = process.env.RELATIVE_DATE_LOCALE;
    const originalLevel = process.env.LOG_LEVEL;

    afterEach(() => {
      if (originalLocale === undefined) {
        delete process.env.RELATIVE_DATE_LOCALE;
      } else {
        process.env.RELATIVE_DATE_LOCALE = originalLocale;
      }
      if (originalLevel === undefined) {
        delete process.env.LOG_LEVEL;
      } else {
        process.env.LOG_LEVEL = originalLevel;
      }
      clearLexiconCache();
    });

    it('should not affect parsing when they are invalid', () => {
      process.env.RELATIVE_DATE_LOCALE = '';
      process.env.LOG_LEVEL = 'verbose';
      clearLexiconCache();

      expect(parse('hoje', 'pt-BR')).toEqual({ success: true, data: today() });
    });
  });

  describe('broken lexicon files', () => {
    const originalDir = process.env.RELATIVE_DATE_LEXICON_DIR;

    afterEach(() => {
      if (originalDir === undefined) {
        delete process.env.RELATIVE_DATE_LEXICON_DIR;
      } else {
        process.env.RELATIVE_DATE_LEXICON_DIR = originalDir;
      }
      clearLexiconCache();
      vi.restoreAllMocks();
    });

    it('should throw instead of returning a failure', () => {
      const dir = mkdtempSync(join(tmpdir(), 'lexicons-'));
      writeFileSync(join(dir, 'xx.yml'), 'locale: xx\n');
      process.env.RELATIVE_DATE_LEXICON_DIR = dir;
      clearLexiconCache();

      try {
        expect(() => parse('hoje', 'xx')).toThrow(LexiconError);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});

describe('Properties', () => {
  it('should match every exact phrase of every locale to its expression', () => {
    for (const locale of BUILTIN_LOCALES) {
      const table = lookup(locale);
      for (const [phrase, expression] of table.phrases) {
        expect(match(normalize(phrase), table)).toEqual(expression);
      }
    }
  });

  it('should ignore case and accents', () => {
    const variants: [string, string][] = [
      ['amanhã', 'AMANHA'],
      ['próxima segunda', 'Proxima SEGUNDA'],
      ['depois de amanhã', 'Depois De Amanha'],
      ['há três dias', 'HA TRES DIAS'],
      ['sábado passado', 'SABADO PASSADO']
    ];
    for (const [text, variant] of variants) {
      expect(parse(variant, 'pt-BR')).toEqual(parse(text, 'pt-BR'));
    }
  });
});
