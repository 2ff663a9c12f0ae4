/**
 * Relative Date Parser
 *
 * Public entry points: normalize + match a phrase for one locale, and
 * optionally resolve it against a reference date. User-input failures come
 * back as typed results; nothing is thrown for malformed text.
 */

import { SpanStatusCode, trace } from '@opentelemetry/api';
import { logger, serviceName } from '../../shared/observability/src/logger.js';
import { isParseError, ParseError } from './errors.js';
import { lookup } from './lexicon/registry.js';
import { match } from './matcher.js';
import { normalize } from './normalizer.js';
import { resolve } from './resolver.js';
import { RelativeExpression } from './types.js';

export type Result<T, E = ParseError> =
  | { success: true; data: T }
  | { success: false; error: E };

export type ParseResult = Result<RelativeExpression>;

const tracer = trace.getTracer(serviceName);

/**
 * Parse a relative date phrase in the given locale
 */
export function parse(text: string, locale: string): ParseResult {
  return tracer.startActiveSpan('relative_date.parse', (span): ParseResult => {
    span.setAttribute('relative_date.locale', locale);
    try {
      const expression = match(normalize(text), lookup(locale));
      span.setAttribute('relative_date.kind', expression.kind);
      return { success: true, data: expression };
    } catch (error) {
      if (isParseError(error)) {
        span.setAttribute('relative_date.error', error.code);
        logger.debug(`No relative date parsed from "${text}"`, { locale, code: error.code });
        return { success: false, error };
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error)
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Parse a phrase and resolve it against a reference date
 */
export function parseRelativeDate(text: string, locale: string, referenceDate: Date): Result<Date> {
  const parsed = parse(text, locale);
  if (!parsed.success) {
    return parsed;
  }
  return { success: true, data: resolve(parsed.data, referenceDate) };
}
