export type RelativeDateErrorCode =
  | 'UNSUPPORTED_LOCALE'
  | 'NO_MATCH'
  | 'INVALID_QUANTITY'
  | 'LEXICON_INVALID';

export class RelativeDateError extends Error {
  readonly code: RelativeDateErrorCode;

  constructor(code: RelativeDateErrorCode, message: string) {
    super(message);
    this.name = 'RelativeDateError';
    this.code = code;
  }
}

export class UnsupportedLocaleError extends RelativeDateError {
  readonly locale: string;

  constructor(locale: string) {
    super('UNSUPPORTED_LOCALE', `No lexicon registered for locale "${locale}"`);
    this.name = 'UnsupportedLocaleError';
    this.locale = locale;
  }
}

export class NoMatchError extends RelativeDateError {
  readonly text: string;

  constructor(text: string, locale: string) {
    super('NO_MATCH', `"${text}" is not a relative date expression in ${locale}`);
    this.name = 'NoMatchError';
    this.text = text;
  }
}

export class InvalidQuantityError extends RelativeDateError {
  readonly token: string;

  constructor(token: string, reason: string) {
    super('INVALID_QUANTITY', `Invalid quantity "${token}": ${reason}`);
    this.name = 'InvalidQuantityError';
    this.token = token;
  }
}

/** Malformed lexicon file or table; not a user-input failure */
export class LexiconError extends RelativeDateError {
  readonly source: string;

  constructor(source: string, message: string) {
    super('LEXICON_INVALID', `Lexicon ${source}: ${message}`);
    this.name = 'LexiconError';
    this.source = source;
  }
}

/**
 * Failures `parse` reports to its caller
 */
export type ParseError = UnsupportedLocaleError | NoMatchError | InvalidQuantityError;

export function isParseError(error: unknown): error is ParseError {
  return (
    error instanceof UnsupportedLocaleError ||
    error instanceof NoMatchError ||
    error instanceof InvalidQuantityError
  );
}
