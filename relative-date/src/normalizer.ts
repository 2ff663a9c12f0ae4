/**
 * Text normalization shared by the lexicon loader and the matcher, so that
 * "Amanhã", "amanha" and "  AMANHÃ " all land on the same entry.
 */

export type NormalizedText = string;

const COMBINING_MARKS = /\p{M}/gu;
const WHITESPACE = /\s+/g;

/**
 * Normalize input text for matching
 * - Convert to lowercase
 * - Strip accents and other diacritics
 * - Collapse whitespace runs and trim
 */
export function normalize(text: string): NormalizedText {
  return text
    .toLowerCase()
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .replace(WHITESPACE, ' ')
    .trim();
}

/**
 * Split normalized text into tokens
 */
export function tokenize(normalized: NormalizedText): string[] {
  return normalized === '' ? [] : normalized.split(' ');
}
