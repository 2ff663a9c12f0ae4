/**
 * Find every relative date expression inside free text
 */

import { lookup } from './lexicon/registry.js';
import { matchTokens } from './matcher.js';
import { normalize, tokenize } from './normalizer.js';
import { ExtractedExpression, LexiconTable } from './types.js';

const LEADING_PUNCTUATION = /^[,;:!?()"]+/;
const TRAILING_PUNCTUATION = /[,;:!?()"]+$/;

/** A token with surrounding punctuation removed, and where it sits in the text */
interface Word {
  text: string;
  start: number;
}

const vocabularies = new WeakMap<LexiconTable, ReadonlySet<string>>();

/**
 * Every single token the lexicon knows, so "dom." keeps its dot
 */
function vocabulary(table: LexiconTable): ReadonlySet<string> {
  const cached = vocabularies.get(table);
  if (cached) {
    return cached;
  }

  const known = new Set<string>();
  const maps: ReadonlyMap<string, unknown>[] = [
    table.phrases,
    table.weekdays,
    table.numbers,
    table.units,
    table.ordinals,
    table.months
  ];
  for (const map of maps) {
    for (const key of map.keys()) {
      tokenize(key).forEach((word) => known.add(word));
    }
  }
  for (const template of table.templates) {
    for (const part of template.parts) {
      if (part.type === 'literal') {
        part.words.forEach((word) => known.add(word));
      }
    }
  }

  vocabularies.set(table, known);
  return known;
}

/**
 * Split normalized text into words, dropping quotes, brackets, commas and
 * the like around each token, and a full stop unless the lexicon spells the
 * token with one
 */
function words(normalized: string, table: LexiconTable): Word[] {
  const known = vocabulary(table);
  const result: Word[] = [];
  let offset = 0;

  for (const token of tokenize(normalized)) {
    const leading = LEADING_PUNCTUATION.exec(token)?.[0].length ?? 0;
    let text = token.slice(leading).replace(TRAILING_PUNCTUATION, '');
    if (text.endsWith('.') && !known.has(text)) {
      text = text.slice(0, -1).replace(TRAILING_PUNCTUATION, '');
    }
    if (text.length > 0) {
      result.push({ text, start: offset + leading });
    }
    offset += token.length + 1;
  }

  return result;
}

/**
 * Scan text left to right. At each word the longest window that parses
 * wins and scanning resumes after it; unmatched words are skipped.
 * Positions refer to the normalized text.
 */
export function extractAll(text: string, locale: string): ExtractedExpression[] {
  const table = lookup(locale);
  const normalized = normalize(text);
  const sequence = words(normalized, table);

  const found: ExtractedExpression[] = [];
  let i = 0;
  while (i < sequence.length) {
    let consumed = 0;

    for (let length = Math.min(table.maxSpan, sequence.length - i); length >= 1; length--) {
      const window = sequence.slice(i, i + length);
      const result = matchTokens(
        window.map((word) => word.text),
        table
      );
      if (result && 'expression' in result) {
        const first = window[0];
        const last = window[window.length - 1];
        const start = first.start;
        const end = last.start + last.text.length;
        found.push({
          expression: result.expression,
          token: normalized.slice(start, end),
          start_pos: start,
          end_pos: end
        });
        consumed = length;
        break;
      }
    }

    i += consumed > 0 ? consumed : 1;
  }

  return found;
}
