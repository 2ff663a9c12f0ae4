/**
 * Lexicon file schema
 *
 * Lexicons are authored as YAML (one file per locale) and validated with zod
 * before they are compiled into a LexiconTable.
 */

import { z } from 'zod';
import { MAX_QUANTITY, WEEKDAY_NAMES } from '../types.js';

const WordListSchema = z.array(z.string().min(1)).min(1);

const WeekdayNameSchema = z.enum(WEEKDAY_NAMES);

const SignedCountSchema = z
  .number()
  .int()
  .min(-MAX_QUANTITY)
  .max(MAX_QUANTITY)
  .refine((n) => n !== 0, 'must not be zero');

/**
 * Expression attached to an exact phrase. Weekdays are written by name.
 */
export const PhraseExpressionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('today') }),
  z.object({ kind: z.literal('tomorrow') }),
  z.object({ kind: z.literal('yesterday') }),
  z.object({ kind: z.literal('offset_days'), days: SignedCountSchema }),
  z.object({ kind: z.literal('offset_weeks'), weeks: SignedCountSchema }),
  z.object({ kind: z.literal('offset_months'), months: SignedCountSchema }),
  z.object({ kind: z.literal('weekday_next'), weekday: WeekdayNameSchema }),
  z.object({ kind: z.literal('weekday_last'), weekday: WeekdayNameSchema }),
  z.object({ kind: z.literal('weekday_this'), weekday: WeekdayNameSchema })
]);

export const TemplateSchema = z.object({
  /** Space-separated tokens: literal alternatives ("a|b") or slots ({count}, {unit}, {weekday}, {ordinal}, {month}) */
  pattern: z.string().min(1),
  produces: z.enum(['offset', 'weekday_next', 'weekday_last', 'weekday_this', 'weekday_of_month']),
  direction: z.enum(['future', 'past']).default('future')
});

export const LexiconFileSchema = z.object({
  locale: z.string().min(1),
  first_day_of_week: WeekdayNameSchema,
  weekdays: z.object({
    sunday: WordListSchema,
    monday: WordListSchema,
    tuesday: WordListSchema,
    wednesday: WordListSchema,
    thursday: WordListSchema,
    friday: WordListSchema,
    saturday: WordListSchema
  }),
  numbers: z.record(z.string().min(1), z.number().int().positive().max(MAX_QUANTITY)),
  units: z.object({
    day: WordListSchema,
    week: WordListSchema,
    month: WordListSchema
  }),
  ordinals: z
    .record(
      z.string().min(1),
      z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5), z.literal(-1)])
    )
    .default({}),
  months: z
    .object({
      january: WordListSchema,
      february: WordListSchema,
      march: WordListSchema,
      april: WordListSchema,
      may: WordListSchema,
      june: WordListSchema,
      july: WordListSchema,
      august: WordListSchema,
      september: WordListSchema,
      october: WordListSchema,
      november: WordListSchema,
      december: WordListSchema
    })
    .optional(),
  phrases: z
    .array(
      z.object({
        phrase: z.string().min(1),
        expression: PhraseExpressionSchema
      })
    )
    .default([]),
  templates: z.array(TemplateSchema).default([])
});

export type PhraseExpression = z.infer<typeof PhraseExpressionSchema>;
export type TemplateDefinition = z.infer<typeof TemplateSchema>;
export type LexiconFile = z.infer<typeof LexiconFileSchema>;
/** Lexicon as accepted by buildLexiconTable, before defaults are applied */
export type LexiconFileInput = z.input<typeof LexiconFileSchema>;
