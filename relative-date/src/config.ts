import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { z } from 'zod';
import { LOG_THRESHOLDS } from '../../shared/observability/src/logger.js';

/** Lexicons shipped beside the sources */
export const DEFAULT_LEXICON_DIR = fileURLToPath(new URL('../lexicons/', import.meta.url));

const LexiconEnvSchema = z.object({
  RELATIVE_DATE_LEXICON_DIR: z.string().trim().min(1).optional()
});

const EnvSchema = LexiconEnvSchema.extend({
  RELATIVE_DATE_LOCALE: z.string().trim().min(1).default('pt-BR'),
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_THRESHOLDS)).optional(),
  OTEL_SERVICE_NAME: z.string().trim().min(1).optional()
});

export interface RelativeDateConfig {
  /** Locale used when the caller names none (CLI) */
  defaultLocale: string;
  /** Directory holding `<locale>.yml` lexicon files */
  lexiconDir: string;
}

function check<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, env: NodeJS.ProcessEnv): T {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid relative-date configuration: ${issues}`);
  }
  return parsed.data;
}

function toLexiconDir(dir: string | undefined): string {
  return dir ? resolve(process.cwd(), dir) : DEFAULT_LEXICON_DIR;
}

/**
 * Directory the lexicon registry reads from. Only looks at
 * RELATIVE_DATE_LEXICON_DIR, so library callers are not tied to CLI settings.
 */
export function lexiconDir(env: NodeJS.ProcessEnv = process.env): string {
  return toLexiconDir(check(LexiconEnvSchema, env).RELATIVE_DATE_LEXICON_DIR);
}

/**
 * Read and validate every setting the CLI uses, including LOG_LEVEL and
 * OTEL_SERVICE_NAME, which the logger itself reads without failing
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelativeDateConfig {
  const parsed = check(EnvSchema, env);
  return {
    defaultLocale: parsed.RELATIVE_DATE_LOCALE,
    lexiconDir: toLexiconDir(parsed.RELATIVE_DATE_LEXICON_DIR)
  };
}
