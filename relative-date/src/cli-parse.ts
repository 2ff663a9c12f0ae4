#!/usr/bin/env node
/**
 * CLI tool to parse relative date phrases.
 *
 * Usage:
 *   npx tsx relative-date/src/cli-parse.ts "próxima segunda"
 *   npx tsx relative-date/src/cli-parse.ts --locale en --reference 2024-08-13 "in two weeks"
 *   npx tsx relative-date/src/cli-parse.ts --extract "hoje e depois de amanhã e quinta-feira"
 *
 * Options:
 *   --locale L        Lexicon locale (default: RELATIVE_DATE_LOCALE or pt-BR)
 *   --reference D     Reference date as YYYY-MM-DD (default: today)
 *   --extract         List every expression found in the text
 *   --vocabulary      Print the locale's weekday names in week order
 *
 * Reads RELATIVE_DATE_LOCALE, RELATIVE_DATE_LEXICON_DIR and LOG_LEVEL from .env
 */

import "dotenv/config";
import { loadConfig, RelativeDateConfig } from "./config.js";
import { UnsupportedLocaleError } from "./errors.js";
import { formatExpression } from "./expressions.js";
import { extractAll } from "./extract.js";
import { lookup, weekdaysInLocaleOrder } from "./lexicon/registry.js";
import { parse } from "./parser.js";
import { resolve } from "./resolver.js";
import { BUILTIN_LOCALES, LexiconTable } from "./types.js";
import { formatDate, parseDate, startOfDay } from "./utils.js";

// ── Parse CLI args ──────────────────────────────────────────────────────────

const args = process.argv.slice(2);

function readConfig(): RelativeDateConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

const config = readConfig();

let locale = config.defaultLocale;
let reference = startOfDay(new Date());
let extract = false;
let vocabulary = false;
const positional: string[] = [];

for (let i = 0; i < args.length; i++) {
  const arg = args[i];
  if (arg === "--locale" && i + 1 < args.length) {
    locale = args[++i];
  } else if (arg === "--reference" && i + 1 < args.length) {
    try {
      reference = parseDate(args[++i]);
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  } else if (arg === "--extract") {
    extract = true;
  } else if (arg === "--vocabulary") {
    vocabulary = true;
  } else if (arg === "--help" || arg === "-h") {
    console.log(`
Usage:
  npx tsx relative-date/src/cli-parse.ts [options] "text"

Options:
  --locale L        Lexicon locale (built in: ${BUILTIN_LOCALES.join(", ")})
  --reference D     Reference date as YYYY-MM-DD (default: today)
  --extract         List every expression found in the text
  --vocabulary      Print the locale's weekday names in week order
  -h, --help        Show this help message
`);
    process.exit(0);
  } else {
    positional.push(arg);
  }
}

// ── Run ─────────────────────────────────────────────────────────────────────

function loadLexicon(): LexiconTable {
  try {
    return lookup(locale);
  } catch (error) {
    if (error instanceof UnsupportedLocaleError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

if (vocabulary) {
  for (const { name, words } of weekdaysInLocaleOrder(loadLexicon())) {
    console.log(`${name.padEnd(10)} ${words.join(", ")}`);
  }
  process.exit(0);
}

const text = positional.join(" ").trim();
if (!text) {
  console.error("Error: Please provide a phrase as an argument.");
  process.exit(1);
}

if (extract) {
  loadLexicon();
  const found = extractAll(text, locale);
  if (found.length === 0) {
    console.log("No relative dates found.");
  }
  for (const item of found) {
    console.log(`${item.token}\t${formatExpression(item.expression)}\t${formatDate(resolve(item.expression, reference))}`);
  }
  process.exit(0);
}

const result = parse(text, locale);
if (!result.success) {
  console.error(`Error: ${result.error.message}`);
  process.exit(1);
}

console.log(`${formatExpression(result.data)}\t${formatDate(resolve(result.data, reference))}`);
