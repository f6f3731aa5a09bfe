import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('vocabulary');

export const DEFAULT_SCRIPTURE_BOOKS_PATH = fileURLToPath(
  new URL('../../config/scripture-books.json', import.meta.url)
);

export const DEFAULT_THEOLOGICAL_CONCEPTS_PATH = fileURLToPath(
  new URL('../../config/theological-concepts.json', import.meta.url)
);

/** Used when no concept vocabulary can be read */
export const FALLBACK_CONCEPTS: readonly string[] = Object.freeze([
  'god',
  'jesus',
  'christ',
  'lord',
  'bible',
  'scripture',
  'word',
]);

const ScriptureVocabularySchema = z.object({
  books: z.array(z.object({
    name: z.string().min(1),
    aliases: z.array(z.string().min(1)).min(1),
  })).min(1),
  abbreviations: z.record(z.string()).default({}),
});

const ConceptVocabularySchema = z.object({
  categories: z.record(z.array(z.string())),
  options: z.object({
    caseSensitive: z.boolean().default(false),
  }).default({}),
  corrections: z.record(z.string()).default({}),
});

export interface ScriptureBook {
  readonly name: string;
  /** Lowercase spellings, matched case-insensitively */
  readonly aliases: readonly string[];
}

export interface ScriptureVocabulary {
  /** Canonical order; alias collisions resolve to the earliest book */
  readonly books: readonly ScriptureBook[];
  /** Abbreviation → full book name, for preprocessing */
  readonly abbreviations: Readonly<Record<string, string>>;
}

export interface ConceptVocabulary {
  readonly categories: Readonly<Record<string, readonly string[]>>;
  readonly caseSensitive: boolean;
  /** Lowercase term → corrected spelling, for preprocessing */
  readonly corrections: Readonly<Record<string, string>>;
}

function readJson(filepath: string): unknown {
  return JSON.parse(readFileSync(filepath, 'utf-8'));
}

/**
 * Load the book/alias table. A missing or malformed table is a configuration error.
 */
export function loadScriptureVocabulary(filepath: string = DEFAULT_SCRIPTURE_BOOKS_PATH): ScriptureVocabulary {
  let data: unknown;
  try {
    data = readJson(filepath);
  } catch (error) {
    throw new ConfigurationError(`Failed to read scripture vocabulary ${filepath}: ${String(error)}`);
  }

  const result = ScriptureVocabularySchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(`Invalid scripture vocabulary ${filepath}: ${result.error.message}`);
  }

  return Object.freeze({
    books: Object.freeze(result.data.books.map(book => Object.freeze({
      name: book.name,
      aliases: Object.freeze(book.aliases.map(alias => alias.toLowerCase())),
    }))),
    abbreviations: Object.freeze({ ...result.data.abbreviations }),
  });
}

/**
 * Load the concept vocabulary, falling back to a minimal term set when the file is unusable
 */
export function loadConceptVocabulary(filepath: string = DEFAULT_THEOLOGICAL_CONCEPTS_PATH): ConceptVocabulary {
  try {
    const result = ConceptVocabularySchema.safeParse(readJson(filepath));
    if (result.success) {
      return Object.freeze({
        categories: Object.freeze({ ...result.data.categories }),
        caseSensitive: result.data.options.caseSensitive,
        corrections: Object.freeze({ ...result.data.corrections }),
      });
    }
    logger.warn(`Invalid concept vocabulary ${filepath}, using fallback terms: ${result.error.message}`);
  } catch (error) {
    logger.warn(`Concept vocabulary ${filepath} unavailable, using fallback terms: ${String(error)}`);
  }

  return fallbackConceptVocabulary();
}

export function fallbackConceptVocabulary(): ConceptVocabulary {
  return Object.freeze({
    categories: Object.freeze({ default: FALLBACK_CONCEPTS }),
    caseSensitive: false,
    corrections: Object.freeze({}),
  });
}

/**
 * Build a concept vocabulary from a plain term list
 */
export function conceptVocabularyFromTerms(terms: readonly string[], caseSensitive = false): ConceptVocabulary {
  return Object.freeze({
    categories: Object.freeze({ default: Object.freeze([...terms]) }),
    caseSensitive,
    corrections: Object.freeze({}),
  });
}
