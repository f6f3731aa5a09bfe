import type { ConceptVocabulary, ScriptureVocabulary } from './vocabulary.js';
import { TextProcessor } from './text-processing.js';

const PERIOD_BEFORE_NUMBER = /\b([A-Za-z]+)\.+(\s*\d+)/g;
const UNDERSCORE_REFERENCE = /([A-Za-z]+)_+(\d+):(\d+)/g;
const SPACED_COLON = /(\d+)\s*:\s*(\d+)/g;
const ROMAN_NUMERALS: Readonly<Record<string, string>> = { I: '1', II: '2', III: '3' };

/**
 * Builds `\b(a|b|c)` over the keys, longest first so a longer key wins over its prefix
 */
function alternation(keys: Iterable<string>): string {
  return [...keys]
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map(key => TextProcessor.escapeRegExp(key))
    .join('|');
}

/**
 * Rewrites document text so references and key terms are spelled consistently before chunking
 */
export class DocumentPreprocessor {
  private abbreviations: Map<string, string>;
  private corrections: Map<string, string>;
  private abbreviationPattern: RegExp | null;
  private romanPattern: RegExp | null;
  private correctionPattern: RegExp | null;

  constructor(scripture: ScriptureVocabulary, concepts: ConceptVocabulary) {
    this.abbreviations = new Map(
      Object.entries(scripture.abbreviations).map(([abbreviation, name]) => [abbreviation.toLowerCase(), name])
    );
    this.corrections = new Map(
      Object.entries(concepts.corrections).map(([term, corrected]) => [term.toLowerCase(), corrected])
    );

    // "I John 3:16" but not "I went to 3 places"
    const numberedBooks = new Set<string>();
    for (const book of scripture.books) {
      const match = /^\d\s+(.+)$/.exec(book.name);
      if (match?.[1]) numberedBooks.add(match[1]);
    }

    this.romanPattern = numberedBooks.size > 0
      ? new RegExp(String.raw`\b(III|II|I)\s+(${alternation(numberedBooks)})(?=\s+\d)`, 'g')
      : null;
    this.abbreviationPattern = this.abbreviations.size > 0
      ? new RegExp(String.raw`\b(${alternation(this.abbreviations.keys())})\.?(?=\s+\d+(?::\d+|\s+\d+))`, 'gi')
      : null;
    this.correctionPattern = this.corrections.size > 0
      ? new RegExp(String.raw`\b(${alternation(this.corrections.keys())})\b`, 'gi')
      : null;
  }

  /**
   * Normalize reference spelling: "Mal_3:16" and "Mal 3 : 16" become "Malachi 3:16",
   * "II Timothy 1 7" becomes "2 Timothy 1 7", "1 Cor. 13:4" becomes "1 Cor 13:4"
   */
  normalizeReferences(text: string): string {
    let result = text
      .replace(PERIOD_BEFORE_NUMBER, '$1$2')
      .replace(UNDERSCORE_REFERENCE, '$1 $2:$3')
      .replace(SPACED_COLON, '$1:$2');

    if (this.romanPattern) {
      result = result.replace(this.romanPattern, (_match: string, numeral: string, book: string) =>
        `${ROMAN_NUMERALS[numeral] ?? numeral} ${book}`
      );
    }

    if (this.abbreviationPattern) {
      result = result.replace(this.abbreviationPattern, (match: string, abbreviation: string) =>
        this.abbreviations.get(abbreviation.toLowerCase()) ?? match
      );
    }

    return result;
  }

  /**
   * Apply the vocabulary's capitalization corrections, whole words only
   */
  correctTerms(text: string): string {
    if (!this.correctionPattern) return text;
    return text.replace(this.correctionPattern, (match: string) =>
      this.corrections.get(match.toLowerCase()) ?? match
    );
  }

  preprocess(text: string): string {
    return this.correctTerms(this.normalizeReferences(text));
  }
}
