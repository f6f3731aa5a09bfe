import { DatabaseService } from './database.js';
import { type DocumentIndexer, rebuildIndex } from './indexing.js';
import type { DocumentTextSource, RebuildSummary } from '../types/document.js';
import type { ScriptureBook, ScriptureVocabulary } from '../utils/vocabulary.js';
import { TextProcessor } from '../utils/text-processing.js';
import { appendDistinct, parseStringArray } from '../utils/json-columns.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const MAX_REFERENCE_CONTEXTS = 3;

export interface ExtractedReference {
  normalizedReference: string;
  /** First surface form seen in the text */
  originalText: string;
  /** Every distinct surface form, in order of appearance */
  surfaceForms: string[];
  contexts: string[];
  count: number;
}

export interface ReferenceExtraction {
  references: Map<string, ExtractedReference>;
  /** Matched text that could not be normalized */
  unparsedCandidates: string[];
}

export interface StoredReference {
  reference: string;
  normalized_reference: string;
  contexts: string[];
}

export interface ReferenceSearchResult extends StoredReference {
  document_id: number;
  filename: string;
  filepath: string;
  /** Every matching row of the document */
  matches: StoredReference[];
}

export interface ScriptureStatistics {
  total_references: number;
  unique_references: number;
  top_references: Array<{ normalized_reference: string; document_count: number }>;
}

interface ReferenceForm {
  name: string;
  /** Pattern source following the alias and its separator */
  body: string;
}

/**
 * Surface forms recognized after a book alias. Every form is tried for every alias.
 */
const REFERENCE_FORMS: readonly ReferenceForm[] = [
  // A list item must not be the number of a following book, as in "Gen 1:1, 2 Tim 3:16"
  { name: 'chapter-verse', body: String.raw`\d+:\d+(?:-\d+)?(?:,\s*\d+(?:-\d+)?(?![\d-])(?!\s+[A-Za-z]+\.?\s+\d))*\b` },
  { name: 'space-separated', body: String.raw`\d+\s+\d+(?:-\d+)?\b` },
  { name: 'spelled-out', body: String.raw`(?:chapter\s+)?\d+(?:\s+verse\s+|\s+v\.?\s+)\d+(?:-\d+)?\b` },
  { name: 'chapter-only', body: String.raw`chapter\s+\d+\b` },
];

const SPELLED_OUT_REMAINDER = /^(?:chapter\s+)?(\d+)\s+(?:verse|v\.?)\s+(\d+(?:-\d+)?)$/i;
const CHAPTER_ONLY_REMAINDER = /^chapter\s+(\d+)$/i;
const DIGITS = /^\d+$/;

interface CompiledAlias {
  alias: string;
  book: ScriptureBook;
  /** Anchored alias prefix used by normalization */
  prefix: RegExp;
  /** One global recognizer per reference form */
  recognizers: RegExp[];
}

interface Candidate {
  start: number;
  end: number;
  text: string;
}

interface ReferenceRow {
  document_id: number;
  filename: string;
  filepath: string;
  reference: string;
  normalized_reference: string;
  context_snippets: string | null;
}

/**
 * Extracts scripture references, normalizes them to "Book C:V" and maintains scripture_index
 */
export class ScriptureIndexer implements DocumentIndexer {
  private db: DatabaseService;
  private aliases: CompiledAlias[];
  private logger: Logger;

  constructor(db: DatabaseService, vocabulary: ScriptureVocabulary, logger?: Logger) {
    this.db = db;
    this.logger = logger ?? createLogger('scripture-indexer');
    this.aliases = vocabulary.books.flatMap(book =>
      book.aliases.map(alias => {
        const escaped = TextProcessor.escapeRegExp(alias);
        return {
          alias,
          book,
          prefix: new RegExp(String.raw`^${escaped}\.?(?![a-z])\s*`, 'i'),
          recognizers: REFERENCE_FORMS.map(
            form => new RegExp(String.raw`\b${escaped}\.?\s+${form.body}`, 'gi')
          ),
        };
      })
    );
  }

  /**
   * Canonical "Book remainder" form of a reference, or null when it cannot be parsed.
   * Aliases are tried in vocabulary order and the first that parses wins.
   */
  normalize(candidate: string): string | null {
    const reference = candidate.trim().replace(/[\s,.;:!?]+$/, '');

    for (const { book, prefix } of this.aliases) {
      const match = prefix.exec(reference);
      if (!match) continue;

      const remainder = reference.slice(match[0].length).trim();

      if (remainder.includes(':')) {
        return `${book.name} ${remainder}`;
      }

      const spelled = SPELLED_OUT_REMAINDER.exec(remainder);
      if (spelled) {
        return `${book.name} ${spelled[1]}:${spelled[2]}`;
      }

      const chapter = CHAPTER_ONLY_REMAINDER.exec(remainder);
      if (chapter) {
        return `${book.name} ${chapter[1]}`;
      }

      if (remainder.includes(' ')) {
        const [chapterPart = '', versePart = ''] = remainder.split(/\s+/);
        if (DIGITS.test(chapterPart) && DIGITS.test(versePart)) {
          return `${book.name} ${chapterPart}:${versePart}`;
        }
      } else if (DIGITS.test(remainder)) {
        return `${book.name} ${remainder}`;
      }
    }

    return null;
  }

  /**
   * Find every reference in a text, grouped by normalized form
   */
  extract(text: string): ReferenceExtraction {
    const sentences = TextProcessor.splitSentences(text);
    const lowerSentences = sentences.map(sentence => sentence.toLowerCase());
    const references = new Map<string, ExtractedReference>();
    const unparsedCandidates: string[] = [];

    for (const candidate of this.findCandidates(text)) {
      const normalized = this.normalize(candidate.text);
      if (normalized === null) {
        unparsedCandidates.push(candidate.text);
        continue;
      }

      let entry = references.get(normalized);
      if (!entry) {
        entry = {
          normalizedReference: normalized,
          originalText: candidate.text,
          surfaceForms: [],
          contexts: [],
          count: 0,
        };
        references.set(normalized, entry);
      }

      entry.count++;
      appendDistinct(entry.surfaceForms, [candidate.text], Number.POSITIVE_INFINITY);

      const needle = candidate.text.toLowerCase();
      appendDistinct(
        entry.contexts,
        sentences.filter((_, i) => lowerSentences[i]?.includes(needle)),
        MAX_REFERENCE_CONTEXTS
      );
    }

    return { references, unparsedCandidates };
  }

  /**
   * Run every recognizer over the text. Identical spans collapse to one candidate, and a
   * span lying inside a longer one (the "John 3:16" within "1 John 3:16") is dropped.
   */
  private findCandidates(text: string): Candidate[] {
    const lowerText = text.toLowerCase();
    const spans = new Map<string, Candidate>();

    for (const { alias, recognizers } of this.aliases) {
      if (!lowerText.includes(alias)) continue;

      for (const recognizer of recognizers) {
        recognizer.lastIndex = 0;
        let match: RegExpExecArray | null;
        while ((match = recognizer.exec(text)) !== null) {
          const start = match.index;
          const end = start + match[0].length;
          const key = `${start}:${end}`;
          if (!spans.has(key)) {
            spans.set(key, { start, end, text: match[0] });
          }
        }
      }
    }

    const candidates = [...spans.values()];
    return candidates
      .filter(candidate => !candidates.some(other =>
        other !== candidate &&
        other.start <= candidate.start &&
        other.end >= candidate.end
      ))
      .sort((a, b) => a.start - b.start || b.end - a.end);
  }

  /**
   * Replace a document's rows with the references found in its text
   */
  indexDocument(documentId: number, fullText: string, displayName?: string): boolean {
    const label = displayName ?? `document ${documentId}`;

    try {
      const { references, unparsedCandidates } = this.extract(fullText);
      const db = this.db.getDb();
      const remove = db.prepare<[number]>('DELETE FROM scripture_index WHERE document_id = ?');
      const insert = db.prepare<[string, number, string, string]>(`
        INSERT INTO scripture_index (reference, document_id, context_snippets, normalized_reference)
        VALUES (?, ?, ?, ?)
      `);

      let rows = 0;
      this.db.transaction(() => {
        remove.run(documentId);
        for (const reference of references.values()) {
          const contexts = JSON.stringify(reference.contexts);
          for (const form of reference.surfaceForms) {
            insert.run(form, documentId, contexts, reference.normalizedReference);
            rows++;
          }
        }
      });

      if (unparsedCandidates.length > 0) {
        this.logger.debug(
          `${label}: ${unparsedCandidates.length} unparsed candidates: ${unparsedCandidates.join('; ')}`
        );
      }
      this.logger.debug(`${label}: indexed ${references.size} references in ${rows} rows`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to index scripture references for ${label}: ${String(error)}`);
      return false;
    }
  }

  /**
   * Documents containing a reference, ordered by filename. Matches raw or normalized rows
   * against the query and its normalized form by case-sensitive substring.
   */
  searchByReference(query: string): ReferenceSearchResult[] {
    const raw = query.trim();
    if (raw.length === 0) return [];

    const normalized = this.normalize(raw) ?? raw;
    const rows = this.db.getDb()
      .prepare<{ raw: string; normalized: string }, ReferenceRow>(`
        SELECT si.document_id, d.filename, d.filepath, si.reference, si.normalized_reference, si.context_snippets
        FROM scripture_index si
        JOIN documents d ON d.id = si.document_id
        WHERE instr(si.reference, @raw) > 0
           OR instr(si.normalized_reference, @raw) > 0
           OR instr(si.reference, @normalized) > 0
           OR instr(si.normalized_reference, @normalized) > 0
        ORDER BY d.filename, si.document_id, si.normalized_reference, si.reference
      `)
      .all({ raw, normalized });

    const grouped = new Map<number, ReferenceSearchResult>();
    for (const row of rows) {
      const stored: StoredReference = {
        reference: row.reference,
        normalized_reference: row.normalized_reference,
        contexts: parseStringArray(row.context_snippets),
      };

      const existing = grouped.get(row.document_id);
      if (existing) {
        existing.matches.push(stored);
        appendDistinct(existing.contexts, stored.contexts, MAX_REFERENCE_CONTEXTS);
      } else {
        grouped.set(row.document_id, {
          document_id: row.document_id,
          filename: row.filename,
          filepath: row.filepath,
          ...stored,
          contexts: [...stored.contexts],
          matches: [stored],
        });
      }
    }

    return [...grouped.values()];
  }

  getDocumentReferences(documentId: number): StoredReference[] {
    return this.db.getDb()
      .prepare<[number], { reference: string; normalized_reference: string; context_snippets: string | null }>(`
        SELECT reference, normalized_reference, context_snippets
        FROM scripture_index WHERE document_id = ?
        ORDER BY normalized_reference, reference
      `)
      .all(documentId)
      .map(row => ({
        reference: row.reference,
        normalized_reference: row.normalized_reference,
        contexts: parseStringArray(row.context_snippets),
      }));
  }

  getStatistics(limit: number = 20): ScriptureStatistics {
    const db = this.db.getDb();
    const totals = db
      .prepare<[], { total: number; unique_count: number }>(`
        SELECT COUNT(*) AS total, COUNT(DISTINCT normalized_reference) AS unique_count FROM scripture_index
      `)
      .get();

    const top = db
      .prepare<[number], { normalized_reference: string; document_count: number }>(`
        SELECT normalized_reference, COUNT(DISTINCT document_id) AS document_count
        FROM scripture_index
        GROUP BY normalized_reference
        ORDER BY document_count DESC, normalized_reference
        LIMIT ?
      `)
      .all(limit);

    return {
      total_references: totals?.total ?? 0,
      unique_references: totals?.unique_count ?? 0,
      top_references: top,
    };
  }

  clearDocument(documentId: number): void {
    this.db.getDb().prepare<[number]>('DELETE FROM scripture_index WHERE document_id = ?').run(documentId);
  }

  clearAll(): void {
    this.db.getDb().exec('DELETE FROM scripture_index');
  }

  /**
   * Re-index every document from its stored chunks
   */
  rebuildAll(source: DocumentTextSource): RebuildSummary {
    return rebuildIndex(this, source, this.logger, 'Scripture index');
  }
}
