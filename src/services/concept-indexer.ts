import { DatabaseService } from './database.js';
import { type DocumentIndexer, rebuildIndex } from './indexing.js';
import type { DocumentTextSource, RebuildSummary } from '../types/document.js';
import type { ConceptVocabulary } from '../utils/vocabulary.js';
import { TextProcessor } from '../utils/text-processing.js';
import { appendDistinct, parseStringArray } from '../utils/json-columns.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const MAX_CONCEPT_CONTEXTS = 3;

export interface ConceptOccurrence {
  frequency: number;
  contexts: string[];
}

export interface StoredConcept extends ConceptOccurrence {
  concept: string;
}

export interface ConceptSearchResult {
  document_id: number;
  filename: string;
  filepath: string;
  /** Distinct requested concepts found in the document */
  concept_matches: number;
  total_frequency: number;
  concepts: string[];
}

export interface ConceptStatistics {
  total_entries: number;
  unique_concepts: number;
  top_concepts: Array<{ concept: string; document_count: number; total_frequency: number }>;
}

interface CompiledConcept {
  concept: string;
  /** Global whole-word matcher for counting */
  counter: RegExp;
  /** Non-global twin for sentence tests */
  tester: RegExp;
}

interface ConceptSearchRow {
  document_id: number;
  filename: string;
  filepath: string;
  concept_matches: number;
  total_frequency: number;
  concepts: string;
}

/**
 * Counts curated theological terms per document and maintains theological_concept_index
 */
export class ConceptIndexer implements DocumentIndexer {
  private db: DatabaseService;
  private caseSensitive: boolean;
  private compiled: CompiledConcept[];
  private logger: Logger;

  constructor(db: DatabaseService, vocabulary: ConceptVocabulary, logger?: Logger) {
    this.db = db;
    this.caseSensitive = vocabulary.caseSensitive;
    this.logger = logger ?? createLogger('concept-indexer');

    const flags = this.caseSensitive ? '' : 'i';
    this.compiled = this.collectTerms(vocabulary).map(concept => {
      // Lookarounds instead of \b so terms ending in punctuation still match whole
      const source = String.raw`(?<!\w)${TextProcessor.escapeRegExp(concept)}(?!\w)`;
      return {
        concept,
        counter: new RegExp(source, `g${flags}`),
        tester: new RegExp(source, flags),
      };
    });
  }

  /**
   * Flatten categories, keeping the first spelling of each term
   */
  private collectTerms(vocabulary: ConceptVocabulary): string[] {
    const seen = new Set<string>();
    const terms: string[] = [];

    for (const categoryTerms of Object.values(vocabulary.categories)) {
      for (const raw of categoryTerms) {
        const term = raw.trim();
        const key = this.conceptKey(term);
        if (term.length === 0 || seen.has(key)) continue;
        seen.add(key);
        terms.push(term);
      }
    }

    return terms;
  }

  private conceptKey(concept: string): string {
    return this.caseSensitive ? concept : concept.toLowerCase();
  }

  getConcepts(): string[] {
    return this.compiled.map(entry => entry.concept);
  }

  /**
   * Whole-word occurrences of each vocabulary term, with up to three distinct sentences per term
   */
  extract(text: string): Map<string, ConceptOccurrence> {
    const sentences = TextProcessor.splitSentences(text);
    const found = new Map<string, ConceptOccurrence>();

    for (const { concept, counter, tester } of this.compiled) {
      const frequency = text.match(counter)?.length ?? 0;
      if (frequency === 0) continue;

      const contexts: string[] = [];
      appendDistinct(contexts, sentences.filter(sentence => tester.test(sentence)), MAX_CONCEPT_CONTEXTS);
      found.set(concept, { frequency, contexts });
    }

    return found;
  }

  /**
   * Replace a document's rows with the concepts found in its text
   */
  indexDocument(documentId: number, fullText: string, displayName?: string): boolean {
    const label = displayName ?? `document ${documentId}`;

    try {
      const concepts = this.extract(fullText);
      const db = this.db.getDb();
      const remove = db.prepare<[number]>('DELETE FROM theological_concept_index WHERE document_id = ?');
      const insert = db.prepare<[string, number, number, string]>(`
        INSERT INTO theological_concept_index (concept, document_id, frequency, context_snippets)
        VALUES (?, ?, ?, ?)
      `);

      this.db.transaction(() => {
        remove.run(documentId);
        for (const [concept, occurrence] of concepts) {
          insert.run(concept, documentId, occurrence.frequency, JSON.stringify(occurrence.contexts));
        }
      });

      this.logger.debug(`${label}: indexed ${concepts.size} concepts`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to index concepts for ${label}: ${String(error)}`);
      return false;
    }
  }

  /**
   * Documents containing any of the concepts at least `minFrequency` times,
   * most distinct matches first, then highest total frequency
   */
  searchByConcepts(concepts: readonly string[], minFrequency: number = 1): ConceptSearchResult[] {
    const wanted = [...new Set(
      concepts.map(concept => this.conceptKey(concept.trim())).filter(concept => concept.length > 0)
    )];
    if (wanted.length === 0) return [];

    const column = this.caseSensitive ? 'tci.concept' : 'lower(tci.concept)';
    const placeholders = wanted.map(() => '?').join(', ');

    const rows = this.db.getDb()
      .prepare<Array<string | number>, ConceptSearchRow>(`
        SELECT tci.document_id, d.filename, d.filepath,
               COUNT(*) AS concept_matches,
               SUM(tci.frequency) AS total_frequency,
               json_group_array(tci.concept) AS concepts
        FROM theological_concept_index tci
        JOIN documents d ON d.id = tci.document_id
        WHERE tci.frequency >= ? AND ${column} IN (${placeholders})
        GROUP BY tci.document_id, d.filename, d.filepath
        ORDER BY concept_matches DESC, total_frequency DESC, d.filename, tci.document_id
      `)
      .all(minFrequency, ...wanted);

    return rows.map(row => ({
      document_id: row.document_id,
      filename: row.filename,
      filepath: row.filepath,
      concept_matches: row.concept_matches,
      total_frequency: row.total_frequency,
      concepts: parseStringArray(row.concepts).sort(),
    }));
  }

  getDocumentConcepts(documentId: number): StoredConcept[] {
    return this.db.getDb()
      .prepare<[number], { concept: string; frequency: number; context_snippets: string | null }>(`
        SELECT concept, frequency, context_snippets
        FROM theological_concept_index WHERE document_id = ?
        ORDER BY frequency DESC, concept
      `)
      .all(documentId)
      .map(row => ({
        concept: row.concept,
        frequency: row.frequency,
        contexts: parseStringArray(row.context_snippets),
      }));
  }

  getStatistics(limit: number = 20): ConceptStatistics {
    const db = this.db.getDb();
    const totals = db
      .prepare<[], { total: number; unique_count: number }>(`
        SELECT COUNT(*) AS total, COUNT(DISTINCT concept) AS unique_count FROM theological_concept_index
      `)
      .get();

    const top = db
      .prepare<[number], { concept: string; document_count: number; total_frequency: number }>(`
        SELECT concept, COUNT(DISTINCT document_id) AS document_count, SUM(frequency) AS total_frequency
        FROM theological_concept_index
        GROUP BY concept
        ORDER BY document_count DESC, total_frequency DESC, concept
        LIMIT ?
      `)
      .all(limit);

    return {
      total_entries: totals?.total ?? 0,
      unique_concepts: totals?.unique_count ?? 0,
      top_concepts: top,
    };
  }

  clearDocument(documentId: number): void {
    this.db.getDb()
      .prepare<[number]>('DELETE FROM theological_concept_index WHERE document_id = ?')
      .run(documentId);
  }

  clearAll(): void {
    this.db.getDb().exec('DELETE FROM theological_concept_index');
  }

  /**
   * Re-index every document from its stored chunks
   */
  rebuildAll(source: DocumentTextSource): RebuildSummary {
    return rebuildIndex(this, source, this.logger, 'Concept index');
  }
}
