import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConceptIndexer } from '../../src/services/concept-indexer.js';
import type { DatabaseService } from '../../src/services/database.js';
import type { DocumentTextSource } from '../../src/types/document.js';
import { conceptVocabularyFromTerms } from '../../src/utils/vocabulary.js';
import { createMemoryDatabase, dumpTable, insertTestDocument } from './helpers.js';

describe('ConceptIndexer', () => {
  let db: DatabaseService;
  let indexer: ConceptIndexer;

  beforeEach(() => {
    db = createMemoryDatabase();
    indexer = new ConceptIndexer(db, conceptVocabularyFromTerms(['God', 'Jesus', 'grace', 'faith', 'Holy Spirit']));
  });

  afterEach(() => {
    db.close();
  });

  describe('extract', () => {
    it('counts whole-word occurrences with their sentences', () => {
      const lower = new ConceptIndexer(db, conceptVocabularyFromTerms(['god', 'jesus']));
      const found = lower.extract('God is good. God is great. Jesus saves.');

      expect([...found.keys()]).toEqual(['god', 'jesus']);
      expect(found.get('god')).toEqual({ frequency: 2, contexts: ['God is good', 'God is great'] });
      expect(found.get('jesus')).toEqual({ frequency: 1, contexts: ['Jesus saves'] });
    });

    it('ignores terms embedded in longer words', () => {
      const found = indexer.extract('Godly people showed graceful faithfulness.');
      expect(found.size).toBe(0);
    });

    it('matches multi-word terms', () => {
      expect(indexer.extract('The holy spirit moves.').get('Holy Spirit')).toEqual({
        frequency: 1,
        contexts: ['The holy spirit moves'],
      });
    });

    it('keeps at most three distinct context sentences', () => {
      const found = indexer.extract('Faith one. Faith two. Faith three. Faith four.');
      expect(found.get('faith')).toEqual({
        frequency: 4,
        contexts: ['Faith one', 'Faith two', 'Faith three'],
      });
    });

    it('respects case when the vocabulary asks for it', () => {
      const strict = new ConceptIndexer(db, conceptVocabularyFromTerms(['Grace'], true));
      expect(strict.extract('grace and Grace').get('Grace')?.frequency).toBe(1);
    });

    it('drops duplicate spellings across categories', () => {
      const duplicated = new ConceptIndexer(db, conceptVocabularyFromTerms(['grace', 'Grace', ' faith ']));
      expect(duplicated.getConcepts()).toEqual(['grace', 'faith']);
    });
  });

  describe('indexDocument and searchByConcepts', () => {
    it('stores one row per concept', () => {
      const id = insertTestDocument(db, 'a.txt');
      expect(indexer.indexDocument(id, 'Grace upon grace. Faith alone.')).toBe(true);

      expect(indexer.getDocumentConcepts(id)).toEqual([
        { concept: 'grace', frequency: 2, contexts: ['Grace upon grace'] },
        { concept: 'faith', frequency: 1, contexts: ['Faith alone'] },
      ]);
    });

    it('ranks by distinct matches, then total frequency', () => {
      const both = insertTestDocument(db, 'both.txt');
      const manyGrace = insertTestDocument(db, 'many.txt');
      const oneGrace = insertTestDocument(db, 'one.txt');
      indexer.indexDocument(both, 'Grace and faith.');
      indexer.indexDocument(manyGrace, 'Grace, grace, grace.');
      indexer.indexDocument(oneGrace, 'Grace.');

      const results = indexer.searchByConcepts(['GRACE', 'faith']);
      expect(results.map(result => [result.filename, result.concept_matches, result.total_frequency])).toEqual([
        ['both.txt', 2, 2],
        ['many.txt', 1, 3],
        ['one.txt', 1, 1],
      ]);
      expect(results[0]?.concepts).toEqual(['faith', 'grace']);
    });

    it('applies the minimum frequency per row', () => {
      const many = insertTestDocument(db, 'many.txt');
      const one = insertTestDocument(db, 'one.txt');
      indexer.indexDocument(many, 'Grace, grace.');
      indexer.indexDocument(one, 'Grace.');

      expect(indexer.searchByConcepts(['grace'], 2).map(result => result.document_id)).toEqual([many]);
    });

    it('returns nothing for blank or unknown concepts', () => {
      const id = insertTestDocument(db, 'a.txt');
      indexer.indexDocument(id, 'Grace.');
      expect(indexer.searchByConcepts([' ', ''])).toEqual([]);
      expect(indexer.searchByConcepts(['mercy'])).toEqual([]);
    });

    it('clears one document and keeps the rows of others', () => {
      const removed = insertTestDocument(db, 'a.txt');
      const kept = insertTestDocument(db, 'b.txt');
      indexer.indexDocument(removed, 'Grace and faith.');
      indexer.indexDocument(kept, 'Grace, grace.');

      indexer.clearDocument(removed);

      expect(indexer.getDocumentConcepts(removed)).toEqual([]);
      expect(indexer.getDocumentConcepts(kept)).toEqual([
        { concept: 'grace', frequency: 2, contexts: ['Grace, grace'] },
      ]);
      expect(indexer.searchByConcepts(['faith'])).toEqual([]);
    });

    it('reports statistics', () => {
      const first = insertTestDocument(db, 'a.txt');
      const second = insertTestDocument(db, 'b.txt');
      indexer.indexDocument(first, 'Grace and faith.');
      indexer.indexDocument(second, 'Grace, grace.');

      expect(indexer.getStatistics()).toEqual({
        total_entries: 3,
        unique_concepts: 2,
        top_concepts: [
          { concept: 'grace', document_count: 2, total_frequency: 3 },
          { concept: 'faith', document_count: 1, total_frequency: 1 },
        ],
      });
    });
  });

  describe('rebuildAll', () => {
    it('produces identical tables on consecutive runs', () => {
      const texts = new Map<number, string>();
      texts.set(insertTestDocument(db, 'a.txt'), 'God gives grace. Jesus and God.');
      texts.set(insertTestDocument(db, 'b.txt'), 'Faith comes by hearing.');

      const source: DocumentTextSource = {
        listDocuments: () => db.listDocuments(),
        getDocumentText: id => texts.get(id) ?? '',
      };

      expect(indexer.rebuildAll(source)).toEqual({ total: 2, succeeded: 2, failed: 0, success: true });
      const firstDump = dumpTable(db, 'theological_concept_index');
      indexer.rebuildAll(source);

      expect(dumpTable(db, 'theological_concept_index')).toBe(firstDump);
      expect(indexer.getStatistics().total_entries).toBe(4);
    });
  });
});
