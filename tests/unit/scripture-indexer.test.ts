import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ScriptureIndexer } from '../../src/services/scripture-indexer.js';
import type { DatabaseService } from '../../src/services/database.js';
import type { DocumentTextSource } from '../../src/types/document.js';
import { loadScriptureVocabulary } from '../../src/utils/vocabulary.js';
import { createMemoryDatabase, dumpTable, insertTestDocument } from './helpers.js';

describe('ScriptureIndexer', () => {
  let db: DatabaseService;
  let indexer: ScriptureIndexer;

  beforeEach(() => {
    db = createMemoryDatabase();
    indexer = new ScriptureIndexer(db, loadScriptureVocabulary());
  });

  afterEach(() => {
    db.close();
  });

  describe('normalize', () => {
    it.each([
      ['John 3:16', 'John 3:16'],
      ['Jn 3:16;', 'John 3:16'],
      ['1 Cor 13:4-7', '1 Corinthians 13:4-7'],
      ['Romans 8 28', 'Romans 8:28'],
      ['John chapter 3 verse 16', 'John 3:16'],
      ['Psalms chapter 23', 'Psalms 23'],
      ['Psalm 23', 'Psalms 23'],
      ['Gen 1:1', 'Genesis 1:1'],
      ['Ezek 37:1', 'Ezekiel 37:1'],
      ['Phil 4:13', 'Philippians 4:13'],
      ['Philemon 1:6', 'Philemon 1:6'],
      ['Rev. 21:4', 'Revelation 21:4'],
      ['rom 8:28', 'Romans 8:28'],
      ['2 Tim 3 16', '2 Timothy 3:16'],
    ])('normalizes %s to %s', (input, expected) => {
      expect(indexer.normalize(input)).toBe(expected);
    });

    it.each([['Foo 3:16'], ['John'], ['']])('rejects %j', input => {
      expect(indexer.normalize(input)).toBeNull();
    });

    it('is deterministic', () => {
      expect(indexer.normalize('1 Cor 13:4-7')).toBe(indexer.normalize('1 Cor 13:4-7'));
    });
  });

  describe('extract', () => {
    it('groups surface forms under one normalized reference', () => {
      const { references, unparsedCandidates } = indexer.extract('See John 3:16 and Jn 3:16.');

      expect(unparsedCandidates).toEqual([]);
      expect([...references.keys()]).toEqual(['John 3:16']);
      expect(references.get('John 3:16')).toEqual({
        normalizedReference: 'John 3:16',
        originalText: 'John 3:16',
        surfaceForms: ['John 3:16', 'Jn 3:16'],
        contexts: ['See John 3:16 and Jn 3:16'],
        count: 2,
      });
    });

    it('keeps a numbered book from also matching the unnumbered one', () => {
      const { references } = indexer.extract('Read 1 John 3:16 today.');
      expect([...references.keys()]).toEqual(['1 John 3:16']);
    });

    it('finds references in document order with their sentences', () => {
      const text = 'Compare Romans 8:28, then Romans 8 28! Also see Gen 1:1. Nothing here.';
      const { references } = indexer.extract(text);

      expect([...references.keys()]).toEqual(['Romans 8:28', 'Genesis 1:1']);
      expect(references.get('Romans 8:28')?.surfaceForms).toEqual(['Romans 8:28', 'Romans 8 28']);
      expect(references.get('Romans 8:28')?.contexts).toEqual(['Compare Romans 8:28, then Romans 8 28']);
      expect(references.get('Genesis 1:1')?.contexts).toEqual(['Also see Gen 1:1']);
    });

    it('does not take the number of a following book into a verse list', () => {
      const { references } = indexer.extract('See Romans 8:28, 1 Cor 13:4-7. Then Gen 1:1, 2 Tim 3:16.');
      expect([...references.keys()]).toEqual([
        'Romans 8:28',
        '1 Corinthians 13:4-7',
        'Genesis 1:1',
        '2 Timothy 3:16',
      ]);
    });

    it('keeps verse lists that continue the same chapter', () => {
      const { references } = indexer.extract('Read John 3:16, 17 and more.');
      expect([...references.keys()]).toEqual(['John 3:16, 17']);
    });

    it('keeps at most three context sentences', () => {
      const text = 'One Gen 1:1. Two Gen 1:1. Three Gen 1:1. Four Gen 1:1.';
      const reference = indexer.extract(text).references.get('Genesis 1:1');
      expect(reference?.count).toBe(4);
      expect(reference?.contexts).toEqual(['One Gen 1:1', 'Two Gen 1:1', 'Three Gen 1:1']);
    });

    it('finds nothing in text without references', () => {
      expect(indexer.extract('In the beginning there was a plain sentence.').references.size).toBe(0);
    });
  });

  describe('indexDocument and searchByReference', () => {
    it('stores one row per surface form and finds the document by either form', () => {
      const id = insertTestDocument(db, 'sermon.txt');
      expect(indexer.indexDocument(id, 'See John 3:16 and Jn 3:16.')).toBe(true);

      expect(indexer.getDocumentReferences(id)).toEqual([
        { reference: 'Jn 3:16', normalized_reference: 'John 3:16', contexts: ['See John 3:16 and Jn 3:16'] },
        { reference: 'John 3:16', normalized_reference: 'John 3:16', contexts: ['See John 3:16 and Jn 3:16'] },
      ]);

      for (const query of ['John 3:16', 'Jn 3:16']) {
        const results = indexer.searchByReference(query);
        expect(results).toHaveLength(1);
        expect(results[0]?.document_id).toBe(id);
        expect(results[0]?.filename).toBe('sermon.txt');
        expect(results[0]?.matches).toHaveLength(2);
      }
    });

    it('orders matching documents by filename', () => {
      const later = insertTestDocument(db, 'b.txt');
      const earlier = insertTestDocument(db, 'a.txt');
      indexer.indexDocument(later, 'Read Romans 8:28 again.');
      indexer.indexDocument(earlier, 'Romans 8:28 first.');

      expect(indexer.searchByReference('Rom 8:28').map(result => result.filename)).toEqual(['a.txt', 'b.txt']);
    });

    it('returns nothing for an unknown or empty reference', () => {
      const id = insertTestDocument(db, 'a.txt');
      indexer.indexDocument(id, 'Romans 8:28.');
      expect(indexer.searchByReference('Jude 1:3')).toEqual([]);
      expect(indexer.searchByReference('   ')).toEqual([]);
    });

    it('replaces a document rows on re-index', () => {
      const id = insertTestDocument(db, 'a.txt');
      indexer.indexDocument(id, 'Romans 8:28.');
      indexer.indexDocument(id, 'Gen 1:1.');

      expect(indexer.getDocumentReferences(id).map(row => row.normalized_reference)).toEqual(['Genesis 1:1']);
    });

    it('clears one document and keeps the rows of others', () => {
      const removed = insertTestDocument(db, 'a.txt');
      const kept = insertTestDocument(db, 'b.txt');
      indexer.indexDocument(removed, 'Romans 8:28.');
      indexer.indexDocument(kept, 'Romans 8:28 and Gen 1:1.');

      indexer.clearDocument(removed);

      expect(indexer.getDocumentReferences(removed)).toEqual([]);
      expect(indexer.getDocumentReferences(kept).map(row => row.normalized_reference)).toEqual([
        'Genesis 1:1',
        'Romans 8:28',
      ]);
      expect(indexer.searchByReference('Romans 8:28').map(result => result.document_id)).toEqual([kept]);
    });

    it('reports statistics', () => {
      const first = insertTestDocument(db, 'a.txt');
      const second = insertTestDocument(db, 'b.txt');
      indexer.indexDocument(first, 'See John 3:16 and Jn 3:16.');
      indexer.indexDocument(second, 'John 3:16 and Gen 1:1.');

      expect(indexer.getStatistics()).toEqual({
        total_references: 4,
        unique_references: 2,
        top_references: [
          { normalized_reference: 'John 3:16', document_count: 2 },
          { normalized_reference: 'Genesis 1:1', document_count: 1 },
        ],
      });
    });
  });

  describe('rebuildAll', () => {
    it('produces identical tables on consecutive runs', () => {
      const texts = new Map<number, string>();
      texts.set(insertTestDocument(db, 'a.txt'), 'See John 3:16 and Jn 3:16. Also 1 Cor 13:4-7.');
      texts.set(insertTestDocument(db, 'b.txt'), 'Romans 8 28 and Psalms chapter 23.');
      texts.set(insertTestDocument(db, 'empty.txt'), '');

      const source: DocumentTextSource = {
        listDocuments: () => db.listDocuments(),
        getDocumentText: id => texts.get(id) ?? '',
      };

      const first = indexer.rebuildAll(source);
      const firstDump = dumpTable(db, 'scripture_index');
      const second = indexer.rebuildAll(source);

      expect(first).toEqual({ total: 3, succeeded: 3, failed: 0, success: true });
      expect(second).toEqual(first);
      expect(dumpTable(db, 'scripture_index')).toBe(firstDump);
      expect(indexer.getStatistics().unique_references).toBe(4);
    });
  });
});
