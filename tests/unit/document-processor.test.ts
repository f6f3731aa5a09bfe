import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import {
  DocumentProcessor,
  type DocumentProcessorOptions,
  type FileResult,
} from '../../src/services/document-processor.js';
import { PlainTextExtractor } from '../../src/services/text-extractor.js';
import { TextChunker } from '../../src/utils/chunking.js';
import { DocumentPreprocessor } from '../../src/utils/preprocessing.js';
import { FileError } from '../../src/utils/errors.js';
import { loadConceptVocabulary, loadScriptureVocabulary } from '../../src/utils/vocabulary.js';
import {
  type TestLibrary,
  cleanupTestDir,
  createTestDir,
  createTestLibrary,
  writeTestFile,
} from './helpers.js';

describe('DocumentProcessor', () => {
  let library: TestLibrary;
  let testDir: string;
  let seen: FileResult[];

  function createProcessor(options: Partial<DocumentProcessorOptions> = {}): DocumentProcessor {
    return new DocumentProcessor(
      library.store,
      library.scripture,
      library.concepts,
      new PlainTextExtractor(),
      new TextChunker({ maxChunkSize: 50, overlap: 5 }),
      new DocumentPreprocessor(loadScriptureVocabulary(), loadConceptVocabulary()),
      { maxFileSizeMb: 10, onFile: result => seen.push(result), ...options }
    );
  }

  function writeLibrary(): void {
    writeTestFile(testDir, 'b.txt', 'Grace and Jn 3:16 here.');
    writeTestFile(testDir, 'a.md', '# Notes\n\nFaith and Rom 8 : 28.');
    writeTestFile(testDir, 'sub/c.txt', 'jesus saves');
    writeTestFile(testDir, 'skip.pdf', 'not text');
    writeTestFile(testDir, 'empty.txt', '   ');
  }

  beforeEach(() => {
    library = createTestLibrary();
    testDir = createTestDir('processor-');
    seen = [];
  });

  afterEach(() => {
    library.db.close();
    cleanupTestDir(testDir);
  });

  describe('listSupportedFiles', () => {
    it('walks subdirectories and sorts by path', async () => {
      writeLibrary();
      expect(await createProcessor().listSupportedFiles(testDir)).toEqual([
        join(testDir, 'a.md'),
        join(testDir, 'b.txt'),
        join(testDir, 'empty.txt'),
        join(testDir, 'sub', 'c.txt'),
      ]);
    });

    it('rejects a path that is not a directory', async () => {
      const file = writeTestFile(testDir, 'a.txt', 'text');
      await expect(createProcessor().listSupportedFiles(file)).rejects.toThrow(FileError);
      await expect(createProcessor().listSupportedFiles(join(testDir, 'nope'))).rejects.toThrow(FileError);
    });
  });

  describe('processDirectory', () => {
    it('ingests, preprocesses and indexes every supported file', async () => {
      writeLibrary();
      const summary = await createProcessor().processDirectory(testDir);

      expect(summary).toEqual({ processed: 3, skipped: 0, errors: 1 });
      expect(seen.map(result => [result.filepath, result.outcome])).toEqual([
        [join(testDir, 'a.md'), 'processed'],
        [join(testDir, 'b.txt'), 'processed'],
        [join(testDir, 'empty.txt'), 'error'],
        [join(testDir, 'sub', 'c.txt'), 'processed'],
      ]);
      expect(seen[2]?.message).toBe('no text extracted');

      const markdown = seen[0]?.documentId ?? -1;
      expect(library.store.getDocumentText(markdown)).toBe('Notes Faith and Romans 8:28.');
      expect(library.store.getDocument(markdown)?.file_type).toBe('text/markdown');

      expect(library.scripture.searchByReference('John 3:16').map(result => result.filename)).toEqual(['b.txt']);
      expect(library.scripture.searchByReference('Romans 8:28').map(result => result.filename)).toEqual(['a.md']);
      expect(library.concepts.searchByConcepts(['jesus']).map(result => result.filename)).toEqual(['c.txt']);
    });

    it('skips files already in the library on a second run', async () => {
      writeLibrary();
      const processor = createProcessor();
      await processor.processDirectory(testDir);
      const callsAfterFirstRun = library.embedder.calls;

      expect(await processor.processDirectory(testDir)).toEqual({ processed: 0, skipped: 3, errors: 1 });
      expect(library.embedder.calls).toBe(callsAfterFirstRun);
      expect(await processor.findUnprocessedFiles(testDir)).toEqual([join(testDir, 'empty.txt')]);
    });
  });

  describe('processFile', () => {
    it('skips a copy of an ingested file', async () => {
      const original = writeTestFile(testDir, 'a.txt', 'Grace alone.');
      const copy = writeTestFile(testDir, 'copy.txt', 'Grace alone.');
      const processor = createProcessor();

      expect((await processor.processFile(original)).outcome).toBe('processed');
      expect(await processor.processFile(copy)).toEqual({
        filepath: copy,
        outcome: 'skipped',
        message: 'already processed',
      });
    });

    it('keeps the sentence around a reference written with a dotted abbreviation', async () => {
      const filepath = writeTestFile(testDir, 'love.txt', 'Love is patient, 1 Cor. 13:4 says so.');
      const result = await createProcessor().processFile(filepath);

      expect(library.scripture.getDocumentReferences(result.documentId ?? -1)).toEqual([
        {
          reference: '1 Cor 13:4',
          normalized_reference: '1 Corinthians 13:4',
          contexts: ['Love is patient, 1 Cor 13:4 says so'],
        },
      ]);
    });

    it('reports chunk counts for processed files', async () => {
      const words = Array.from({ length: 60 }, (_, i) => `word${i}`).join(' ');
      const result = await createProcessor().processFile(writeTestFile(testDir, 'long.txt', words));

      expect(result.outcome).toBe('processed');
      expect(result.chunkCount).toBe(2);
      expect(library.store.stats().chunk_count).toBe(2);
    });

    it('turns validation failures into error outcomes', async () => {
      const processor = createProcessor();
      const pdf = writeTestFile(testDir, 'a.pdf', 'not text');

      expect(await processor.processFile(pdf)).toEqual({
        filepath: pdf,
        outcome: 'error',
        message: 'Unsupported file type: .pdf',
      });

      const missing = await processor.processFile(join(testDir, 'missing.txt'));
      expect(missing.outcome).toBe('error');
      expect(missing.message?.startsWith(`File not found: ${join(testDir, 'missing.txt')}`)).toBe(true);
    });

    it('rejects files over the size limit', async () => {
      const filepath = writeTestFile(testDir, 'a.txt', 'Grace alone.');
      const result = await createProcessor({ maxFileSizeMb: 0 }).processFile(filepath);

      expect(result).toEqual({
        filepath,
        outcome: 'error',
        message: `File is too large (max 0MB): ${filepath}`,
      });
    });

    it('reports a document the store could not add', async () => {
      library.embedder.failWith = new Error('provider down');
      const filepath = writeTestFile(testDir, 'a.txt', 'Grace alone.');

      expect(await createProcessor().processFile(filepath)).toEqual({
        filepath,
        outcome: 'error',
        message: 'not added',
      });
      expect(library.store.listDocuments()).toEqual([]);
    });
  });

  describe('maintenance', () => {
    it('rebuilds the requested indexes', async () => {
      writeLibrary();
      const processor = createProcessor();
      await processor.processDirectory(testDir);
      library.scripture.clearAll();

      expect(processor.rebuildIndexes({ concepts: false })).toEqual({
        scripture: { total: 3, succeeded: 3, failed: 0, success: true },
      });
      expect(library.scripture.getStatistics().unique_references).toBe(2);

      const both = processor.rebuildIndexes();
      expect(both.scripture?.success).toBe(true);
      expect(both.concepts?.total).toBe(3);
    });

    it('clears indexes and content', async () => {
      writeLibrary();
      const processor = createProcessor();
      await processor.processDirectory(testDir);

      processor.clearAll();

      expect(library.store.stats().document_count).toBe(0);
      expect(library.scripture.getStatistics().total_references).toBe(0);
      expect(library.concepts.getStatistics().total_entries).toBe(0);
    });

    it('keeps index rows when clearing the content fails', async () => {
      writeLibrary();
      const processor = createProcessor();
      await processor.processDirectory(testDir);
      const scriptureBefore = library.scripture.getStatistics();
      const conceptsBefore = library.concepts.getStatistics();
      vi.spyOn(library.store, 'clearAll').mockImplementation(() => {
        throw new Error('disk full');
      });

      expect(() => processor.clearAll()).toThrow('disk full');

      expect(scriptureBefore.total_references).toBe(2);
      expect(library.scripture.getStatistics()).toEqual(scriptureBefore);
      expect(library.concepts.getStatistics()).toEqual(conceptsBefore);
      expect(library.store.stats().document_count).toBe(3);
    });
  });
});
