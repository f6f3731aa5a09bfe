/**
 * Shared fixtures for unit tests: temp directories, an in-memory library and fake providers
 */

import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from 'fs';
import { createHash } from 'crypto';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { DatabaseService } from '../../src/services/database.js';
import { SqliteVectorIndex } from '../../src/services/vector-index.js';
import { ContentStore } from '../../src/services/content-store.js';
import { ScriptureIndexer } from '../../src/services/scripture-indexer.js';
import { ConceptIndexer } from '../../src/services/concept-indexer.js';
import type { EmbeddingProvider, GenerationOptions, GenerationProvider } from '../../src/types/provider.js';
import { type ConceptVocabulary, conceptVocabularyFromTerms, loadScriptureVocabulary } from '../../src/utils/vocabulary.js';

export const FAKE_DIMENSION = 16;

/**
 * Deterministic bag-of-words embedding: every lowercase word adds 1 to a hashed bucket
 */
export function fakeEmbedding(text: string): number[] {
  const vector: number[] = new Array<number>(FAKE_DIMENSION).fill(0);
  for (const word of text.toLowerCase().split(/[^a-z0-9]+/)) {
    if (word.length === 0) continue;
    const bucket = createHash('sha256').update(word).digest().readUInt32BE(0) % FAKE_DIMENSION;
    vector[bucket] = (vector[bucket] ?? 0) + 1;
  }
  return vector;
}

export class FakeEmbedder implements EmbeddingProvider {
  readonly name = 'fake';
  calls = 0;
  texts: string[] = [];
  failWith: Error | null = null;

  async embed(text: string): Promise<number[]> {
    this.calls++;
    this.texts.push(text);
    if (this.failWith) {
      throw this.failWith;
    }
    return fakeEmbedding(text);
  }
}

export class FakeGenerator implements GenerationProvider {
  readonly name = 'fake';
  prompts: string[] = [];
  options: Array<GenerationOptions | undefined> = [];
  answer = 'fake answer';
  failWith: Error | null = null;

  async generate(prompt: string, options?: GenerationOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    if (this.failWith) {
      throw this.failWith;
    }
    return this.answer;
  }
}

export function createTestDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `scriptorium-${prefix}`));
}

export function cleanupTestDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a file below `dir`, creating parent directories, and return its path
 */
export function writeTestFile(dir: string, relativePath: string, content: string): string {
  const filepath = join(dir, relativePath);
  mkdirSync(dirname(filepath), { recursive: true });
  writeFileSync(filepath, content, 'utf-8');
  return filepath;
}

export function createMemoryDatabase(): DatabaseService {
  const db = new DatabaseService(':memory:');
  db.initialize();
  return db;
}

export interface TestLibrary {
  db: DatabaseService;
  vectors: SqliteVectorIndex;
  store: ContentStore;
  scripture: ScriptureIndexer;
  concepts: ConceptIndexer;
  embedder: FakeEmbedder;
}

export function createTestLibrary(
  conceptVocabulary: ConceptVocabulary = conceptVocabularyFromTerms(['God', 'Jesus', 'grace', 'faith'])
): TestLibrary {
  const db = createMemoryDatabase();
  const vectors = new SqliteVectorIndex(db);
  const embedder = new FakeEmbedder();
  const store = new ContentStore(db, vectors, embedder);
  const scripture = new ScriptureIndexer(db, loadScriptureVocabulary());
  const concepts = new ConceptIndexer(db, conceptVocabulary);
  return { db, vectors, store, scripture, concepts, embedder };
}

/**
 * Every row of an index table in primary-key order, as JSON
 */
export function dumpTable(db: DatabaseService, table: 'scripture_index' | 'theological_concept_index'): string {
  const rows = db.getDb().prepare<[], Record<string, unknown>>(`SELECT * FROM ${table} ORDER BY 1, 2`).all();
  return JSON.stringify(rows);
}

/**
 * Insert a bare document row so index tables can reference it
 */
export function insertTestDocument(db: DatabaseService, filename: string): number {
  return db.insertDocument({
    filename,
    filepath: `/library/${filename}`,
    file_hash: createHash('sha256').update(filename).digest('hex'),
    file_size: 0,
    file_type: 'text/plain',
    modified_at: null,
    chunk_count: 0,
    status: 'processed',
  });
}
