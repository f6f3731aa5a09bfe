import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import { DatabaseError } from '../utils/errors.js';
import { MigrationManager } from '../utils/migrations.js';
import type { Chunk, Document, DocumentStatus, QueryHistoryRecord } from '../types/document.js';

export interface DatabaseOptions {
  /** How long a writer waits on a locked database before failing */
  busyTimeoutMs?: number;
}

export type NewDocument = Omit<Document, 'id' | 'created_at'>;
export type NewChunk = Omit<Chunk, 'id' | 'created_at'>;

export class DatabaseService {
  private db: Database.Database | null = null;
  private dbPath: string;
  private busyTimeoutMs: number;

  constructor(dbPath: string, options: DatabaseOptions = {}) {
    this.dbPath = dbPath;
    this.busyTimeoutMs = options.busyTimeoutMs ?? 30000;
  }

  /**
   * Open the connection and bring the schema up to date
   */
  initialize(): void {
    if (this.db) return;

    try {
      if (this.dbPath !== ':memory:') {
        mkdirSync(path.dirname(path.resolve(this.dbPath)), { recursive: true });
      }

      this.db = new Database(this.dbPath);

      // WAL lets readers proceed alongside a single writer
      this.db.pragma('journal_mode = WAL');
      this.db.pragma(`busy_timeout = ${this.busyTimeoutMs}`);
      this.db.pragma('foreign_keys = ON');

      new MigrationManager(this.db).migrate();
    } catch (error) {
      this.close();
      throw new DatabaseError(`Failed to initialize database: ${String(error)}`, error);
    }
  }

  /**
   * Close database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Get database instance
   */
  getDb(): Database.Database {
    if (!this.db) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  /**
   * Execute in transaction
   */
  transaction<T>(fn: () => T): T {
    const db = this.getDb();
    const transaction = db.transaction(fn);
    return transaction();
  }

  // Document operations

  /**
   * Insert a new document and return its id
   */
  insertDocument(doc: NewDocument): number {
    const db = this.getDb();

    try {
      const stmt = db.prepare<[string, string, string, number, string, string | null, number, DocumentStatus]>(`
        INSERT INTO documents (filename, filepath, file_hash, file_size, file_type, modified_at, chunk_count, status)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `);

      const result = stmt.run(
        doc.filename,
        doc.filepath,
        doc.file_hash,
        doc.file_size,
        doc.file_type,
        doc.modified_at,
        doc.chunk_count,
        doc.status
      );

      return Number(result.lastInsertRowid);
    } catch (error) {
      throw new DatabaseError(`Failed to insert document: ${String(error)}`, error);
    }
  }

  /**
   * Get document by ID
   */
  getDocumentById(id: number): Document | null {
    try {
      const stmt = this.getDb().prepare<[number], Document>('SELECT * FROM documents WHERE id = ?');
      return stmt.get(id) ?? null;
    } catch (error) {
      throw new DatabaseError(`Failed to get document: ${String(error)}`, error);
    }
  }

  /**
   * Get document by file hash
   */
  getDocumentByHash(fileHash: string): Document | null {
    try {
      const stmt = this.getDb().prepare<[string], Document>('SELECT * FROM documents WHERE file_hash = ?');
      return stmt.get(fileHash) ?? null;
    } catch (error) {
      throw new DatabaseError(`Failed to get document by hash: ${String(error)}`, error);
    }
  }

  /**
   * Get document by source path
   */
  getDocumentByPath(filepath: string): Document | null {
    try {
      const stmt = this.getDb().prepare<[string], Document>('SELECT * FROM documents WHERE filepath = ?');
      return stmt.get(filepath) ?? null;
    } catch (error) {
      throw new DatabaseError(`Failed to get document by path: ${String(error)}`, error);
    }
  }

  /**
   * List all documents in id order
   */
  listDocuments(): Document[] {
    try {
      return this.getDb().prepare<[], Document>('SELECT * FROM documents ORDER BY id').all();
    } catch (error) {
      throw new DatabaseError(`Failed to list documents: ${String(error)}`, error);
    }
  }

  // Chunk operations

  /**
   * Insert a chunk unless its hash is already stored. Returns whether a row was written.
   */
  insertChunk(chunk: NewChunk): boolean {
    try {
      const stmt = this.getDb().prepare<[number, number, string, string, string]>(`
        INSERT OR IGNORE INTO document_chunks (document_id, chunk_index, chunk_text, chunk_hash, vector_key)
        VALUES (?, ?, ?, ?, ?)
      `);

      const result = stmt.run(
        chunk.document_id,
        chunk.chunk_index,
        chunk.chunk_text,
        chunk.chunk_hash,
        chunk.vector_key
      );

      return result.changes > 0;
    } catch (error) {
      throw new DatabaseError(`Failed to insert chunk: ${String(error)}`, error);
    }
  }

  hasChunkHash(chunkHash: string): boolean {
    try {
      const row = this.getDb()
        .prepare<[string], { found: number }>('SELECT 1 AS found FROM document_chunks WHERE chunk_hash = ?')
        .get(chunkHash);
      return row !== undefined;
    } catch (error) {
      throw new DatabaseError(`Failed to look up chunk hash: ${String(error)}`, error);
    }
  }

  /**
   * Get chunks for a document in chunk order
   */
  getChunksByDocumentId(documentId: number): Chunk[] {
    try {
      const stmt = this.getDb().prepare<[number], Chunk>(
        'SELECT * FROM document_chunks WHERE document_id = ? ORDER BY chunk_index'
      );
      return stmt.all(documentId);
    } catch (error) {
      throw new DatabaseError(`Failed to get chunks: ${String(error)}`, error);
    }
  }

  /**
   * Vector keys of every chunk owned by the given documents
   */
  getVectorKeysForDocuments(documentIds: readonly number[]): string[] {
    if (documentIds.length === 0) return [];

    try {
      const placeholders = documentIds.map(() => '?').join(', ');
      const stmt = this.getDb().prepare<number[], { vector_key: string }>(
        `SELECT vector_key FROM document_chunks WHERE document_id IN (${placeholders}) ORDER BY id`
      );
      return stmt.all(...documentIds).map(row => row.vector_key);
    } catch (error) {
      throw new DatabaseError(`Failed to get vector keys: ${String(error)}`, error);
    }
  }

  listVectorKeys(): string[] {
    try {
      return this.getDb()
        .prepare<[], { vector_key: string }>('SELECT vector_key FROM document_chunks ORDER BY id')
        .all()
        .map(row => row.vector_key);
    } catch (error) {
      throw new DatabaseError(`Failed to list vector keys: ${String(error)}`, error);
    }
  }

  /**
   * Delete chunks whose document no longer exists and return their vector keys
   */
  deleteOrphanedChunks(): string[] {
    const db = this.getDb();

    try {
      const orphaned = db
        .prepare<[], { vector_key: string }>(`
          SELECT vector_key FROM document_chunks
          WHERE document_id NOT IN (SELECT id FROM documents)
        `)
        .all()
        .map(row => row.vector_key);

      db.prepare('DELETE FROM document_chunks WHERE document_id NOT IN (SELECT id FROM documents)').run();
      return orphaned;
    } catch (error) {
      throw new DatabaseError(`Failed to delete orphaned chunks: ${String(error)}`, error);
    }
  }

  // Query history

  insertQueryHistory(record: Omit<QueryHistoryRecord, 'id' | 'created_at'>): void {
    try {
      this.getDb()
        .prepare<[string, string, number, number]>(`
          INSERT INTO query_history (query_text, query_hash, results_count, execution_time)
          VALUES (?, ?, ?, ?)
        `)
        .run(record.query_text, record.query_hash, record.results_count, record.execution_time);
    } catch (error) {
      throw new DatabaseError(`Failed to record query: ${String(error)}`, error);
    }
  }

  /**
   * Most recent queries first
   */
  listQueryHistory(limit: number): QueryHistoryRecord[] {
    try {
      return this.getDb()
        .prepare<[number], QueryHistoryRecord>('SELECT * FROM query_history ORDER BY id DESC LIMIT ?')
        .all(limit);
    } catch (error) {
      throw new DatabaseError(`Failed to list query history: ${String(error)}`, error);
    }
  }

  // Aggregates

  getContentCounts(): { document_count: number; chunk_count: number; total_size: number } {
    try {
      const row = this.getDb()
        .prepare<[], { document_count: number; chunk_count: number; total_size: number }>(`
          SELECT
            (SELECT COUNT(*) FROM documents) AS document_count,
            (SELECT COUNT(*) FROM document_chunks) AS chunk_count,
            (SELECT COALESCE(SUM(file_size), 0) FROM documents) AS total_size
        `)
        .get();
      return row ?? { document_count: 0, chunk_count: 0, total_size: 0 };
    } catch (error) {
      throw new DatabaseError(`Failed to get content counts: ${String(error)}`, error);
    }
  }

  getTypeDistribution(): Record<string, number> {
    try {
      const rows = this.getDb()
        .prepare<[], { file_type: string; count: number }>(`
          SELECT file_type, COUNT(*) AS count FROM documents
          GROUP BY file_type ORDER BY count DESC, file_type
        `)
        .all();

      const distribution: Record<string, number> = {};
      for (const row of rows) {
        distribution[row.file_type] = row.count;
      }
      return distribution;
    } catch (error) {
      throw new DatabaseError(`Failed to get type distribution: ${String(error)}`, error);
    }
  }

  /**
   * Delete all documents, chunks and query history. Index tables must be cleared first.
   */
  clearContent(): void {
    try {
      this.getDb().exec(`
        DELETE FROM document_chunks;
        DELETE FROM documents;
        DELETE FROM query_history;
      `);
    } catch (error) {
      throw new DatabaseError(`Failed to clear content: ${String(error)}`, error);
    }
  }

  /**
   * Reclaim free pages. Must run outside a transaction.
   */
  vacuum(): void {
    try {
      this.getDb().exec('VACUUM');
    } catch (error) {
      throw new DatabaseError(`Failed to vacuum database: ${String(error)}`, error);
    }
  }
}
