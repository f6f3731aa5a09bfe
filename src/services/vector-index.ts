import { DatabaseService } from './database.js';
import { DatabaseError, ValidationError } from '../utils/errors.js';

export interface VectorMetadata {
  document_id: number;
  chunk_index: number;
  filename: string;
  filepath: string;
}

export interface VectorEntry {
  key: string;
  vector: readonly number[];
  metadata: VectorMetadata;
  content: string;
}

export interface VectorMatch {
  key: string;
  /** Cosine distance, 0 for identical direction */
  distance: number;
  metadata: VectorMetadata;
  content: string;
}

/**
 * Nearest-neighbour backend keyed by opaque chunk keys
 */
export interface VectorIndex {
  upsert(entry: VectorEntry): void;
  /** Ascending distance; ties keep index order */
  query(vector: readonly number[], k: number, allowedKeys?: Iterable<string>): VectorMatch[];
  delete(keys: readonly string[]): number;
  count(): number;
  keys(): string[];
  clear(): void;
}

interface VectorRow {
  key: string;
  embedding: Buffer;
  dimension: number;
  document_id: number;
  chunk_index: number;
  filename: string;
  filepath: string;
  content: string;
}

export function encodeVector(vector: readonly number[]): Buffer {
  return Buffer.from(Float32Array.from(vector).buffer);
}

export function decodeVector(blob: Buffer): Float32Array {
  // Copy so the view is 4-byte aligned regardless of the source buffer
  const bytes = new Uint8Array(blob.byteLength);
  bytes.set(blob);
  return new Float32Array(bytes.buffer);
}

/**
 * Cosine distance in [0, 2]; a zero vector is at distance 1 from everything
 */
export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Vector index stored beside the content tables, so upserts join the caller's transaction.
 * Search is an exhaustive cosine scan.
 */
export class SqliteVectorIndex implements VectorIndex {
  private db: DatabaseService;

  constructor(db: DatabaseService) {
    this.db = db;
  }

  upsert(entry: VectorEntry): void {
    if (entry.vector.length === 0) {
      throw new ValidationError(`Vector for ${entry.key} is empty`);
    }

    try {
      this.db.getDb()
        .prepare<[string, Buffer, number, number, number, string, string, string]>(`
          INSERT INTO vector_index (key, embedding, dimension, document_id, chunk_index, filename, filepath, content)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT(key) DO UPDATE SET
            embedding = excluded.embedding,
            dimension = excluded.dimension,
            document_id = excluded.document_id,
            chunk_index = excluded.chunk_index,
            filename = excluded.filename,
            filepath = excluded.filepath,
            content = excluded.content
        `)
        .run(
          entry.key,
          encodeVector(entry.vector),
          entry.vector.length,
          entry.metadata.document_id,
          entry.metadata.chunk_index,
          entry.metadata.filename,
          entry.metadata.filepath,
          entry.content
        );
    } catch (error) {
      throw new DatabaseError(`Failed to upsert vector ${entry.key}: ${String(error)}`, error);
    }
  }

  query(vector: readonly number[], k: number, allowedKeys?: Iterable<string>): VectorMatch[] {
    if (k <= 0) return [];

    const allowed = allowedKeys === undefined ? null : new Set(allowedKeys);
    if (allowed !== null && allowed.size === 0) return [];

    let rows: IterableIterator<VectorRow>;
    try {
      rows = this.db.getDb()
        .prepare<[], VectorRow>(`
          SELECT key, embedding, dimension, document_id, chunk_index, filename, filepath, content
          FROM vector_index ORDER BY rowid
        `)
        .iterate();
    } catch (error) {
      throw new DatabaseError(`Failed to query vector index: ${String(error)}`, error);
    }

    const matches: VectorMatch[] = [];
    for (const row of rows) {
      if (allowed !== null && !allowed.has(row.key)) continue;

      if (row.dimension !== vector.length) {
        throw new ValidationError(
          `Query vector has dimension ${vector.length} but ${row.key} has dimension ${row.dimension}`
        );
      }

      matches.push({
        key: row.key,
        distance: cosineDistance(vector, decodeVector(row.embedding)),
        metadata: {
          document_id: row.document_id,
          chunk_index: row.chunk_index,
          filename: row.filename,
          filepath: row.filepath,
        },
        content: row.content,
      });
    }

    // Array.prototype.sort is stable, so equal distances keep rowid order
    return matches.sort((a, b) => a.distance - b.distance).slice(0, k);
  }

  delete(keys: readonly string[]): number {
    if (keys.length === 0) return 0;

    try {
      const stmt = this.db.getDb().prepare<[string]>('DELETE FROM vector_index WHERE key = ?');
      return this.db.transaction(() => {
        let removed = 0;
        for (const key of keys) {
          removed += stmt.run(key).changes;
        }
        return removed;
      });
    } catch (error) {
      throw new DatabaseError(`Failed to delete vectors: ${String(error)}`, error);
    }
  }

  count(): number {
    try {
      const row = this.db.getDb()
        .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM vector_index')
        .get();
      return row?.count ?? 0;
    } catch (error) {
      throw new DatabaseError(`Failed to count vectors: ${String(error)}`, error);
    }
  }

  clear(): void {
    try {
      this.db.getDb().exec('DELETE FROM vector_index');
    } catch (error) {
      throw new DatabaseError(`Failed to clear vector index: ${String(error)}`, error);
    }
  }

  keys(): string[] {
    try {
      return this.db.getDb()
        .prepare<[], { key: string }>('SELECT key FROM vector_index ORDER BY rowid')
        .all()
        .map(row => row.key);
    } catch (error) {
      throw new DatabaseError(`Failed to list vector keys: ${String(error)}`, error);
    }
  }
}
