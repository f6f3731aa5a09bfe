import { promises as fs } from 'fs';
import { DatabaseService } from './database.js';
import type { VectorIndex, VectorMetadata } from './vector-index.js';
import type { EmbeddingProvider } from '../types/provider.js';
import type {
  ContentStats,
  Document,
  DocumentTextSource,
  QueryHistoryRecord,
} from '../types/document.js';
import { TextProcessor } from '../utils/text-processing.js';
import { isUniqueViolation } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface SimilarityResult {
  content: string;
  metadata: VectorMetadata;
  /** 1 - cosine distance */
  similarity: number;
  key: string;
}

interface PendingChunk {
  index: number;
  text: string;
  hash: string;
  vector: number[];
}

export function vectorKey(documentId: number, chunkIndex: number): string {
  return `doc_${documentId}_chunk_${chunkIndex}`;
}

/**
 * Owns documents, chunks and query history, and keeps the vector index in step with them
 */
export class ContentStore implements DocumentTextSource {
  private db: DatabaseService;
  private vectors: VectorIndex;
  private embedder: EmbeddingProvider;
  private logger: Logger;

  constructor(db: DatabaseService, vectors: VectorIndex, embedder: EmbeddingProvider, logger?: Logger) {
    this.db = db;
    this.vectors = vectors;
    this.embedder = embedder;
    this.logger = logger ?? createLogger('content-store');
  }

  /**
   * Whether a file with identical bytes has been ingested. Throws FileError when the file cannot be read.
   */
  async isDocumentProcessed(filepath: string): Promise<boolean> {
    const fileHash = await TextProcessor.hashFile(filepath);
    return this.db.getDocumentByHash(fileHash) !== null;
  }

  /**
   * Ingest a document's chunks. Returns the new document id, or null when the document
   * was already processed or ingestion failed; nothing is written in either case.
   */
  async addDocument(filepath: string, filename: string, fileType: string, chunks: readonly string[]): Promise<number | null> {
    let fileHash: string;
    let fileSize: number;
    let modifiedAt: string;
    try {
      fileHash = await TextProcessor.hashFile(filepath);
      const stats = await fs.stat(filepath);
      fileSize = stats.size;
      modifiedAt = stats.mtime.toISOString();
    } catch (error) {
      this.logger.error(`Cannot read ${filepath}: ${String(error)}`);
      return null;
    }

    if (this.db.getDocumentByHash(fileHash)) {
      this.logger.info(`Skipping ${filename}: already processed`);
      return null;
    }

    const existing = this.db.getDocumentByPath(filepath);
    if (existing) {
      this.logger.warn(
        `Skipping ${filename}: ${filepath} is already stored as document ${existing.id} with different content`
      );
      return null;
    }

    let pending: PendingChunk[];
    try {
      pending = await this.embedNewChunks(chunks);
    } catch (error) {
      this.logger.error(`Failed to embed chunks of ${filename}, document not added: ${String(error)}`);
      return null;
    }

    try {
      const documentId = this.db.transaction(() => {
        const id = this.db.insertDocument({
          filename,
          filepath,
          file_hash: fileHash,
          file_size: fileSize,
          file_type: fileType,
          modified_at: modifiedAt,
          chunk_count: chunks.length,
          status: 'processed',
        });

        for (const chunk of pending) {
          const key = vectorKey(id, chunk.index);
          const inserted = this.db.insertChunk({
            document_id: id,
            chunk_index: chunk.index,
            chunk_text: chunk.text,
            chunk_hash: chunk.hash,
            vector_key: key,
          });

          // Another writer stored the same text since it was embedded
          if (!inserted) continue;

          this.vectors.upsert({
            key,
            vector: chunk.vector,
            metadata: { document_id: id, chunk_index: chunk.index, filename, filepath },
            content: chunk.text,
          });
        }

        return id;
      });

      this.logger.info(
        `Added ${filename} as document ${documentId}: ${pending.length} of ${chunks.length} chunks stored`
      );
      return documentId;
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.logger.info(`Skipping ${filename}: stored concurrently by another process`);
      } else {
        this.logger.error(`Failed to add ${filename}: ${String(error)}`);
      }
      return null;
    }
  }

  /**
   * Hash chunks, drop those already stored or repeated in the batch, and embed the rest
   */
  private async embedNewChunks(chunks: readonly string[]): Promise<PendingChunk[]> {
    const seen = new Set<string>();
    const pending: PendingChunk[] = [];

    for (const [index, text] of chunks.entries()) {
      const hash = TextProcessor.hashText(text);
      if (seen.has(hash) || this.db.hasChunkHash(hash)) {
        this.logger.debug(`Skipping duplicate chunk ${index}`);
        continue;
      }
      seen.add(hash);
      pending.push({ index, text, hash, vector: await this.embedder.embed(text) });
    }

    return pending;
  }

  /**
   * Nearest chunks to a query, most similar first. Failures are logged and yield [].
   */
  async searchSimilar(queryText: string, topK: number): Promise<SimilarityResult[]> {
    return this.search(queryText, topK);
  }

  /**
   * Nearest chunks among the given documents only
   */
  async searchSimilarFiltered(
    queryText: string,
    documentIds: readonly number[],
    topK: number
  ): Promise<SimilarityResult[]> {
    const keys = this.db.getVectorKeysForDocuments([...new Set(documentIds)]);
    if (keys.length === 0) {
      return [];
    }
    return this.search(queryText, Math.min(topK, keys.length), keys);
  }

  private async search(queryText: string, topK: number, allowedKeys?: readonly string[]): Promise<SimilarityResult[]> {
    let queryVector: number[];
    try {
      queryVector = await this.embedder.embed(queryText);
    } catch (error) {
      this.logger.error(`Failed to embed query: ${String(error)}`);
      return [];
    }

    try {
      return this.vectors.query(queryVector, topK, allowedKeys).map(match => ({
        content: match.content,
        metadata: match.metadata,
        similarity: 1 - match.distance,
        key: match.key,
      }));
    } catch (error) {
      this.logger.error(`Vector search failed: ${String(error)}`);
      return [];
    }
  }

  stats(): ContentStats {
    const counts = this.db.getContentCounts();
    return {
      ...counts,
      vector_count: this.vectors.count(),
      type_distribution: this.db.getTypeDistribution(),
    };
  }

  /**
   * Append to query history. Never throws.
   */
  recordQuery(queryText: string, resultCount: number, executionTime: number): void {
    try {
      this.db.insertQueryHistory({
        query_text: queryText,
        query_hash: TextProcessor.hashText(queryText),
        results_count: resultCount,
        execution_time: executionTime,
      });
    } catch (error) {
      this.logger.warn(`Could not record query history: ${String(error)}`);
    }
  }

  getQueryHistory(limit: number = 20): QueryHistoryRecord[] {
    return this.db.listQueryHistory(limit);
  }

  getDocument(documentId: number): Document | null {
    return this.db.getDocumentById(documentId);
  }

  listDocuments(): Document[] {
    return this.db.listDocuments();
  }

  /**
   * Stored chunks of a document joined by blank lines, in chunk order
   */
  getDocumentText(documentId: number): string {
    return this.db
      .getChunksByDocumentId(documentId)
      .map(chunk => chunk.chunk_text)
      .join('\n\n');
  }

  /**
   * Remove chunks without a document and vectors without a chunk
   */
  cleanup(): { chunks: number; vectors: number } {
    const result = this.db.transaction(() => {
      const orphanedChunkKeys = this.db.deleteOrphanedChunks();
      const strayKeys = this.findStrayVectorKeys();
      const removed = this.vectors.delete([...orphanedChunkKeys, ...strayKeys]);
      return { chunks: orphanedChunkKeys.length, vectors: removed };
    });

    this.db.vacuum();
    this.logger.info(`Cleanup removed ${result.chunks} chunks and ${result.vectors} vectors`);
    return result;
  }

  private findStrayVectorKeys(): string[] {
    const known = new Set(this.db.listVectorKeys());
    return this.vectors.keys().filter(key => !known.has(key));
  }

  /**
   * Delete every document, chunk, vector and history row. Index tables must be cleared first.
   */
  /**
   * Run work against the library database in one transaction; nested calls become savepoints
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn);
  }

  clearAll(): void {
    this.db.transaction(() => {
      this.vectors.clear();
      this.db.clearContent();
    });
    this.logger.info('Cleared all documents, chunks, vectors and query history');
  }
}
