export type DocumentStatus = 'processed' | 'failed';

export interface Document {
  id: number;
  filename: string;
  filepath: string;
  file_hash: string;
  file_size: number;
  file_type: string;
  created_at: string;
  modified_at: string | null;
  /** Chunks produced for the document, duplicates included */
  chunk_count: number;
  status: DocumentStatus;
}

export interface Chunk {
  id: number;
  document_id: number;
  chunk_index: number;
  chunk_text: string;
  chunk_hash: string;
  vector_key: string;
  created_at: string;
}

export interface QueryHistoryRecord {
  id: number;
  query_text: string;
  query_hash: string;
  results_count: number;
  /** Milliseconds */
  execution_time: number;
  created_at: string;
}

export interface ContentStats {
  document_count: number;
  chunk_count: number;
  vector_count: number;
  total_size: number;
  type_distribution: Record<string, number>;
}

/**
 * Read access to reassembled document text, as used by index rebuilds
 */
export interface DocumentTextSource {
  listDocuments(): Document[];
  getDocumentText(documentId: number): string;
}

export interface RebuildSummary {
  total: number;
  succeeded: number;
  failed: number;
  success: boolean;
}
