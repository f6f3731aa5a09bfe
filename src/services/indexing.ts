import type { DocumentTextSource, RebuildSummary } from '../types/document.js';
import type { Logger } from '../utils/logger.js';

/**
 * An auxiliary index rebuilt per document from its full text
 */
export interface DocumentIndexer {
  indexDocument(documentId: number, fullText: string, displayName?: string): boolean;
}

/**
 * Re-index every document from its stored chunks. One document's failure does not stop the rest.
 */
export function rebuildIndex(
  indexer: DocumentIndexer,
  source: DocumentTextSource,
  logger: Logger,
  indexName: string
): RebuildSummary {
  const documents = source.listDocuments();
  let succeeded = 0;

  for (const document of documents) {
    const text = source.getDocumentText(document.id);
    if (text.length === 0) {
      logger.warn(`No chunks found for ${document.filename}`);
    }
    if (indexer.indexDocument(document.id, text, document.filename)) {
      succeeded++;
    }
  }

  const failed = documents.length - succeeded;
  logger.info(`${indexName} rebuilt: ${succeeded}/${documents.length} documents`);
  return { total: documents.length, succeeded, failed, success: failed === 0 };
}
