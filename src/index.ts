export { createLibrary } from './app.js';
export type { Library, LibraryOverrides } from './app.js';

export { DatabaseService } from './services/database.js';
export { SqliteVectorIndex, cosineDistance } from './services/vector-index.js';
export type { VectorIndex, VectorEntry, VectorMatch, VectorMetadata } from './services/vector-index.js';
export { ContentStore, vectorKey } from './services/content-store.js';
export type { SimilarityResult } from './services/content-store.js';
export { ScriptureIndexer } from './services/scripture-indexer.js';
export type { ExtractedReference, ReferenceSearchResult, StoredReference } from './services/scripture-indexer.js';
export { ConceptIndexer } from './services/concept-indexer.js';
export type { ConceptOccurrence, ConceptSearchResult } from './services/concept-indexer.js';
export { InMemoryScriptureLookup } from './services/scripture-lookup.js';
export type { ScriptureTextLookup } from './services/scripture-lookup.js';
export { PlainTextExtractor } from './services/text-extractor.js';
export type { TextExtractor } from './services/text-extractor.js';
export { DocumentProcessor } from './services/document-processor.js';
export type { FileResult, ProcessingSummary } from './services/document-processor.js';
export { QueryEngine, GENERATION_FAILED_MESSAGE } from './services/query-engine.js';
export type { QueryResponse, SourceReference } from './services/query-engine.js';

export { OpenAIProvider } from './providers/openai.js';
export { OllamaProvider } from './providers/ollama.js';
export { ProviderFactory } from './providers/factory.js';

export { TextChunker } from './utils/chunking.js';
export { DocumentPreprocessor } from './utils/preprocessing.js';
export { ConfigManager } from './utils/config.js';
export { loadScriptureVocabulary, loadConceptVocabulary } from './utils/vocabulary.js';
export * from './utils/errors.js';

export type { AppConfig, AppConfigInput, ProviderName } from './types/config.js';
export type { Document, Chunk, ContentStats, QueryHistoryRecord, RebuildSummary } from './types/document.js';
export type { EmbeddingProvider, GenerationProvider, GenerationOptions } from './types/provider.js';
