import type { AppConfig } from './types/config.js';
import type { EmbeddingProvider, GenerationProvider } from './types/provider.js';
import { DatabaseService } from './services/database.js';
import { SqliteVectorIndex, type VectorIndex } from './services/vector-index.js';
import { ContentStore } from './services/content-store.js';
import { ScriptureIndexer } from './services/scripture-indexer.js';
import { ConceptIndexer } from './services/concept-indexer.js';
import { InMemoryScriptureLookup } from './services/scripture-lookup.js';
import { PlainTextExtractor } from './services/text-extractor.js';
import { DocumentProcessor, type FileResult } from './services/document-processor.js';
import { QueryEngine } from './services/query-engine.js';
import { ProviderFactory } from './providers/factory.js';
import { TextChunker } from './utils/chunking.js';
import { DocumentPreprocessor } from './utils/preprocessing.js';
import { loadConceptVocabulary, loadScriptureVocabulary } from './utils/vocabulary.js';
import { setLogLevel } from './utils/logger.js';

export interface Library {
  db: DatabaseService;
  vectors: VectorIndex;
  store: ContentStore;
  scripture: ScriptureIndexer;
  concepts: ConceptIndexer;
  processor: DocumentProcessor;
  queryEngine: QueryEngine;
  close(): void;
}

export interface LibraryOverrides {
  embedder?: EmbeddingProvider;
  /** null disables generation regardless of configuration */
  generator?: GenerationProvider | null;
  onFile?: (result: FileResult) => void;
}

function resolveProviders(
  config: AppConfig,
  overrides: LibraryOverrides
): { embedder: EmbeddingProvider; generator: GenerationProvider | null } {
  const { embedder, generator } = overrides;
  if (embedder !== undefined && generator !== undefined) {
    return { embedder, generator };
  }

  const fromConfig = ProviderFactory.createFromConfig(config);
  return {
    embedder: embedder ?? fromConfig.embedder,
    generator: generator === undefined ? fromConfig.generator : generator,
  };
}

/**
 * Wire every service from configuration. The database is opened and migrated here.
 */
export function createLibrary(config: AppConfig, overrides: LibraryOverrides = {}): Library {
  setLogLevel(config.logging.level);

  const { embedder, generator } = resolveProviders(config, overrides);

  const scriptureVocabulary = loadScriptureVocabulary(config.vocabulary.scriptureBooksPath);
  const conceptVocabulary = loadConceptVocabulary(config.vocabulary.theologicalConceptsPath);
  const chunker = new TextChunker(config.chunking);

  const db = new DatabaseService(config.database.path, { busyTimeoutMs: config.database.busyTimeoutMs });
  db.initialize();

  const vectors = new SqliteVectorIndex(db);
  const store = new ContentStore(db, vectors, embedder);
  const scripture = new ScriptureIndexer(db, scriptureVocabulary);
  const concepts = new ConceptIndexer(db, conceptVocabulary);

  const processor = new DocumentProcessor(
    store,
    scripture,
    concepts,
    new PlainTextExtractor(config.processing.supportedExtensions),
    chunker,
    config.processing.preprocess ? new DocumentPreprocessor(scriptureVocabulary, conceptVocabulary) : null,
    { maxFileSizeMb: config.processing.maxFileSizeMb, onFile: overrides.onFile }
  );

  const lookup = config.vocabulary.scriptureTextPath
    ? InMemoryScriptureLookup.fromFile(config.vocabulary.scriptureTextPath)
    : null;

  const queryEngine = new QueryEngine(store, scripture, concepts, generator, lookup, {
    maxResults: config.query.maxResults,
    contextResults: config.query.contextResults,
    includeSources: config.query.includeSources,
    generation: {
      temperature: config.generation.temperature,
      maxTokens: config.generation.maxTokens,
    },
  });

  return {
    db,
    vectors,
    store,
    scripture,
    concepts,
    processor,
    queryEngine,
    close: () => db.close(),
  };
}
