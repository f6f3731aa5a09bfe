import { promises as fs, Stats } from 'fs';
import path from 'path';
import { ContentStore } from './content-store.js';
import { ScriptureIndexer } from './scripture-indexer.js';
import { ConceptIndexer } from './concept-indexer.js';
import type { TextExtractor } from './text-extractor.js';
import type { RebuildSummary } from '../types/document.js';
import { TextChunker } from '../utils/chunking.js';
import { DocumentPreprocessor } from '../utils/preprocessing.js';
import { FileError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type FileOutcome = 'processed' | 'skipped' | 'error';

export interface ProcessingSummary {
  processed: number;
  skipped: number;
  errors: number;
}

export interface FileResult {
  filepath: string;
  outcome: FileOutcome;
  documentId?: number;
  chunkCount?: number;
  message?: string;
}

export interface DocumentProcessorOptions {
  maxFileSizeMb: number;
  /** Called after each file of a batch */
  onFile?: (result: FileResult) => void;
}

export interface IndexRebuildResult {
  scripture?: RebuildSummary;
  concepts?: RebuildSummary;
}

/**
 * Drives ingestion: extract, preprocess, chunk, store, then index each new document
 */
export class DocumentProcessor {
  private store: ContentStore;
  private scripture: ScriptureIndexer;
  private concepts: ConceptIndexer;
  private extractor: TextExtractor;
  private chunker: TextChunker;
  private preprocessor: DocumentPreprocessor | null;
  private options: DocumentProcessorOptions;
  private logger: Logger;

  constructor(
    store: ContentStore,
    scripture: ScriptureIndexer,
    concepts: ConceptIndexer,
    extractor: TextExtractor,
    chunker: TextChunker,
    preprocessor: DocumentPreprocessor | null,
    options: DocumentProcessorOptions = { maxFileSizeMb: 100 },
    logger?: Logger
  ) {
    this.store = store;
    this.scripture = scripture;
    this.concepts = concepts;
    this.extractor = extractor;
    this.chunker = chunker;
    this.preprocessor = preprocessor;
    this.options = options;
    this.logger = logger ?? createLogger('document-processor');
  }

  /**
   * Ingest one file and index it. Never throws; failures come back as an 'error' outcome.
   */
  async processFile(filepath: string): Promise<FileResult> {
    const absolutePath = path.resolve(filepath);
    const filename = path.basename(absolutePath);

    try {
      await this.validateFile(absolutePath);

      if (await this.store.isDocumentProcessed(absolutePath)) {
        this.logger.info(`Skipping already processed file: ${filename}`);
        return { filepath: absolutePath, outcome: 'skipped', message: 'already processed' };
      }

      const text = this.preprocess(await this.extractor.extract(absolutePath), filename);
      if (text.trim().length === 0) {
        this.logger.warn(`No text extracted from ${absolutePath}`);
        return { filepath: absolutePath, outcome: 'error', message: 'no text extracted' };
      }

      const chunks = this.chunker.chunk(text);
      if (chunks.length === 0) {
        this.logger.warn(`No chunks created from ${absolutePath}`);
        return { filepath: absolutePath, outcome: 'error', message: 'no chunks created' };
      }

      const documentId = await this.store.addDocument(
        absolutePath,
        filename,
        this.extractor.detectFileType(absolutePath),
        chunks
      );

      if (documentId === null) {
        // Lost a race to an identical file, or the store refused it
        if (await this.store.isDocumentProcessed(absolutePath)) {
          return { filepath: absolutePath, outcome: 'skipped', message: 'already processed' };
        }
        this.logger.error(`Failed to add ${filename} to the library`);
        return { filepath: absolutePath, outcome: 'error', message: 'not added' };
      }

      this.indexDocument(documentId, filename);
      this.logger.info(`Processed ${filename} (${chunks.length} chunks)`);
      return { filepath: absolutePath, outcome: 'processed', documentId, chunkCount: chunks.length };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to process ${filename}: ${message}`);
      return { filepath: absolutePath, outcome: 'error', message };
    }
  }

  /**
   * Ingest files one at a time in the given order
   */
  async processFiles(filepaths: readonly string[]): Promise<ProcessingSummary> {
    const summary: ProcessingSummary = { processed: 0, skipped: 0, errors: 0 };

    for (const filepath of filepaths) {
      const result = await this.processFile(filepath);
      this.tally(summary, result.outcome);
      this.options.onFile?.(result);
    }

    this.logger.info(
      `Processing complete: ${summary.processed} processed, ${summary.skipped} skipped, ${summary.errors} errors`
    );
    return summary;
  }

  /**
   * Ingest every supported file under a directory, in sorted path order
   */
  async processDirectory(directory: string): Promise<ProcessingSummary> {
    return this.processFiles(await this.listSupportedFiles(directory));
  }

  /**
   * Supported files under a directory whose content is not in the library yet
   */
  async findUnprocessedFiles(directory: string): Promise<string[]> {
    const unprocessed: string[] = [];

    for (const filepath of await this.listSupportedFiles(directory)) {
      try {
        if (!(await this.store.isDocumentProcessed(filepath))) {
          unprocessed.push(filepath);
        }
      } catch (error) {
        this.logger.warn(`Cannot read ${filepath}: ${String(error)}`);
      }
    }

    return unprocessed;
  }

  /**
   * Every supported file below a directory, recursively, sorted by path
   */
  async listSupportedFiles(directory: string): Promise<string[]> {
    const root = path.resolve(directory);
    const stats = await fs.stat(root).catch((error: unknown) => {
      throw new FileError(`Cannot read directory ${root}: ${String(error)}`);
    });
    if (!stats.isDirectory()) {
      throw new FileError(`Not a directory: ${root}`);
    }

    const files: string[] = [];
    const walk = async (current: string): Promise<void> => {
      const entries = await fs.readdir(current, { withFileTypes: true });
      for (const entry of entries) {
        const entryPath = path.join(current, entry.name);
        if (entry.isDirectory()) {
          await walk(entryPath);
        } else if (entry.isFile() && this.extractor.supports(entryPath)) {
          files.push(entryPath);
        }
      }
    };

    await walk(root);
    return files.sort();
  }

  /**
   * Rebuild the scripture and concept indexes from stored chunks
   */
  rebuildIndexes(which: { scripture?: boolean; concepts?: boolean } = {}): IndexRebuildResult {
    const result: IndexRebuildResult = {};
    if (which.scripture ?? true) {
      result.scripture = this.scripture.rebuildAll(this.store);
    }
    if (which.concepts ?? true) {
      result.concepts = this.concepts.rebuildAll(this.store);
    }
    return result;
  }

  /**
   * Empty the library in one transaction: index rows first, then vectors, chunks, documents and history
   */
  clearAll(): void {
    this.store.transaction(() => {
      this.scripture.clearAll();
      this.concepts.clearAll();
      this.store.clearAll();
    });
  }

  private async validateFile(filepath: string): Promise<void> {
    let stats: Stats;
    try {
      stats = await fs.stat(filepath);
    } catch (error) {
      throw new FileError(`File not found: ${filepath} (${String(error)})`);
    }

    if (!stats.isFile()) {
      throw new FileError(`Not a file: ${filepath}`);
    }

    if (stats.size > this.options.maxFileSizeMb * 1024 * 1024) {
      throw new FileError(`File is too large (max ${this.options.maxFileSizeMb}MB): ${filepath}`);
    }

    if (!this.extractor.supports(filepath)) {
      throw new FileError(`Unsupported file type: ${path.extname(filepath) || filepath}`);
    }
  }

  private preprocess(text: string, filename: string): string {
    if (!this.preprocessor || text.length === 0) return text;
    try {
      return this.preprocessor.preprocess(text);
    } catch (error) {
      this.logger.warn(`Preprocessing failed for ${filename}, using raw text: ${String(error)}`);
      return text;
    }
  }

  private indexDocument(documentId: number, filename: string): void {
    const fullText = this.store.getDocumentText(documentId);
    if (!this.scripture.indexDocument(documentId, fullText, filename)) {
      this.logger.warn(`Scripture index incomplete for ${filename}; run rebuild-index`);
    }
    if (!this.concepts.indexDocument(documentId, fullText, filename)) {
      this.logger.warn(`Concept index incomplete for ${filename}; run rebuild-index`);
    }
  }

  private tally(summary: ProcessingSummary, outcome: FileOutcome): void {
    switch (outcome) {
      case 'processed':
        summary.processed++;
        break;
      case 'skipped':
        summary.skipped++;
        break;
      case 'error':
        summary.errors++;
        break;
    }
  }
}
