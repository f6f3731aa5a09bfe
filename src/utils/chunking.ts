import { ValidationError } from './errors.js';

export interface ChunkingOptions {
  /** Words per chunk */
  maxChunkSize: number;
  /** Words shared by consecutive chunks */
  overlap: number;
}

export class TextChunker {
  private options: ChunkingOptions;

  constructor(options: ChunkingOptions) {
    TextChunker.validateOptions(options);
    this.options = options;
  }

  /**
   * Split text into overlapping word windows joined by single spaces
   */
  chunk(text: string): string[] {
    const words = text.split(/\s+/).filter(word => word.length > 0);
    const { maxChunkSize, overlap } = this.options;
    const step = maxChunkSize - overlap;
    const chunks: string[] = [];

    for (let start = 0; start < words.length; start += step) {
      chunks.push(words.slice(start, start + maxChunkSize).join(' '));
    }

    return chunks;
  }

  getOptions(): ChunkingOptions {
    return { ...this.options };
  }

  /**
   * Validate chunking options
   */
  static validateOptions(options: ChunkingOptions): void {
    const { maxChunkSize, overlap } = options;

    if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
      throw new ValidationError('Chunk size must be a positive integer');
    }

    if (!Number.isInteger(overlap) || overlap < 0) {
      throw new ValidationError('Overlap must be a non-negative integer');
    }

    if (overlap >= maxChunkSize) {
      throw new ValidationError('Overlap must be less than chunk size');
    }
  }

  /**
   * Number of chunks `chunk` produces for a text of `wordCount` words
   */
  static expectedChunkCount(wordCount: number, options: ChunkingOptions): number {
    TextChunker.validateOptions(options);
    return Math.ceil(wordCount / (options.maxChunkSize - options.overlap));
  }
}
