import { promises as fs } from 'fs';
import path from 'path';
import { TextProcessor } from '../utils/text-processing.js';
import { createLogger, type Logger } from '../utils/logger.js';

const MIME_TYPES: Record<string, string> = {
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.markdown': 'text/markdown',
  '.csv': 'text/csv',
};

/**
 * Turns a file into plain text for chunking
 */
export interface TextExtractor {
  supports(filepath: string): boolean;
  /** MIME type recorded as the document's file_type */
  detectFileType(filepath: string): string;
  /** Plain text of the file, or '' when nothing could be extracted */
  extract(filepath: string): Promise<string>;
}

export class PlainTextExtractor implements TextExtractor {
  private extensions: Set<string>;
  private logger: Logger;

  constructor(extensions: readonly string[] = Object.keys(MIME_TYPES), logger?: Logger) {
    this.extensions = new Set(
      extensions
        .map(extension => extension.toLowerCase())
        .filter(extension => extension in MIME_TYPES)
    );
    this.logger = logger ?? createLogger('text-extractor');
  }

  getSupportedExtensions(): string[] {
    return [...this.extensions];
  }

  supports(filepath: string): boolean {
    return this.extensions.has(path.extname(filepath).toLowerCase());
  }

  detectFileType(filepath: string): string {
    return MIME_TYPES[path.extname(filepath).toLowerCase()] ?? 'application/octet-stream';
  }

  async extract(filepath: string): Promise<string> {
    if (!this.supports(filepath)) {
      this.logger.warn(`Unsupported file format: ${filepath}`);
      return '';
    }

    let content: string;
    try {
      content = await fs.readFile(filepath, 'utf-8');
    } catch (error) {
      this.logger.error(`Failed to read ${filepath}: ${String(error)}`);
      return '';
    }

    switch (path.extname(filepath).toLowerCase()) {
      case '.md':
      case '.markdown':
        return TextProcessor.extractText(content, 'md');
      case '.csv':
        return TextProcessor.cleanText(this.formatCsv(content));
      default:
        return TextProcessor.extractText(content, 'txt');
    }
  }

  /**
   * One line per row with cells joined by " | "; quoted fields lose their quotes
   */
  private formatCsv(content: string): string {
    return content
      .split(/\r?\n/)
      .filter(line => line.trim().length > 0)
      .map(line => this.splitCsvLine(line).join(' | '))
      .join('\n');
  }

  private splitCsvLine(line: string): string[] {
    const cells: string[] = [];
    let current = '';
    let quoted = false;

    for (let i = 0; i < line.length; i++) {
      const char = line.charAt(i);
      if (quoted) {
        if (char === '"' && line.charAt(i + 1) === '"') {
          current += '"';
          i++;
        } else if (char === '"') {
          quoted = false;
        } else {
          current += char;
        }
      } else if (char === '"') {
        quoted = true;
      } else if (char === ',') {
        cells.push(current.trim());
        current = '';
      } else {
        current += char;
      }
    }

    cells.push(current.trim());
    return cells;
  }
}
