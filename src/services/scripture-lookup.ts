import { readFileSync } from 'fs';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('scripture-lookup');

const PassageFileSchema = z.record(z.string());

/**
 * Passage text for a normalized reference such as "John 3:16"
 */
export interface ScriptureTextLookup {
  getText(normalizedReference: string): string | null;
}

export class InMemoryScriptureLookup implements ScriptureTextLookup {
  private passages: Map<string, string>;

  constructor(passages: Record<string, string> = {}) {
    this.passages = new Map(Object.entries(passages));
  }

  getText(normalizedReference: string): string | null {
    return this.passages.get(normalizedReference) ?? null;
  }

  /**
   * Load a JSON object of reference → passage text. An unreadable file yields an empty lookup.
   */
  static fromFile(filepath: string): InMemoryScriptureLookup {
    try {
      const result = PassageFileSchema.safeParse(JSON.parse(readFileSync(filepath, 'utf-8')));
      if (result.success) {
        return new InMemoryScriptureLookup(result.data);
      }
      logger.warn(`Ignoring scripture text file ${filepath}: ${result.error.message}`);
    } catch (error) {
      logger.warn(`Scripture text file ${filepath} unavailable: ${String(error)}`);
    }
    return new InMemoryScriptureLookup();
  }
}
