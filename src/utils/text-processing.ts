import crypto from 'crypto';
import { promises as fs } from 'fs';
import { FileError } from './errors.js';

export type TextFormat = 'txt' | 'md';

export class TextProcessor {
  /**
   * Clean and normalize text content
   */
  static cleanText(text: string): string {
    return text
      .normalize('NFKC')
      // Control characters other than tab and newlines
      .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g, '')
      .replace(/\u00A0/g, ' ')
      .replace(/\r\n?/g, '\n')
      .replace(/[ \t]+/g, ' ')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  /**
   * Extract plain text from various formats
   */
  static extractText(content: string, format: TextFormat = 'txt'): string {
    switch (format) {
      case 'txt':
        return this.cleanText(content);
      case 'md':
        return this.cleanText(this.extractFromMarkdown(content));
    }
  }

  /**
   * Extract plain text from Markdown
   */
  private static extractFromMarkdown(markdown: string): string {
    return markdown
      // Remove code blocks
      .replace(/```[\s\S]*?```/g, '')
      .replace(/`[^`\n]+`/g, '')
      // Remove headers (keep text)
      .replace(/^#{1,6}\s+/gm, '')
      // Remove images
      .replace(/!\[([^\]]*)\]\([^)]+\)/g, '')
      // Remove links but keep text
      .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
      // Remove emphasis markers
      .replace(/(\*\*|__)([^*_]+)\1/g, '$2')
      .replace(/(\*|_)([^*_]+)\1/g, '$2')
      // Remove strikethrough
      .replace(/~~([^~]+)~~/g, '$1')
      // Remove horizontal rules
      .replace(/^[-*_]{3,}$/gm, '')
      // Remove blockquote and list markers
      .replace(/^[ \t]*>\s?/gm, '')
      .replace(/^[ \t]*[-*+]\s+/gm, '')
      .replace(/^[ \t]*\d+\.\s+/gm, '');
  }

  /**
   * Split text into trimmed, non-empty sentences on `.`, `!` and `?`
   */
  static splitSentences(text: string): string[] {
    return text
      .split(/[.!?]+/)
      .map(sentence => sentence.trim())
      .filter(sentence => sentence.length > 0);
  }

  /**
   * SHA-256 of a text as lowercase hex
   */
  static hashText(text: string): string {
    return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
  }

  /**
   * SHA-256 of a file's raw bytes as lowercase hex
   */
  static async hashFile(filepath: string): Promise<string> {
    try {
      const buffer = await fs.readFile(filepath);
      return crypto.createHash('sha256').update(buffer).digest('hex');
    } catch (error) {
      throw new FileError(`Failed to calculate file hash for ${filepath}: ${String(error)}`);
    }
  }

  static escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  }
}
