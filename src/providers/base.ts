import type { AIProvider, GenerationOptions } from '../types/provider.js';
import { ApiError } from '../utils/errors.js';

export interface RetryOptions {
  maxRetries?: number;
  /** Initial backoff in milliseconds, doubled after each failed attempt */
  delayMs?: number;
}

export abstract class BaseAIProvider implements AIProvider {
  abstract readonly name: string;
  protected maxRetries: number;
  protected delayMs: number;

  constructor(retry: RetryOptions = {}) {
    this.maxRetries = retry.maxRetries ?? 3;
    this.delayMs = retry.delayMs ?? 1000;
  }

  abstract embed(text: string): Promise<number[]>;
  abstract generate(prompt: string, options?: GenerationOptions): Promise<string>;
  abstract validateConnection(): Promise<boolean>;

  /**
   * Handle API errors with retry logic
   */
  protected async withRetry<T>(operation: () => Promise<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;

        // Don't retry on authentication errors
        if (this.isAuthError(error)) {
          throw new ApiError(`Authentication failed: ${errorMessage(error)}`, this.name);
        }

        if (attempt === this.maxRetries) {
          break;
        }

        // Exponential backoff
        await this.sleep(this.delayMs * Math.pow(2, attempt - 1));
      }
    }

    throw new ApiError(
      `Operation failed after ${this.maxRetries} attempts: ${errorMessage(lastError)}`,
      this.name
    );
  }

  /**
   * Check if error is authentication related
   */
  protected isAuthError(error: unknown): boolean {
    const message = String(error).toLowerCase();
    return message.includes('unauthorized') ||
           message.includes('api key') ||
           message.includes('authentication');
  }

  /**
   * Sleep for specified milliseconds
   */
  protected sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Validate text input for embedding or generation
   */
  protected validateText(text: string): void {
    if (text.trim().length === 0) {
      throw new ApiError('Text cannot be empty', this.name);
    }

    if (text.length > 100000) {
      throw new ApiError('Text is too long for processing', this.name);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
