import { OpenAIProvider } from './openai.js';
import type { RetryOptions } from './base.js';

export interface OllamaProviderOptions {
  baseUrl?: string;
  embeddingModel?: string;
  chatModel?: string;
  retry?: RetryOptions;
}

/**
 * Local Ollama server through its OpenAI-compatible /v1 API
 */
export class OllamaProvider extends OpenAIProvider {
  readonly name: string = 'ollama';

  constructor(options: OllamaProviderOptions = {}) {
    const baseUrl = (options.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, '');
    super({
      // Ollama ignores the key, but the client requires one
      apiKey: 'ollama',
      baseUrl: `${baseUrl}/v1`,
      embeddingModel: options.embeddingModel ?? 'nomic-embed-text:latest',
      chatModel: options.chatModel ?? 'llama3.2:3b',
      retry: options.retry,
    });
  }

  getBaseUrl(): string {
    return this.client.baseURL;
  }
}
