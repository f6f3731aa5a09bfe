import OpenAI from 'openai';
import { BaseAIProvider, type RetryOptions } from './base.js';
import type { GenerationOptions } from '../types/provider.js';
import { ApiError } from '../utils/errors.js';

export interface OpenAIProviderOptions {
  apiKey: string;
  baseUrl?: string;
  embeddingModel?: string;
  chatModel?: string;
  retry?: RetryOptions;
}

export class OpenAIProvider extends BaseAIProvider {
  readonly name: string = 'openai';
  protected client: OpenAI;
  protected embeddingModel: string;
  protected chatModel: string;

  constructor(options: OpenAIProviderOptions) {
    super(options.retry);
    this.client = new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    });
    this.embeddingModel = options.embeddingModel ?? 'text-embedding-3-small';
    this.chatModel = options.chatModel ?? 'gpt-4o-mini';
  }

  async validateConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }

  async embed(text: string): Promise<number[]> {
    this.validateText(text);

    const response = await this.withRetry(() =>
      this.client.embeddings.create({
        model: this.embeddingModel,
        input: text,
      })
    );

    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new ApiError(`Empty embedding returned by ${this.embeddingModel}`, this.name);
    }
    return embedding;
  }

  /**
   * Generate text using chat completion
   */
  async generate(prompt: string, options: GenerationOptions = {}): Promise<string> {
    this.validateText(prompt);

    const response = await this.withRetry(() =>
      this.client.chat.completions.create({
        model: options.model ?? this.chatModel,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: options.maxTokens ?? 1024,
        temperature: options.temperature ?? 0.1,
      })
    );

    const text = response.choices[0]?.message?.content?.trim() ?? '';
    if (text.length === 0) {
      throw new ApiError(`Empty completion returned by ${options.model ?? this.chatModel}`, this.name);
    }
    return text;
  }
}
