import type { AIProvider } from '../types/provider.js';
import type { AppConfig, ProviderName } from '../types/config.js';
import { OpenAIProvider } from './openai.js';
import { OllamaProvider } from './ollama.js';
import { ConfigurationError } from '../utils/errors.js';

export class ProviderFactory {
  /**
   * Create an AI provider instance from its configuration section
   */
  static createProvider(name: ProviderName, providers: AppConfig['providers']): AIProvider {
    switch (name) {
      case 'openai': {
        const openai = providers.openai;
        if (!openai || openai.apiKey.trim().length === 0) {
          throw new ConfigurationError('API key is required for openai provider');
        }
        return new OpenAIProvider({
          apiKey: openai.apiKey,
          baseUrl: openai.baseUrl,
          embeddingModel: openai.embeddingModel,
          chatModel: openai.chatModel,
        });
      }
      case 'ollama': {
        const ollama = providers.ollama;
        return new OllamaProvider({
          baseUrl: ollama?.baseUrl,
          embeddingModel: ollama?.embeddingModel,
          chatModel: ollama?.chatModel,
        });
      }
    }
  }

  /**
   * Get list of supported providers
   */
  static getSupportedProviders(): ProviderName[] {
    return ['openai', 'ollama'];
  }

  /**
   * Validate provider name
   */
  static isValidProvider(name: string): name is ProviderName {
    return this.getSupportedProviders().some(provider => provider === name);
  }

  /**
   * Embedding and generation providers chosen by configuration. One instance is shared when both use the same backend.
   */
  static createFromConfig(config: AppConfig): { embedder: AIProvider; generator: AIProvider | null } {
    const embedder = this.createProvider(config.embedding.provider, config.providers);

    if (!config.generation.enabled) {
      return { embedder, generator: null };
    }

    const generator = config.generation.provider === config.embedding.provider
      ? embedder
      : this.createProvider(config.generation.provider, config.providers);

    return { embedder, generator };
  }
}
