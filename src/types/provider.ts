export interface GenerationOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface EmbeddingProvider {
  readonly name: string;
  /** Fixed-dimension embedding; identical input yields an identical vector */
  embed(text: string): Promise<number[]>;
}

export interface GenerationProvider {
  readonly name: string;
  generate(prompt: string, options?: GenerationOptions): Promise<string>;
}

export interface AIProvider extends EmbeddingProvider, GenerationProvider {
  validateConnection(): Promise<boolean>;
}
