import { z } from 'zod';

export const ProviderNameSchema = z.enum(['openai', 'ollama']);

export const AppConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  providers: z.object({
    openai: z.object({
      apiKey: z.string(),
      baseUrl: z.string().optional(),
      embeddingModel: z.string().default('text-embedding-3-small'),
      chatModel: z.string().default('gpt-4o-mini'),
    }).optional(),
    ollama: z.object({
      baseUrl: z.string().default('http://localhost:11434'),
      embeddingModel: z.string().default('nomic-embed-text:latest'),
      chatModel: z.string().default('llama3.2:3b'),
    }).optional(),
  }).default({}),
  embedding: z.object({
    provider: ProviderNameSchema.default('ollama'),
  }).default({}),
  generation: z.object({
    enabled: z.boolean().default(true),
    provider: ProviderNameSchema.default('ollama'),
    temperature: z.number().min(0).max(2).default(0.1),
    maxTokens: z.number().int().positive().default(1024),
  }).default({}),
  database: z.object({
    path: z.string().default(''),
    busyTimeoutMs: z.number().int().nonnegative().default(30000),
  }).default({}),
  chunking: z.object({
    maxChunkSize: z.number().int().positive().default(1500),
    overlap: z.number().int().nonnegative().default(100),
  }).default({}),
  processing: z.object({
    supportedExtensions: z.array(z.string()).default(['.txt', '.md', '.markdown', '.csv']),
    maxFileSizeMb: z.number().positive().default(100),
    preprocess: z.boolean().default(true),
  }).default({}),
  vocabulary: z.object({
    scriptureBooksPath: z.string().optional(),
    theologicalConceptsPath: z.string().optional(),
    scriptureTextPath: z.string().optional(),
  }).default({}),
  query: z.object({
    maxResults: z.number().int().positive().default(10),
    contextResults: z.number().int().positive().default(5),
    includeSources: z.boolean().default(true),
  }).default({}),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  }).default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type ProviderName = z.infer<typeof ProviderNameSchema>;
