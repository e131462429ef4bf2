import { z } from 'zod';
import { LanguageSchema, LANGUAGES } from '../chunks/languages.js';

// Подключение к PostgreSQL. url имеет приоритет над отдельными полями.
export const DatabaseConfigSchema = z.object({
  url: z.string().optional(),
  host: z.string().default('localhost'),
  port: z.number().default(5432),
  name: z.string().default('code_index'),
  user: z.string().default('code_index'),
  password: z.string().default('code_index'),
});

// Хранилище векторов: postgres (pgvector) или память процесса.
export const StoreConfigSchema = z.object({
  provider: z.enum(['postgres', 'memory']).default('postgres'),
});

export const JinaEmbeddingsSchema = z.object({
  apiKey: z.string(),
  model: z.string().default('jina-embeddings-v2-base-code'),
  dimensions: z.number().default(768),
});

export const OpenAIEmbeddingsSchema = z.object({
  apiKey: z.string(),
  model: z.string().default('text-embedding-3-small'),
  dimensions: z.number().default(1536),
});

// Локальный Ollama-сервер.
export const OllamaEmbeddingsSchema = z.object({
  baseUrl: z.string().default('http://localhost:11434'),
  model: z.string().default('nomic-embed-text'),
  dimensions: z.number().default(768),
});

export const MockEmbeddingsSchema = z.object({
  dimensions: z.number().int().positive().default(384),
});

export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['jina', 'openai', 'ollama', 'mock']).default('ollama'),
  jina: JinaEmbeddingsSchema.optional(),
  openai: OpenAIEmbeddingsSchema.optional(),
  ollama: OllamaEmbeddingsSchema.default({}),
  mock: MockEmbeddingsSchema.default({}),
});

// Параметры индексации.
export const IndexingConfigSchema = z.object({
  languages: z.array(LanguageSchema).min(1).default([...LANGUAGES]),
  batchSize: z.number().int().positive().default(50),
  concurrency: z.number().int().positive().default(4),
  exclude: z.array(z.string()).default([]),
  respectGitignore: z.boolean().default(true),
  // Файлы крупнее лимита (байты) пропускаются.
  maxFileSize: z.number().int().positive().default(1024 * 1024),
});

export const SearchConfigSchema = z.object({
  defaultTopK: z.number().int().min(1).max(100).default(10),
  // Верхняя граница topK для запросов к сервису.
  maxTopK: z.number().int().min(1).max(100).default(100),
});

export const ServerConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(8080),
  corsOrigins: z.array(z.string()).default(['http://localhost:3000', 'http://localhost:5080']),
});

// Корневая схема конфигурации приложения.
export const AppConfigSchema = z.object({
  database: DatabaseConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  embeddings: EmbeddingsConfigSchema.default({}),
  indexing: IndexingConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type JinaEmbeddingsConfig = z.infer<typeof JinaEmbeddingsSchema>;
export type OpenAIEmbeddingsConfig = z.infer<typeof OpenAIEmbeddingsSchema>;
export type OllamaEmbeddingsConfig = z.infer<typeof OllamaEmbeddingsSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type IndexingConfig = z.infer<typeof IndexingConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
