// Запросы и ответы поиска.
import { z } from 'zod';
import { LanguageSchema } from '../chunks/languages.js';
import { NodeTypeSchema, type CodeChunk } from '../chunks/types.js';

export const MAX_TOP_K = 100;

export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  topK: z.number().int().min(1).max(MAX_TOP_K).default(10),
  languages: z.array(LanguageSchema).optional(),
  nodeTypes: z.array(NodeTypeSchema).optional(),
  filePathPrefix: z.string().min(1).optional(),
  includeContent: z.boolean().default(true),
  includeEmbedding: z.boolean().default(false),
});

export type SearchRequest = z.infer<typeof SearchRequestSchema>;
// Вход до применения значений по умолчанию.
export type SearchRequestInput = z.input<typeof SearchRequestSchema>;

export interface SearchResult {
  chunk: CodeChunk;
  // [0, 1], 1 — совпадение направления векторов.
  similarityScore: number;
  // С единицы, по убыванию сходства.
  rank: number;
}

export interface SearchResponse {
  query: string;
  results: SearchResult[];
  totalFound: number;
  durationMs: number;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  version: string;
  databaseConnected: boolean;
  embeddingModelLoaded: boolean;
  timestamp: Date;
}
