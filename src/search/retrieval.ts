// Семантический поиск: эмбеддинг запроса -> ближайшие чанки индекса.
import type { TextEmbedder } from '../embeddings/types.js';
import { ServiceNotReadyError } from '../errors.js';
import { clampScore, type VectorIndex } from '../storage/vector-index.js';
import {
  SearchRequestSchema,
  type HealthStatus, type SearchRequestInput, type SearchResponse, type SearchResult,
} from './types.js';

export interface RetrievalServiceOptions {
  version: string;
  maxTopK: number;
  // Подготовка хранилища при старте; false — сервис остаётся неготовым.
  prepare?: () => Promise<boolean>;
}

export class RetrievalService {
  private ready = false;

  constructor(
    private readonly index: VectorIndex,
    private readonly embedder: TextEmbedder,
    private readonly options: RetrievalServiceOptions,
  ) {}

  async start(): Promise<boolean> {
    this.ready = this.options.prepare ? await this.options.prepare() : true;
    return this.ready;
  }

  isReady(): boolean {
    return this.ready;
  }

  /**
   * Выполняет поиск. Невалидный запрос — ZodError,
   * вызов до успешного start() — ServiceNotReadyError.
   */
  async search(input: SearchRequestInput): Promise<SearchResponse> {
    const request = SearchRequestSchema.parse(input);
    if (!this.ready) {
      throw new ServiceNotReadyError();
    }

    const startTime = performance.now();
    const embedding = await this.embedder.embedQuery(request.query);
    const chunks = await this.index.search(embedding, Math.min(request.topK, this.options.maxTopK), {
      languages: request.languages,
      nodeTypes: request.nodeTypes,
      filePathPrefix: request.filePathPrefix,
    });
    const durationMs = performance.now() - startTime;

    const results: SearchResult[] = chunks.map((found, i) => {
      const { embedding: vector, similarityScore, ...chunk } = found;
      const score = clampScore(similarityScore ?? 0);
      return {
        chunk: {
          ...chunk,
          content: request.includeContent ? chunk.content : '',
          ...(request.includeEmbedding && vector ? { embedding: vector } : {}),
          similarityScore: score,
        },
        similarityScore: score,
        rank: i + 1,
      };
    });

    return { query: request.query, results, totalFound: results.length, durationMs };
  }

  async health(): Promise<HealthStatus> {
    const databaseConnected = await this.index.healthCheck();
    const embeddingModelLoaded = this.ready;
    return {
      status: databaseConnected && embeddingModelLoaded ? 'healthy' : 'degraded',
      version: this.options.version,
      databaseConnected,
      embeddingModelLoaded,
      timestamp: new Date(),
    };
  }
}
