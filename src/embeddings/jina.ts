import type { JinaEmbeddingsConfig } from '../config/schema.js';
import {
  EmbeddingDataResponseSchema, postJsonWithRetry, sortedEmbeddings, toBatches,
  type RetryPolicy,
} from './http.js';
import type { TextEmbedder } from './types.js';

// Jina различает эмбеддинги документов и запросов.
type JinaTask = 'retrieval.passage' | 'retrieval.query';

const JINA_API_URL = 'https://api.jina.ai/v1/embeddings';

const BATCH_SIZE = 64;

// При 429 ждём 60с * попытка; при 5xx экспоненциально от 1с.
const RETRY_POLICY: RetryPolicy = {
  name: 'Jina',
  label: 'jina',
  maxRetries: 5,
  baseDelayMs: 1000,
  rateLimitDelayMs: 60_000,
};

export class JinaTextEmbedder implements TextEmbedder {
  readonly dimensions: number;
  private readonly apiKey: string;
  private readonly model: string;

  constructor(config: JinaEmbeddingsConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.dimensions = config.dimensions;
  }

  async embed(input: string): Promise<number[]> {
    return this.single(input, 'retrieval.passage');
  }

  // Батчи отправляются последовательно из-за rate limit.
  async embedBatch(inputs: string[]): Promise<number[][]> {
    const results: number[][] = [];
    for (const batch of toBatches(inputs, BATCH_SIZE)) {
      results.push(...await this.callApi(batch, 'retrieval.passage'));
    }
    return results;
  }

  async embedQuery(input: string): Promise<number[]> {
    return this.single(input, 'retrieval.query');
  }

  private async single(input: string, task: JinaTask): Promise<number[]> {
    const [vector] = await this.callApi([input], task);
    if (!vector) {
      throw new Error('Jina API returned no embeddings');
    }
    return vector;
  }

  private async callApi(input: string[], task: JinaTask): Promise<number[][]> {
    const response = await postJsonWithRetry(
      JINA_API_URL,
      // truncate: длинные тексты обрезаются до лимита модели.
      { model: this.model, input, task, dimensions: this.dimensions, truncate: true },
      { Authorization: `Bearer ${this.apiKey}` },
      EmbeddingDataResponseSchema,
      RETRY_POLICY,
    );
    return sortedEmbeddings(response);
  }
}
