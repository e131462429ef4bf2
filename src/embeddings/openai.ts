import type { OpenAIEmbeddingsConfig } from '../config/schema.js';
import {
  EmbeddingDataResponseSchema, postJsonWithRetry, sortedEmbeddings, toBatches,
  type RetryPolicy,
} from './http.js';
import type { TextEmbedder } from './types.js';

const OPENAI_API_URL = 'https://api.openai.com/v1/embeddings';

const BATCH_SIZE = 100;

// Экспоненциальная задержка: 1с, 2с, 4с.
const RETRY_POLICY: RetryPolicy = {
  name: 'OpenAI',
  label: 'openai',
  maxRetries: 3,
  baseDelayMs: 1000,
};

export class OpenAITextEmbedder implements TextEmbedder {
  readonly dimensions: number;
  private readonly apiKey: string;
  private readonly model: string;

  constructor(config: OpenAIEmbeddingsConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.dimensions = config.dimensions;
  }

  async embed(input: string): Promise<number[]> {
    const [vector] = await this.callApi([input]);
    if (!vector) {
      throw new Error('OpenAI API returned no embeddings');
    }
    return vector;
  }

  async embedBatch(inputs: string[]): Promise<number[][]> {
    const results: number[][] = [];
    for (const batch of toBatches(inputs, BATCH_SIZE)) {
      results.push(...await this.callApi(batch));
    }
    return results;
  }

  // OpenAI не различает документы и запросы.
  async embedQuery(input: string): Promise<number[]> {
    return this.embed(input);
  }

  private async callApi(input: string[]): Promise<number[][]> {
    const response = await postJsonWithRetry(
      OPENAI_API_URL,
      { model: this.model, input, dimensions: this.dimensions },
      { Authorization: `Bearer ${this.apiKey}` },
      EmbeddingDataResponseSchema,
      RETRY_POLICY,
    );
    return sortedEmbeddings(response);
  }
}
