// Эмбеддинги через локальный Ollama-сервер.
import { z } from 'zod';
import type { OllamaEmbeddingsConfig } from '../config/schema.js';
import { toBatches } from './http.js';
import type { TextEmbedder } from './types.js';

const BATCH_SIZE = 32;

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).optional(),
  embedding: z.array(z.number()).optional(),
});

type EmbedResponse = z.infer<typeof EmbedResponseSchema>;

export class OllamaTextEmbedder implements TextEmbedder {
  readonly dimensions: number;
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(config: OllamaEmbeddingsConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.model = config.model;
    this.dimensions = config.dimensions;
  }

  async embed(input: string): Promise<number[]> {
    const [vector] = await this.callBatch([input]);
    if (!vector) {
      throw new Error('Ollama returned empty embedding array');
    }
    return vector;
  }

  async embedBatch(inputs: string[]): Promise<number[][]> {
    const results: number[][] = [];
    for (const batch of toBatches(inputs, BATCH_SIZE)) {
      results.push(...await this.callBatch(batch));
    }
    return results;
  }

  // Модели Ollama не различают документы и запросы.
  async embedQuery(input: string): Promise<number[]> {
    return this.embed(input);
  }

  private async postJson(endpoint: string, body: Record<string, unknown>): Promise<EmbedResponse> {
    const response = await fetch(`${this.baseUrl}${endpoint}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const payload = await response.text();
      throw new Error(`Ollama request failed (${response.status}) ${endpoint}: ${payload}`);
    }

    const parsed = EmbedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Ollama ${endpoint} returned an unexpected response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async callBatch(inputs: string[]): Promise<number[][]> {
    try {
      const data = await this.postJson('/api/embed', { model: this.model, input: inputs });
      if (data.embeddings) {
        return data.embeddings;
      }
    } catch (error) {
      if (inputs.length > 1) {
        throw error;
      }
    }

    // Старые версии Ollama знают только /api/embeddings с одним текстом.
    const output: number[][] = [];
    for (const text of inputs) {
      const data = await this.postJson('/api/embeddings', { model: this.model, prompt: text });
      if (!data.embedding) {
        throw new Error('Ollama /api/embeddings response does not contain embedding');
      }
      output.push(data.embedding);
    }
    return output;
  }
}
