// Детерминированные эмбеддинги по хэшу текста: для тестов и работы без модели.
import { createHash } from 'node:crypto';
import type { TextEmbedder } from './types.js';

// Байт sha256 на компоненту; каждые 32 компоненты берётся новый блок хэша.
function hashToVector(input: string, dimensions: number): number[] {
  const vector: number[] = [];
  for (let block = 0; vector.length < dimensions; block++) {
    const digest = createHash('sha256').update(`${block}:${input}`).digest();
    for (const byte of digest) {
      if (vector.length === dimensions) break;
      vector.push(byte / 127.5 - 1);
    }
  }

  const norm = Math.hypot(...vector);
  return norm === 0 ? vector : vector.map((v) => v / norm);
}

export class MockTextEmbedder implements TextEmbedder {
  constructor(readonly dimensions = 384) {}

  async embed(input: string): Promise<number[]> {
    return hashToVector(input, this.dimensions);
  }

  async embedBatch(inputs: string[]): Promise<number[][]> {
    return inputs.map((input) => hashToVector(input, this.dimensions));
  }

  // Префикс отделяет векторы запросов от векторов документов.
  async embedQuery(input: string): Promise<number[]> {
    return hashToVector(`query:${input}`, this.dimensions);
  }
}
