// Векторный индекс в памяти процесса: store.provider = memory и тесты.
import { randomUUID } from 'node:crypto';
import type { CodeChunk } from '../chunks/types.js';
import {
  distanceToSimilarity, emptyStats,
  type IndexStats, type SchemaStatus, type SearchFilters, type UpsertResult, type VectorIndex,
} from './vector-index.js';

// Косинусное расстояние; null при разной длине или нулевом векторе.
export function cosineDistance(a: readonly number[], b: readonly number[]): number | null {
  if (a.length !== b.length || a.length === 0) {
    return null;
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return null;
  }
  return 1 - dot / Math.sqrt(normA * normB);
}

function keyOf(filePath: string, fullyQualifiedName: string): string {
  return `${filePath}\u0000${fullyQualifiedName}`;
}

export class InMemoryVectorIndex implements VectorIndex {
  private readonly records = new Map<string, CodeChunk>();
  private dimension: number | null = null;

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async checkSchema(): Promise<SchemaStatus> {
    if (this.dimension === null) {
      return { exists: false, indexes: [] };
    }
    return { exists: true, table: 'memory', dimension: this.dimension, indexes: [] };
  }

  async createSchema(dimension: number): Promise<boolean> {
    this.dimension = dimension;
    return true;
  }

  async upsert(chunk: CodeChunk): Promise<UpsertResult | null> {
    const key = keyOf(chunk.filePath, chunk.fullyQualifiedName);
    const existing = this.records.get(key);
    if (existing?.id) {
      // Как в PgVectorIndex: тип узла и язык остаются от первой записи.
      this.records.set(key, { ...chunk, id: existing.id, nodeType: existing.nodeType, language: existing.language });
      return { recordId: existing.id, wasUpdate: true };
    }
    const recordId = randomUUID();
    this.records.set(key, { ...chunk, id: recordId });
    return { recordId, wasUpdate: false };
  }

  async deleteByFile(filePath: string): Promise<number> {
    return this.deleteWhere((chunk) => chunk.filePath === filePath);
  }

  async deleteStale(filePath: string, keep: readonly string[]): Promise<number> {
    const kept = new Set(keep);
    return this.deleteWhere((chunk) => chunk.filePath === filePath && !kept.has(chunk.fullyQualifiedName));
  }

  async deleteAll(): Promise<number> {
    const count = this.records.size;
    this.records.clear();
    return count;
  }

  async search(embedding: number[], topK: number, filters: SearchFilters = {}): Promise<CodeChunk[]> {
    const { languages, nodeTypes, filePathPrefix } = filters;
    const scored: CodeChunk[] = [];

    for (const chunk of this.records.values()) {
      if (!chunk.embedding) continue;
      if (languages?.length && !languages.includes(chunk.language)) continue;
      if (nodeTypes?.length && !nodeTypes.includes(chunk.nodeType)) continue;
      if (filePathPrefix && !chunk.filePath.startsWith(filePathPrefix)) continue;

      const distance = cosineDistance(embedding, chunk.embedding);
      if (distance === null) continue;
      scored.push({ ...chunk, similarityScore: distanceToSimilarity(distance) });
    }

    return scored
      .sort((a, b) => (b.similarityScore ?? 0) - (a.similarityScore ?? 0))
      .slice(0, topK);
  }

  async stats(): Promise<IndexStats> {
    const stats = emptyStats();
    for (const chunk of this.records.values()) {
      stats.totalChunks++;
      stats.byLanguage[chunk.language] = (stats.byLanguage[chunk.language] ?? 0) + 1;
      stats.byNodeType[chunk.nodeType] = (stats.byNodeType[chunk.nodeType] ?? 0) + 1;
    }
    return stats;
  }

  async close(): Promise<void> {}

  private deleteWhere(predicate: (chunk: CodeChunk) => boolean): number {
    let count = 0;
    for (const [key, chunk] of this.records) {
      if (predicate(chunk)) {
        this.records.delete(key);
        count++;
      }
    }
    return count;
  }
}
