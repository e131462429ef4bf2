// Контракт векторного индекса чанков и единая политика оценки сходства.
import type { Language } from '../chunks/languages.js';
import type { CodeChunk, NodeType } from '../chunks/types.js';

// Фильтры поиска; все заданные условия объединяются через AND.
export interface SearchFilters {
  languages?: Language[];
  nodeTypes?: NodeType[];
  filePathPrefix?: string;
}

export interface UpsertResult {
  recordId: string;
  // true — запись с тем же (filePath, fullyQualifiedName) уже существовала.
  wasUpdate: boolean;
}

export interface SchemaStatus {
  exists: boolean;
  table?: string;
  // Размерность вектора, зафиксированная при создании схемы.
  dimension?: number | null;
  indexes: string[];
}

export interface IndexStats {
  totalChunks: number;
  byLanguage: Record<string, number>;
  byNodeType: Record<string, number>;
}

/**
 * Хранилище чанков с векторным поиском.
 * Ошибки хранилища не пробрасываются: методы логируют их и возвращают
 * пустой результат, null, 0 или false.
 */
export interface VectorIndex {
  healthCheck(): Promise<boolean>;
  checkSchema(): Promise<SchemaStatus>;
  createSchema(dimension: number): Promise<boolean>;
  upsert(chunk: CodeChunk): Promise<UpsertResult | null>;
  deleteByFile(filePath: string): Promise<number>;
  // Удаляет чанки файла, чьих имён нет в keep.
  deleteStale(filePath: string, keep: readonly string[]): Promise<number>;
  deleteAll(): Promise<number>;
  // Ближайшие чанки по убыванию сходства, не больше topK.
  search(embedding: number[], topK: number, filters?: SearchFilters): Promise<CodeChunk[]>;
  stats(): Promise<IndexStats>;
  close(): Promise<void>;
}

export function clampScore(score: number): number {
  if (Number.isNaN(score)) {
    return 0;
  }
  return Math.min(1, Math.max(0, score));
}

// Косинусное расстояние [0, 2] -> сходство [0, 1]: 1 - distance с отсечением.
export function distanceToSimilarity(distance: number): number {
  return clampScore(1 - distance);
}

export function emptyStats(): IndexStats {
  return { totalChunks: 0, byLanguage: {}, byNodeType: {} };
}
