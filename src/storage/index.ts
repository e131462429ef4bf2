// Barrel-файл модуля хранения.
export { createDb, closeDb } from './db.js';

export type { Migration } from './migrator.js';
export { runMigrations, getAppliedMigrations } from './migrator.js';
export { CODE_CHUNKS_TABLE, createCodeChunksMigration } from './migrations/001_code_chunks.js';

export type { CodeChunkRow } from './schema.js';
export { rowToChunk, parseVector, escapeLike } from './schema.js';

export type {
  VectorIndex, SearchFilters, UpsertResult, SchemaStatus, IndexStats,
} from './vector-index.js';
export { clampScore, distanceToSimilarity, emptyStats } from './vector-index.js';
export { PgVectorIndex } from './pg-vector-index.js';
export { InMemoryVectorIndex, cosineDistance } from './memory-vector-index.js';
