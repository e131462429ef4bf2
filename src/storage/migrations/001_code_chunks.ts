// Таблица code_chunks: один узел кода на строку, вектор фиксированной размерности.
import type { Migration } from '../migrator.js';

export const CODE_CHUNKS_TABLE = 'code_chunks';

// Размерность вектора задаётся при создании схемы и дальше не меняется.
export function createCodeChunksMigration(dimension: number): Migration {
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new Error(`Invalid vector dimension: ${dimension}`);
  }

  return {
    name: '001_code_chunks',

    async isPresent(sql) {
      const [row] = await sql<{ name: string | null }[]>`SELECT to_regclass(${CODE_CHUNKS_TABLE})::text AS name`;
      return Boolean(row?.name);
    },

    async up(sql) {
      await sql`CREATE EXTENSION IF NOT EXISTS vector`;

      await sql`
        CREATE TABLE IF NOT EXISTS code_chunks (
          id                   UUID PRIMARY KEY DEFAULT gen_random_uuid(),
          file_path            TEXT NOT NULL,
          fully_qualified_name TEXT NOT NULL,
          node_type            TEXT NOT NULL,
          language             TEXT NOT NULL,
          content              TEXT NOT NULL,
          start_line           INTEGER NOT NULL,
          end_line             INTEGER NOT NULL,
          embedding            vector(${sql.unsafe(String(dimension))}),
          last_modified        TIMESTAMPTZ,
          token_count          INTEGER NOT NULL DEFAULT 0,
          char_count           INTEGER NOT NULL DEFAULT 0,
          created_at           TIMESTAMPTZ NOT NULL DEFAULT now(),
          updated_at           TIMESTAMPTZ NOT NULL DEFAULT now(),
          UNIQUE (file_path, fully_qualified_name)
        )
      `;

      // text_pattern_ops: индекс работает для LIKE 'prefix%'.
      await sql`CREATE INDEX IF NOT EXISTS idx_code_chunks_file_path ON code_chunks (file_path text_pattern_ops)`;
      await sql`CREATE INDEX IF NOT EXISTS idx_code_chunks_language ON code_chunks (language)`;
      await sql`CREATE INDEX IF NOT EXISTS idx_code_chunks_node_type ON code_chunks (node_type)`;
      await sql`
        CREATE INDEX IF NOT EXISTS idx_code_chunks_embedding ON code_chunks
          USING hnsw (embedding vector_cosine_ops)
          WITH (m = 16, ef_construction = 200)
      `;
    },
  };
}
