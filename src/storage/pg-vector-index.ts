// Векторный индекс на PostgreSQL + pgvector.
import pgvector from 'pgvector';
import type postgres from 'postgres';
import type { CodeChunk } from '../chunks/types.js';
import { errorMessage } from '../errors.js';
import { runMigrations } from './migrator.js';
import { CODE_CHUNKS_TABLE, createCodeChunksMigration } from './migrations/001_code_chunks.js';
import { escapeLike, rowToChunk, type CodeChunkRow } from './schema.js';
import {
  distanceToSimilarity, emptyStats,
  type IndexStats, type SchemaStatus, type SearchFilters, type UpsertResult, type VectorIndex,
} from './vector-index.js';

function logFailure(operation: string, error: unknown): void {
  console.error(`[vector-index] ${operation} failed: ${errorMessage(error)}`);
}

export class PgVectorIndex implements VectorIndex {
  constructor(private readonly sql: postgres.Sql) {}

  async healthCheck(): Promise<boolean> {
    try {
      await this.sql`SELECT 1`;
      return true;
    } catch (error) {
      logFailure('health check', error);
      return false;
    }
  }

  async checkSchema(): Promise<SchemaStatus> {
    try {
      const [table] = await this.sql<{ name: string | null }[]>`
        SELECT to_regclass(${CODE_CHUNKS_TABLE})::text AS name
      `;
      if (!table?.name) {
        return { exists: false, indexes: [] };
      }

      // Для pgvector atttypmod колонки равен размерности, -1 если она не задана.
      const [column] = await this.sql<{ dimension: number }[]>`
        SELECT atttypmod AS dimension FROM pg_attribute
        WHERE attrelid = ${CODE_CHUNKS_TABLE}::regclass AND attname = 'embedding'
      `;
      const indexes = await this.sql<{ indexname: string }[]>`
        SELECT indexname FROM pg_indexes WHERE tablename = ${CODE_CHUNKS_TABLE} ORDER BY indexname
      `;

      return {
        exists: true,
        table: CODE_CHUNKS_TABLE,
        dimension: column && column.dimension > 0 ? column.dimension : null,
        indexes: indexes.map((row) => row.indexname),
      };
    } catch (error) {
      logFailure('schema check', error);
      return { exists: false, indexes: [] };
    }
  }

  async createSchema(dimension: number): Promise<boolean> {
    try {
      const ran = await runMigrations(this.sql, [createCodeChunksMigration(dimension)]);
      if (ran.length > 0) {
        console.error(`[vector-index] applied migrations: ${ran.join(', ')}`);
      }
      return true;
    } catch (error) {
      logFailure('schema creation', error);
      return false;
    }
  }

  // xmax = 0 только у строки, вставленной этим запросом. Тип узла и язык при обновлении не меняются.
  async upsert(chunk: CodeChunk): Promise<UpsertResult | null> {
    try {
      const embedding = chunk.embedding ? pgvector.toSql(chunk.embedding) as string : null;
      const [row] = await this.sql<{ id: string; inserted: boolean }[]>`
        INSERT INTO code_chunks (
          file_path, fully_qualified_name, node_type, language, content,
          start_line, end_line, embedding, last_modified, token_count, char_count
        ) VALUES (
          ${chunk.filePath}, ${chunk.fullyQualifiedName}, ${chunk.nodeType}, ${chunk.language}, ${chunk.content},
          ${chunk.startLine}, ${chunk.endLine}, ${embedding}::vector, ${chunk.lastModified ?? null},
          ${chunk.tokenCount}, ${chunk.charCount}
        )
        ON CONFLICT (file_path, fully_qualified_name) DO UPDATE SET
          content = EXCLUDED.content,
          start_line = EXCLUDED.start_line,
          end_line = EXCLUDED.end_line,
          embedding = EXCLUDED.embedding,
          last_modified = EXCLUDED.last_modified,
          token_count = EXCLUDED.token_count,
          char_count = EXCLUDED.char_count,
          updated_at = now()
        RETURNING id, (xmax = 0) AS inserted
      `;
      if (!row) {
        return null;
      }
      return { recordId: row.id, wasUpdate: !row.inserted };
    } catch (error) {
      logFailure(`upsert of ${chunk.filePath}#${chunk.fullyQualifiedName}`, error);
      return null;
    }
  }

  async deleteByFile(filePath: string): Promise<number> {
    try {
      const result = await this.sql`DELETE FROM code_chunks WHERE file_path = ${filePath}`;
      return result.count;
    } catch (error) {
      logFailure(`delete of ${filePath}`, error);
      return 0;
    }
  }

  async deleteStale(filePath: string, keep: readonly string[]): Promise<number> {
    try {
      const result = await this.sql`
        DELETE FROM code_chunks
        WHERE file_path = ${filePath}
          ${keep.length > 0 ? this.sql`AND NOT (fully_qualified_name = ANY(${[...keep]}))` : this.sql``}
      `;
      return result.count;
    } catch (error) {
      logFailure(`stale cleanup of ${filePath}`, error);
      return 0;
    }
  }

  async deleteAll(): Promise<number> {
    try {
      const result = await this.sql`DELETE FROM code_chunks`;
      return result.count;
    } catch (error) {
      logFailure('delete all', error);
      return 0;
    }
  }

  async search(embedding: number[], topK: number, filters: SearchFilters = {}): Promise<CodeChunk[]> {
    try {
      const vector = pgvector.toSql(embedding) as string;
      const { languages, nodeTypes, filePathPrefix } = filters;

      const rows = await this.sql<CodeChunkRow[]>`
        SELECT
          id, file_path, fully_qualified_name, node_type, language, content,
          start_line, end_line, embedding::text AS embedding, last_modified,
          token_count, char_count,
          embedding <=> ${vector}::vector AS distance
        FROM code_chunks
        WHERE embedding IS NOT NULL
          ${languages?.length ? this.sql`AND language = ANY(${languages})` : this.sql``}
          ${nodeTypes?.length ? this.sql`AND node_type = ANY(${nodeTypes})` : this.sql``}
          ${filePathPrefix ? this.sql`AND file_path LIKE ${escapeLike(filePathPrefix) + '%'} ESCAPE '\\'` : this.sql``}
        ORDER BY distance
        LIMIT ${topK}
      `;

      const results: CodeChunk[] = [];
      for (const row of rows) {
        const chunk = rowToChunk(row);
        if (chunk) {
          results.push({ ...chunk, similarityScore: distanceToSimilarity(row.distance ?? 1) });
        }
      }
      return results;
    } catch (error) {
      logFailure('search', error);
      return [];
    }
  }

  async stats(): Promise<IndexStats> {
    try {
      const rows = await this.sql<{ language: string; node_type: string; count: number }[]>`
        SELECT language, node_type, COUNT(*)::int AS count
        FROM code_chunks
        GROUP BY language, node_type
      `;

      const stats = emptyStats();
      for (const row of rows) {
        stats.totalChunks += row.count;
        stats.byLanguage[row.language] = (stats.byLanguage[row.language] ?? 0) + row.count;
        stats.byNodeType[row.node_type] = (stats.byNodeType[row.node_type] ?? 0) + row.count;
      }
      return stats;
    } catch (error) {
      logFailure('stats', error);
      return emptyStats();
    }
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
