// JSON-формат HTTP API: snake_case снаружи, camelCase внутри.
import { z } from 'zod';
import { parseLanguages } from '../chunks/languages.js';
import { parseNodeTypes, type CodeChunk } from '../chunks/types.js';
import type { IndexRequest, IndexResponse } from '../indexer/types.js';
import type { HealthStatus, SearchRequestInput, SearchResponse } from '../search/types.js';
import type { IndexStats, SchemaStatus } from '../storage/vector-index.js';

const StringList = z.array(z.string());

// Языки и типы узлов сверяются позже через parseLanguages/parseNodeTypes.
export const SearchBodySchema = z.object({
  query: z.string(),
  top_k: z.number().optional(),
  languages: StringList.optional(),
  node_types: StringList.optional(),
  file_path_prefix: z.string().optional(),
  include_content: z.boolean().optional(),
  include_embedding: z.boolean().optional(),
});

export const IndexBodySchema = z.object({
  source_path: z.string().min(1),
  languages: StringList.optional(),
  incremental: z.boolean().optional(),
  dry_run: z.boolean().optional(),
});

export function toSearchRequest(body: z.infer<typeof SearchBodySchema>): SearchRequestInput {
  return {
    query: body.query,
    topK: body.top_k,
    languages: body.languages && parseLanguages(body.languages),
    nodeTypes: body.node_types && parseNodeTypes(body.node_types),
    filePathPrefix: body.file_path_prefix,
    includeContent: body.include_content,
    includeEmbedding: body.include_embedding,
  };
}

// Повторяемый параметр запроса, допускающий и список через запятую.
function listParam(values: string[] | undefined): string[] | undefined {
  const items = (values ?? []).flatMap((v) => v.split(',')).map((v) => v.trim()).filter((v) => v.length > 0);
  return items.length > 0 ? items : undefined;
}

// GET /search?q=&top_k=&language=&node_type=&file_prefix=
export function searchRequestFromQuery(
  query: (name: string) => string | undefined,
  queries: (name: string) => string[] | undefined,
): SearchRequestInput {
  const topK = query('top_k');
  const languages = listParam(queries('language'));
  const nodeTypes = listParam(queries('node_type'));
  return {
    query: query('q') ?? '',
    topK: topK === undefined ? undefined : Number(topK),
    languages: languages && parseLanguages(languages),
    nodeTypes: nodeTypes && parseNodeTypes(nodeTypes),
    filePathPrefix: query('file_prefix') || undefined,
  };
}

export function toIndexRequest(body: z.infer<typeof IndexBodySchema>): IndexRequest {
  return {
    sourcePath: body.source_path,
    languages: body.languages && parseLanguages(body.languages),
    incremental: body.incremental ?? true,
    dryRun: body.dry_run ?? false,
  };
}

export function chunkToWire(chunk: CodeChunk): Record<string, unknown> {
  return {
    id: chunk.id ?? null,
    file_path: chunk.filePath,
    fully_qualified_name: chunk.fullyQualifiedName,
    node_type: chunk.nodeType,
    language: chunk.language,
    content: chunk.content,
    start_line: chunk.startLine,
    end_line: chunk.endLine,
    last_modified: chunk.lastModified?.toISOString() ?? null,
    token_count: chunk.tokenCount,
    char_count: chunk.charCount,
    similarity_score: chunk.similarityScore ?? null,
    ...(chunk.embedding ? { embedding: chunk.embedding } : {}),
  };
}

export function searchResponseToWire(response: SearchResponse): Record<string, unknown> {
  return {
    query: response.query,
    results: response.results.map((result) => ({
      chunk: chunkToWire(result.chunk),
      similarity_score: result.similarityScore,
      rank: result.rank,
    })),
    total_found: response.totalFound,
    duration_ms: response.durationMs,
  };
}

export function indexResponseToWire(response: IndexResponse): Record<string, unknown> {
  return {
    total_files: response.totalFiles,
    total_chunks: response.totalChunks,
    indexed_chunks: response.indexedChunks,
    updated_chunks: response.updatedChunks,
    deleted_chunks: response.deletedChunks,
    errors: response.errors,
    duration_seconds: response.durationSeconds,
  };
}

export function healthToWire(health: HealthStatus): Record<string, unknown> {
  return {
    status: health.status,
    version: health.version,
    database_connected: health.databaseConnected,
    embedding_model_loaded: health.embeddingModelLoaded,
    timestamp: health.timestamp.toISOString(),
  };
}

export function schemaToWire(status: SchemaStatus): Record<string, unknown> {
  return {
    exists: status.exists,
    table: status.table ?? null,
    dimension: status.dimension ?? null,
    indexes: status.indexes,
  };
}

export function statsToWire(stats: IndexStats): Record<string, unknown> {
  return {
    total_chunks: stats.totalChunks,
    by_language: stats.byLanguage,
    by_node_type: stats.byNodeType,
  };
}
