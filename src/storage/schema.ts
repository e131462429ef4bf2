// Строка таблицы code_chunks и её отображение в CodeChunk.
import { z } from 'zod';
import { LanguageSchema } from '../chunks/languages.js';
import { NodeTypeSchema, type CodeChunk } from '../chunks/types.js';

export interface CodeChunkRow {
  id: string;
  file_path: string;
  fully_qualified_name: string;
  node_type: string;
  language: string;
  content: string;
  start_line: number;
  end_line: number;
  // pgvector отдаёт вектор текстом вида '[0.1,0.2]'.
  embedding: string | null;
  last_modified: Date | null;
  token_count: number;
  char_count: number;
  distance?: number;
}

const VectorSchema = z.array(z.number());

// Разбор текстового представления pgvector.
export function parseVector(text: string | null): number[] | undefined {
  if (text === null) {
    return undefined;
  }
  try {
    const parsed = VectorSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

// null — строка с языком, который приложение не знает.
export function rowToChunk(row: CodeChunkRow): CodeChunk | null {
  const language = LanguageSchema.safeParse(row.language);
  if (!language.success) {
    return null;
  }
  const nodeType = NodeTypeSchema.safeParse(row.node_type);

  const chunk: CodeChunk = {
    id: row.id,
    filePath: row.file_path,
    fullyQualifiedName: row.fully_qualified_name,
    nodeType: nodeType.success ? nodeType.data : 'unknown',
    language: language.data,
    content: row.content,
    startLine: row.start_line,
    endLine: row.end_line,
    tokenCount: row.token_count,
    charCount: row.char_count,
  };

  const embedding = parseVector(row.embedding);
  if (embedding) {
    chunk.embedding = embedding;
  }
  if (row.last_modified) {
    chunk.lastModified = row.last_modified;
  }
  return chunk;
}

// Экранирует % _ и \ для LIKE ... ESCAPE '\'.
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}
