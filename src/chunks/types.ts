import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { Language } from './languages.js';

// Классификация структурных узлов.
export const NODE_TYPES = [
  'class',
  'interface',
  'struct',
  'record',
  'enum',
  'method',
  'constructor',
  'property',
  'field',
  'event',
  'delegate',
  'namespace',
  'function',
  'arrow_function',
  'block',
  'unknown',
] as const;

export const NodeTypeSchema = z.enum(NODE_TYPES);

export type NodeType = z.infer<typeof NodeTypeSchema>;

// Структурный фрагмент кода: единица индексации и поиска.
export interface CodeChunk {
  // Непрозрачный идентификатор записи в хранилище; не участвует в идентичности.
  id?: string;
  // Путь относительно корня источника, с разделителями '/'.
  filePath: string;
  // Вместе с filePath образует ключ идентичности.
  fullyQualifiedName: string;
  nodeType: NodeType;
  language: Language;
  content: string;
  // 1-based, включительно.
  startLine: number;
  endLine: number;
  embedding?: number[];
  lastModified?: Date;
  tokenCount: number;
  charCount: number;
  // Только в результатах поиска, в диапазоне [0, 1].
  similarityScore?: number;
}

// Приблизительное соотношение символов к токенам.
export const CHARS_PER_TOKEN = 4;

// Оценка количества токенов по длине текста.
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

// Разбирает список типов узлов; бросает ValidationError на неизвестном.
export function parseNodeTypes(values: readonly string[]): NodeType[] {
  const result: NodeType[] = [];
  for (const value of values) {
    const parsed = NodeTypeSchema.safeParse(value.trim().toLowerCase());
    if (!parsed.success) {
      throw new ValidationError(`Unknown node type: ${value}. Supported: ${NODE_TYPES.join(', ')}`);
    }
    if (!result.includes(parsed.data)) {
      result.push(parsed.data);
    }
  }
  return result;
}
