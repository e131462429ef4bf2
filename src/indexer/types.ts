import { z } from 'zod';
import { LanguageSchema } from '../chunks/languages.js';

// Запрос на индексацию дерева исходников.
export const IndexRequestSchema = z.object({
  sourcePath: z.string().min(1),
  // Без languages берутся языки из конфигурации.
  languages: z.array(LanguageSchema).min(1).optional(),
  incremental: z.boolean().default(true),
  dryRun: z.boolean().default(false),
});

export type IndexRequest = z.infer<typeof IndexRequestSchema>;

export interface IndexResponse {
  totalFiles: number;
  totalChunks: number;
  indexedChunks: number;
  updatedChunks: number;
  // Чанки удалённых файлов плюс устаревшие чанки переиндексированных.
  deletedChunks: number;
  errors: string[];
  durationSeconds: number;
}
