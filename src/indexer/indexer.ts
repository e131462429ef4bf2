// Оркестрация индексации: план -> извлечение -> эмбеддинги -> upsert/удаление.
import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ChunkExtractor } from '../chunks/extractor.js';
import type { Language } from '../chunks/languages.js';
import type { CodeChunk } from '../chunks/types.js';
import type { TextEmbedder } from '../embeddings/types.js';
import { errorMessage } from '../errors.js';
import type { SourceFile } from '../sources/local.js';
import type { VectorIndex } from '../storage/vector-index.js';
import type { ChangeDetector } from './change-detector.js';
import { mapWithConcurrency } from './pool.js';
import type { ProgressReporter } from './progress.js';
import type { IndexRequest, IndexResponse } from './types.js';

export type Extractor = Pick<ChunkExtractor, 'extract' | 'supports'>;
export type PlanSource = Pick<ChangeDetector, 'detect'>;

export interface CodeIndexerOptions {
  batchSize: number;
  concurrency: number;
  defaultLanguages: Language[];
}

// Итог обработки одного файла.
interface FileOutcome {
  chunks: number;
  inserted: number;
  updated: number;
  pruned: number;
  error: string | null;
}

const EMPTY_OUTCOME: FileOutcome = { chunks: 0, inserted: 0, updated: 0, pruned: 0, error: null };

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export class CodeIndexer {
  constructor(
    private readonly extractor: Extractor,
    private readonly embedder: TextEmbedder,
    private readonly vectorIndex: VectorIndex,
    private readonly changes: PlanSource,
    private readonly progress: ProgressReporter,
    private readonly options: CodeIndexerOptions,
  ) {}

  // Создаёт схему хранилища, если её нет. false — схема недоступна или несовместима.
  async ensureSchema(): Promise<boolean> {
    const status = await this.vectorIndex.checkSchema();
    if (!status.exists) {
      return this.vectorIndex.createSchema(this.embedder.dimensions);
    }
    if (status.dimension && status.dimension !== this.embedder.dimensions) {
      console.error(
        `[indexer] vector dimension mismatch: schema has ${status.dimension}, ` +
        `embedder produces ${this.embedder.dimensions}`,
      );
      return false;
    }
    return true;
  }

  async index(request: IndexRequest): Promise<IndexResponse> {
    const startTime = Date.now();
    const elapsed = (): number => (Date.now() - startTime) / 1000;
    const root = resolve(request.sourcePath);

    if (!await isDirectory(root)) {
      return {
        totalFiles: 0,
        totalChunks: 0,
        indexedChunks: 0,
        updatedChunks: 0,
        deletedChunks: 0,
        errors: [`Source path does not exist: ${root}`],
        durationSeconds: elapsed(),
      };
    }

    const languages = request.languages ?? this.options.defaultLanguages;
    const plan = await this.changes.detect(root, languages, request.incremental);
    this.progress.onPlan(plan);

    const totals = { ...EMPTY_OUTCOME };
    const errors: string[] = [];
    const total = plan.toIndex.length;

    for (let i = 0; i < total; i += this.options.batchSize) {
      const batch = plan.toIndex.slice(i, i + this.options.batchSize);
      const outcomes = await mapWithConcurrency(
        batch,
        this.options.concurrency,
        (file) => this.processFile(file, request.dryRun),
      );

      for (const outcome of outcomes) {
        totals.chunks += outcome.chunks;
        totals.inserted += outcome.inserted;
        totals.updated += outcome.updated;
        totals.pruned += outcome.pruned;
        if (outcome.error) {
          errors.push(outcome.error);
          this.progress.onFileError(outcome.error);
        }
      }

      this.progress.onBatchComplete(Math.min(i + batch.length, total), total);
    }

    // Удаления — после всех файлов: переименованный файл уже записан под новым путём.
    let purged = 0;
    if (!request.dryRun) {
      for (const filePath of plan.toDelete) {
        purged += await this.vectorIndex.deleteByFile(filePath);
      }
    }

    const response: IndexResponse = {
      totalFiles: total,
      totalChunks: totals.chunks,
      indexedChunks: totals.inserted,
      updatedChunks: totals.updated,
      deletedChunks: purged + totals.pruned,
      errors,
      durationSeconds: elapsed(),
    };

    this.progress.onComplete(response);
    return response;
  }

  // Ошибки файла не прерывают прогон: они попадают в outcome.error.
  private async processFile(file: SourceFile, dryRun: boolean): Promise<FileOutcome> {
    try {
      const [content, fileStat] = await Promise.all([
        readFile(file.absolutePath, 'utf-8'),
        stat(file.absolutePath),
      ]);

      const chunks: CodeChunk[] = this.extractor
        .extract(content, file.language, file.filePath)
        .map((chunk) => ({ ...chunk, lastModified: fileStat.mtime }));

      if (dryRun) {
        return { ...EMPTY_OUTCOME, chunks: chunks.length };
      }

      const embedded = await this.embed(chunks);

      let inserted = 0;
      let updated = 0;
      let failed = 0;
      for (const chunk of embedded) {
        const result = await this.vectorIndex.upsert(chunk);
        if (!result) {
          failed++;
        } else if (result.wasUpdate) {
          updated++;
        } else {
          inserted++;
        }
      }

      // Без грамматики пустой список чанков не значит, что узлы исчезли.
      const pruned = this.extractor.supports(file.language)
        ? await this.vectorIndex.deleteStale(file.filePath, embedded.map((c) => c.fullyQualifiedName))
        : 0;

      return {
        chunks: chunks.length,
        inserted,
        updated,
        pruned,
        error: failed > 0
          ? `${file.filePath}: failed to upsert ${failed} of ${embedded.length} chunks`
          : null,
      };
    } catch (error) {
      return { ...EMPTY_OUTCOME, error: `${file.filePath}: ${errorMessage(error)}` };
    }
  }

  // Один вызов эмбеддера на файл.
  private async embed(chunks: CodeChunk[]): Promise<CodeChunk[]> {
    if (chunks.length === 0) {
      return [];
    }

    const vectors = await this.embedder.embedBatch(chunks.map((c) => c.content));
    if (vectors.length !== chunks.length) {
      throw new Error(`Embedder returned ${vectors.length} vectors for ${chunks.length} chunks`);
    }

    return chunks.map((chunk, i) => {
      const vector = vectors[i];
      if (!vector || vector.length !== this.embedder.dimensions) {
        throw new Error(
          `Embedding dimension mismatch: expected ${this.embedder.dimensions}, got ${vector?.length ?? 0}`,
        );
      }
      return { ...chunk, embedding: vector };
    });
  }
}
