// Сборка компонентов приложения по конфигурации.
import { ChunkExtractor } from './chunks/extractor.js';
import { TreeSitterParser } from './chunks/tree-sitter-parser.js';
import type { AppConfig } from './config/schema.js';
import { createTextEmbedder } from './embeddings/factory.js';
import type { TextEmbedder } from './embeddings/types.js';
import { ChangeDetector } from './indexer/change-detector.js';
import { CodeIndexer } from './indexer/indexer.js';
import { SilentProgress, type ProgressReporter } from './indexer/progress.js';
import { RetrievalService } from './search/retrieval.js';
import { createDb } from './storage/db.js';
import { InMemoryVectorIndex } from './storage/memory-vector-index.js';
import { PgVectorIndex } from './storage/pg-vector-index.js';
import type { VectorIndex } from './storage/vector-index.js';
import { VERSION } from './version.js';

export interface Services {
  config: AppConfig;
  index: VectorIndex;
  embedder: TextEmbedder;
  indexer: CodeIndexer;
  retrieval: RetrievalService;
  close(): Promise<void>;
}

export interface ServiceOverrides {
  progress?: ProgressReporter;
  index?: VectorIndex;
  embedder?: TextEmbedder;
}

export function createVectorIndex(config: AppConfig): VectorIndex {
  return config.store.provider === 'memory'
    ? new InMemoryVectorIndex()
    : new PgVectorIndex(createDb(config.database));
}

// Подключение к базе открывается лениво, при первом запросе.
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const index = overrides.index ?? createVectorIndex(config);
  const embedder = overrides.embedder ?? createTextEmbedder(config.embeddings);
  const extractor = new ChunkExtractor(new TreeSitterParser());
  const changes = new ChangeDetector({
    exclude: config.indexing.exclude,
    respectGitignore: config.indexing.respectGitignore,
    maxFileSize: config.indexing.maxFileSize,
  });

  const indexer = new CodeIndexer(extractor, embedder, index, changes, overrides.progress ?? new SilentProgress(), {
    batchSize: config.indexing.batchSize,
    concurrency: config.indexing.concurrency,
    defaultLanguages: config.indexing.languages,
  });

  const retrieval = new RetrievalService(index, embedder, {
    version: VERSION,
    maxTopK: config.search.maxTopK,
    prepare: () => indexer.ensureSchema(),
  });

  return {
    config,
    index,
    embedder,
    indexer,
    retrieval,
    close: () => index.close(),
  };
}
