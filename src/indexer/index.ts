// Barrel-файл модуля индексации.
export { CodeIndexer } from './indexer.js';
export type { CodeIndexerOptions, Extractor, PlanSource } from './indexer.js';
export { ChangeDetector } from './change-detector.js';
export type { IndexPlan, IndexMode, ChangeDetectorOptions } from './change-detector.js';
export { IndexWatcher } from './watcher.js';
export type { IndexWatcherHandlers } from './watcher.js';
export { ConsoleProgress, SilentProgress } from './progress.js';
export type { ProgressReporter } from './progress.js';
export { IndexRequestSchema } from './types.js';
export type { IndexRequest, IndexResponse } from './types.js';
export { mapWithConcurrency } from './pool.js';
