// Barrel-файл модуля поиска.
export { RetrievalService } from './retrieval.js';
export type { RetrievalServiceOptions } from './retrieval.js';
export { SearchRequestSchema, MAX_TOP_K } from './types.js';
export type {
  SearchRequest, SearchRequestInput, SearchResult, SearchResponse, HealthStatus,
} from './types.js';
