// Публичный API пакета.
export * from './chunks/index.js';
export * from './config/index.js';
export * from './embeddings/index.js';
export * from './indexer/index.js';
export * from './search/index.js';
export * from './server/index.js';
export * from './sources/index.js';
export * from './storage/index.js';
export { ValidationError, ServiceNotReadyError, errorMessage } from './errors.js';
export { createServices, createVectorIndex } from './services.js';
export type { Services, ServiceOverrides } from './services.js';
export { VERSION } from './version.js';
