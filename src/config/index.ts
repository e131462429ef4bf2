// Barrel-файл модуля конфигурации.
export {
  AppConfigSchema,
  DatabaseConfigSchema,
  StoreConfigSchema,
  EmbeddingsConfigSchema,
  IndexingConfigSchema,
  SearchConfigSchema,
  ServerConfigSchema,
} from './schema.js';

export type {
  AppConfig,
  DatabaseConfig,
  StoreConfig,
  EmbeddingsConfig,
  JinaEmbeddingsConfig,
  OpenAIEmbeddingsConfig,
  OllamaEmbeddingsConfig,
  IndexingConfig,
  SearchConfig,
  ServerConfig,
} from './schema.js';

export { defaultConfig } from './defaults.js';

export { loadConfig, resolveEnvVars, deepMerge, envOverrides, resolveConfigPath } from './loader.js';
