import { AppConfigSchema } from './schema.js';
import type { AppConfig } from './schema.js';

// Значения по умолчанию выводятся из zod-схемы, чтобы не расходиться с ней.
export const defaultConfig: AppConfig = AppConfigSchema.parse({});
