import { readFile, access } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { AppConfigSchema } from './schema.js';
import type { AppConfig } from './schema.js';

// Подстановка переменных окружения: ${ENV_VAR}.
const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

// Имя файла конфигурации в текущей директории.
export const LOCAL_CONFIG_FILE = 'code-index.config.yaml';

// Переменная окружения с явным путём к конфигу.
export const CONFIG_ENV_VAR = 'CODE_INDEX_CONFIG';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Рекурсивно заменяет строки вида ${ENV_VAR} на значения из process.env.
 * Неизвестная переменная остаётся как есть.
 */
export function resolveEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(ENV_VAR_PATTERN, (match, varName: string) => process.env[varName] ?? match);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item));
  }

  if (isPlainObject(obj)) {
    const result: PlainObject = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value);
    }
    return result;
  }

  return obj;
}

/**
 * Deep-merge двух объектов без мутации аргументов.
 * Массивы из source заменяют массивы target целиком.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    result[key] = isPlainObject(sourceValue) && isPlainObject(targetValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
  }

  return result;
}

/**
 * Переопределения из окружения поверх файла конфигурации.
 * DATABASE_URL, CODE_INDEX_HOST, CODE_INDEX_PORT, CORS_ALLOWED_ORIGINS, EMBEDDING_PROVIDER.
 */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): PlainObject {
  const overrides: PlainObject = {};
  const server: PlainObject = {};

  if (env['DATABASE_URL']) {
    overrides['database'] = { url: env['DATABASE_URL'] };
  }
  if (env['EMBEDDING_PROVIDER']) {
    overrides['embeddings'] = { provider: env['EMBEDDING_PROVIDER'] };
  }
  if (env['CODE_INDEX_HOST']) {
    server['host'] = env['CODE_INDEX_HOST'];
  }
  if (env['CODE_INDEX_PORT']) {
    const port = Number(env['CODE_INDEX_PORT']);
    // Нечисловое значение пропускаем дальше, чтобы zod сообщил об ошибке.
    server['port'] = Number.isNaN(port) ? env['CODE_INDEX_PORT'] : port;
  }
  if (env['CORS_ALLOWED_ORIGINS']) {
    server['corsOrigins'] = env['CORS_ALLOWED_ORIGINS']
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0);
  }
  if (Object.keys(server).length > 0) {
    overrides['server'] = server;
  }

  return overrides;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Определяет путь к конфиг-файлу.
 * Порядок: --config, CODE_INDEX_CONFIG, ./code-index.config.yaml,
 * ~/.config/code-index/config.yaml. Явно указанный, но отсутствующий файл — ошибка.
 */
export async function resolveConfigPath(configPath?: string): Promise<string | null> {
  if (configPath) {
    const resolved = resolve(configPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found at path: ${resolved}`);
  }

  const envConfigPath = process.env[CONFIG_ENV_VAR];
  if (envConfigPath) {
    const resolved = resolve(envConfigPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found at ${CONFIG_ENV_VAR} path: ${resolved}`);
  }

  const localPath = resolve(LOCAL_CONFIG_FILE);
  if (await fileExists(localPath)) {
    return localPath;
  }

  const globalPath = join(homedir(), '.config', 'code-index', 'config.yaml');
  if (await fileExists(globalPath)) {
    return globalPath;
  }

  return null;
}

/**
 * Загружает конфигурацию: YAML -> ${ENV} -> переопределения окружения -> zod.
 * Без файла конфигурации работают дефолты схемы и переменные окружения.
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  const resolvedPath = await resolveConfigPath(configPath);

  let fileConfig: PlainObject = {};
  if (resolvedPath) {
    const raw = await readFile(resolvedPath, 'utf-8');
    const parsed: unknown = resolveEnvVars(parseYaml(raw));
    if (isPlainObject(parsed)) {
      fileConfig = parsed;
    } else if (parsed !== null && parsed !== undefined) {
      // Пустой YAML даёт null и допустим; скаляр или список — нет.
      throw new Error(`Config file must contain a mapping: ${resolvedPath}`);
    }
  }

  return AppConfigSchema.parse(deepMerge(fileConfig, envOverrides()));
}
