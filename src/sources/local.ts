// Полное сканирование дерева исходников.
import fg from 'fast-glob';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { detectLanguage, extensionsFor } from '../chunks/languages.js';
import type { Language } from '../chunks/languages.js';
import { FileFilter, toPosixPath } from './file-filter.js';

// Файл-кандидат на индексацию.
export interface SourceFile {
  // Относительно корня, с разделителями '/'.
  filePath: string;
  absolutePath: string;
  language: Language;
}

export interface ScanOptions {
  languages: readonly Language[];
  exclude?: string[];
  respectGitignore?: boolean;
  maxFileSize?: number;
}

export interface ScanResult {
  files: SourceFile[];
  excludedCount: number;
}

// Максимальный размер файла по умолчанию (1 МБ).
export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;

/**
 * Находит файлы выбранных языков под basePath.
 * Скрытые каталоги, каталоги сборки и зависимостей отсекаются FileFilter,
 * файлы крупнее maxFileSize пропускаются.
 */
export async function scanSourceFiles(basePath: string, options: ScanOptions): Promise<ScanResult> {
  const root = resolve(basePath);
  const extensions = extensionsFor(options.languages).map((ext) => ext.slice(1));
  if (extensions.length === 0) {
    return { files: [], excludedCount: 0 };
  }

  const pattern = extensions.length === 1
    ? `**/*.${extensions[0]}`
    : `**/*.{${extensions.join(',')}}`;

  // fast-glob: минимальный ignore для производительности, остальное решает FileFilter.
  const paths = await fg(pattern, {
    cwd: root,
    ignore: ['**/node_modules/**', '**/.git/**'],
    dot: false,
    onlyFiles: true,
    caseSensitiveMatch: false,
  });

  const filter = new FileFilter(root, {
    exclude: options.exclude,
    respectGitignore: options.respectGitignore,
  });
  await filter.init();

  const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
  const files: SourceFile[] = [];
  let excludedCount = 0;

  for (const relPath of paths.sort()) {
    const filePath = toPosixPath(relPath);
    const language = detectLanguage(filePath);
    if (!language || !options.languages.includes(language) || !filter.shouldInclude(filePath)) {
      excludedCount++;
      continue;
    }

    const absolutePath = resolve(root, filePath);
    const size = await fileSize(absolutePath);
    if (size === null || size > maxFileSize) {
      excludedCount++;
      continue;
    }

    files.push({ filePath, absolutePath, language });
  }

  return { files, excludedCount };
}

// Размер файла; null, если файл исчез между обходом и проверкой.
export async function fileSize(absolutePath: string): Promise<number | null> {
  try {
    return (await stat(absolutePath)).size;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
