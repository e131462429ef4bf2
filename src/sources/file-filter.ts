// Фильтрация путей: встроенные исключения, .gitignore и exclude из конфига.
import ignore from 'ignore';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

type Ignore = ReturnType<typeof ignore>;

// Исключаются всегда, в любом режиме индексации (формат .gitignore).
export const BUILTIN_PATTERNS = [
  // Скрытые файлы и каталоги (.git, .vs, .idea, .venv ...).
  '.*',
  // Результаты сборки.
  'bin',
  'obj',
  'dist',
  'build',
  'out',
  'target',
  'coverage',
  // Зависимости пакетных менеджеров.
  'node_modules',
  'bower_components',
  'vendor',
  'venv',
  '__pycache__',
];

export interface FileFilterOptions {
  exclude?: string[];
  respectGitignore?: boolean;
}

export class FileFilter {
  private readonly builtinIg: Ignore;
  private gitignoreIg: Ignore | null = null;
  private configIg: Ignore | null = null;

  constructor(
    private readonly basePath: string,
    private readonly options: FileFilterOptions = {},
  ) {
    this.builtinIg = ignore().add(BUILTIN_PATTERNS);
  }

  // Загружает .gitignore корня и паттерны конфига.
  async init(): Promise<void> {
    if (this.options.respectGitignore ?? true) {
      const gitignoreContent = await tryReadFile(join(this.basePath, '.gitignore'));
      if (gitignoreContent !== null) {
        this.gitignoreIg = ignore().add(gitignoreContent);
      }
    }

    if (this.options.exclude && this.options.exclude.length > 0) {
      this.configIg = ignore().add(this.options.exclude);
    }
  }

  // true, если файл участвует в индексации. Путь относительный к basePath.
  shouldInclude(relativePath: string): boolean {
    const normalized = toPosixPath(relativePath);

    if (this.builtinIg.ignores(normalized)) {
      return false;
    }
    if (this.gitignoreIg !== null && this.gitignoreIg.ignores(normalized)) {
      return false;
    }
    if (this.configIg !== null && this.configIg.ignores(normalized)) {
      return false;
    }
    return true;
  }
}

// Нормализует разделители к Unix-стилю.
export function toPosixPath(path: string): string {
  return path.replace(/\\/g, '/');
}

// Читает файл; null, если его нет.
async function tryReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
