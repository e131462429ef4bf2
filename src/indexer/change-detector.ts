// План индексации: полный обход дерева или изменения git относительно HEAD.
import { resolve } from 'node:path';
import { detectLanguage } from '../chunks/languages.js';
import type { Language } from '../chunks/languages.js';
import { errorMessage } from '../errors.js';
import { FileFilter, toPosixPath } from '../sources/file-filter.js';
import { isGitWorkTree, listWorkingTreeChanges, runGit } from '../sources/git.js';
import type { GitRunner } from '../sources/git.js';
import { DEFAULT_MAX_FILE_SIZE, fileSize, scanSourceFiles } from '../sources/local.js';
import type { SourceFile } from '../sources/local.js';

export type IndexMode = 'full' | 'incremental';

export interface IndexPlan {
  mode: IndexMode;
  toIndex: SourceFile[];
  // Пути (относительно корня), чьи чанки нужно удалить целиком.
  toDelete: string[];
}

export interface ChangeDetectorOptions {
  exclude?: string[];
  respectGitignore?: boolean;
  maxFileSize?: number;
  git?: GitRunner;
}

export class ChangeDetector {
  private readonly git: GitRunner;

  constructor(private readonly options: ChangeDetectorOptions = {}) {
    this.git = options.git ?? runGit;
  }

  /**
   * Инкрементальный режим работает только внутри рабочего дерева git.
   * Любая ошибка чтения состояния git -> полный обход.
   */
  async detect(root: string, languages: readonly Language[], incremental: boolean): Promise<IndexPlan> {
    const resolvedRoot = resolve(root);

    if (incremental && await isGitWorkTree(resolvedRoot, this.git)) {
      try {
        return await this.detectIncremental(resolvedRoot, languages);
      } catch (error) {
        console.warn(`[changes] git diff failed, falling back to full scan: ${errorMessage(error)}`);
      }
    }

    return this.detectFull(resolvedRoot, languages);
  }

  async detectFull(root: string, languages: readonly Language[]): Promise<IndexPlan> {
    const { files } = await scanSourceFiles(root, {
      languages,
      exclude: this.options.exclude,
      respectGitignore: this.options.respectGitignore,
      maxFileSize: this.options.maxFileSize,
    });
    return { mode: 'full', toIndex: files, toDelete: [] };
  }

  async detectIncremental(root: string, languages: readonly Language[]): Promise<IndexPlan> {
    const changes = await listWorkingTreeChanges(root, this.git);

    // .gitignore здесь уже учтён git'ом (--exclude-standard), поэтому не читаем его повторно.
    const filter = new FileFilter(root, { exclude: this.options.exclude, respectGitignore: false });
    await filter.init();

    const maxFileSize = this.options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    const toIndex = new Map<string, SourceFile>();
    const toDelete = new Set<string>();

    const addForIndex = async (rawPath: string): Promise<void> => {
      const filePath = toPosixPath(rawPath);
      const language = detectLanguage(filePath);
      if (!language || !languages.includes(language) || !filter.shouldInclude(filePath)) {
        return;
      }
      const absolutePath = resolve(root, filePath);
      // Файл мог исчезнуть из рабочего дерева после diff.
      const size = await fileSize(absolutePath);
      if (size === null || size > maxFileSize) {
        return;
      }
      toIndex.set(filePath, { filePath, absolutePath, language });
    };

    const addForDelete = (rawPath: string): void => {
      const filePath = toPosixPath(rawPath);
      // Удаляем только то, что могло попасть в индекс.
      if (detectLanguage(filePath) && filter.shouldInclude(filePath)) {
        toDelete.add(filePath);
      }
    };

    for (const change of changes) {
      switch (change.status) {
      case 'added':
      case 'modified':
        await addForIndex(change.path);
        break;
      case 'deleted':
        addForDelete(change.path);
        break;
      case 'renamed':
        addForDelete(change.oldPath);
        await addForIndex(change.path);
        break;
      }
    }

    return {
      mode: 'incremental',
      toIndex: [...toIndex.values()].sort((a, b) => comparePaths(a.filePath, b.filePath)),
      toDelete: [...toDelete].sort(),
    };
  }
}

function comparePaths(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
