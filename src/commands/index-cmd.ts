// Команда code-index index: индексация дерева исходников.
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { parseLanguages } from '../chunks/languages.js';
import { loadConfig } from '../config/index.js';
import { ConsoleProgress, IndexWatcher } from '../indexer/index.js';
import type { IndexRequest } from '../indexer/index.js';
import { createServices } from '../services.js';
import { collect, exitWithError, parsePositiveInt } from './options.js';

interface IndexOptions {
  config?: string;
  language: string[];
  full?: boolean;
  incremental?: boolean;
  dryRun?: boolean;
  watch?: number;
}

async function assertDirectory(path: string): Promise<void> {
  const isDirectory = await stat(path).then((s) => s.isDirectory(), () => false);
  if (!isDirectory) {
    throw new Error(`Source path does not exist: ${path}`);
  }
}

// Ждёт Ctrl+C / SIGTERM.
function waitForShutdown(): Promise<void> {
  return new Promise((done) => {
    process.once('SIGINT', () => done());
    process.once('SIGTERM', () => done());
  });
}

export const indexCommand = new Command('index')
  .description('Index source files under a directory')
  .argument('<path>', 'Directory to index')
  .option('-c, --config <path>', 'Path to config file')
  .option('-l, --language <lang>', 'Language to index (repeatable)', collect, [])
  .option('--incremental', 'Index only files changed since HEAD (default)')
  .option('--full', 'Re-index every file')
  .option('--dry-run', 'Extract chunks without writing to the index')
  .option('--watch <seconds>', 'Re-run incremental indexing every N seconds', parsePositiveInt)
  .action(async (path: string, options: IndexOptions) => {
    try {
      const root = resolve(path);
      await assertDirectory(root);
      const languages = options.language.length > 0 ? parseLanguages(options.language) : undefined;

      const config = await loadConfig(options.config);
      const services = createServices(config, { progress: new ConsoleProgress() });

      try {
        const request: IndexRequest = {
          sourcePath: root,
          languages,
          incremental: !options.full,
          dryRun: options.dryRun ?? false,
        };

        if (!request.dryRun && !await services.indexer.ensureSchema()) {
          throw new Error('Schema is unavailable or incompatible with the embedder');
        }

        console.log(`Индексация: ${root}${request.dryRun ? ' (dry run)' : ''}`);

        if (options.watch === undefined) {
          await services.indexer.index(request);
          return;
        }

        console.log(`Наблюдение: повтор каждые ${options.watch}с, Ctrl+C для выхода.`);
        const watcher = new IndexWatcher(services.indexer, request, options.watch * 1000, {
          onError: (message) => console.error(`  Ошибка: ${message}`),
        });
        watcher.start();
        await waitForShutdown();
        await watcher.stop();
      } finally {
        await services.close();
      }
    } catch (error) {
      exitWithError(error);
    }
  });
