// Команда code-index search: семантический поиск из терминала.
import { Command } from 'commander';
import { parseLanguages } from '../chunks/languages.js';
import { parseNodeTypes } from '../chunks/types.js';
import { loadConfig } from '../config/index.js';
import type { SearchResult } from '../search/index.js';
import { createServices } from '../services.js';
import { collect, exitWithError, parsePositiveInt } from './options.js';

interface SearchOptions {
  config?: string;
  topK?: number;
  language: string[];
  type: string[];
  file?: string;
}

// Количество строк содержимого в выводе результата.
const PREVIEW_LINES = 3;

export function formatResult(result: SearchResult): string {
  const { chunk } = result;
  const header =
    `${result.rank}. [${result.similarityScore.toFixed(3)}] ${chunk.nodeType} ${chunk.fullyQualifiedName}` +
    `  ${chunk.filePath}:${chunk.startLine}-${chunk.endLine}`;
  const preview = chunk.content
    .split('\n')
    .slice(0, PREVIEW_LINES)
    .map((line) => `     ${line}`);
  return [header, ...preview].join('\n');
}

export const searchCommand = new Command('search')
  .description('Search indexed code by meaning')
  .argument('<query>', 'Natural-language or code query')
  .option('-c, --config <path>', 'Path to config file')
  .option('-k, --top-k <n>', 'Number of results', parsePositiveInt)
  .option('-l, --language <lang>', 'Filter by language (repeatable)', collect, [])
  .option('-t, --type <nodeType>', 'Filter by node type (repeatable)', collect, [])
  .option('-f, --file <prefix>', 'Filter by file path prefix')
  .action(async (query: string, options: SearchOptions) => {
    try {
      const languages = options.language.length > 0 ? parseLanguages(options.language) : undefined;
      const nodeTypes = options.type.length > 0 ? parseNodeTypes(options.type) : undefined;

      const config = await loadConfig(options.config);
      const services = createServices(config);

      try {
        if (!await services.retrieval.start()) {
          throw new Error('Search service failed to start: schema is unavailable');
        }

        const response = await services.retrieval.search({
          query,
          topK: options.topK ?? config.search.defaultTopK,
          languages,
          nodeTypes,
          filePathPrefix: options.file,
        });

        if (response.results.length === 0) {
          console.log('Ничего не найдено.');
          return;
        }

        console.log(`Найдено: ${response.totalFound} (${response.durationMs.toFixed(0)} мс)\n`);
        for (const result of response.results) {
          console.log(formatResult(result));
        }
      } finally {
        await services.close();
      }
    } catch (error) {
      exitWithError(error);
    }
  });
