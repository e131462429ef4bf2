// Команда code-index stats: состав индекса.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import type { IndexStats } from '../storage/index.js';
import { createServices } from '../services.js';
import { exitWithError } from './options.js';

// Группы по убыванию количества.
function formatGroup(title: string, counts: Record<string, number>): string[] {
  const rows = Object.entries(counts)
    .sort(([, a], [, b]) => b - a)
    .map(([key, count]) => `    ${key.padEnd(20)} ${count}`);
  return [`  ${title}:`, ...rows];
}

export function formatStats(stats: IndexStats): string {
  return [
    `Всего фрагментов: ${stats.totalChunks}`,
    ...formatGroup('По языкам', stats.byLanguage),
    ...formatGroup('По типам узлов', stats.byNodeType),
  ].join('\n');
}

export const statsCommand = new Command('stats')
  .description('Show index statistics')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const services = createServices(config);

      try {
        console.log(formatStats(await services.index.stats()));
      } finally {
        await services.close();
      }
    } catch (error) {
      exitWithError(error);
    }
  });
