// Команда code-index reset: удаление всех фрагментов.
import { confirm } from '@inquirer/prompts';
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { createServices } from '../services.js';
import { exitWithError } from './options.js';

export const resetCommand = new Command('reset')
  .description('Delete every chunk from the index')
  .option('-c, --config <path>', 'Path to config file')
  .option('--force', 'Skip confirmation')
  .action(async (options: { config?: string; force?: boolean }) => {
    try {
      const config = await loadConfig(options.config);

      if (!options.force) {
        const confirmed = await confirm({ message: 'Удалить все фрагменты из индекса?', default: false });
        if (!confirmed) {
          console.log('Отменено.');
          return;
        }
      }

      const services = createServices(config);
      try {
        const deleted = await services.index.deleteAll();
        console.log(`Удалено фрагментов: ${deleted}`);
      } finally {
        await services.close();
      }
    } catch (error) {
      exitWithError(error);
    }
  });
