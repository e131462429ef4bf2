// Команда code-index init: создание схемы хранилища.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { createServices } from '../services.js';
import { exitWithError } from './options.js';

export const initCommand = new Command('init')
  .description('Create the vector index schema')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const services = createServices(config);

      try {
        console.log('Инициализация схемы...');
        if (!await services.indexer.ensureSchema()) {
          throw new Error('Schema is unavailable or incompatible with the embedder');
        }
        const status = await services.index.checkSchema();
        console.log(`Схема готова: ${status.table ?? 'code_chunks'}, размерность ${status.dimension ?? services.embedder.dimensions}.`);
      } finally {
        await services.close();
      }
    } catch (error) {
      exitWithError(error);
    }
  });
