// Команда code-index serve: HTTP API поиска.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { createApp, startServer } from '../server/index.js';
import { createServices } from '../services.js';
import { exitWithError, parsePort } from './options.js';

interface ServeOptions {
  config?: string;
  host?: string;
  port?: number;
}

export const serveCommand = new Command('serve')
  .description('Start the HTTP search API')
  .option('-c, --config <path>', 'Path to config file')
  .option('--host <host>', 'Interface to listen on')
  .option('--port <port>', 'Port to listen on', parsePort)
  .action(async (options: ServeOptions) => {
    try {
      const config = await loadConfig(options.config);
      const services = createServices(config);

      if (!await services.retrieval.start()) {
        await services.close();
        throw new Error('Search service failed to start: schema is unavailable');
      }

      const app = createApp({
        retrieval: services.retrieval,
        index: services.index,
        indexer: services.indexer,
        corsOrigins: config.server.corsOrigins,
      });
      const server = await startServer(app, options.host ?? config.server.host, options.port ?? config.server.port);
      console.log(`Сервер запущен: ${server.url}`);

      const shutdown = (): void => {
        console.log('Остановка сервера...');
        void server.close()
          .then(() => services.close())
          .then(() => process.exit(0), exitWithError);
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    } catch (error) {
      exitWithError(error);
    }
  });
