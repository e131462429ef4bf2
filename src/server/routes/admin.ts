import { Hono } from 'hono';
import type { CodeIndexer } from '../../indexer/indexer.js';
import { readBody } from '../body.js';
import { IndexBodySchema, indexResponseToWire, toIndexRequest } from '../wire.js';

// Запуск индексации по HTTP; ответ приходит после завершения прогона.
export function adminRoutes(deps: { indexer: Pick<CodeIndexer, 'index'> }) {
  const app = new Hono();

  app.post('/index', async (c) => {
    const body = await readBody(c, IndexBodySchema);
    const response = await deps.indexer.index(toIndexRequest(body));
    return c.json(indexResponseToWire(response));
  });

  return app;
}
