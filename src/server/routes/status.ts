import { Hono } from 'hono';
import type { RetrievalService } from '../../search/retrieval.js';
import type { VectorIndex } from '../../storage/vector-index.js';
import { healthToWire, schemaToWire, statsToWire } from '../wire.js';

// /health, /schema, /stats. Ошибки хранилища превращаются в degraded/пустые ответы внутри индекса.
export function statusRoutes(deps: { retrieval: RetrievalService; index: VectorIndex }) {
  const app = new Hono();

  app.get('/health', async (c) => c.json(healthToWire(await deps.retrieval.health())));

  app.get('/schema', async (c) => c.json(schemaToWire(await deps.index.checkSchema())));

  app.get('/stats', async (c) => c.json(statsToWire(await deps.index.stats())));

  return app;
}
