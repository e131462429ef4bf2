import { Hono } from 'hono';
import type { RetrievalService } from '../../search/retrieval.js';
import { readBody } from '../body.js';
import { SearchBodySchema, searchRequestFromQuery, searchResponseToWire, toSearchRequest } from '../wire.js';

export function searchRoutes(deps: { retrieval: RetrievalService }) {
  const app = new Hono();

  app.post('/', async (c) => {
    const body = await readBody(c, SearchBodySchema);
    const response = await deps.retrieval.search(toSearchRequest(body));
    return c.json(searchResponseToWire(response));
  });

  app.get('/', async (c) => {
    const request = searchRequestFromQuery((name) => c.req.query(name), (name) => c.req.queries(name));
    const response = await deps.retrieval.search(request);
    return c.json(searchResponseToWire(response));
  });

  return app;
}
