// HTTP API поиска и индексации.
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { ZodError } from 'zod';
import { ServiceNotReadyError, ValidationError, errorMessage } from '../errors.js';
import type { CodeIndexer } from '../indexer/indexer.js';
import type { RetrievalService } from '../search/retrieval.js';
import type { VectorIndex } from '../storage/vector-index.js';
import { adminRoutes } from './routes/admin.js';
import { searchRoutes } from './routes/search.js';
import { statusRoutes } from './routes/status.js';

export type AppDeps = {
  retrieval: RetrievalService;
  index: VectorIndex;
  indexer: Pick<CodeIndexer, 'index'>;
  corsOrigins: string[];
  // Лог запросов через hono/logger; в тестах выключен.
  logRequests?: boolean;
};

function zodDetails(error: ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  if (deps.logRequests ?? true) {
    app.use('*', logger());
  }
  app.use('*', cors({ origin: deps.corsOrigins }));

  app.route('/', statusRoutes({ retrieval: deps.retrieval, index: deps.index }));
  app.route('/search', searchRoutes({ retrieval: deps.retrieval }));
  app.route('/admin', adminRoutes({ indexer: deps.indexer }));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    if (err instanceof ZodError) {
      return c.json({ error: 'Validation failed', details: zodDetails(err) }, 422);
    }
    if (err instanceof ValidationError) {
      return c.json({ error: err.message, details: err.details }, 422);
    }
    if (err instanceof ServiceNotReadyError) {
      return c.json({ error: err.message }, 503);
    }
    console.error(`[server] ${c.req.method} ${c.req.path} failed: ${errorMessage(err)}`);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
