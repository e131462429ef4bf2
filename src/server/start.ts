import type { Server } from 'node:net';
import { serve } from '@hono/node-server';
import type { Hono } from 'hono';

export interface StartedServer {
  url: string;
  close(): Promise<void>;
}

// Поднимает HTTP-сервер и ждёт начала прослушивания порта.
export function startServer(app: Hono, host: string, port: number): Promise<StartedServer> {
  return new Promise((resolve, reject) => {
    const server: Server = serve({ fetch: app.fetch, hostname: host, port }, (info) => {
      resolve({
        url: `http://${host}:${info.port}`,
        close: () => new Promise<void>((done, fail) => {
          server.close((error) => (error ? fail(error) : done()));
        }),
      });
    });
    server.once('error', reject);
  });
}
