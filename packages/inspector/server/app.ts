import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { MnemoError, createLogger, errorMessage } from '@mnemo/shared';
import type { EventBus, NodeStore } from '@mnemo/shared';
import type { MemoryRuntime } from '@mnemo/recall';
import { createRoutes } from './routes.js';
import type { RouteOptions } from './routes.js';

const log = createLogger('Inspector');

/**
 * Express app serving the inspector API under /api.
 * Store failures map to 503, validation failures to 400.
 * Without a bus there are no /api/events routes.
 */
export function createInspectorApp(store: NodeStore, bus: EventBus | null, opts?: RouteOptions): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.use('/api', createRoutes(store, bus, opts));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof MnemoError
      ? (err.code === 'VALIDATION' ? 400 : err.code === 'STORAGE_UNAVAILABLE' ? 503 : 500)
      : 500;
    log.error(`Request failed (${status}): ${errorMessage(err)}`);
    res.status(status).json({ error: errorMessage(err) });
  });

  return app;
}

/**
 * Serve the inspector inside a running daemon, on its store and bus, so the
 * event routes carry what capture, recall and the sweeper emit.
 */
export function serveInspector(runtime: MemoryRuntime, port = runtime.config.inspector.port): Promise<Server> {
  const app = createInspectorApp(runtime.store, runtime.bus, {
    embedder: runtime.embedder,
    recallWindow: runtime.config.recallWindow,
    embeddingTimeoutMs: runtime.config.embeddingTimeoutMs,
  });
  return new Promise((resolve, reject) => {
    const server = app.listen(port, '127.0.0.1', () => {
      log.info(`Serving on http://127.0.0.1:${port} for ${runtime.store.dbPath}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export { createRoutes, toNodeView } from './routes.js';
export type { NodeView, RankedView, RouteOptions } from './routes.js';
