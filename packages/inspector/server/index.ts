/**
 * Mnemo Inspector API Server
 *
 * Read-only view of the memory store for debugging, beside a running daemon.
 * This process has no use cases of its own, so it serves no event routes; a
 * daemon streams its live events through serveInspector instead.
 */

import { NodeStore, loadConfig } from '@mnemo/shared';
import { HashingEmbeddingProvider } from '@mnemo/recall';
import { createInspectorApp } from './app.js';

const config = loadConfig();

const store = new NodeStore(config.dbPath, { readonly: true, busyTimeoutMs: config.busyTimeoutMs });

const app = createInspectorApp(store, null, {
  embedder: new HashingEmbeddingProvider(),
  recallWindow: config.recallWindow,
  embeddingTimeoutMs: config.embeddingTimeoutMs,
});

app.listen(config.inspector.port, () => {
  console.log(`[Mnemo Inspector] API server running on http://localhost:${config.inspector.port}`);
  console.log(`[Mnemo Inspector] Store: ${config.dbPath}`);
});

export { app, store };
