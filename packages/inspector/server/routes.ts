/**
 * Inspector API Routes
 *
 * Wraps NodeStore reads as REST endpoints. Given the bus the use cases emit
 * on, also serves its history and an SSE stream of its traffic. Nothing here
 * writes to the store.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { createLogger, errorMessage } from '@mnemo/shared';
import type { EventBus, MemoryNode, NodeStore } from '@mnemo/shared';
import { rank, scoreBreakdown } from '@mnemo/ranking';
import type { ScoreBreakdown } from '@mnemo/ranking';
import { embedText } from '@mnemo/recall';
import type { EmbeddingProvider } from '@mnemo/recall';

const log = createLogger('Inspector');

export interface RouteOptions {
  /** Query embedder for /rank; without one, ranking uses the fuzzy and keyword terms only. */
  embedder?: EmbeddingProvider;
  recallWindow?: number;
  embeddingTimeoutMs?: number;
}

/** A node as served over HTTP: the vector is replaced by its length. */
export interface NodeView extends Omit<MemoryNode, 'vector'> {
  vectorDims: number;
}

export interface RankedView {
  node: NodeView;
  score: ScoreBreakdown;
}

const MAX_LIMIT = 1000;

export function toNodeView(node: MemoryNode): NodeView {
  const { vector, ...rest } = node;
  return { ...rest, vectorDims: vector.length };
}

export function createRoutes(store: NodeStore, bus: EventBus | null, opts?: RouteOptions): Router {
  const router = Router();
  const recallWindow = opts?.recallWindow ?? 15;

  // ─── Store ──────────────────────────────────────────────────────

  router.get('/status', (_req, res) => {
    res.json({ dbPath: store.dbPath, stats: store.stats() });
  });

  router.get('/circles', (_req, res) => {
    res.json(store.listCircles());
  });

  router.get('/nodes', (req, res) => {
    const limit = parseLimit(req.query.limit, 100);
    if (limit === null) {
      res.status(400).json({ error: `limit must be an integer between 1 and ${MAX_LIMIT}` });
      return;
    }
    const circleId = queryString(req.query.circle);
    res.json(store.findLast(limit, circleId).map(toNodeView));
  });

  router.get('/nodes/:nodeId', (req, res) => {
    const node = store.getNode(req.params.nodeId);
    if (!node) {
      res.status(404).json({ error: `Node ${req.params.nodeId} not found` });
      return;
    }
    res.json(toNodeView(node));
  });

  // ─── Ranking ────────────────────────────────────────────────────

  const handleRank = async (req: Request, res: Response): Promise<void> => {
    const query = queryString(req.query.q) ?? '';
    const circleId = queryString(req.query.circle);
    const limit = parseLimit(req.query.limit, recallWindow);
    if (limit === null) {
      res.status(400).json({ error: `limit must be an integer between 1 and ${MAX_LIMIT}` });
      return;
    }

    const candidates = store.findLast(limit, circleId);
    const embedder = opts?.embedder;
    let queryVector: number[] | null = null;
    if (embedder && query.trim()) {
      try {
        queryVector = await embedText(embedder, query, opts?.embeddingTimeoutMs ?? 5_000);
      } catch (err) {
        log.warn(`Query embedding failed, ranking without vectors: ${errorMessage(err)}`);
      }
    }
    const modelId = embedder?.modelId ?? null;

    const ranked: RankedView[] = rank(query, candidates, queryVector, modelId).map(node => ({
      node: toNodeView(node),
      score: scoreBreakdown(query, node, queryVector, modelId),
    }));
    res.json({ query, vectorModelId: queryVector ? modelId : null, results: ranked });
  };

  router.get('/rank', (req, res, next) => {
    handleRank(req, res).catch(next);
  });

  // ─── Events ─────────────────────────────────────────────────────

  if (!bus) return router;

  router.get('/events', (req, res) => {
    const limit = parseLimit(req.query.limit, 100);
    if (limit === null) {
      res.status(400).json({ error: `limit must be an integer between 1 and ${MAX_LIMIT}` });
      return;
    }
    res.json(bus.getHistory(undefined, limit));
  });

  router.get('/events/stream', (_req: Request, res: Response) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.write(': connected\n\n');

    const unsubscribe = bus.on('*', event => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    });

    res.on('close', () => {
      unsubscribe();
      log.debug('SSE client disconnected');
    });
  });

  return router;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/** fallback when absent, null when present but not a usable limit */
function parseLimit(value: unknown, fallback: number): number | null {
  if (value === undefined) return fallback;
  if (typeof value !== 'string') return null;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_LIMIT) return null;
  return parsed;
}
