/**
 * Node Store — The Shared Primitive
 *
 * Every Mnemo package reads from and writes to this.
 * SQLite via better-sqlite3 (synchronous, fast, zero-ops).
 *
 * Owns the on-disk representation of nodes and circles. Nodes are only ever
 * inserted or deleted whole; every value handed out is a fresh copy built
 * from the row. Medium failures surface as StorageUnavailableError and are
 * never retried here.
 */

import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { Circle, CircleSummary, MemoryNode, NewMemoryNode, StoreStats } from '../types/index.js';
import { LOCAL_CIRCLE_ID } from '../types/index.js';
import { DuplicateIdError, MnemoError, StorageUnavailableError, ValidationError } from '../errors/index.js';
import { cosineSimilarity, decodeVector, encodeVector, isWellFormedVector, toFloat32 } from '../vector/index.js';
import { createLogger, preview } from '../log/index.js';

const log = createLogger('NodeStore');

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS nodes (
    node_id TEXT PRIMARY KEY,
    content TEXT NOT NULL,
    vector BLOB NOT NULL,
    vector_model_id TEXT NOT NULL,
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL,
    expires_at TEXT,
    circle_id TEXT NOT NULL DEFAULT '${LOCAL_CIRCLE_ID}'
  );

  CREATE INDEX IF NOT EXISTS idx_nodes_created ON nodes(created_at);
  CREATE INDEX IF NOT EXISTS idx_nodes_circle_created ON nodes(circle_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_nodes_model ON nodes(vector_model_id);

  CREATE TABLE IF NOT EXISTS circles (
    circle_id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    local_only INTEGER NOT NULL DEFAULT 1,
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL
  );
`;

// ─── Row Shapes ───────────────────────────────────────────────────

interface NodeRow {
  node_id: string;
  content: string;
  vector: Buffer;
  vector_model_id: string;
  metadata: string;
  created_at: string;
  expires_at: string | null;
  circle_id: string;
  rowid: number;
}

interface CircleRow {
  circle_id: string;
  name: string;
  local_only: number;
  metadata: string;
  created_at: string;
}

interface CircleSummaryRow extends CircleRow {
  node_count: number;
}

interface CountRow {
  count: number;
}

interface ModelCountRow {
  vector_model_id: string;
  count: number;
}

interface RangeRow {
  oldest: string | null;
  newest: string | null;
}

const NODE_COLUMNS = 'rowid, node_id, content, vector, vector_model_id, metadata, created_at, expires_at, circle_id';

export interface NodeStoreOptions {
  readonly?: boolean;
  busyTimeoutMs?: number;   // 0 = fail immediately when the file is locked
  now?: () => Date;         // clock used for TTL evaluation
}

export interface FindSimilarOptions {
  circleId?: string;
}

export interface ScoredNode {
  node: MemoryNode;
  similarity: number;
}

export class NodeStore {
  private db: Database.Database;
  private readonly now: () => Date;
  readonly dbPath: string;
  readonly isReadonly: boolean;

  constructor(dbPath: string, options?: NodeStoreOptions) {
    this.dbPath = dbPath;
    this.isReadonly = options?.readonly ?? false;
    this.now = options?.now ?? (() => new Date());
    this.db = openDatabase(dbPath, this.isReadonly, options?.busyTimeoutMs ?? 0);
  }

  // ─── Writes ─────────────────────────────────────────────────────

  /**
   * Insert a new node, registering its circle on first use.
   * Throws DuplicateIdError on id collision; nothing is written in that case.
   */
  save(input: NewMemoryNode): MemoryNode {
    const node = normalizeNode(input);

    const insert = this.db.transaction((n: MemoryNode) => {
      this.db.prepare(`
        INSERT OR IGNORE INTO circles (circle_id, name, local_only, metadata, created_at)
        VALUES (?, ?, 1, '{}', ?)
      `).run(n.circleId, n.circleId, n.createdAt);

      this.db.prepare(`
        INSERT INTO nodes (node_id, content, vector, vector_model_id, metadata, created_at, expires_at, circle_id)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        n.nodeId,
        n.content,
        encodeVector(n.vector),
        n.vectorModelId,
        JSON.stringify(n.metadata),
        n.createdAt,
        n.expiresAt,
        n.circleId,
      );
    });

    try {
      insert(node);
    } catch (err) {
      if (sqliteCode(err) === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
        throw new DuplicateIdError(node.nodeId, { cause: err });
      }
      throw toStorageError('save', err);
    }

    log.debug(`Saved node ${node.nodeId} in '${node.circleId}' (${node.vectorModelId}): '${preview(node.content)}'`);
    return cloneNode(node);
  }

  /**
   * Delete every node whose age exceeds ttlSeconds, across all circles.
   * Each node is judged by its own createdAt at the moment the statement runs.
   */
  deleteExpired(ttlSeconds: number): number {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds < 0) {
      throw new ValidationError('ttlSeconds', `must be a non-negative number, got ${ttlSeconds}`);
    }
    const cutoffDate = new Date(this.now().getTime() - ttlSeconds * 1000);
    if (Number.isNaN(cutoffDate.getTime())) {
      throw new ValidationError('ttlSeconds', `reaches before the earliest representable date, got ${ttlSeconds}`);
    }
    const cutoff = cutoffDate.toISOString();

    const deleted = this.guard('deleteExpired', () =>
      this.db.prepare('DELETE FROM nodes WHERE created_at < ?').run(cutoff).changes
    );
    log.debug(`deleteExpired(ttl=${ttlSeconds}s, cutoff=${cutoff}): ${deleted} removed`);
    return deleted;
  }

  purgeCircle(circleId: string): number {
    const deleted = this.guard('purgeCircle', () =>
      this.db.prepare('DELETE FROM nodes WHERE circle_id = ?').run(circleId).changes
    );
    log.info(`Purged ${deleted} nodes from circle '${circleId}'`);
    return deleted;
  }

  purgeAll(): number {
    const deleted = this.guard('purgeAll', () =>
      this.db.prepare('DELETE FROM nodes').run().changes
    );
    log.info(`Purged all ${deleted} nodes from all circles`);
    return deleted;
  }

  /**
   * Register (or rename) a circle for listing. Nodes do not need this:
   * referencing a circle from a node registers it implicitly.
   */
  registerCircle(circle: Omit<Circle, 'createdAt'> & { createdAt?: string }): Circle {
    if (!circle.circleId.trim()) {
      throw new ValidationError('circleId', 'must not be empty');
    }
    const createdAt = circle.createdAt ?? this.now().toISOString();

    this.guard('registerCircle', () =>
      this.db.prepare(`
        INSERT INTO circles (circle_id, name, local_only, metadata, created_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(circle_id) DO UPDATE SET
          name = excluded.name,
          local_only = excluded.local_only,
          metadata = excluded.metadata
      `).run(circle.circleId, circle.name, circle.localOnly ? 1 : 0, JSON.stringify(circle.metadata), createdAt)
    );

    const stored = this.getCircle(circle.circleId);
    if (!stored) {
      throw new StorageUnavailableError('registerCircle', null);
    }
    return stored;
  }

  // ─── Reads ──────────────────────────────────────────────────────

  getNode(nodeId: string): MemoryNode | null {
    const row = this.guard('getNode', () =>
      this.db.prepare<[string], NodeRow>(`SELECT ${NODE_COLUMNS} FROM nodes WHERE node_id = ?`).get(nodeId)
    );
    return row ? this.mapNode(row) : null;
  }

  /**
   * Most recently created nodes, newest first, optionally scoped to a circle.
   */
  findLast(limit: number, circleId?: string | null): MemoryNode[] {
    if (!(limit > 0)) return [];
    // LIMIT -1 is unbounded in SQLite; Infinity would not bind
    const take = Number.isFinite(limit) ? Math.floor(limit) : -1;

    const rows = this.guard('findLast', () => {
      if (circleId) {
        return this.db.prepare<[string, number], NodeRow>(`
          SELECT ${NODE_COLUMNS} FROM nodes WHERE circle_id = ?
          ORDER BY created_at DESC, rowid DESC LIMIT ?
        `).all(circleId, take);
      }
      return this.db.prepare<[number], NodeRow>(`
        SELECT ${NODE_COLUMNS} FROM nodes
        ORDER BY created_at DESC, rowid DESC LIMIT ?
      `).all(take);
    });

    log.debug(`findLast(${take}, ${circleId ?? '*'}): ${rows.length} rows`);
    return rows.map(r => this.mapNode(r));
  }

  /**
   * Nodes most similar to queryVector among those produced by the same model.
   * Nodes of any other model are never compared and never returned.
   */
  findSimilar(
    queryVector: readonly number[],
    queryVectorModelId: string,
    limit: number,
    options?: FindSimilarOptions
  ): MemoryNode[] {
    return this.findSimilarScored(queryVector, queryVectorModelId, limit, options).map(s => s.node);
  }

  findSimilarScored(
    queryVector: readonly number[],
    queryVectorModelId: string,
    limit: number,
    options?: FindSimilarOptions
  ): ScoredNode[] {
    if (!isWellFormedVector(queryVector)) {
      throw new ValidationError('queryVector', 'must be a non-empty array of finite numbers');
    }
    if (!(limit > 0)) return [];

    const query = toFloat32(queryVector);
    const circleId = options?.circleId;

    const rows = this.guard('findSimilar', () => {
      if (circleId) {
        return this.db.prepare<[string, string], NodeRow>(`
          SELECT ${NODE_COLUMNS} FROM nodes WHERE vector_model_id = ? AND circle_id = ?
          ORDER BY created_at DESC, rowid DESC
        `).all(queryVectorModelId, circleId);
      }
      return this.db.prepare<[string], NodeRow>(`
        SELECT ${NODE_COLUMNS} FROM nodes WHERE vector_model_id = ?
        ORDER BY created_at DESC, rowid DESC
      `).all(queryVectorModelId);
    });

    // newest-first input + stable sort: equal similarities stay newest first
    const scored = rows
      .map(row => {
        const node = this.mapNode(row);
        return { node, similarity: cosineSimilarity(query, node.vector) };
      })
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, Math.floor(limit));

    log.debug(`findSimilar(${queryVectorModelId}, ${limit}): ${rows.length} comparable, ${scored.length} returned`);
    return scored;
  }

  countByCircle(circleId: string): number {
    const row = this.guard('countByCircle', () =>
      this.db.prepare<[string], CountRow>('SELECT COUNT(*) AS count FROM nodes WHERE circle_id = ?').get(circleId)
    );
    return row?.count ?? 0;
  }

  getCircle(circleId: string): Circle | null {
    const row = this.guard('getCircle', () =>
      this.db.prepare<[string], CircleRow>('SELECT * FROM circles WHERE circle_id = ?').get(circleId)
    );
    return row ? this.mapCircle(row) : null;
  }

  /**
   * Registered circles plus any circle only referenced by nodes, with live counts.
   * The local circle is always listed first.
   */
  listCircles(): CircleSummary[] {
    const rows = this.guard('listCircles', () =>
      this.db.prepare<[], CircleSummaryRow>(`
        SELECT c.circle_id, c.name, c.local_only, c.metadata, c.created_at,
               (SELECT COUNT(*) FROM nodes n WHERE n.circle_id = c.circle_id) AS node_count
        FROM circles c
        UNION ALL
        SELECT n.circle_id, n.circle_id, 1, '{}', MIN(n.created_at), COUNT(*)
        FROM nodes n
        WHERE n.circle_id NOT IN (SELECT circle_id FROM circles)
        GROUP BY n.circle_id
      `).all()
    );

    const summaries = rows.map(r => ({ ...this.mapCircle(r), nodeCount: r.node_count }));
    if (!summaries.some(c => c.circleId === LOCAL_CIRCLE_ID)) {
      summaries.push({
        circleId: LOCAL_CIRCLE_ID,
        name: LOCAL_CIRCLE_ID,
        localOnly: true,
        metadata: {},
        createdAt: this.now().toISOString(),
        nodeCount: 0,
      });
    }

    return summaries.sort((a, b) => {
      if (a.circleId === LOCAL_CIRCLE_ID) return -1;
      if (b.circleId === LOCAL_CIRCLE_ID) return 1;
      return a.circleId.localeCompare(b.circleId);
    });
  }

  stats(): StoreStats {
    return this.guard('stats', () => {
      const total = this.db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM nodes').get();
      const range = this.db.prepare<[], RangeRow>(
        'SELECT MIN(created_at) AS oldest, MAX(created_at) AS newest FROM nodes'
      ).get();
      const models = this.db.prepare<[], ModelCountRow>(
        'SELECT vector_model_id, COUNT(*) AS count FROM nodes GROUP BY vector_model_id'
      ).all();

      const byModel: Record<string, number> = {};
      for (const m of models) byModel[m.vector_model_id] = m.count;

      return {
        totalNodes: total?.count ?? 0,
        circleCount: this.listCircles().length,
        oldestCreatedAt: range?.oldest ?? null,
        newestCreatedAt: range?.newest ?? null,
        models: byModel,
      };
    });
  }

  close(): void {
    this.db.close();
  }

  getDb(): Database.Database {
    return this.db;
  }

  // ─── Internals ──────────────────────────────────────────────────

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof MnemoError) throw err;
      throw toStorageError(operation, err);
    }
  }

  private mapNode(row: NodeRow): MemoryNode {
    return {
      nodeId: row.node_id,
      content: row.content,
      vector: decodeVector(row.vector),
      vectorModelId: row.vector_model_id,
      metadata: parseMetadata(row.metadata),
      createdAt: row.created_at,
      expiresAt: row.expires_at,
      circleId: row.circle_id,
    };
  }

  private mapCircle(row: CircleRow): Circle {
    return {
      circleId: row.circle_id,
      name: row.name,
      localOnly: row.local_only === 1,
      metadata: parseMetadata(row.metadata),
      createdAt: row.created_at,
    };
  }
}

// ─── Helpers ──────────────────────────────────────────────────────

function openDatabase(dbPath: string, readonly: boolean, busyTimeoutMs: number): Database.Database {
  try {
    if (!readonly && dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath, { readonly, fileMustExist: readonly, timeout: busyTimeoutMs });
    if (!readonly) {
      db.pragma('journal_mode = WAL');
      db.exec(SCHEMA);
    }
    return db;
  } catch (err) {
    throw toStorageError('open', err);
  }
}

export function newNodeId(): string {
  return randomUUID();
}

function normalizeNode(input: NewMemoryNode): MemoryNode {
  if (!input.nodeId.trim()) {
    throw new ValidationError('nodeId', 'must not be empty');
  }
  if (!isWellFormedVector(input.vector)) {
    throw new ValidationError('vector', 'must be a non-empty array of finite numbers');
  }
  if (!input.vectorModelId.trim()) {
    throw new ValidationError('vectorModelId', 'must not be empty');
  }
  const createdAt = normalizeTimestamp('createdAt', input.createdAt);
  const expiresAt = input.expiresAt === null ? null : normalizeTimestamp('expiresAt', input.expiresAt);

  return {
    nodeId: input.nodeId,
    content: input.content,
    vector: toFloat32(input.vector),
    vectorModelId: input.vectorModelId,
    metadata: { ...input.metadata },
    createdAt,
    expiresAt,
    circleId: input.circleId?.trim() ? input.circleId : LOCAL_CIRCLE_ID,
  };
}

// Stored timestamps are canonical UTC ISO strings so they sort as text.
function normalizeTimestamp(field: string, value: string): string {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new ValidationError(field, `not a valid timestamp: '${value}'`);
  }
  return new Date(time).toISOString();
}

function cloneNode(node: MemoryNode): MemoryNode {
  return { ...node, vector: [...node.vector], metadata: structuredClone(node.metadata) };
}

function parseMetadata(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) return {};
  return { ...parsed };
}

function sqliteCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

function toStorageError(operation: string, err: unknown): StorageUnavailableError {
  const code = sqliteCode(err);
  log.error(`${operation} failed (${code ?? 'unknown'}):`, err);
  return new StorageUnavailableError(operation, code, { cause: err });
}
