/**
 * Tests for the Mnemo shared infrastructure:
 * - Node Store (SQLite)
 * - Event Bus (pub/sub)
 * - Vector codec and cosine similarity
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NodeStore, newNodeId } from '../../packages/shared/node-store/index.js';
import { EventBus, createEvent } from '../../packages/shared/event-bus/index.js';
import { cosineSimilarity, decodeVector, encodeVector, toFloat32 } from '../../packages/shared/vector/index.js';
import {
  DuplicateIdError,
  StorageUnavailableError,
  ValidationError,
} from '../../packages/shared/errors/index.js';
import type { NewMemoryNode } from '../../packages/shared/types/index.js';
import { MAX_TTL_SECONDS } from '../../packages/shared/config/index.js';
import { join } from 'path';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function makeNode(overrides: Partial<NewMemoryNode> = {}): NewMemoryNode {
  return {
    nodeId: newNodeId(),
    content: 'some text',
    vector: [1, 0, 0],
    vectorModelId: 'model-a',
    metadata: {},
    createdAt: '2026-03-01T11:00:00.000Z',
    expiresAt: null,
    ...overrides,
  };
}

// ─── Node Store Tests ───────────────────────────────────────────

describe('NodeStore', () => {
  let store: NodeStore;
  let tempDir: string;
  let dbPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'mnemo-test-'));
    dbPath = join(tempDir, 'nested', 'test.db');
    store = new NodeStore(dbPath, { now: () => NOW });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('save', () => {
    it('persists a node and reads it back at float32 precision', () => {
      const saved = store.save(makeNode({
        nodeId: 'n-1',
        content: 'buy milk',
        vector: [0.1, 0.2, 0.3],
        metadata: { source: 'clipboard' },
      }));

      expect(saved.circleId).toBe('local');
      expect(saved.vector).toEqual(toFloat32([0.1, 0.2, 0.3]));

      const loaded = store.getNode('n-1');
      expect(loaded).toEqual(saved);
      expect(loaded?.vector).toEqual([Math.fround(0.1), Math.fround(0.2), Math.fround(0.3)]);
      expect(loaded?.metadata).toEqual({ source: 'clipboard' });
    });

    it('normalizes a missing or blank circle to local', () => {
      store.save(makeNode({ nodeId: 'a', circleId: null }));
      store.save(makeNode({ nodeId: 'b', circleId: '  ' }));

      expect(store.getNode('a')?.circleId).toBe('local');
      expect(store.getNode('b')?.circleId).toBe('local');
      expect(store.countByCircle('local')).toBe(2);
    });

    it('stores timestamps as canonical UTC ISO strings', () => {
      store.save(makeNode({ nodeId: 'ts', createdAt: '2026-03-01T13:00:00+01:00' }));
      expect(store.getNode('ts')?.createdAt).toBe('2026-03-01T12:00:00.000Z');
    });

    it('hands out independent copies', () => {
      const saved = store.save(makeNode({ nodeId: 'copy', metadata: { tags: ['x'] } }));
      saved.vector[0] = 42;
      saved.metadata.tags = [];

      const loaded = store.getNode('copy');
      expect(loaded?.vector[0]).toBe(1);
      expect(loaded?.metadata).toEqual({ tags: ['x'] });
    });

    it('rejects a duplicate id and writes nothing', () => {
      store.save(makeNode({ nodeId: 'dup', content: 'first' }));

      expect(() => store.save(makeNode({ nodeId: 'dup', content: 'second' }))).toThrow(DuplicateIdError);
      expect(store.countByCircle('local')).toBe(1);
      expect(store.getNode('dup')?.content).toBe('first');
    });

    it('rejects malformed nodes', () => {
      expect(() => store.save(makeNode({ vector: [] }))).toThrow(ValidationError);
      expect(() => store.save(makeNode({ vector: [1, Number.NaN] }))).toThrow(ValidationError);
      expect(() => store.save(makeNode({ vectorModelId: '' }))).toThrow(ValidationError);
      expect(() => store.save(makeNode({ nodeId: '' }))).toThrow(ValidationError);
      expect(() => store.save(makeNode({ createdAt: 'yesterday-ish' }))).toThrow(ValidationError);
      expect(store.stats().totalNodes).toBe(0);
    });

    it('registers the circle of a node implicitly', () => {
      store.save(makeNode({ circleId: 'work' }));
      expect(store.getCircle('work')?.name).toBe('work');
    });
  });

  describe('findLast', () => {
    it('returns the newest nodes first, up to the limit', () => {
      store.save(makeNode({ nodeId: 'old', createdAt: '2026-03-01T09:00:00.000Z' }));
      store.save(makeNode({ nodeId: 'new', createdAt: '2026-03-01T11:00:00.000Z' }));
      store.save(makeNode({ nodeId: 'mid', createdAt: '2026-03-01T10:00:00.000Z' }));

      expect(store.findLast(10).map(n => n.nodeId)).toEqual(['new', 'mid', 'old']);
      expect(store.findLast(2).map(n => n.nodeId)).toEqual(['new', 'mid']);
    });

    it('orders equal timestamps by later insert first', () => {
      store.save(makeNode({ nodeId: 'first' }));
      store.save(makeNode({ nodeId: 'second' }));
      expect(store.findLast(2).map(n => n.nodeId)).toEqual(['second', 'first']);
    });

    it('scopes to one circle', () => {
      store.save(makeNode({ nodeId: 'w1', circleId: 'work' }));
      store.save(makeNode({ nodeId: 'l1' }));
      store.save(makeNode({ nodeId: 'w2', circleId: 'work', createdAt: '2026-03-01T11:30:00.000Z' }));

      expect(store.findLast(10, 'work').map(n => n.nodeId)).toEqual(['w2', 'w1']);
      expect(store.findLast(10, 'local').map(n => n.nodeId)).toEqual(['l1']);
    });

    it('treats an infinite limit as no limit', () => {
      store.save(makeNode({ nodeId: 'a', createdAt: '2026-03-01T09:00:00.000Z' }));
      store.save(makeNode({ nodeId: 'b', createdAt: '2026-03-01T10:00:00.000Z', circleId: 'work' }));

      expect(store.findLast(Infinity).map(n => n.nodeId)).toEqual(['b', 'a']);
      expect(store.findLast(Infinity, 'work').map(n => n.nodeId)).toEqual(['b']);
    });

    it('returns nothing for a non-positive limit', () => {
      store.save(makeNode());
      expect(store.findLast(0)).toEqual([]);
      expect(store.findLast(-3)).toEqual([]);
    });
  });

  describe('findSimilar', () => {
    it('compares only nodes of the query model', () => {
      store.save(makeNode({ nodeId: 'a-x', vector: [1, 0] }));
      store.save(makeNode({ nodeId: 'a-y', vector: [0, 1] }));
      store.save(makeNode({ nodeId: 'b-x', vector: [1, 0], vectorModelId: 'model-b' }));

      const results = store.findSimilarScored([1, 0], 'model-a', 10);
      expect(results.map(r => r.node.nodeId)).toEqual(['a-x', 'a-y']);
      expect(results.map(r => r.similarity)).toEqual([1, 0]);
    });

    it('skips nodes whose vector length differs instead of failing', () => {
      store.save(makeNode({ nodeId: 'short', vector: [1, 0] }));
      store.save(makeNode({ nodeId: 'long', vector: [1, 0, 0] }));

      const results = store.findSimilarScored([1, 0, 0], 'model-a', 10);
      expect(results.map(r => [r.node.nodeId, r.similarity])).toEqual([['long', 1], ['short', 0]]);
    });

    it('honours the limit and the circle filter', () => {
      store.save(makeNode({ nodeId: 'l', vector: [1, 0] }));
      store.save(makeNode({ nodeId: 'w', vector: [0.9, 0.1], circleId: 'work' }));

      expect(store.findSimilar([1, 0], 'model-a', 1).map(n => n.nodeId)).toEqual(['l']);
      expect(store.findSimilar([1, 0], 'model-a', 5, { circleId: 'work' }).map(n => n.nodeId)).toEqual(['w']);
      expect(store.findSimilar([1, 0], 'model-a', 0)).toEqual([]);
    });

    it('breaks similarity ties by newest first', () => {
      store.save(makeNode({ nodeId: 'older', vector: [0, 1], createdAt: '2026-03-01T08:00:00.000Z' }));
      store.save(makeNode({ nodeId: 'newer', vector: [0, 1], createdAt: '2026-03-01T09:00:00.000Z' }));

      expect(store.findSimilar([0, 1], 'model-a', 2).map(n => n.nodeId)).toEqual(['newer', 'older']);
    });

    it('rejects an empty or non-finite query vector', () => {
      expect(() => store.findSimilar([], 'model-a', 5)).toThrow(ValidationError);
      expect(() => store.findSimilar([Infinity], 'model-a', 5)).toThrow(ValidationError);
    });
  });

  describe('deleteExpired', () => {
    it('deletes nodes older than the TTL in every circle', () => {
      store.save(makeNode({ nodeId: 'stale-local', createdAt: '2026-03-01T11:00:00.000Z' }));
      store.save(makeNode({ nodeId: 'stale-work', createdAt: '2026-03-01T10:00:00.000Z', circleId: 'work' }));
      store.save(makeNode({ nodeId: 'fresh', createdAt: '2026-03-01T11:59:30.000Z' }));

      expect(store.deleteExpired(60)).toBe(2);
      expect(store.findLast(10).map(n => n.nodeId)).toEqual(['fresh']);
    });

    it('judges age by createdAt, not expiresAt', () => {
      store.save(makeNode({
        nodeId: 'late-expiry',
        createdAt: '2026-03-01T11:00:00.000Z',
        expiresAt: '2027-01-01T00:00:00.000Z',
      }));
      expect(store.deleteExpired(60)).toBe(1);
    });

    it('with ttl 0 deletes everything created strictly before now', () => {
      store.save(makeNode({ nodeId: 'past', createdAt: '2026-03-01T11:59:59.999Z' }));
      store.save(makeNode({ nodeId: 'now', createdAt: NOW.toISOString() }));

      expect(store.deleteExpired(0)).toBe(1);
      expect(store.getNode('now')).not.toBeNull();
    });

    it('rejects a negative TTL', () => {
      expect(() => store.deleteExpired(-1)).toThrow(ValidationError);
    });

    it('rejects a TTL whose cutoff is not a representable date', () => {
      store.save(makeNode({ nodeId: 'kept' }));

      expect(() => store.deleteExpired(1e13)).toThrow(ValidationError);
      expect(() => store.deleteExpired(1e13)).toThrow('ttlSeconds: reaches before the earliest representable date');
      expect(store.getNode('kept')).not.toBeNull();
    });

    it('keeps everything under the longest configurable TTL', () => {
      store.save(makeNode({ nodeId: 'kept', createdAt: '2000-01-01T00:00:00.000Z' }));
      expect(store.deleteExpired(MAX_TTL_SECONDS)).toBe(0);
    });
  });

  describe('purge', () => {
    it('purgeCircle deletes only that circle', () => {
      store.save(makeNode({ circleId: 'work' }));
      store.save(makeNode({ circleId: 'work' }));
      store.save(makeNode());

      expect(store.purgeCircle('work')).toBe(2);
      expect(store.countByCircle('work')).toBe(0);
      expect(store.countByCircle('local')).toBe(1);
    });

    it('purgeAll empties every circle', () => {
      store.save(makeNode());
      store.save(makeNode());
      store.save(makeNode({ circleId: 'work' }));
      store.save(makeNode({ circleId: 'work' }));

      expect(store.purgeAll()).toBe(4);
      expect(store.countByCircle('local')).toBe(0);
      expect(store.countByCircle('work')).toBe(0);
    });

    it('purging an unknown circle deletes nothing', () => {
      store.save(makeNode());
      expect(store.purgeCircle('nowhere')).toBe(0);
      expect(store.countByCircle('local')).toBe(1);
    });
  });

  describe('circles & stats', () => {
    it('lists local first, then the rest by id, with live counts', () => {
      store.save(makeNode({ circleId: 'work' }));
      store.registerCircle({ circleId: 'archive', name: 'Archive', localOnly: false, metadata: {} });

      const circles = store.listCircles();
      expect(circles.map(c => [c.circleId, c.nodeCount])).toEqual([
        ['local', 0],
        ['archive', 0],
        ['work', 1],
      ]);
      expect(circles[1].name).toBe('Archive');
      expect(circles[1].localOnly).toBe(false);
    });

    it('registerCircle renames an existing circle', () => {
      store.registerCircle({ circleId: 'work', name: 'Work', localOnly: true, metadata: {} });
      const renamed = store.registerCircle({ circleId: 'work', name: 'Office', localOnly: true, metadata: {} });
      expect(renamed.name).toBe('Office');
    });

    it('reports totals, time range and models', () => {
      store.save(makeNode({ createdAt: '2026-03-01T08:00:00.000Z' }));
      store.save(makeNode({ createdAt: '2026-03-01T10:00:00.000Z', vectorModelId: 'model-b', circleId: 'work' }));
      store.save(makeNode({ createdAt: '2026-03-01T09:00:00.000Z' }));

      expect(store.stats()).toEqual({
        totalNodes: 3,
        circleCount: 2,
        oldestCreatedAt: '2026-03-01T08:00:00.000Z',
        newestCreatedAt: '2026-03-01T10:00:00.000Z',
        models: { 'model-a': 2, 'model-b': 1 },
      });
    });
  });

  describe('storage failures', () => {
    it('reports a missing database opened read-only as unavailable', () => {
      const attempt = () => new NodeStore(join(tempDir, 'missing.db'), { readonly: true });
      expect(attempt).toThrow(StorageUnavailableError);
      try {
        attempt();
      } catch (err) {
        expect(err instanceof StorageUnavailableError && err.operation).toBe('open');
      }
    });

    it('surfaces write failures with the SQLite code', () => {
      store.save(makeNode({ nodeId: 'kept' }));
      const reader = new NodeStore(dbPath, { readonly: true });
      try {
        expect(reader.findLast(5).map(n => n.nodeId)).toEqual(['kept']);

        let caught: unknown = null;
        try {
          reader.purgeAll();
        } catch (err) {
          caught = err;
        }
        expect(caught).toBeInstanceOf(StorageUnavailableError);
        expect(caught instanceof StorageUnavailableError && caught.operation).toBe('purgeAll');
        expect(caught instanceof StorageUnavailableError && caught.sqliteCode).toBe('SQLITE_READONLY');
      } finally {
        reader.close();
      }
      expect(store.countByCircle('local')).toBe(1);
    });
  });
});

// ─── Event Bus Tests ────────────────────────────────────────────

describe('EventBus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus({ maxHistory: 3 });
  });

  const captured = (nodeId: string) => createEvent(
    'memory.node_captured',
    'capture',
    { nodeId, circleId: 'local', vectorModelId: 'model-a', contentLength: 4 },
    { circleId: 'local' }
  );

  it('delivers to exact, prefix and wildcard subscribers in subscription order', async () => {
    const seen: string[] = [];
    bus.on('*', () => { seen.push('all'); });
    bus.on('memory.node_captured', e => { seen.push(`exact:${e.payload.nodeId}`); });
    bus.on('memory.*', () => { seen.push('prefix'); });
    bus.on('circle.*', () => { seen.push('circle'); });

    await bus.emit(captured('n1'));
    expect(seen).toEqual(['all', 'exact:n1', 'prefix']);
  });

  it('once handlers fire a single time', async () => {
    let calls = 0;
    bus.once('memory.node_captured', () => { calls++; });

    await bus.emit(captured('n1'));
    await bus.emit(captured('n2'));
    expect(calls).toBe(1);
    expect(bus.getStats()).toEqual({});
  });

  it('isolates a failing handler from the others and the publisher', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const seen: string[] = [];
    bus.on('memory.node_captured', () => { throw new Error('boom'); });
    bus.on('memory.node_captured', () => { seen.push('second'); });

    await expect(bus.emit(captured('n1'))).resolves.toBeUndefined();
    expect(seen).toEqual(['second']);
    vi.restoreAllMocks();
  });

  it('unsubscribes', async () => {
    let calls = 0;
    const off = bus.on('memory.*', () => { calls++; });
    off();
    await bus.emit(captured('n1'));
    expect(calls).toBe(0);
  });

  it('keeps a bounded history', async () => {
    for (const id of ['a', 'b', 'c', 'd']) {
      await bus.emit(captured(id));
    }
    await bus.emit(createEvent('circle.switched', 'circle', { circleId: 'work', previousCircleId: 'local' }));

    const history = bus.getHistory();
    expect(history).toHaveLength(3);
    expect(bus.getHistory('memory.node_captured')).toHaveLength(2);
    expect(history[2].channel).toBe('circle.switched');
    expect(history[2].circleId).toBeNull();
  });
});

// ─── Vector Tests ───────────────────────────────────────────────

describe('vectors', () => {
  it('encodes little-endian float32, four bytes per component', () => {
    const buf = encodeVector([1, -2.5]);
    expect(buf.byteLength).toBe(8);
    expect(buf.readFloatLE(0)).toBe(1);
    expect(buf.readFloatLE(4)).toBe(-2.5);
    expect(decodeVector(buf)).toEqual([1, -2.5]);
  });

  it('computes cosine similarity', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    expect(cosineSimilarity([3, 4], [6, 8])).toBeCloseTo(1, 12);
  });

  it('returns the 0 sentinel for degenerate input', () => {
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});
