/**
 * Mnemo Shared Types
 *
 * The Node Store is the shared primitive. Every package reads/writes it.
 * These types define its shape across all packages.
 */

// ─── Circles ──────────────────────────────────────────────────────

/** The distinguished circle every node without an explicit circle belongs to. */
export const LOCAL_CIRCLE_ID = 'local';

export interface Circle {
  circleId: string;
  name: string;
  localOnly: boolean;            // sharing transport is out of scope, only the flag is kept
  metadata: Record<string, unknown>; // reserved: per-circle key references etc.
  createdAt: string;             // ISO 8601
}

export interface CircleSummary extends Circle {
  nodeCount: number;
}

// ─── Nodes ────────────────────────────────────────────────────────

export interface MemoryNode {
  nodeId: string;
  content: string;
  vector: number[];              // float32 precision, meaningful only against vectorModelId
  vectorModelId: string;
  metadata: Record<string, unknown>;
  createdAt: string;             // ISO 8601, millisecond resolution
  expiresAt: string | null;      // informational, the sweep uses createdAt
  circleId: string;
}

/** Input accepted by NodeStore.save. A missing circle means the local circle. */
export type NewMemoryNode = Omit<MemoryNode, 'circleId'> & { circleId?: string | null };

export interface StoreStats {
  totalNodes: number;
  circleCount: number;
  oldestCreatedAt: string | null;
  newestCreatedAt: string | null;
  models: Record<string, number>; // vectorModelId -> node count
}

// ─── Event Bus ────────────────────────────────────────────────────

export type PurgeScope = 'expired' | 'circle' | 'all';
export type RecallMode = 'recall' | 'view';

export interface EventPayloads {
  'memory.node_captured': {
    nodeId: string;
    circleId: string;
    vectorModelId: string;
    contentLength: number;
  };
  'memory.node_recalled': {
    nodeId: string | null;        // null when the picked string matched no node
    circleId: string;
    mode: RecallMode;
    action: 'paste' | 'copy';
  };
  'memory.capture_failed': {
    reason: string;
    errorCode: string | null;
  };
  'memory.recall_failed': {
    reason: string;
    errorCode: string | null;
  };
  'memory.purged': {
    scope: PurgeScope;
    circleId: string | null;
    deleted: number;
  };
  'memory.expired': {
    ttlSeconds: number;
    deleted: number;
  };
  'circle.switched': {
    circleId: string;
    previousCircleId: string;
  };
  'circle.registered': {
    circleId: string;
    name: string;
  };
}

export type EventChannel = keyof EventPayloads;

export type EventSource = 'store' | 'capture' | 'recall' | 'purge' | 'sweeper' | 'circle' | 'system';

export interface BusEvent<T = unknown> {
  channel: EventChannel;
  timestamp: string;
  source: EventSource;
  circleId: string | null;
  payload: T;
}

export type EventHandler<T = unknown> = (event: BusEvent<T>) => void | Promise<void>;
