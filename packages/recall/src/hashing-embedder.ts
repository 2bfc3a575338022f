/**
 * Hashing Embedder — Deterministic Local Vectors
 *
 * Bag-of-words feature hashing: each token is hashed (FNV-1a, 32-bit) to a
 * bucket and a sign, counts are accumulated, and the result is L2-normalized.
 * No model download and no network, so it is the default provider for the
 * CLI, the inspector and the tests. Texts sharing words get a positive
 * cosine; unrelated texts land near 0.
 */

import type { EmbeddingProvider } from './collaborators.js';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export interface HashingEmbeddingOptions {
  dimensions?: number;
}

export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly modelId: string;
  readonly dimensions: number;

  constructor(opts?: HashingEmbeddingOptions) {
    const dimensions = opts?.dimensions ?? 256;
    if (!Number.isInteger(dimensions) || dimensions < 2) {
      throw new RangeError(`dimensions must be an integer >= 2, got ${dimensions}`);
    }
    this.dimensions = dimensions;
    this.modelId = `hashing-bow-${dimensions}`;
  }

  async encode(text: string, signal?: AbortSignal): Promise<number[]> {
    signal?.throwIfAborted();
    return this.encodeSync(text);
  }

  /** All zeros when the text has no tokens. */
  encodeSync(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      const bucket = hash % this.dimensions;
      // top bit picks the sign so collisions partly cancel out
      vector[bucket] += (hash & 0x80000000) === 0 ? 1 : -1;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map(v => v / norm);
  }
}

/** Lowercased alphanumeric tokens of two or more characters. */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(t => t.length > 1);
}

function fnv1a(token: string): number {
  let hash = FNV_OFFSET;
  for (const byte of Buffer.from(token, 'utf-8')) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}
