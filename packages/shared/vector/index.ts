/**
 * Vector primitives shared by the store and the ranking engine.
 *
 * Vectors are persisted as little-endian IEEE-754 float32, 4 bytes per
 * component. Every in-process comparison runs on float32-downcast values so
 * a freshly encoded vector and its stored copy score identically.
 */

const FLOAT32_BYTES = 4;

/** Round every component to float32 precision. */
export function toFloat32(vector: readonly number[]): number[] {
  return Array.from(Float32Array.from(vector));
}

export function encodeVector(vector: readonly number[]): Buffer {
  const buf = Buffer.alloc(vector.length * FLOAT32_BYTES);
  vector.forEach((value, i) => buf.writeFloatLE(value, i * FLOAT32_BYTES));
  return buf;
}

export function decodeVector(buf: Uint8Array): number[] {
  const view = Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength);
  const count = Math.floor(view.byteLength / FLOAT32_BYTES);
  const out = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    out[i] = view.readFloatLE(i * FLOAT32_BYTES);
  }
  return out;
}

export function isWellFormedVector(vector: readonly number[]): boolean {
  return vector.length > 0 && vector.every(v => Number.isFinite(v));
}

/**
 * Cosine similarity in [-1, 1].
 * Empty, zero-magnitude or length-mismatched inputs give the sentinel 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }

  if (magA === 0 || magB === 0) return 0;
  const sim = dot / (Math.sqrt(magA) * Math.sqrt(magB));
  // float error can push |sim| a hair past 1
  return Math.max(-1, Math.min(1, sim));
}
