import { ExternalCollaboratorError, MnemoError, errorMessage, isWellFormedVector, toFloat32 } from '@mnemo/shared';
import type { EmbeddingProvider } from './collaborators.js';
import { withTimeout } from './timeout.js';

/**
 * Encode text with a time limit and check the result is a usable vector.
 * Every failure comes back as ExternalCollaboratorError (timeouts as
 * EmbeddingTimeoutError). The vector is returned at float32 precision.
 */
export async function embedText(
  embedder: EmbeddingProvider,
  text: string,
  timeoutMs: number
): Promise<number[]> {
  let vector: number[];
  try {
    vector = await withTimeout(signal => embedder.encode(text, signal), timeoutMs);
  } catch (err) {
    if (err instanceof MnemoError) throw err;
    throw new ExternalCollaboratorError('embedding', `encode failed: ${errorMessage(err)}`, { cause: err });
  }

  if (!Array.isArray(vector) || !isWellFormedVector(vector)) {
    throw new ExternalCollaboratorError('embedding', `model ${embedder.modelId} returned a malformed vector`);
  }
  return toFloat32(vector);
}
