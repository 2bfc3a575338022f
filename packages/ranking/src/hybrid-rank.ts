/**
 * Hybrid Ranking — Order Candidates Against a Live Query
 *
 * score = semantic × 0.7 + fuzzy × 0.3 (+ 0.5 when the query is a literal substring)
 *
 * Semantic: cosine between the query vector and the node vector, only when
 * both come from the same embedding model. Anything else contributes 0, so a
 * node embedded by another model can never win on the semantic term.
 * Fuzzy: case-insensitive Ratcliff/Obershelp ratio of query and content.
 * Keyword: case-insensitive substring hit.
 *
 * Scores are ranking keys, not probabilities: the boost can push them past 1.
 * Nothing here throws and nothing here mutates its inputs, so rank() is safe
 * to call on every keystroke.
 */

import { cosineSimilarity, toFloat32 } from '@mnemo/shared';
import type { MemoryNode } from '@mnemo/shared';
import { sequenceRatio } from './sequence-matcher.js';

export const SEMANTIC_WEIGHT = 0.7;
export const FUZZY_WEIGHT = 0.3;
export const KEYWORD_BOOST = 0.5;

export type RankableNode = Pick<MemoryNode, 'content' | 'vector' | 'vectorModelId'>;

export interface ScoreBreakdown {
  semantic: number;
  fuzzy: number;
  keyword: boolean;
  total: number;
}

export function scoreBreakdown(
  query: string,
  node: RankableNode,
  queryVector: readonly number[] | null | undefined,
  queryVectorModelId: string | null | undefined
): ScoreBreakdown {
  const semantic = queryVector && queryVector.length > 0 && node.vectorModelId === queryVectorModelId
    ? cosineSimilarity(queryVector, node.vector)
    : 0;

  const queryLower = query.toLowerCase();
  const contentLower = node.content.toLowerCase();
  const fuzzy = sequenceRatio(queryLower, contentLower);
  const keyword = contentLower.includes(queryLower);

  const total = semantic * SEMANTIC_WEIGHT + fuzzy * FUZZY_WEIGHT + (keyword ? KEYWORD_BOOST : 0);
  return { semantic, fuzzy, keyword, total };
}

export function hybridScore(
  query: string,
  node: RankableNode,
  queryVector: readonly number[] | null | undefined,
  queryVectorModelId: string | null | undefined
): number {
  return scoreBreakdown(query, node, queryVector, queryVectorModelId).total;
}

/**
 * Reorder nodes by descending hybrid score. Ties keep their input order.
 * An empty query returns the nodes in their original order (browse mode).
 * Always returns a new array.
 */
export function rank<T extends RankableNode>(
  query: string,
  nodes: readonly T[],
  queryVector?: readonly number[] | null,
  queryVectorModelId?: string | null
): T[] {
  if (!query) return [...nodes];

  // same float32 precision the store compares at
  const vector = queryVector ? toFloat32(queryVector) : null;

  return nodes
    .map((node, index) => ({ node, index, score: hybridScore(query, node, vector, queryVectorModelId) }))
    .sort((x, y) => y.score - x.score || x.index - y.index)
    .map(s => s.node);
}
