/**
 * @mnemo/ranking — pure, deterministic candidate ranking.
 *
 * cosineSimilarity: vector term (shared with the Node Store)
 * sequenceRatio: Ratcliff/Obershelp fuzzy term
 * hybridScore / rank: the blended ordering used by recall and the picker
 */

export { cosineSimilarity } from '@mnemo/shared';
export { sequenceRatio, matchingBlocks } from './sequence-matcher.js';
export type { MatchingBlock } from './sequence-matcher.js';
export {
  rank,
  hybridScore,
  scoreBreakdown,
  SEMANTIC_WEIGHT,
  FUZZY_WEIGHT,
  KEYWORD_BOOST,
} from './hybrid-rank.js';
export type { RankableNode, ScoreBreakdown } from './hybrid-rank.js';
