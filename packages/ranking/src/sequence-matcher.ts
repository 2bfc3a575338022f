/**
 * Ratcliff/Obershelp string similarity.
 *
 * Finds the longest common block, recurses into the unmatched pieces on
 * either side, and scores 2·M / T where M is the total matched length and T
 * the combined length of both strings. Works on code points, so astral
 * characters count once.
 */

export interface MatchingBlock {
  a: number;      // start in the first sequence
  b: number;      // start in the second sequence
  size: number;
}

/**
 * Longest common block inside a[alo:ahi] × b[blo:bhi].
 * Ties go to the block starting earliest in a, then earliest in b.
 */
function longestMatch(
  a: readonly string[],
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): MatchingBlock {
  let best: MatchingBlock = { a: alo, b: blo, size: 0 };
  let j2len = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { a: i - k + 1, b: j - k + 1, size: k };
      }
    }
    j2len = next;
  }

  return best;
}

export function matchingBlocks(first: string, second: string): MatchingBlock[] {
  const a = Array.from(first);
  const b = Array.from(second);

  const b2j = new Map<string, number[]>();
  b.forEach((ch, j) => {
    const positions = b2j.get(ch);
    if (positions) positions.push(j);
    else b2j.set(ch, [j]);
  });

  const blocks: MatchingBlock[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;

    const m = longestMatch(a, b2j, alo, ahi, blo, bhi);
    if (m.size === 0) continue;

    blocks.push(m);
    if (alo < m.a && blo < m.b) {
      queue.push([alo, m.a, blo, m.b]);
    }
    if (m.a + m.size < ahi && m.b + m.size < bhi) {
      queue.push([m.a + m.size, ahi, m.b + m.size, bhi]);
    }
  }

  return blocks.sort((x, y) => x.a - y.a || x.b - y.b);
}

/**
 * Similarity ratio in [0, 1]. Two empty strings are identical (1).
 */
export function sequenceRatio(first: string, second: string): number {
  const total = Array.from(first).length + Array.from(second).length;
  if (total === 0) return 1;

  const matched = matchingBlocks(first, second).reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / total;
}
