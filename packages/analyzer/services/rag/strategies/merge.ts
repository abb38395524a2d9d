// Result merging shared by multi-query and ensemble retrieval
import type { Passage } from "../types";

/**
 * Interleave ranked lists by rank (all first hits, then all second hits, ...),
 * keeping the first occurrence of each passage id.
 */
export function mergeRoundRobin(lists: Passage[][], limit: number): Passage[] {
  const merged: Passage[] = [];
  const seen = new Set<string>();
  const depth = Math.max(0, ...lists.map(list => list.length));

  for (let rank = 0; rank < depth && merged.length < limit; rank++) {
    for (const list of lists) {
      const passage = list[rank];
      if (!passage || seen.has(passage.id)) continue;
      seen.add(passage.id);
      merged.push(passage);
      if (merged.length >= limit) break;
    }
  }

  return merged;
}

type FusedEntry = {
  passage: Passage;
  score: number;
  firstList: number;
  firstRank: number;
};

/**
 * Weighted reciprocal rank fusion: score(d) = Σ wᵢ / (c + rankᵢ(d)), ranks 1-based.
 * Ties go to the passage seen in the earlier list, then the better rank there.
 */
export function reciprocalRankFusion(lists: Passage[][], weights: number[], limit: number, c = 60): Passage[] {
  const fused = new Map<string, FusedEntry>();

  lists.forEach((list, listIdx) => {
    const weight = weights[listIdx] ?? 1;
    list.forEach((passage, rankIdx) => {
      const contribution = weight / (c + rankIdx + 1);
      const existing = fused.get(passage.id);
      if (existing) {
        existing.score += contribution;
      } else {
        fused.set(passage.id, { passage, score: contribution, firstList: listIdx, firstRank: rankIdx });
      }
    });
  });

  return [...fused.values()]
    .sort((a, b) => b.score - a.score || a.firstList - b.firstList || a.firstRank - b.firstRank)
    .slice(0, limit)
    .map(entry => ({ ...entry.passage, score: entry.score }));
}
