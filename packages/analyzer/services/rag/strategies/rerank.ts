// Reranked retrieval - oversized vector search reordered by a relevance model
import { RetrievalUnavailable, errorMessage } from "../errors";
import type { RerankHit, Reranker } from "../providers";
import type { Passage, RetrievalStrategy } from "../types";
import type { VectorIndex } from "../vectorIndex";

export type RerankStrategyConfig = {
  topK: number;
  candidateK: number;
};

export function createRerankStrategy(
  index: VectorIndex,
  reranker: Reranker,
  config: RerankStrategyConfig,
): RetrievalStrategy {
  return {
    name: "rerank",
    async retrieve(query, context) {
      const candidates = await index.search(query, Math.max(config.candidateK, config.topK), context?.meter);
      if (candidates.length === 0) return [];

      let hits: RerankHit[];
      try {
        hits = await reranker.rerank(
          query,
          candidates.map(c => c.text),
          config.topK,
        );
        context?.meter?.recordRerank();
      } catch (error) {
        throw new RetrievalUnavailable(`Reranking failed: ${errorMessage(error)}`, { cause: error });
      }

      const seen = new Set<number>();
      const reordered: Passage[] = [];
      for (const hit of [...hits].sort((a, b) => b.relevanceScore - a.relevanceScore)) {
        const candidate = candidates[hit.index];
        if (!candidate || seen.has(hit.index)) continue;
        seen.add(hit.index);
        reordered.push({ ...candidate, score: hit.relevanceScore });
      }
      return reordered.slice(0, config.topK);
    },
  };
}
