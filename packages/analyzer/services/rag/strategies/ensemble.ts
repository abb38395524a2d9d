// Ensemble retrieval - run several strategies and fuse their rankings
import type { RetrievalStrategy } from "../types";
import { reciprocalRankFusion } from "./merge";

export type EnsembleMember = {
  strategy: RetrievalStrategy;
  weight: number;
};

export type EnsembleStrategyConfig = {
  topK: number;
  /** RRF smoothing constant */
  rrfK?: number;
};

/**
 * Members are listed in priority order; on equal fused scores the passage found
 * by the earlier member wins.
 */
export function createEnsembleStrategy(members: EnsembleMember[], config: EnsembleStrategyConfig): RetrievalStrategy {
  if (members.length < 2) {
    throw new Error("Ensemble retrieval needs at least two member strategies");
  }

  return {
    name: "ensemble",
    async retrieve(query, context) {
      const lists = await Promise.all(members.map(member => member.strategy.retrieve(query, context)));
      return reciprocalRankFusion(
        lists,
        members.map(member => member.weight),
        config.topK,
        config.rrfK,
      );
    },
  };
}
