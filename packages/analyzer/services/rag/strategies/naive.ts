import type { RetrievalStrategy } from "../types";
import type { VectorIndex } from "../vectorIndex";

export type NaiveStrategyConfig = {
  topK: number;
  name?: string;
};

/** Single nearest-neighbour search over the flat passage index. */
export function createNaiveStrategy(index: VectorIndex, config: NaiveStrategyConfig): RetrievalStrategy {
  return {
    name: config.name ?? "naive",
    retrieve: (query, context) => index.search(query, config.topK, context?.meter),
  };
}
