// Parent-document retrieval - match small child chunks, return their parent blocks
import type { FeedbackRecord } from "../../corpus/types";
import { RAG_CONFIG } from "../config";
import { buildParentChildPassages } from "../indexing";
import type { EmbeddingModel } from "../providers";
import type { Passage, RetrievalStrategy } from "../types";
import { VectorIndex } from "../vectorIndex";

export type ParentDocumentStrategyConfig = {
  topK: number;
  /** Children fetched per requested parent, to leave room for siblings collapsing */
  childMultiplier?: number;
  parentChunkSize?: number;
  childChunkSize?: number;
  childChunkOverlap?: number;
};

export async function createParentDocumentStrategy(
  records: readonly FeedbackRecord[],
  embedder: EmbeddingModel,
  config: ParentDocumentStrategyConfig,
): Promise<RetrievalStrategy> {
  const { parents, children } = buildParentChildPassages(records, {
    parentChunkSize: config.parentChunkSize ?? RAG_CONFIG.parentChunkSize,
    childChunkSize: config.childChunkSize ?? RAG_CONFIG.childChunkSize,
    childChunkOverlap: config.childChunkOverlap ?? RAG_CONFIG.childChunkOverlap,
  });
  const childIndex = await VectorIndex.build(children, embedder);
  const childK = config.topK * (config.childMultiplier ?? 4);

  console.log(`Parent-document index: ${parents.size} parents, ${childIndex.size} children`);

  return {
    name: "parent_document",
    async retrieve(query, context) {
      const hits = await childIndex.search(query, childK, context?.meter);

      const result: Passage[] = [];
      const seen = new Set<string>();
      for (const child of hits) {
        if (!child.parentId || seen.has(child.parentId)) continue;
        const parent = parents.get(child.parentId);
        if (!parent) continue;
        seen.add(parent.id);
        result.push({ ...parent, recordIds: [...parent.recordIds], score: child.score });
        if (result.length >= config.topK) break;
      }
      return result;
    },
  };
}
