// Strategy Factory - builds retrieval strategies by name over one corpus snapshot
import type { FeedbackRecord } from "../../corpus/types";
import { RAG_CONFIG } from "../config";
import { ConfigurationError, errorMessage } from "../errors";
import { type ChunkingOptions, chunkRecords } from "../indexing";
import type { ModelServices } from "../providers";
import { type RetrievalStrategy, STRATEGY_NAMES, type StrategyName, type StrategySlot } from "../types";
import { VectorIndex } from "../vectorIndex";
import { createBm25Strategy } from "./bm25";
import { createEnsembleStrategy } from "./ensemble";
import { createMultiQueryStrategy } from "./multiQuery";
import { createNaiveStrategy } from "./naive";
import { createParentDocumentStrategy } from "./parentDocument";
import { createRerankStrategy } from "./rerank";

export type StrategyFactoryDeps = {
  records: readonly FeedbackRecord[];
  services: ModelServices;
  topK?: number;
  chunking?: ChunkingOptions;
  rerankCandidateK?: number;
};

export function isStrategyName(name: string): name is StrategyName {
  return STRATEGY_NAMES.some(known => known === name);
}

/**
 * Builds strategies lazily. The flat passage index is embedded once and shared by
 * every strategy that needs it.
 */
export class StrategyFactory {
  private readonly topK: number;
  private indexPromise: Promise<VectorIndex> | null = null;

  constructor(private readonly deps: StrategyFactoryDeps) {
    this.topK = deps.topK ?? RAG_CONFIG.defaultTopK;
  }

  private passages() {
    return chunkRecords(
      this.deps.records,
      this.deps.chunking ?? { chunkSize: RAG_CONFIG.chunkSize, chunkOverlap: RAG_CONFIG.chunkOverlap },
    );
  }

  private vectorIndex(): Promise<VectorIndex> {
    if (!this.indexPromise) {
      // A failed build is retried on the next request
      this.indexPromise = VectorIndex.build(this.passages(), this.deps.services.embedder).catch(error => {
        this.indexPromise = null;
        throw error;
      });
    }
    return this.indexPromise;
  }

  async build(name: StrategyName): Promise<RetrievalStrategy> {
    const { services } = this.deps;
    const topK = this.topK;

    switch (name) {
      case "naive":
        return createNaiveStrategy(await this.vectorIndex(), { topK });
      case "bm25":
        return createBm25Strategy(this.passages(), { topK });
      case "multi_query":
        return createMultiQueryStrategy(await this.vectorIndex(), services.chat, { topK });
      case "parent_document":
        return createParentDocumentStrategy(this.deps.records, services.embedder, { topK });
      case "rerank": {
        if (!services.reranker) {
          throw new ConfigurationError("COHERE_API_KEY environment variable is required for rerank retriever");
        }
        return createRerankStrategy(await this.vectorIndex(), services.reranker, {
          topK,
          candidateK: this.deps.rerankCandidateK ?? RAG_CONFIG.rerankCandidateK,
        });
      }
      case "ensemble":
        return createEnsembleStrategy(
          [
            { strategy: await this.build("bm25"), weight: 0.5 },
            { strategy: await this.build("naive"), weight: 0.5 },
          ],
          { topK },
        );
    }
  }

  /**
   * Build every requested strategy. A strategy that cannot be built becomes an
   * unavailable slot carrying its error; the others are unaffected.
   */
  async buildSlots(names: readonly string[]): Promise<StrategySlot[]> {
    const slots: StrategySlot[] = [];

    for (const name of names) {
      if (!isStrategyName(name)) {
        slots.push({ name, status: "unavailable", error: `Unknown retrieval strategy: ${name}` });
        continue;
      }
      try {
        slots.push({ name, status: "ready", strategy: await this.build(name) });
      } catch (error) {
        const message = errorMessage(error);
        console.error(`  Failed to build ${name} retriever: ${message}`);
        slots.push({ name, status: "unavailable", error: message });
      }
    }

    return slots;
  }
}
