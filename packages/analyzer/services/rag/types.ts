// RAG Service Types
import type { UsageMeter } from "./usage";

/**
 * A unit of retrievable text. `id` is the passage identity used when merging
 * results, so two passages with the same id are the same span of the corpus.
 */
export type Passage = {
  id: string;
  text: string;
  /** Feedback records the text was taken from */
  recordIds: string[];
  /** Enclosing parent block, set on child chunks of the parent-document hierarchy */
  parentId?: string;
  /** Strategy-specific relevance score, higher is better */
  score?: number;
};

/** Ordered best-first; length never exceeds the strategy's K. */
export type RetrievalResult = Passage[];

export type RetrievalContext = {
  /** Receives the cost of every external call made while retrieving */
  meter?: UsageMeter;
};

export const STRATEGY_NAMES = ["naive", "bm25", "multi_query", "parent_document", "rerank", "ensemble"] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

export interface RetrievalStrategy {
  readonly name: string;
  retrieve(query: string, context?: RetrievalContext): Promise<RetrievalResult>;
}

/** A strategy as handed to the evaluation harness: built, or failed to build. */
export type StrategySlot =
  | { name: string; status: "ready"; strategy: RetrievalStrategy }
  | { name: string; status: "unavailable"; error: string };

export type AnswerSource =
  | { kind: "feedback"; recordIds: string[]; source?: string; date?: string; snippet: string }
  | { kind: "web"; url: string; title: string; snippet: string };

// Output from analyzer queries
export type AnalyzeOutput = {
  answer: string;
  sources?: AnswerSource[];
  tool: "feedback_search" | "web_search" | "none";
};
