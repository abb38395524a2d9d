// Multi-query retrieval - paraphrase the question, search with every variant, merge
import { RetrievalUnavailable, errorMessage } from "../errors";
import type { ChatModel } from "../providers";
import type { RetrievalStrategy } from "../types";
import type { VectorIndex } from "../vectorIndex";
import { mergeRoundRobin } from "./merge";

export type MultiQueryStrategyConfig = {
  topK: number;
  paraphrases?: number;
};

function buildParaphrasePrompt(query: string, count: number): string {
  return `You are helping search a database of customer feedback (support tickets, app store reviews, surveys and social media mentions).

Write ${count} different versions of the user question below. Each version should use different wording or focus on a different aspect, so that together they retrieve feedback a single phrasing would miss.

Return one question per line, with no numbering and no other text.

Original question: ${query}`;
}

/**
 * Parse the paraphrase completion: one question per line, numbering and bullets
 * stripped, blanks and repeats (including the original) dropped.
 */
export function parseParaphrases(text: string, original: string, limit: number): string[] {
  const seen = new Set([original.trim().toLowerCase()]);
  const result: string[] = [];

  for (const line of text.split("\n")) {
    const cleaned = line.replace(/^\s*(?:\d+[.)]|[-*•])\s*/, "").trim();
    if (!cleaned) continue;
    const key = cleaned.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(cleaned);
    if (result.length >= limit) break;
  }

  return result;
}

export function createMultiQueryStrategy(
  index: VectorIndex,
  chat: ChatModel,
  config: MultiQueryStrategyConfig,
): RetrievalStrategy {
  const paraphraseCount = config.paraphrases ?? 3;

  return {
    name: "multi_query",
    async retrieve(query, context) {
      if (index.size === 0 || !query.trim()) return [];

      let variants: string[];
      try {
        const completion = await chat.complete(buildParaphrasePrompt(query, paraphraseCount));
        context?.meter?.recordCompletion(chat.model, completion);
        variants = parseParaphrases(completion.text, query, paraphraseCount);
      } catch (error) {
        throw new RetrievalUnavailable(`Query paraphrasing failed: ${errorMessage(error)}`, { cause: error });
      }

      const lists = await Promise.all(
        [query, ...variants].map(variant => index.search(variant, config.topK, context?.meter)),
      );
      return mergeRoundRobin(lists, config.topK);
    },
  };
}
